import { startServer } from './api/server.js';

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
