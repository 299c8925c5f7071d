/**
 * Paper Digest - Main Entry Points
 */

export * from './types.js';
export { PaperError, ExtractionError } from './errors.js';
export { loadConfig, type AppConfig } from './config.js';
export { resolveApiKey, FileSecretStore, type SecretStore } from './secrets.js';
export { createModelGateway, createModelClient, ModelGateway, type TextGenerator, type GatewayResult } from './models/gateway.js';
export { splitText } from './pipeline/chunking.js';
export { MapReduceSummarizer, type SummaryPhase } from './pipeline/summarize.js';
export { buildChatPrompt } from './pipeline/context.js';
export { PaperChat } from './pipeline/chat.js';
export { PaperService } from './pipeline/papers.js';
export { HttpExtractor, canonicalizeUrl, type Extractor } from './extraction/extractor.js';
export { MemoryCacheStore, type CacheStore } from './storage/cache.js';
export { SQLiteCacheStore } from './storage/sqlite.js';
export { PaperRepository } from './storage/papers.js';
export { createApp, startServer } from './api/server.js';
