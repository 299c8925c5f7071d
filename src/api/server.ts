/**
 * Paper Digest API Server
 *
 * Hono-based API for tiered paper summaries and grounded chat.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { timeout } from 'hono/timeout';
import { HTTPException } from 'hono/http-exception';
import { serve } from '@hono/node-server';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { ChatResponse, ComplexityTier, ErrorResponse, SummarizeResponse } from '../types.js';
import { isComplexityTier } from '../types.js';
import { PaperError, type PaperErrorCode } from '../errors.js';
import { loadConfig, type AppConfig } from '../config.js';
import { FileSecretStore, resolveApiKey } from '../secrets.js';
import { createModelGateway, type CumulativeUsage } from '../models/gateway.js';
import { MapReduceSummarizer } from '../pipeline/summarize.js';
import { PaperChat } from '../pipeline/chat.js';
import { PaperService } from '../pipeline/papers.js';
import { HttpExtractor } from '../extraction/extractor.js';
import { MemoryCacheStore, type CacheStore } from '../storage/cache.js';
import { SQLiteCacheStore } from '../storage/sqlite.js';
import { PaperRepository } from '../storage/papers.js';

// =============================================================================
// APP SETUP
// =============================================================================

export interface AppServices {
  papers: PaperService;
  /** Model usage for the stats endpoint */
  stats: { model: string; getCumulativeUsage(): CumulativeUsage };
  /** Upper bound on one request, in milliseconds */
  requestDeadlineMs?: number;
}

export const DEGRADED_NOTICE =
  'Some parts of the paper could not be summarized, so this summary may leave out details.';

const STATUS_BY_CODE: Record<PaperErrorCode, 400 | 404 | 422 | 502 | 503> = {
  INVALID_REQUEST: 400,
  NO_DOCUMENT_FOR_SESSION: 404,
  EXTRACTION_FAILED: 422,
  UPSTREAM_ERROR: 502,
  MODEL_UNAVAILABLE: 503,
};

const SummarizeBodySchema = z.object({
  paper_url: z.string({ required_error: 'paper_url is required' }).trim().min(1, 'paper_url is required'),
  complexity: z.unknown().optional(),
});

const ChatBodySchema = z.object({
  paper_url: z.string({ required_error: 'paper_url is required' }).trim().min(1, 'paper_url is required'),
  message: z.string({ required_error: 'message is required' }).trim().min(1, 'message is required'),
  session_id: z.string().trim().min(1).optional(),
});

/**
 * Unknown or missing levels fall back to LOW.
 */
export function parseComplexity(value: unknown): ComplexityTier {
  if (typeof value !== 'string') return 'LOW';
  const upper = value.trim().toUpperCase();
  return isComplexityTier(upper) ? upper : 'LOW';
}

async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    throw new PaperError('INVALID_REQUEST', 'Invalid JSON in request body');
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new PaperError('INVALID_REQUEST', parsed.error.issues[0]?.message ?? 'Invalid request body');
  }
  return parsed.data;
}

export function createApp(services: AppServices): Hono {
  const app = new Hono();
  const { papers, stats } = services;

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use('*', cors());

  if (services.requestDeadlineMs !== undefined) {
    app.use(
      '/api/*',
      timeout(
        services.requestDeadlineMs,
        new HTTPException(503, { message: 'The request took too long, please try again later' })
      )
    );
  }

  app.onError((error, c) => {
    if (error instanceof PaperError) {
      const body: ErrorResponse = { success: false, error: error.message, code: error.code };
      return c.json(body, STATUS_BY_CODE[error.code]);
    }
    if (error instanceof HTTPException && error.status === 503) {
      console.warn(`[Server] ${c.req.method} ${c.req.path} exceeded the request deadline`);
      const body: ErrorResponse = { success: false, error: error.message, code: 'MODEL_UNAVAILABLE' };
      return c.json(body, 503);
    }

    console.error(`[Server] ${c.req.method} ${c.req.path} failed:`, error);
    const body: ErrorResponse = { success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' };
    return c.json(body, 500);
  });

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/stats', (c) => {
    return c.json({ model: stats.model, usage: stats.getCumulativeUsage() });
  });

  // Summarize a paper at the requested complexity
  app.post('/api/summarize', async (c) => {
    const body = await readBody(c, SummarizeBodySchema);
    const tier = parseComplexity(body.complexity);

    const outcome = await papers.summarize(body.paper_url, tier);

    const response: SummarizeResponse = {
      success: true,
      summary: outcome.summary.text,
      level: tier,
      paper_url: outcome.url,
      chunk_count: outcome.summary.chunkCount,
      cached: outcome.cached,
      degraded: outcome.summary.degraded,
    };
    if (outcome.summary.degraded) {
      response.notice = DEGRADED_NOTICE;
    }
    return c.json(response);
  });

  // Ask a follow-up question about a summarized paper
  app.post('/api/chat', async (c) => {
    const body = await readBody(c, ChatBodySchema);
    const sessionId = body.session_id ?? uuid();

    const outcome = await papers.ask(body.paper_url, sessionId, body.message);

    const response: ChatResponse = {
      success: true,
      answer: outcome.answer,
      session_id: sessionId,
    };
    return c.json(response);
  });

  return app;
}

// =============================================================================
// SERVER START
// =============================================================================

function createCacheStore(config: AppConfig): CacheStore {
  if (config.cacheBackend === 'sqlite') {
    console.log(`[Server] Using SQLite cache at ${config.cacheDbPath}`);
    return new SQLiteCacheStore(config.cacheDbPath);
  }
  return new MemoryCacheStore();
}

export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = loadConfig(env);
  const secrets = config.secretFile ? new FileSecretStore(config.secretFile) : undefined;
  const apiKey = await resolveApiKey(config.modelProvider, env, secrets);

  const gateway = createModelGateway(
    { provider: config.modelProvider, apiKey, model: config.modelName },
    {
      maxAttempts: config.modelMaxAttempts,
      timeoutMs: config.modelTimeoutMs,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    }
  );

  const store = createCacheStore(config);
  const repository = new PaperRepository(store, config.cacheTtlMs);
  const papers = new PaperService({
    repository,
    extractor: new HttpExtractor({ minTextChars: config.minTextChars }),
    summarizer: new MapReduceSummarizer(gateway, {
      maxChunkChars: config.maxChunkChars,
      concurrency: config.mapConcurrency,
    }),
    chat: new PaperChat(gateway, repository, { maxContextChars: config.maxContextChars }),
  });

  const sweeper = setInterval(() => {
    store
      .sweep()
      .then((removed) => {
        if (removed > 0) console.log(`[Cache] Swept ${removed} expired entr${removed === 1 ? 'y' : 'ies'}`);
      })
      .catch((error: unknown) => {
        console.error('[Cache] Sweep failed:', error);
      });
  }, Math.min(config.cacheTtlMs, 60_000));
  sweeper.unref();

  const app = createApp({ papers, stats: gateway, requestDeadlineMs: config.requestDeadlineMs });

  serve(
    {
      fetch: app.fetch,
      port: config.port,
    },
    (info) => {
      console.log(`Paper Digest server running at http://localhost:${info.port}`);
      console.log(`Model: ${config.modelProvider}/${gateway.model}`);
    }
  );
}
