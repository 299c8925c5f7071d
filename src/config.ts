/**
 * Runtime configuration, read from the environment once at startup.
 */

import { z } from 'zod';

const intFromEnv = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);

// Unset and empty variables both fall back to the default
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

export const ConfigSchema = z
  .object({
    port: intFromEnv(3000),

    // Model
    modelProvider: z.enum(['gemini', 'anthropic', 'openrouter']).default('gemini'),
    modelName: z.string().min(1).optional(),
    modelTimeoutMs: intFromEnv(60_000),
    requestDeadlineMs: intFromEnv(300_000),
    modelMaxAttempts: intFromEnv(3),
    retryBaseDelayMs: intFromEnv(1000, 0),
    retryMaxDelayMs: intFromEnv(10_000, 0),

    // Pipeline
    maxChunkChars: intFromEnv(20_000),
    mapConcurrency: intFromEnv(4),
    maxContextChars: intFromEnv(60_000),
    minTextChars: intFromEnv(200, 0),

    // Cache
    cacheTtlMs: intFromEnv(3_600_000),
    cacheBackend: z.enum(['memory', 'sqlite']).default('memory'),
    cacheDbPath: z.string().min(1).default('./paper-digest.db'),

    secretFile: z.string().min(1).optional(),
  })
  .refine((config) => config.modelTimeoutMs < config.requestDeadlineMs, {
    message: 'MODEL_TIMEOUT_MS must be lower than REQUEST_DEADLINE_MS',
    path: ['modelTimeoutMs'],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof AppConfig, string> = {
  port: 'PORT',
  modelProvider: 'MODEL_PROVIDER',
  modelName: 'MODEL_NAME',
  modelTimeoutMs: 'MODEL_TIMEOUT_MS',
  requestDeadlineMs: 'REQUEST_DEADLINE_MS',
  modelMaxAttempts: 'MODEL_MAX_ATTEMPTS',
  retryBaseDelayMs: 'RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'RETRY_MAX_DELAY_MS',
  maxChunkChars: 'MAX_CHUNK_CHARS',
  mapConcurrency: 'MAP_CONCURRENCY',
  maxContextChars: 'MAX_CONTEXT_CHARS',
  minTextChars: 'MIN_TEXT_CHARS',
  cacheTtlMs: 'CACHE_TTL_MS',
  cacheBackend: 'CACHE_BACKEND',
  cacheDbPath: 'CACHE_DB_PATH',
  secretFile: 'SECRET_FILE',
};

const ENV_NAMES = new Map<string, string>(Object.entries(ENV_KEYS));

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    raw[field] = blankToUndefined(env[name]);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const field = String(issue.path[0]);
        return `${ENV_NAMES.get(field) ?? field}: ${issue.message}`;
      })
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
