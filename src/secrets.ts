/**
 * API key resolution: environment first, then a secret store.
 *
 * A stored secret is either the bare key or a JSON object of named keys.
 * For an object, the provider's variable name wins; otherwise the first
 * string value is used.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ModelProvider } from './types.js';

export const PROVIDER_KEY_ENV: Record<ModelProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
};

export interface SecretStore {
  /** Raw secret payload, undefined when there is none */
  read(): Promise<string | undefined>;
}

export class FileSecretStore implements SecretStore {
  constructor(private readonly path: string) {}

  async read(): Promise<string | undefined> {
    const raw = await readFile(this.path, 'utf8');
    return raw.trim() || undefined;
  }
}

const SecretObjectSchema = z.record(z.string(), z.unknown());

export function keyFromSecret(secret: string, envName: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(secret);
  } catch {
    // Not JSON: the secret is the key itself
    return secret.trim() || undefined;
  }

  if (typeof json === 'string') {
    return json.trim() || undefined;
  }

  const parsed = SecretObjectSchema.safeParse(json);
  if (!parsed.success) {
    return undefined;
  }

  const named = parsed.data[envName];
  if (typeof named === 'string' && named.trim()) {
    return named.trim();
  }
  const first = Object.values(parsed.data).find(
    (value): value is string => typeof value === 'string' && value.trim() !== ''
  );
  return first?.trim();
}

export async function resolveApiKey(
  provider: ModelProvider,
  env: NodeJS.ProcessEnv = process.env,
  store?: SecretStore
): Promise<string> {
  const envName = PROVIDER_KEY_ENV[provider];
  const fromEnv = env[envName]?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  if (store) {
    const secret = await store.read();
    const fromStore = secret === undefined ? undefined : keyFromSecret(secret, envName);
    if (fromStore) {
      console.log(`[Secrets] Using ${provider} API key from secret store`);
      return fromStore;
    }
  }

  throw new Error(`No API key for ${provider}: set ${envName} or provide SECRET_FILE`);
}
