/**
 * Paper Repository
 *
 * Typed view over a CacheStore:
 *   document:{canonical_url}          -> CachedPaper (JSON)
 *   session:{session_id}:{canonical_url} -> ordered chat turns
 */

import { z } from 'zod';
import type { CachedPaper, ChatTurn, NewChatTurn, SummaryRecord } from '../types.js';
import { COMPLEXITY_TIERS } from '../types.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { CacheStore } from './cache.js';

const SummarySchema = z.object({
  text: z.string(),
  tier: z.enum(COMPLEXITY_TIERS),
  chunkCount: z.number().int().nonnegative(),
  failedChunks: z.number().int().nonnegative(),
  degraded: z.boolean(),
  generatedAt: z.string(),
});

const PaperSchema: z.ZodType<CachedPaper> = z.object({
  url: z.string(),
  text: z.string(),
  sourceKind: z.enum(['pdf', 'html']),
  extractedAt: z.string(),
  summaries: z.object({
    LOW: SummarySchema.optional(),
    MEDIUM: SummarySchema.optional(),
    HIGH: SummarySchema.optional(),
  }),
});

export function documentKey(url: string): string {
  return `document:${url}`;
}

export function sessionKey(sessionId: string, url: string): string {
  return `session:${sessionId}:${url}`;
}

export class PaperRepository {
  private locks = new KeyedMutex();

  constructor(
    private readonly store: CacheStore,
    private readonly ttlMs: number
  ) {}

  /**
   * Unreadable entries count as a miss; the caller re-extracts.
   */
  async getPaper(url: string): Promise<CachedPaper | undefined> {
    const raw = await this.store.get(documentKey(url));
    if (raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`[Cache] Discarding unparsable entry for ${url}`);
      return undefined;
    }

    const parsed = PaperSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[Cache] Discarding malformed entry for ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return undefined;
    }
    return parsed.data;
  }

  async savePaper(paper: CachedPaper): Promise<void> {
    await this.store.put(documentKey(paper.url), JSON.stringify(paper), this.ttlMs);
  }

  /**
   * Add one tier to the stored paper. Read-modify-write runs under a
   * per-document lock so tiers finishing together keep each other.
   * Falls back to `paper` when the stored entry expired in the meantime.
   */
  async saveSummary(paper: CachedPaper, summary: SummaryRecord): Promise<CachedPaper> {
    return this.locks.run(documentKey(paper.url), async () => {
      const current = (await this.getPaper(paper.url)) ?? paper;
      const updated: CachedPaper = {
        ...current,
        summaries: { ...current.summaries, [summary.tier]: summary },
      };
      await this.savePaper(updated);
      return updated;
    });
  }

  async getHistory(sessionId: string, url: string): Promise<ChatTurn[]> {
    return this.store.getHistory(sessionKey(sessionId, url));
  }

  async appendTurns(sessionId: string, url: string, turns: readonly NewChatTurn[]): Promise<ChatTurn[]> {
    return this.store.appendHistory(sessionKey(sessionId, url), turns, this.ttlMs);
  }
}
