/**
 * Cache/Session Store
 *
 * A TTL key-value capability with an atomic history append. Values are
 * opaque strings.
 *
 * Expiry: an entry lives for `ttlMs` from its last write (put or append).
 * Reads never extend it. Expired entries are dropped lazily on read and
 * eagerly by sweep().
 */

import type { ChatTurn, NewChatTurn } from '../types.js';

export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string, ttlMs: number): Promise<void>;
  getHistory(key: string): Promise<ChatTurn[]>;
  /**
   * Append turns in order, atomically for the key. Returns the stored turns
   * with their assigned indices.
   */
  appendHistory(key: string, turns: readonly NewChatTurn[], ttlMs: number): Promise<ChatTurn[]>;
  /** Remove every expired entry; returns how many were removed. */
  sweep(): Promise<number>;
  close(): void;
}

export interface CacheStoreOptions {
  /** Milliseconds since epoch */
  now?: () => number;
}

interface ValueEntry {
  value: string;
  expiresAt: number;
}

interface HistoryEntry {
  turns: ChatTurn[];
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private values = new Map<string, ValueEntry>();
  private histories = new Map<string, HistoryEntry>();
  private readonly now: () => number;

  constructor(options: CacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.values.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.values.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async put(key: string, value: string, ttlMs: number): Promise<void> {
    this.values.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async getHistory(key: string): Promise<ChatTurn[]> {
    const entry = this.liveHistory(key);
    return entry ? entry.turns.map((turn) => ({ ...turn })) : [];
  }

  async appendHistory(key: string, turns: readonly NewChatTurn[], ttlMs: number): Promise<ChatTurn[]> {
    // No await between read and write: the append is atomic on the event loop
    const now = this.now();
    const entry = this.liveHistory(key) ?? { turns: [], expiresAt: now };
    const createdAt = new Date(now).toISOString();

    const appended = turns.map((turn, i) => ({
      role: turn.role,
      text: turn.text,
      index: entry.turns.length + i,
      createdAt,
    }));

    entry.turns.push(...appended);
    entry.expiresAt = now + ttlMs;
    this.histories.set(key, entry);

    return appended.map((turn) => ({ ...turn }));
  }

  async sweep(): Promise<number> {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.values) {
      if (entry.expiresAt <= now) {
        this.values.delete(key);
        removed += 1;
      }
    }
    for (const [key, entry] of this.histories) {
      if (entry.expiresAt <= now) {
        this.histories.delete(key);
        removed += 1;
      }
    }

    return removed;
  }

  close(): void {
    this.values.clear();
    this.histories.clear();
  }

  private liveHistory(key: string): HistoryEntry | undefined {
    const entry = this.histories.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.histories.delete(key);
      return undefined;
    }
    return entry;
  }
}
