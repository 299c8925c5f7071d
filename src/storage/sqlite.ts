/**
 * SQLite Cache Store
 *
 * Durable CacheStore using better-sqlite3. Same contract as the in-memory
 * store, so it can stand in for an external key-value service with TTL.
 */

import Database from 'better-sqlite3';
import type { ChatTurn, ChatRole, NewChatTurn } from '../types.js';
import type { CacheStore, CacheStoreOptions } from './cache.js';

interface ValueRow {
  value: string;
  expires_at: number;
}

interface TurnRow {
  seq: number;
  role: ChatRole;
  text: string;
  created_at: string;
}

export class SQLiteCacheStore implements CacheStore {
  private db: Database.Database;
  private readonly now: () => number;

  constructor(dbPath: string = ':memory:', options: CacheStoreOptions = {}) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.now = options.now ?? Date.now;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      -- Plain values (documents with their summaries)
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      );

      -- Chat histories: one row per key, turns stored separately
      CREATE TABLE IF NOT EXISTS histories (
        key TEXT PRIMARY KEY,
        expires_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS history_turns (
        key TEXT NOT NULL,
        seq INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        text TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (key, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_cache_entries_expiry ON cache_entries(expires_at);
      CREATE INDEX IF NOT EXISTS idx_histories_expiry ON histories(expires_at);
    `);
  }

  async get(key: string): Promise<string | undefined> {
    const row = this.db
      .prepare<[string], ValueRow>('SELECT value, expires_at FROM cache_entries WHERE key = ?')
      .get(key);

    if (!row) return undefined;
    if (row.expires_at <= this.now()) {
      this.db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key);
      return undefined;
    }
    return row.value;
  }

  async put(key: string, value: string, ttlMs: number): Promise<void> {
    this.db
      .prepare('INSERT OR REPLACE INTO cache_entries (key, value, expires_at) VALUES (?, ?, ?)')
      .run(key, value, this.now() + ttlMs);
  }

  async getHistory(key: string): Promise<ChatTurn[]> {
    if (!this.isHistoryLive(key, this.now())) return [];

    const rows = this.db
      .prepare<[string], TurnRow>('SELECT seq, role, text, created_at FROM history_turns WHERE key = ? ORDER BY seq')
      .all(key);

    return rows.map((row) => ({
      role: row.role,
      text: row.text,
      index: row.seq,
      createdAt: row.created_at,
    }));
  }

  async appendHistory(key: string, turns: readonly NewChatTurn[], ttlMs: number): Promise<ChatTurn[]> {
    const append = this.db.transaction((items: readonly NewChatTurn[]): ChatTurn[] => {
      const now = this.now();
      if (!this.isHistoryLive(key, now)) {
        this.db.prepare('DELETE FROM history_turns WHERE key = ?').run(key);
      }

      const countRow = this.db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM history_turns WHERE key = ?')
        .get(key);
      const start = countRow?.count ?? 0;
      const createdAt = new Date(now).toISOString();
      const insert = this.db.prepare(
        'INSERT INTO history_turns (key, seq, role, text, created_at) VALUES (?, ?, ?, ?, ?)'
      );

      const appended = items.map((turn, i) => {
        insert.run(key, start + i, turn.role, turn.text, createdAt);
        return { role: turn.role, text: turn.text, index: start + i, createdAt };
      });

      this.db
        .prepare('INSERT OR REPLACE INTO histories (key, expires_at) VALUES (?, ?)')
        .run(key, now + ttlMs);

      return appended;
    });

    return append.immediate(turns);
  }

  async sweep(): Promise<number> {
    const sweepExpired = this.db.transaction((now: number): number => {
      const values = this.db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(now).changes;
      this.db
        .prepare('DELETE FROM history_turns WHERE key IN (SELECT key FROM histories WHERE expires_at <= ?)')
        .run(now);
      const histories = this.db.prepare('DELETE FROM histories WHERE expires_at <= ?').run(now).changes;
      return values + histories;
    });

    return sweepExpired(this.now());
  }

  close(): void {
    this.db.close();
  }

  private isHistoryLive(key: string, now: number): boolean {
    const row = this.db
      .prepare<[string], { expires_at: number }>('SELECT expires_at FROM histories WHERE key = ?')
      .get(key);
    return row !== undefined && row.expires_at > now;
  }
}
