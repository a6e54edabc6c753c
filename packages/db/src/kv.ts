// ABOUTME: KVStore backed by the kv_cache table so cached lookups survive restarts.
// ABOUTME: Each put is written immediately; expired rows are removed when read.

import type BetterSqlite3 from 'better-sqlite3';
import type { KVPutOptions, KVStore } from '@albumsmith/shared';
import type { KVRow } from './schema';

export class SqliteKV implements KVStore {
  constructor(
    private db: BetterSqlite3.Database,
    private now: () => number = Date.now
  ) {}

  get(key: string): Promise<string | null>;
  get(key: string, type: 'json'): Promise<unknown>;
  async get(key: string, type?: 'json'): Promise<unknown> {
    const row = this.db
      .prepare<[string], KVRow>('SELECT key, value, expires_at FROM kv_cache WHERE key = ?')
      .get(key);
    if (!row) return null;

    if (row.expires_at !== null && row.expires_at <= this.now()) {
      await this.delete(key);
      return null;
    }
    return type === 'json' ? JSON.parse(row.value) : row.value;
  }

  async put(key: string, value: string, options: KVPutOptions = {}): Promise<void> {
    const expiresAt =
      options.expirationTtl !== undefined ? this.now() + options.expirationTtl * 1000 : null;
    this.db
      .prepare<[string, string, number | null]>(
        `INSERT INTO kv_cache (key, value, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`
      )
      .run(key, value, expiresAt);
  }

  async delete(key: string): Promise<void> {
    this.db.prepare<[string]>('DELETE FROM kv_cache WHERE key = ?').run(key);
  }

  async list(prefix = ''): Promise<string[]> {
    const rows = this.db
      .prepare<[number, string, number], Pick<KVRow, 'key'>>(
        `SELECT key FROM kv_cache
         WHERE substr(key, 1, ?) = ? AND (expires_at IS NULL OR expires_at > ?)
         ORDER BY key`
      )
      .all(prefix.length, prefix, this.now());
    return rows.map((row) => row.key);
  }

  /**
   * Remove every expired row. Returns the number deleted.
   */
  purgeExpired(): number {
    return this.db
      .prepare<[number]>('DELETE FROM kv_cache WHERE expires_at IS NOT NULL AND expires_at <= ?')
      .run(this.now()).changes;
  }
}
