// Database client and utilities for Albumsmith

export * from './schema';
export { SqliteKV } from './kv';

import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import BetterSqlite3 from 'better-sqlite3';
import { AppError, albumSchema, errorMessage, type Album, type AlbumSummary } from '@albumsmith/shared';
import { SqliteKV } from './kv';
import { MIGRATIONS } from './schema';
import type { AlbumRow, AlbumSummaryRow } from './schema';

// Database client wrapper
export class Database {
  public readonly cache: SqliteKV;

  constructor(private db: BetterSqlite3.Database) {
    this.cache = new SqliteKV(db);
  }

  /**
   * Open (or create) a database file and apply migrations.
   * Pass ':memory:' for a throwaway database.
   */
  static open(path: string): Database {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    const sqlite = new BetterSqlite3(path);
    sqlite.pragma('journal_mode = WAL');

    const database = new Database(sqlite);
    database.migrate();
    return database;
  }

  migrate(): void {
    for (const file of MIGRATIONS) {
      const sql = readFileSync(new URL(`../migrations/${file}`, import.meta.url), 'utf8');
      this.db.exec(sql);
    }
  }

  // Album history
  async recordAlbum(album: Album): Promise<void> {
    this.db
      .prepare<[string, string, string, string, number, string, string]>(
        `INSERT INTO albums (id, title, theme, language, track_count, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        album.id,
        album.title,
        album.theme,
        album.language,
        album.tracks.length,
        JSON.stringify(album),
        album.createdAt
      );
    console.log(`[History] Recorded album ${album.id} "${album.title}"`);
  }

  async getAlbum(id: string): Promise<Album | null> {
    const row = this.db
      .prepare<[string], Pick<AlbumRow, 'payload'>>('SELECT payload FROM albums WHERE id = ?')
      .get(id);
    if (!row) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload);
    } catch (error) {
      console.error(`[History] Stored album ${id} is not valid JSON:`, errorMessage(error));
      throw new AppError(`Stored album is unreadable: ${id}`, 'CORRUPT_RECORD', 500);
    }

    const parsed = albumSchema.safeParse(payload);
    if (!parsed.success) {
      console.error(`[History] Stored album ${id} failed validation:`, parsed.error.message);
      throw new AppError(`Stored album is unreadable: ${id}`, 'CORRUPT_RECORD', 500);
    }
    return parsed.data;
  }

  async listAlbums(limit: number = 25, offset: number = 0): Promise<AlbumSummary[]> {
    const rows = this.db
      .prepare<[number, number], AlbumSummaryRow>(
        `SELECT id, title, theme, track_count, created_at FROM albums
         ORDER BY created_at DESC, rowid DESC
         LIMIT ? OFFSET ?`
      )
      .all(limit, offset);

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      theme: row.theme,
      trackCount: row.track_count,
      createdAt: row.created_at,
    }));
  }

  async countAlbums(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM albums')
      .get();
    return row?.count ?? 0;
  }

  async deleteAlbum(id: string): Promise<boolean> {
    return this.db.prepare<[string]>('DELETE FROM albums WHERE id = ?').run(id).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
