// Row type definitions for the Albumsmith SQLite database

export interface AlbumRow {
  id: string;
  title: string;
  theme: string;
  language: string;
  track_count: number;
  /** Full album as JSON */
  payload: string;
  created_at: string;
}

export type AlbumSummaryRow = Omit<AlbumRow, 'language' | 'payload'>;

export interface KVRow {
  key: string;
  value: string;
  /** Epoch milliseconds, null for no expiry */
  expires_at: number | null;
}

/** Migration files applied in order by Database.migrate() */
export const MIGRATIONS = ['0001_initial.sql'] as const;
