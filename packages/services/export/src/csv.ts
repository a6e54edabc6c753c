// Tabular export: one row per track

import type { Album } from '@albumsmith/shared';

export const CSV_COLUMNS = [
  '#',
  'Title',
  'Genre',
  'Duration (s)',
  'Tempo (BPM)',
  'Mood',
  'Theme',
  'Artist',
  'Link',
] as const;

/**
 * Quote a field when it holds a delimiter, quote or line break; quotes are doubled
 */
export function escapeCsvValue(value: string | number | null): string {
  const text = value === null ? '' : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function albumToCsv(album: Album): string {
  const rows = [
    CSV_COLUMNS.map(escapeCsvValue),
    ...album.tracks.map((track) =>
      [
        track.position,
        track.title,
        track.genre,
        track.duration,
        track.tempo,
        track.mood,
        track.theme,
        track.artist,
        track.link,
      ].map(escapeCsvValue)
    ),
  ];
  return rows.map((row) => row.join(',')).join('\r\n') + '\r\n';
}
