// ABOUTME: Renders albums as JSON, CSV or plain text and writes them to disk.
// ABOUTME: Write failures become ExportError; the album itself is never touched.

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ExportError, errorMessage, generateSlug, type Album } from '@albumsmith/shared';
import { albumToCsv } from './csv';
import { EXPORT_FORMATS, type ExportFormat } from './formats';
import { albumToText } from './text';

export { CSV_COLUMNS, albumToCsv, escapeCsvValue } from './csv';
export { EXPORT_FORMATS, exportFormatSchema, parseExportFormat } from './formats';
export type { ExportFormat, ExportFormatInfo } from './formats';
export { albumStats, albumToText, formatDuration, formatStats } from './text';
export type { AlbumStats } from './text';

export function albumToJson(album: Album): string {
  return `${JSON.stringify(album, null, 2)}\n`;
}

export function renderAlbum(album: Album, format: ExportFormat): string {
  switch (format) {
    case 'json':
      return albumToJson(album);
    case 'csv':
      return albumToCsv(album);
    case 'txt':
      return albumToText(album);
  }
}

/**
 * File name derived from the album title, e.g. "nuit-drill-echo.csv"
 */
export function suggestedFilename(album: Album, format: ExportFormat): string {
  return `${generateSlug(album.title) || 'album'}.${EXPORT_FORMATS[format].extension}`;
}

/**
 * Write the album to `filePath` (UTF-8), creating parent directories.
 * Returns the absolute path written.
 */
export async function exportAlbum(album: Album, format: ExportFormat, filePath: string): Promise<string> {
  const target = resolve(filePath);
  const body = renderAlbum(album, format);

  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, body, 'utf8');
  } catch (error) {
    console.error(`[Export] Failed to write ${target}:`, errorMessage(error));
    throw new ExportError(target, errorMessage(error), error);
  }

  console.log(`[Export] Wrote ${format.toUpperCase()} for "${album.title}" to ${target}`);
  return target;
}
