// Slugs for export file names, and album page URLs keyed by id

import { stripDiacritics } from './text';

/**
 * Generate a URL- and filename-safe slug from a name
 */
export function generateSlug(name: string): string {
  return stripDiacritics(name)
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '') // Remove special chars
    .replace(/\s+/g, '-') // Spaces to hyphens
    .replace(/-+/g, '-') // Collapse multiple hyphens
    .replace(/^-|-$/g, ''); // Trim leading/trailing hyphens
}

/**
 * Generate album URL using the album ID
 */
export function albumUrl(albumId: string): string {
  return `/album/${encodeURIComponent(albumId)}`;
}
