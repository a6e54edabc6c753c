// Text normalization helpers

/** Trim and collapse runs of whitespace to single spaces */
export function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Canonical form of an artist name, used for cache keys and de-duplication
 */
export function normalizeArtistName(name: string): string {
  return collapseWhitespace(name).toLowerCase();
}

/** Remove accents: "Écho" -> "Echo" */
export function stripDiacritics(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
