// Lifetimes for cached lookups

export const CACHE_CONFIG = {
  deezer: {
    // Artist profiles (genres, average track length) drift slowly
    artist: { ttlDays: 30 },
  },
} as const;

export type CacheLifetime = { ttlDays: number } | { ttlHours: number } | { ttlMinutes: number };

/**
 * Convert a lifetime to the seconds a KV `expirationTtl` takes
 */
export function getTtlSeconds(lifetime: CacheLifetime): number {
  if ('ttlDays' in lifetime) return lifetime.ttlDays * 24 * 60 * 60;
  if ('ttlHours' in lifetime) return lifetime.ttlHours * 60 * 60;
  return lifetime.ttlMinutes * 60;
}
