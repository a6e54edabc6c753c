// Deezer service - artist metadata lookups with caching

import type { KVStore } from '@albumsmith/shared';
import { DeezerArtists } from './artists';
import { ArtistLookupCache } from './cache';
import { DeezerRateLimiter, type RateLimiterOptions } from './rate-limit';

export { DeezerArtists } from './artists';
export type { DeezerArtistsOptions } from './artists';

export { ArtistLookupCache } from './cache';
export type { CacheEntry, LookupCacheOptions } from './cache';

export { DeezerRateLimiter } from './rate-limit';
export type { RateLimiterOptions } from './rate-limit';

export { deezerFetch, deezerGet } from './fetch';

// Convenience class that wires the client, rate limiter and cache together
export class DeezerService {
  public readonly rateLimiter: DeezerRateLimiter;
  public readonly artists: DeezerArtists;
  public readonly lookup: ArtistLookupCache;

  constructor(config: { cache: KVStore; apiBase?: string; rateLimit?: RateLimiterOptions }) {
    this.rateLimiter = new DeezerRateLimiter(config.rateLimit);
    this.artists = new DeezerArtists(this.rateLimiter, { apiBase: config.apiBase });
    this.lookup = new ArtistLookupCache(this.artists, config.cache);
  }
}
