// ABOUTME: Memoizes artist lookups in a KVStore keyed by normalized artist name.
// ABOUTME: Successful profiles are stored with their fetch time; failures are never stored.

import { z } from 'zod';
import { CACHE_CONFIG, getTtlSeconds } from '@albumsmith/config';
import {
  artistProfileSchema,
  normalizeArtistName,
  type ArtistLookup,
  type ArtistProfile,
  type KVStore,
  type MetadataClient,
} from '@albumsmith/shared';

const cacheEntrySchema = z.object({
  profile: artistProfileSchema,
  fetchedAt: z.string(),
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

// Malformed JSON reads as undefined so it fails schema validation like any other bad entry
function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export interface LookupCacheOptions {
  ttlSeconds?: number;
  now?: () => Date;
}

export class ArtistLookupCache implements ArtistLookup {
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(
    private client: MetadataClient,
    private cache: KVStore,
    options: LookupCacheOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? getTtlSeconds(CACHE_CONFIG.deezer.artist);
    this.now = options.now ?? (() => new Date());
  }

  static cacheKey(name: string): string {
    return `deezer:artist:${normalizeArtistName(name)}`;
  }

  async get(name: string): Promise<ArtistProfile> {
    const entry = await this.peek(name);
    if (entry) {
      console.log(`[LookupCache] Cache hit for "${name}"`);
      return entry.profile;
    }

    console.log(`[LookupCache] Cache miss for "${name}", fetching`);
    return this.refresh(name);
  }

  /**
   * Stored entry without fetching. Unreadable entries are dropped.
   */
  async peek(name: string): Promise<CacheEntry | null> {
    const key = ArtistLookupCache.cacheKey(name);
    const raw = await this.cache.get(key);
    if (raw === null) return null;

    const parsed = cacheEntrySchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      console.warn(`[LookupCache] Discarding unreadable entry ${key}`);
      await this.cache.delete(key);
      return null;
    }
    return parsed.data;
  }

  /**
   * Fetch from the client and overwrite any stored entry
   */
  async refresh(name: string): Promise<ArtistProfile> {
    const profile = await this.client.fetchArtist(name);
    const entry: CacheEntry = { profile, fetchedAt: this.now().toISOString() };

    await this.cache.put(ArtistLookupCache.cacheKey(name), JSON.stringify(entry), {
      expirationTtl: this.ttlSeconds,
    });
    return profile;
  }

  async invalidate(name: string): Promise<void> {
    await this.cache.delete(ArtistLookupCache.cacheKey(name));
  }
}
