// ABOUTME: Deezer artist lookup - search, top tracks, and album genres.
// ABOUTME: Builds an ArtistProfile; every failure surfaces as a LookupError.

import { DEEZER_CONFIG } from '@albumsmith/config';
import {
  LookupError,
  collapseWhitespace,
  errorMessage,
  normalizeArtistName,
  stripDiacritics,
  type ArtistProfile,
  type MetadataClient,
} from '@albumsmith/shared';
import type { DeezerRateLimiter } from './rate-limit';
import { deezerGet } from './fetch';
import {
  albumGenresSchema,
  artistSearchSchema,
  topTracksSchema,
  type DeezerArtist,
  type DeezerTopTrack,
} from './types';

export interface DeezerArtistsOptions {
  apiBase?: string;
  topTracksLimit?: number;
}

function matchKey(name: string): string {
  return stripDiacritics(normalizeArtistName(name));
}

export class DeezerArtists implements MetadataClient {
  private readonly apiBase: string;
  private readonly topTracksLimit: number;

  constructor(
    private rateLimiter: DeezerRateLimiter,
    options: DeezerArtistsOptions = {}
  ) {
    this.apiBase = (options.apiBase ?? DEEZER_CONFIG.apiBase).replace(/\/$/, '');
    this.topTracksLimit = options.topTracksLimit ?? DEEZER_CONFIG.topTracksLimit;
  }

  async fetchArtist(name: string): Promise<ArtistProfile> {
    const query = collapseWhitespace(name);
    if (!query) {
      throw new LookupError(name, 'empty artist name');
    }

    try {
      console.log(`[Deezer] Looking up artist "${query}"`);
      const artist = await this.searchArtist(query);
      const tracks = await this.getTopTracks(artist.id);
      if (tracks.length === 0) {
        throw new LookupError(query, 'no top tracks');
      }
      const genres = await this.getGenres(tracks);

      const durations = tracks.map((track) => track.duration).filter((seconds) => seconds > 0);
      const averageTrackDuration =
        durations.length > 0
          ? Math.round(durations.reduce((sum, seconds) => sum + seconds, 0) / durations.length)
          : DEEZER_CONFIG.defaultTrackDuration;

      return {
        id: String(artist.id),
        name: artist.name,
        genres,
        averageTrackDuration,
        fans: artist.nb_fan ?? 0,
        url: artist.link,
        image: artist.picture_medium ?? null,
      };
    } catch (error) {
      if (error instanceof LookupError) throw error;
      console.error(`[Deezer] Lookup failed for "${query}":`, errorMessage(error));
      throw new LookupError(query, errorMessage(error), error);
    }
  }

  /**
   * Search by name, preferring an exact (case- and accent-insensitive) match over the top hit
   */
  async searchArtist(query: string): Promise<DeezerArtist> {
    const url = `${this.apiBase}/search/artist?q=${encodeURIComponent(query)}&limit=${DEEZER_CONFIG.searchLimit}`;
    const result = await deezerGet(url, artistSearchSchema, { timeout: 'lookup' }, this.rateLimiter);

    if (result.data.length === 0) {
      throw new LookupError(query, 'no matching artist');
    }

    const wanted = matchKey(query);
    return result.data.find((candidate) => matchKey(candidate.name) === wanted) ?? result.data[0];
  }

  async getTopTracks(artistId: number): Promise<DeezerTopTrack[]> {
    const url = `${this.apiBase}/artist/${artistId}/top?limit=${this.topTracksLimit}`;
    const result = await deezerGet(url, topTracksSchema, { timeout: 'lookup' }, this.rateLimiter);
    return result.data;
  }

  /**
   * Genres of the albums the top tracks come from, in first-seen order.
   * An album that fails to load is skipped.
   */
  async getGenres(tracks: readonly DeezerTopTrack[]): Promise<string[]> {
    const albumIds = [...new Set(tracks.flatMap((track) => (track.album ? [track.album.id] : [])))];

    const perAlbum = await Promise.all(
      albumIds.map(async (albumId) => {
        try {
          return await this.getAlbumGenres(albumId);
        } catch (error) {
          console.warn(`[Deezer] Skipping genres for album ${albumId}:`, errorMessage(error));
          return [];
        }
      })
    );

    return [...new Set(perAlbum.flat())];
  }

  async getAlbumGenres(albumId: number): Promise<string[]> {
    const url = `${this.apiBase}/album/${albumId}`;
    const album = await deezerGet(url, albumGenresSchema, { timeout: 'enrichment' }, this.rateLimiter);
    return (album.genres?.data ?? []).map((genre) => genre.name.trim()).filter(Boolean);
  }
}
