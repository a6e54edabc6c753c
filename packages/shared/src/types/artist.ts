// Types for artist data across the application

import type { GenreTag, Language } from './genre';

/** Artist metadata as returned by the metadata provider */
export interface ArtistProfile {
  readonly id: string; // Deezer ID
  readonly name: string;
  /** Raw genre strings in first-seen order, de-duplicated */
  readonly genres: readonly string[];
  /** Mean top-track length in seconds */
  readonly averageTrackDuration: number;
  readonly fans: number;
  readonly url: string;
  readonly image: string | null;
}

/** Artist as credited on a generated album */
export interface ArtistCredit {
  readonly name: string;
  /** False when the lookup failed and the artist fell back to Unknown */
  readonly resolved: boolean;
  readonly url: string | null;
  readonly genres: readonly GenreTag[];
  readonly language: Language;
}

/** Anything that can turn an artist name into a profile */
export interface MetadataClient {
  fetchArtist(name: string): Promise<ArtistProfile>;
}

/** Cached lookup; fails with LookupError when the underlying client fails */
export interface ArtistLookup {
  get(name: string): Promise<ArtistProfile>;
}
