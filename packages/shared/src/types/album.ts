// Types for album data across the application

import type { ArtistCredit } from './artist';
import type { GenreTag, Language, LanguageOption } from './genre';
import type { Track } from './track';

export interface Album {
  readonly id: string;
  readonly title: string;
  readonly theme: string;
  readonly language: Language;
  readonly narration: string;
  /** Requested genres first, then each artist's tags */
  readonly genres: readonly GenreTag[];
  readonly requestedGenres: readonly GenreTag[];
  readonly artists: readonly ArtistCredit[];
  readonly tracks: readonly Track[];
  readonly createdAt: string;
}

export interface AlbumRequest {
  artists: string[];
  genres: GenreTag[];
  theme: string;
  trackCount: number;
  language?: LanguageOption;
}

/** Row shown in the generation history */
export interface AlbumSummary {
  id: string;
  title: string;
  theme: string;
  trackCount: number;
  createdAt: string;
}

export interface Preset {
  name: string;
  description: string;
  genres: GenreTag[];
  theme: string;
}
