// Genre vocabulary and language codes shared by every package

/** Fixed genre vocabulary, in display order */
export const GENRE_TAGS = [
  'Rap',
  'Trap',
  'Drill',
  'Boom Bap',
  'Pop',
  'R&B',
  'Electro',
  'Techno',
  'House',
  'Ambient',
  'Lo-Fi',
  'Jazz',
  'Neo-Jazz',
  'Rock',
  'Indie',
  'Metal',
  'Cinematic',
  'Unknown',
] as const;

export type GenreTag = (typeof GENRE_TAGS)[number];

/** Fallback tag for artists whose genres could not be determined */
export const UNKNOWN_GENRE: GenreTag = 'Unknown';

export function isGenreTag(value: string): value is GenreTag {
  return GENRE_TAGS.some((tag) => tag === value);
}

/**
 * Order tags by their position in the vocabulary
 */
export function compareGenreTags(a: GenreTag, b: GenreTag): number {
  return GENRE_TAGS.indexOf(a) - GENRE_TAGS.indexOf(b);
}

export const LANGUAGES = ['en', 'fr'] as const;

export type Language = (typeof LANGUAGES)[number];

/** Requested language: a fixed one, or detected from the artists */
export type LanguageOption = Language | 'auto';
