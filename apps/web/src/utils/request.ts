// ABOUTME: Turns JSON bodies and generator form posts into AlbumRequest values.
// ABOUTME: Shape problems become InputError; range checks stay with the assembler.

import { z } from 'zod';
import { GENERATOR_LIMITS } from '@albumsmith/config';
import {
  InputError,
  genreTagSchema,
  isGenreTag,
  languageOptionSchema,
  type AlbumRequest,
  type GenreTag,
  type LanguageOption,
} from '@albumsmith/shared';

export const albumRequestSchema = z.object({
  artists: z.array(z.string()),
  genres: z.array(genreTagSchema).default([]),
  theme: z.string().default(''),
  trackCount: z.number().default(GENERATOR_LIMITS.defaultTrackCount),
  language: languageOptionSchema.default('auto'),
});

/** Values the generator form is rendered with */
export interface GeneratorFormValues {
  artists: string;
  genres: GenreTag[];
  theme: string;
  trackCount: string;
  language: LanguageOption;
}

export const EMPTY_FORM: GeneratorFormValues = {
  artists: '',
  genres: [],
  theme: '',
  trackCount: String(GENERATOR_LIMITS.defaultTrackCount),
  language: 'auto',
};

export function parseAlbumRequest(body: unknown): AlbumRequest {
  const parsed = albumRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new InputError('Invalid album request', { issues: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}

/**
 * Artist names from a comma- or newline-separated field
 */
export function splitArtists(value: string): string[] {
  return value
    .split(/[,\n]/)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

// parseBody({ all: true }) gives a string, a File, or an array of either
function formStrings(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((item): item is string => typeof item === 'string');
}

function formString(value: unknown): string {
  return formStrings(value)[0] ?? '';
}

/**
 * Read the generator form. Genre names outside the vocabulary are kept apart
 * so the handler can report them and still re-render what was typed.
 */
export function readGeneratorForm(form: Record<string, unknown>): {
  values: GeneratorFormValues;
  unknownGenres: string[];
} {
  const genreNames = formStrings(form.genres);
  const language = languageOptionSchema.safeParse(formString(form.language) || 'auto');

  return {
    values: {
      artists: formString(form.artists),
      genres: genreNames.filter(isGenreTag),
      theme: formString(form.theme),
      trackCount: formString(form.trackCount) || EMPTY_FORM.trackCount,
      language: language.success ? language.data : 'auto',
    },
    unknownGenres: genreNames.filter((name) => !isGenreTag(name)),
  };
}

export function toAlbumRequest(values: GeneratorFormValues): AlbumRequest {
  return {
    artists: splitArtists(values.artists),
    genres: values.genres,
    theme: values.theme,
    trackCount: Number(values.trackCount),
    language: values.language,
  };
}
