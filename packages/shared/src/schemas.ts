// ABOUTME: zod schemas for values read back from storage or sent over the API.
// ABOUTME: Parsed output is checked against the domain interfaces at compile time.

import { z } from 'zod';
import { GENRE_TAGS, LANGUAGES } from './types/genre';
import type { Album, AlbumSummary, ArtistProfile } from './types';

export const genreTagSchema = z.enum(GENRE_TAGS);

export const languageSchema = z.enum(LANGUAGES);

export const languageOptionSchema = z.union([languageSchema, z.literal('auto')]);

export const artistProfileSchema: z.ZodType<ArtistProfile> = z.object({
  id: z.string(),
  name: z.string(),
  genres: z.array(z.string()),
  averageTrackDuration: z.number().nonnegative(),
  fans: z.number().int().nonnegative(),
  url: z.string(),
  image: z.string().nullable(),
});

const artistCreditSchema = z.object({
  name: z.string(),
  resolved: z.boolean(),
  url: z.string().nullable(),
  genres: z.array(genreTagSchema),
  language: languageSchema,
});

const trackSchema = z.object({
  position: z.number().int().positive(),
  title: z.string(),
  genre: genreTagSchema,
  mood: z.string(),
  theme: z.string(),
  tempo: z.number().int().positive(),
  duration: z.number().int().positive(),
  artist: z.string().nullable(),
  link: z.string().nullable(),
});

export const albumSchema: z.ZodType<Album> = z.object({
  id: z.string(),
  title: z.string(),
  theme: z.string(),
  language: languageSchema,
  narration: z.string(),
  genres: z.array(genreTagSchema).min(1),
  requestedGenres: z.array(genreTagSchema),
  artists: z.array(artistCreditSchema),
  tracks: z.array(trackSchema),
  createdAt: z.string(),
});

export const albumSummarySchema: z.ZodType<AlbumSummary> = z.object({
  id: z.string(),
  title: z.string(),
  theme: z.string(),
  trackCount: z.number().int().nonnegative(),
  createdAt: z.string(),
});
