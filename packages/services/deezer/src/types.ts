// Deezer API response shapes (only the fields we read)

import { z } from 'zod';

/** Deezer reports most failures as HTTP 200 with an error object */
export const deezerErrorSchema = z.object({
  error: z.object({
    type: z.string().optional(),
    message: z.string().optional(),
    code: z.number().optional(),
  }),
});

export const deezerArtistSchema = z.object({
  id: z.number(),
  name: z.string(),
  link: z.string(),
  picture_medium: z.string().nullish(),
  nb_fan: z.number().optional(),
});

export const artistSearchSchema = z.object({
  data: z.array(deezerArtistSchema),
  total: z.number().optional(),
});

export const topTracksSchema = z.object({
  data: z.array(
    z.object({
      id: z.number(),
      title: z.string(),
      duration: z.number(),
      album: z.object({ id: z.number() }).optional(),
    })
  ),
});

export const albumGenresSchema = z.object({
  id: z.number(),
  genres: z
    .object({
      data: z.array(z.object({ name: z.string() })),
    })
    .optional(),
});

export type DeezerError = z.infer<typeof deezerErrorSchema>;
export type DeezerArtist = z.infer<typeof deezerArtistSchema>;
export type DeezerTopTrack = z.infer<typeof topTracksSchema>['data'][number];
