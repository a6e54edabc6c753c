// Catalog API routes:
// GET /api/genres  - the genre vocabulary with labels and tempo ranges
// GET /api/presets - named genre/theme combinations for the generator

import { Hono } from 'hono';
import type { AppContext } from '../types';

const app = new Hono<AppContext>();

app.get('/genres', (c) => {
  const genres = [...c.get('catalog').genres.values()].map((genre) => ({
    tag: genre.tag,
    label: genre.label,
    tempo: { min: genre.tempo[0], max: genre.tempo[1] },
  }));
  return c.json({ data: genres });
});

app.get('/presets', (c) => {
  return c.json({ data: c.get('catalog').presets });
});

export const catalogRoutes = app;
