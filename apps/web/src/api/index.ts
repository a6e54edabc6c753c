// API Routes Index
// Provides the /api overview endpoint and mounts all route groups

import { Hono } from 'hono';
import { SITE_CONFIG } from '@albumsmith/config';
import type { AppContext } from '../types';
import { albumRoutes } from './albums';
import { catalogRoutes } from './catalog';

const app = new Hono<AppContext>();

// API routes overview
app.get('/', (c) => {
  return c.json({
    message: `${SITE_CONFIG.name} API`,
    version: '0.1.0',
    endpoints: {
      albums: {
        create: 'POST /api/albums { artists, genres?, theme?, trackCount?, language? }',
        list: 'GET /api/albums?limit=&offset=',
        get: 'GET /api/albums/:id',
        delete: 'DELETE /api/albums/:id',
        export: 'GET /api/albums/:id/export?format=json|csv|txt',
        write: 'POST /api/albums/:id/export { format, path? }',
      },
      catalog: {
        genres: 'GET /api/genres',
        presets: 'GET /api/presets',
      },
      other: {
        health: '/health',
      },
    },
  });
});

// Mount route groups
app.route('/albums', albumRoutes);
app.route('/', catalogRoutes);

export const apiRoutes = app;
