// Main entry point for the Albumsmith web application
// Built with Hono; server.ts runs it on Node with @hono/node-server

import { Hono } from 'hono';
import { SITE_CONFIG } from '@albumsmith/config';
import { NotFoundError, errorResponse, toAppError } from '@albumsmith/shared';
import { ErrorPage, NotFoundPage } from './components/ui';
import { handleGenerate, handleGenerator } from './pages/generator';
import { handleAlbumDelete, handleAlbumDetail } from './pages/album/detail';
import { handleAlbumDownload } from './pages/album/export';
import { handleHistory } from './pages/history';
import { apiRoutes } from './api';
import type { AppContext, AppServices } from './types';

export type { AppContext, AppServices } from './types';

export function createApp(services: AppServices) {
  const app = new Hono<AppContext>();

  // Make services available to every handler
  app.use('*', async (c, next) => {
    c.set('db', services.db);
    c.set('assembler', services.assembler);
    c.set('catalog', services.catalog);
    c.set('exportDir', services.exportDir);
    await next();
  });

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      name: SITE_CONFIG.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/', handleGenerator);
  app.post('/generate', handleGenerate);
  app.get('/history', handleHistory);
  app.get('/album/:id', handleAlbumDetail);
  app.post('/album/:id/delete', handleAlbumDelete);
  app.get('/album/:id/export/:format', handleAlbumDownload);

  app.route('/api', apiRoutes);

  app.notFound((c) => {
    if (c.req.path.startsWith('/api')) {
      return errorResponse(new NotFoundError('Route', c.req.path));
    }
    return c.html(<NotFoundPage />, 404);
  });

  // Errors never take the server down: each request gets a JSON or HTML answer
  app.onError((err, c) => {
    const error = toAppError(err);
    if (error.status >= 500) {
      console.error(`[App] ${c.req.method} ${c.req.path} failed:`, err);
    } else {
      console.warn(`[App] ${c.req.method} ${c.req.path}: ${error.message}`);
    }

    if (c.req.path.startsWith('/api')) {
      return errorResponse(error);
    }
    if (error instanceof NotFoundError) {
      return c.html(<NotFoundPage />, 404);
    }
    return c.html(
      <ErrorPage
        title={error.status >= 500 ? 'Something went wrong' : 'Request not accepted'}
        message={error.message}
      />,
      error.status
    );
  });

  return app;
}
