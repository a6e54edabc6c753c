// Album API routes:
// POST   /api/albums            - generate and record an album
// GET    /api/albums            - history, newest first (?limit=&offset=)
// GET    /api/albums/:id        - one album
// DELETE /api/albums/:id        - remove from history
// GET    /api/albums/:id/export - render as ?format=json|csv|txt
// POST   /api/albums/:id/export - write a file under the export directory

import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { InputError, NotFoundError, type Album, type AlbumSummary, type ApiResponse } from '@albumsmith/shared';
import { EXPORT_FORMATS, exportAlbum, parseExportFormat, renderAlbum, suggestedFilename } from '@albumsmith/export';
import { parseAlbumRequest } from '../utils/request';
import { resolveExportPath } from '../utils/paths';
import type { AppContext } from '../types';

const app = new Hono<AppContext>();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(25),
  offset: z.coerce.number().int().min(0).default(0),
});

const exportBodySchema = z.object({
  format: z.string(),
  path: z.string().optional(),
});

async function readJson(c: Context<AppContext>): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new InputError('Request body must be valid JSON');
  }
}

async function findAlbum(c: Context<AppContext>, id: string): Promise<Album> {
  const album = await c.get('db').getAlbum(id);
  if (!album) {
    throw new NotFoundError('Album', id);
  }
  return album;
}

app.post('/', async (c) => {
  const request = parseAlbumRequest(await readJson(c));
  const album = await c.get('assembler').assemble(request);
  await c.get('db').recordAlbum(album);

  return c.json({ data: album } satisfies ApiResponse<Album>, 201);
});

app.get('/', async (c) => {
  const query = listQuerySchema.safeParse(c.req.query());
  if (!query.success) {
    throw new InputError('Invalid paging parameters', { issues: query.error.flatten().fieldErrors });
  }

  const db = c.get('db');
  const { limit, offset } = query.data;
  const [albums, total] = await Promise.all([db.listAlbums(limit, offset), db.countAlbums()]);

  return c.json({ data: albums, meta: { total, limit, offset } } satisfies ApiResponse<AlbumSummary[]>);
});

app.get('/:id', async (c) => {
  const album = await findAlbum(c, c.req.param('id'));
  return c.json({ data: album } satisfies ApiResponse<Album>);
});

app.delete('/:id', async (c) => {
  const id = c.req.param('id');
  if (!(await c.get('db').deleteAlbum(id))) {
    throw new NotFoundError('Album', id);
  }
  return c.json({ data: { id, deleted: true } });
});

app.get('/:id/export', async (c) => {
  const format = parseExportFormat(c.req.query('format') ?? 'json');
  const album = await findAlbum(c, c.req.param('id'));

  return c.body(renderAlbum(album, format), 200, {
    'Content-Type': EXPORT_FORMATS[format].contentType,
  });
});

app.post('/:id/export', async (c) => {
  const body = exportBodySchema.safeParse(await readJson(c));
  if (!body.success) {
    throw new InputError('Export needs a format', { issues: body.error.flatten().fieldErrors });
  }

  const format = parseExportFormat(body.data.format);
  const album = await findAlbum(c, c.req.param('id'));
  const target = resolveExportPath(c.get('exportDir'), body.data.path, suggestedFilename(album, format));

  const written = await exportAlbum(album, format, target);
  return c.json({ data: { id: album.id, format, path: written } }, 201);
});

export const albumRoutes = app;
