// GET /album/:id/export/:format - download an album as JSON, CSV or text

import type { Context } from 'hono';
import { NotFoundError } from '@albumsmith/shared';
import { EXPORT_FORMATS, parseExportFormat, renderAlbum, suggestedFilename } from '@albumsmith/export';
import type { AppContext } from '../../types';

export async function handleAlbumDownload(c: Context<AppContext, '/album/:id/export/:format'>) {
  const id = c.req.param('id');
  const format = parseExportFormat(c.req.param('format'));

  const album = await c.get('db').getAlbum(id);
  if (!album) {
    throw new NotFoundError('Album', id);
  }

  return c.body(renderAlbum(album, format), 200, {
    'Content-Type': EXPORT_FORMATS[format].contentType,
    'Content-Disposition': `attachment; filename="${suggestedFilename(album, format)}"`,
  });
}
