// Album detail page: tracklist, credits, warnings for artists that could not be found,
// export downloads and removal from the history

import type { Context } from 'hono';
import type { Album } from '@albumsmith/shared';
import { EXPORT_FORMATS, albumStats, exportFormatSchema, formatStats } from '@albumsmith/export';
import { Layout } from '../../components/layout';
import { Button, NotFoundPage, TrackList } from '../../components/ui';
import type { AppContext } from '../../types';

interface AlbumDetailProps {
  album: Album;
}

export function AlbumDetailPage({ album }: AlbumDetailProps) {
  const unresolved = album.artists.filter((credit) => !credit.resolved);

  return (
    <Layout title={album.title} description={album.narration}>
      <header>
        <h1>{album.title}</h1>
      </header>

      {unresolved.map((credit) => (
        <p class="warning-message">
          Could not find {credit.name} on Deezer, so it counts as an unknown genre.
        </p>
      ))}

      <section class="section">
        <p>{album.narration}</p>

        <div class="genre-tags">
          {album.genres.map((genre) => (
            <span class="genre-tag">{genre}</span>
          ))}
        </div>

        {album.artists.length > 0 && (
          <p>
            <strong>Artists:</strong>{' '}
            {album.artists.map((credit, index) => (
              <>
                {credit.url ? (
                  <a href={credit.url} target="_blank" rel="noopener noreferrer">
                    {credit.name}
                  </a>
                ) : (
                  credit.name
                )}
                {index < album.artists.length - 1 ? ', ' : ''}
              </>
            ))}
          </p>
        )}
        <p class="text-muted">
          Theme: {album.theme} · Created {album.createdAt.slice(0, 10)}
        </p>
      </section>

      <TrackList tracks={album.tracks} />
      <p class="album-stats text-center text-muted">{formatStats(albumStats(album))}</p>

      <section class="section text-center">
        <div class="export-links">
          {exportFormatSchema.options.map((format) => (
            <Button href={`/album/${album.id}/export/${format}`} variant="secondary" download>
              Download {EXPORT_FORMATS[format].label}
            </Button>
          ))}
        </div>
        <form method="post" action={`/album/${album.id}/delete`}>
          <Button type="submit" variant="secondary" size="small">
            Remove from history
          </Button>
        </form>
      </section>
    </Layout>
  );
}

// GET /album/:id
export async function handleAlbumDetail(c: Context<AppContext, '/album/:id'>) {
  const album = await c.get('db').getAlbum(c.req.param('id'));

  if (!album) {
    return c.html(<NotFoundPage what="album" />, 404);
  }
  return c.html(<AlbumDetailPage album={album} />);
}

// POST /album/:id/delete
export async function handleAlbumDelete(c: Context<AppContext, '/album/:id/delete'>) {
  const id = c.req.param('id');
  const deleted = await c.get('db').deleteAlbum(id);

  if (!deleted) {
    return c.html(<NotFoundPage what="album" />, 404);
  }
  console.log(`[History] Removed album ${id}`);
  return c.redirect('/history', 303);
}
