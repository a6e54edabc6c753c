// History page: previously generated albums, newest first, paginated

import type { Context } from 'hono';
import { SITE_CONFIG } from '@albumsmith/config';
import { albumUrl, type AlbumSummary } from '@albumsmith/shared';
import { Layout } from '../../components/layout';
import type { AppContext } from '../../types';

interface HistoryPageProps {
  albums: AlbumSummary[];
  page: number;
  totalPages: number;
}

export function HistoryPage({ albums, page, totalPages }: HistoryPageProps) {
  return (
    <Layout title="History" active="history">
      <header>
        <h1>History</h1>
      </header>

      {albums.length === 0 ? (
        <p class="text-center text-muted">
          Nothing here yet. <a href="/">Generate your first album</a>.
        </p>
      ) : (
        <table class="history-table">
          <thead>
            <tr>
              <th>Title</th>
              <th>Theme</th>
              <th>Tracks</th>
              <th>Created</th>
            </tr>
          </thead>
          <tbody>
            {albums.map((album) => (
              <tr>
                <td>
                  <a href={albumUrl(album.id)}>{album.title}</a>
                </td>
                <td>{album.theme}</td>
                <td>{album.trackCount}</td>
                <td>{album.createdAt.slice(0, 10)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      {totalPages > 1 && (
        <nav class="pagination">
          {page > 1 && <a href={`/history?page=${page - 1}`}>← Newer</a>}
          <span class="text-muted">
            Page {page} of {totalPages}
          </span>
          {page < totalPages && <a href={`/history?page=${page + 1}`}>Older →</a>}
        </nav>
      )}
    </Layout>
  );
}

// GET /history?page=N
export async function handleHistory(c: Context<AppContext>) {
  const db = c.get('db');
  const pageSize = SITE_CONFIG.historyPageSize;

  const requested = Number.parseInt(c.req.query('page') ?? '1', 10);
  const total = await db.countAlbums();
  const totalPages = Math.max(1, Math.ceil(total / pageSize));
  const page = Number.isNaN(requested) ? 1 : Math.min(Math.max(requested, 1), totalPages);

  const albums = await db.listAlbums(pageSize, (page - 1) * pageSize);
  return c.html(<HistoryPage albums={albums} page={page} totalPages={totalPages} />);
}
