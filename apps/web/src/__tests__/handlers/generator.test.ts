// Generator page handler tests

import { describe, it, expect, beforeEach } from 'vitest';
import { createTestApp, postForm } from '../utils/fixtures';

describe('Generator Handlers', () => {
  let test: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    test = createTestApp();
  });

  describe('GET /', () => {
    it('renders the form with every genre but Unknown', async () => {
      const res = await test.app.request('/');

      expect(res.status).toBe(200);
      const html = await res.text();
      expect(html).toContain('<form method="post" action="/generate"');
      expect(html).toContain('name="artists"');
      expect(html).toContain('value="Drill"');
      expect(html).toContain('value="Cinematic"');
      expect(html).not.toContain('value="Unknown"');
    });

    it('includes proper page structure', async () => {
      const html = await (await test.app.request('/')).text();

      expect(html).toContain('<html');
      expect(html).toContain('<nav');
      expect(html).toContain('<footer');
    });

    it('lists the presets', async () => {
      const html = await (await test.app.request('/')).text();

      expect(html).toContain('href="/?preset=Introspective"');
      expect(html).toContain('href="/?preset=Experimental"');
    });

    it('pre-fills genres and theme from a preset, ignoring case', async () => {
      const res = await test.app.request('/?preset=introspective');

      expect(res.status).toBe(200);
      const html = await res.text();
      expect(html).toContain('value="introspection"');
      expect(html.match(/checked/g)).toHaveLength(3);
    });

    it('reports an unknown preset', async () => {
      const res = await test.app.request('/?preset=Polka');

      expect(res.status).toBe(404);
      expect(await res.text()).toContain('Unknown preset: Polka');
    });
  });

  describe('POST /generate', () => {
    it('records the album and redirects to it', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', 'Test Artist'],
          ['genres', 'Drill'],
          ['theme', 'night'],
          ['trackCount', '3'],
          ['language', 'en'],
        ])
      );

      expect(res.status).toBe(303);
      expect(res.headers.get('Location')).toBe('/album/album-1');

      const album = await test.db.getAlbum('album-1');
      expect(album?.tracks).toHaveLength(3);
      expect(album?.genres).toEqual(['Drill', 'Electro']);
      expect(album?.title).toBe('Night: Drill Echo');
    });

    it('accepts several genres and comma-separated artists', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', 'Test Artist, Another Band'],
          ['genres', 'Jazz'],
          ['genres', 'Ambient'],
          ['theme', 'rain'],
          ['trackCount', '4'],
        ])
      );

      expect(res.status).toBe(303);
      const album = await test.db.getAlbum('album-1');
      expect(album?.requestedGenres).toEqual(['Jazz', 'Ambient']);
      expect(album?.artists.map((credit) => credit.name)).toEqual(['Test Artist', 'Another Band']);
      expect(test.lookupGet).toHaveBeenCalledTimes(2);
    });

    it('still generates when an artist cannot be found', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', 'Nobody Known'],
          ['theme', 'fog'],
          ['trackCount', '2'],
        ])
      );

      expect(res.status).toBe(303);
      const album = await test.db.getAlbum('album-1');
      expect(album?.artists[0]).toMatchObject({ name: 'Nobody Known', resolved: false, genres: ['Unknown'] });
    });

    it('re-renders the form with the message when no artist is given', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', '  ,  '],
          ['theme', 'kept theme'],
          ['trackCount', '3'],
        ])
      );

      expect(res.status).toBe(400);
      const html = await res.text();
      expect(html).toContain('<p class="error-message">Add at least one artist</p>');
      expect(html).toContain('value="kept theme"');
      expect(await test.db.countAlbums()).toBe(0);
    });

    it('rejects a track count above the limit', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', 'Test Artist'],
          ['trackCount', '31'],
        ])
      );

      expect(res.status).toBe(400);
      expect(await res.text()).toContain('At most 30 tracks per album');
    });

    it('rejects genres outside the vocabulary', async () => {
      const res = await test.app.request(
        '/generate',
        postForm([
          ['artists', 'Test Artist'],
          ['genres', 'Polka'],
        ])
      );

      expect(res.status).toBe(400);
      expect(await res.text()).toContain('Unknown genre: Polka');
      expect(test.lookupGet).not.toHaveBeenCalled();
    });
  });
});
