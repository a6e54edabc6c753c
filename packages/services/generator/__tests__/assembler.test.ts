// ABOUTME: Tests for album assembly - validation, degraded lookups, genre union, language and theme.

import { describe, it, expect, vi } from 'vitest';
import {
  InputError,
  LookupError,
  createSeededRandom,
  normalizeArtistName,
  type AlbumRequest,
  type ArtistLookup,
  type ArtistProfile,
} from '@albumsmith/shared';
import { AlbumAssembler, dominantGenre } from '../src/index';

const profiles: Record<string, ArtistProfile> = {
  'freeze corleone': {
    id: '5001',
    name: 'Freeze Corleone',
    genres: ['Drill'],
    averageTrackDuration: 190,
    fans: 1200,
    url: 'https://www.deezer.com/artist/5001',
    image: null,
  },
  air: {
    id: '27',
    name: 'Air',
    genres: ['Electro', 'Pop'],
    averageTrackDuration: 245,
    fans: 900,
    url: 'https://www.deezer.com/artist/27',
    image: null,
  },
  radiohead: {
    id: '399',
    name: 'Radiohead',
    genres: ['Alternative', 'Rock'],
    averageTrackDuration: 260,
    fans: 5000,
    url: 'https://www.deezer.com/artist/399',
    image: null,
  },
};

function createLookup() {
  const get = vi.fn(async (name: string): Promise<ArtistProfile> => {
    const profile = profiles[normalizeArtistName(name)];
    if (!profile) throw new LookupError(name, 'no matching artist');
    return profile;
  });
  const lookup: ArtistLookup = { get };
  return { lookup, get };
}

function request(overrides: Partial<AlbumRequest> = {}): AlbumRequest {
  return { artists: ['Air'], genres: [], theme: 'nuit', trackCount: 5, ...overrides };
}

describe('AlbumAssembler', () => {
  describe('validation', () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup);

    it('rejects an empty artist list', async () => {
      await expect(assembler.assemble(request({ artists: [] }))).rejects.toBeInstanceOf(InputError);
      await expect(assembler.assemble(request({ artists: ['  ', ''] }))).rejects.toThrow('Add at least one artist');
    });

    it.each([0, -1, 2.5, Number.NaN])('rejects a track count of %s', async (trackCount) => {
      await expect(assembler.assemble(request({ trackCount }))).rejects.toBeInstanceOf(InputError);
    });

    it('rejects more tracks than the limit', async () => {
      await expect(assembler.assemble(request({ trackCount: 31 }))).rejects.toThrow('At most 30 tracks per album');
    });

    it('rejects more artists than the limit', async () => {
      const artists = Array.from({ length: 16 }, (_, i) => `Artist ${i}`);
      await expect(assembler.assemble(request({ artists }))).rejects.toMatchObject({
        code: 'INPUT_ERROR',
        status: 400,
        details: { artists: 16 },
      });
    });
  });

  it('builds the exact album for a fixed random source', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup, {
      random: () => 0,
      now: () => new Date('2026-05-01T12:00:00.000Z'),
      createId: () => 'album-1',
    });

    const album = await assembler.assemble(request({ theme: '  la   nuit ', trackCount: 2 }));

    const track = {
      genre: 'Pop',
      title: 'Nuit la nuit',
      mood: 'émotionnel',
      tempo: 90,
      duration: 150,
      artist: 'Air',
      link: 'https://www.deezer.com/artist/27',
    };
    expect(album).toEqual({
      id: 'album-1',
      title: 'La nuit : Écho Pop',
      theme: 'la nuit',
      language: 'fr',
      narration:
        'Album narratif explorant le thème « la nuit », à travers des esthétiques musicales et émotionnelles variées, ancré dans le Pop.',
      genres: ['Pop', 'Electro'],
      requestedGenres: [],
      artists: [
        { name: 'Air', resolved: true, url: 'https://www.deezer.com/artist/27', genres: ['Pop', 'Electro'], language: 'fr' },
      ],
      tracks: [
        { position: 1, ...track, theme: 'solitude' },
        { position: 2, ...track, theme: 'mélancolie' },
      ],
      createdAt: '2026-05-01T12:00:00.000Z',
    });
  });

  it('produces exactly the requested number of tracks', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup, { random: createSeededRandom(4) });

    const album = await assembler.assemble(request({ artists: ['Air', 'Radiohead'], trackCount: 30 }));

    expect(album.tracks).toHaveLength(30);
    expect(album.tracks.map((track) => track.position)).toEqual(Array.from({ length: 30 }, (_, i) => i + 1));
  });

  it('tags every track Drill for a Drill-only request and artist', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup, { random: createSeededRandom(21) });

    const album = await assembler.assemble({
      artists: ['Freeze Corleone'],
      genres: ['Drill'],
      theme: 'Nuit',
      trackCount: 5,
    });

    expect(album.tracks).toHaveLength(5);
    expect(album.tracks.every((track) => track.genre === 'Drill')).toBe(true);
    expect(album.title).toContain('Nuit');
    expect(album.genres).toEqual(['Drill']);
    expect(album.language).toBe('fr');
  });

  it('degrades to Unknown when the only artist cannot be looked up', async () => {
    const { lookup, get } = createLookup();
    const assembler = new AlbumAssembler(lookup, { random: createSeededRandom(8) });

    const album = await assembler.assemble(request({ artists: ['Nobody Known'], genres: ['Jazz'], trackCount: 10 }));

    expect(get).toHaveBeenCalledTimes(1);
    expect(album.genres).toEqual(['Jazz', 'Unknown']);
    expect(album.artists).toEqual([
      { name: 'Nobody Known', resolved: false, url: null, genres: ['Unknown'], language: 'en' },
    ]);
    for (const track of album.tracks) {
      expect(['Jazz', 'Unknown']).toContain(track.genre);
      expect(track.link).toBeNull();
    }
    // Jazz beats Unknown for the title
    expect(album.title).toContain('Jazz');
  });

  it('uses Unknown alone when nothing else is known', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup, { random: () => 0 });

    const album = await assembler.assemble(request({ artists: ['Nobody Known'], theme: '', trackCount: 1 }));

    expect(album.genres).toEqual(['Unknown']);
    expect(album.theme).toBe('freedom');
    expect(album.title).toBe('Freedom: Hybrid Echo');
  });

  it('lets other errors escape', async () => {
    const lookup: ArtistLookup = {
      get: async () => {
        throw new TypeError('programming error');
      },
    };
    const assembler = new AlbumAssembler(lookup);

    await expect(assembler.assemble(request())).rejects.toBeInstanceOf(TypeError);
  });

  it('looks up duplicate names once', async () => {
    const { lookup, get } = createLookup();
    const assembler = new AlbumAssembler(lookup);

    const album = await assembler.assemble(request({ artists: ['Air', ' air ', 'AIR'] }));

    expect(get).toHaveBeenCalledTimes(1);
    expect(album.artists.map((credit) => credit.name)).toEqual(['Air']);
  });

  it('puts requested genres ahead of artist genres', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup);

    const album = await assembler.assemble(request({ artists: ['Radiohead', 'Air'], genres: ['Metal', 'Metal', 'Pop'] }));

    expect(album.requestedGenres).toEqual(['Metal', 'Pop']);
    expect(album.genres).toEqual(['Metal', 'Pop', 'Rock', 'Indie', 'Electro']);
  });

  it('honours an explicit language', async () => {
    const { lookup } = createLookup();
    const assembler = new AlbumAssembler(lookup, { random: () => 0 });

    const album = await assembler.assemble(request({ language: 'en', theme: '', trackCount: 1 }));

    expect(album.language).toBe('en');
    expect(album.theme).toBe('freedom');
    expect(album.tracks[0].title).toBe('Shadow freedom');
  });

  it('returns a frozen album', async () => {
    const { lookup } = createLookup();
    const album = await new AlbumAssembler(lookup).assemble(request());

    expect(Object.isFrozen(album)).toBe(true);
    expect(Object.isFrozen(album.tracks)).toBe(true);
    expect(Object.isFrozen(album.tracks[0])).toBe(true);
    expect(Object.isFrozen(album.artists[0].genres)).toBe(true);
  });

  it('replays the same album from the same seed', async () => {
    const build = () =>
      new AlbumAssembler(createLookup().lookup, {
        random: createSeededRandom(2024),
        now: () => new Date('2026-01-01T00:00:00.000Z'),
        createId: () => 'fixed',
      }).assemble(request({ artists: ['Air', 'Radiohead'], genres: ['Ambient'], trackCount: 12 }));

    expect(await build()).toEqual(await build());
  });
});

describe('dominantGenre', () => {
  it('counts contributions and breaks ties by union order', () => {
    expect(dominantGenre(['Rap', 'Drill'], [['Rap'], ['Drill', 'Rap'], ['Drill']])).toBe('Rap');
    expect(dominantGenre(['Rap', 'Drill'], [['Drill'], ['Drill', 'Rap']])).toBe('Drill');
  });

  it('prefers any real genre over Unknown', () => {
    expect(dominantGenre(['Unknown', 'Jazz'], [['Unknown'], ['Unknown'], ['Jazz']])).toBe('Jazz');
    expect(dominantGenre(['Unknown'], [['Unknown']])).toBe('Unknown');
  });
});
