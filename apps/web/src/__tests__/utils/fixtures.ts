// Test utilities - an app wired to an in-memory database and a fake artist lookup

import { vi } from 'vitest';
import { Database } from '@albumsmith/db';
import { AlbumAssembler, getDefaultCatalog } from '@albumsmith/generator';
import {
  LookupError,
  normalizeArtistName,
  type ArtistLookup,
  type ArtistProfile,
} from '@albumsmith/shared';
import { createApp } from '../../index';

export const testProfiles: Record<string, ArtistProfile> = {
  'test artist': {
    id: '101',
    name: 'Test Artist',
    genres: ['Electro'],
    averageTrackDuration: 240,
    fans: 10,
    url: 'https://www.deezer.com/artist/101',
    image: null,
  },
  'another band': {
    id: '202',
    name: 'Another Band',
    genres: ['Rock'],
    averageTrackDuration: 200,
    fans: 20,
    url: 'https://www.deezer.com/artist/202',
    image: null,
  },
};

export function createFakeLookup() {
  const get = vi.fn(async (name: string): Promise<ArtistProfile> => {
    const profile = testProfiles[normalizeArtistName(name)];
    if (!profile) throw new LookupError(name, 'no matching artist');
    return profile;
  });
  const lookup: ArtistLookup = { get };
  return { lookup, get };
}

/**
 * App with deterministic ids (album-1, album-2...), one minute between
 * creation times, and random choices that always take the first option.
 */
export function createTestApp(options: { exportDir?: string } = {}) {
  const db = Database.open(':memory:');
  const catalog = getDefaultCatalog();
  const { lookup, get } = createFakeLookup();

  let created = 0;
  let clock = Date.parse('2026-03-01T12:00:00.000Z');
  const assembler = new AlbumAssembler(lookup, {
    catalog,
    random: () => 0,
    createId: () => `album-${++created}`,
    now: () => {
      clock += 60_000;
      return new Date(clock);
    },
  });

  const app = createApp({ db, assembler, catalog, exportDir: options.exportDir ?? 'exports' });
  return { app, db, lookupGet: get };
}

/** POST a urlencoded form the way a browser would */
export function postForm(fields: Array<[string, string]>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(fields).toString(),
  };
}

export function postJson(body: unknown, method = 'POST'): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/** Parsed JSON body, typed as the envelope the route is expected to return */
export async function readJson<T>(res: Response): Promise<T> {
  return res.json() as Promise<T>;
}
