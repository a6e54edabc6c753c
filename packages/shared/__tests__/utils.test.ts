// Error, text and slug helper tests

import { describe, it, expect } from 'vitest';
import {
  AppError,
  InputError,
  LookupError,
  errorResponse,
  toAppError,
} from '../src/utils/errors';
import { collapseWhitespace, normalizeArtistName, stripDiacritics, capitalize } from '../src/utils/text';
import { generateSlug } from '../src/utils/slug';
import { isGenreTag, compareGenreTags } from '../src/types/genre';

describe('errors', () => {
  it('gives LookupError the lookup code and a 502 status', () => {
    const cause = new TypeError('fetch failed');
    const error = new LookupError('Air', 'network failure', cause);

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('LOOKUP_ERROR');
    expect(error.status).toBe(502);
    expect(error.message).toBe('Deezer API error: lookup failed for "Air": network failure');
    expect(error.cause).toBe(cause);
  });

  it('wraps unknown values as internal errors', () => {
    expect(toAppError(new Error('boom')).code).toBe('INTERNAL_ERROR');
    expect(toAppError('boom').message).toBe('An unexpected error occurred');

    const input = new InputError('bad');
    expect(toAppError(input)).toBe(input);
  });

  it('serializes an error response', async () => {
    const response = errorResponse(new InputError('Track count must be at least 1', { trackCount: 0 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        message: 'Track count must be at least 1',
        code: 'INPUT_ERROR',
        details: { trackCount: 0 },
      },
    });
  });
});

describe('text helpers', () => {
  it('normalizes artist names', () => {
    expect(normalizeArtistName('  Freeze   Corleone ')).toBe('freeze corleone');
    expect(collapseWhitespace(' la \n nuit ')).toBe('la nuit');
  });

  it('strips accents and capitalizes', () => {
    expect(stripDiacritics('Écho Odyssée')).toBe('Echo Odyssee');
    expect(capitalize('liberté')).toBe('Liberté');
  });

  it('slugs titles for filenames', () => {
    expect(generateSlug('Nuit : Écho Drill')).toBe('nuit-echo-drill');
    expect(generateSlug('Echo of Night (R&B)')).toBe('echo-of-night-rb');
  });
});

describe('genre vocabulary', () => {
  it('recognizes tags exactly', () => {
    expect(isGenreTag('Neo-Jazz')).toBe(true);
    expect(isGenreTag('neo-jazz')).toBe(false);
  });

  it('orders by vocabulary position', () => {
    const tags = ['Unknown', 'Jazz', 'Rap'] as const;
    expect([...tags].sort(compareGenreTags)).toEqual(['Rap', 'Jazz', 'Unknown']);
  });
});
