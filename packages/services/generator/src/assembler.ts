// ABOUTME: Turns an album request into a finished Album: validate, look up artists,
// ABOUTME: merge genres, pick language and theme, then generate titles and tracks.

import { randomUUID } from 'node:crypto';
import { GENERATOR_LIMITS } from '@albumsmith/config';
import {
  InputError,
  LookupError,
  UNKNOWN_GENRE,
  collapseWhitespace,
  normalizeArtistName,
  type Album,
  type AlbumRequest,
  type ArtistCredit,
  type ArtistLookup,
  type GenreTag,
  type Language,
  type RandomSource,
} from '@albumsmith/shared';
import { getDefaultCatalog, type GeneratorCatalog } from './catalog';
import { GenreClassifier } from './genre-classifier';
import { LanguageDetector, majorityLanguage } from './language';
import { TrackTitleGenerator, type TrackInfluence } from './title-generator';

export interface AlbumAssemblerOptions {
  random?: RandomSource;
  catalog?: GeneratorCatalog;
  now?: () => Date;
  createId?: () => string;
}

interface ResolvedArtist {
  credit: ArtistCredit;
  influence: TrackInfluence;
}

/**
 * Most frequent tag across the contributions (requested genres count as one
 * contribution, each artist as another). Ties go to the earlier union entry;
 * Unknown only wins when it is the only tag.
 */
export function dominantGenre(
  union: readonly GenreTag[],
  contributions: ReadonlyArray<readonly GenreTag[]>
): GenreTag {
  const candidates = union.filter((tag) => tag !== UNKNOWN_GENRE);
  let best: GenreTag = UNKNOWN_GENRE;
  let bestCount = 0;

  for (const tag of candidates) {
    const count = contributions.filter((genres) => genres.includes(tag)).length;
    if (count > bestCount) {
      best = tag;
      bestCount = count;
    }
  }
  return best;
}

function freezeAlbum(album: Album): Album {
  for (const track of album.tracks) {
    Object.freeze(track);
  }
  for (const credit of album.artists) {
    Object.freeze(credit.genres);
    Object.freeze(credit);
  }
  Object.freeze(album.tracks);
  Object.freeze(album.artists);
  Object.freeze(album.genres);
  Object.freeze(album.requestedGenres);
  return Object.freeze(album);
}

export class AlbumAssembler {
  private readonly catalog: GeneratorCatalog;
  private readonly classifier: GenreClassifier;
  private readonly languages: LanguageDetector;
  private readonly titles: TrackTitleGenerator;
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(
    private lookup: ArtistLookup,
    options: AlbumAssemblerOptions = {}
  ) {
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.classifier = new GenreClassifier(this.catalog);
    this.languages = new LanguageDetector(this.catalog);
    this.titles = new TrackTitleGenerator(options.random ?? Math.random, this.catalog);
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? randomUUID;
  }

  /**
   * Build an album. Rejects invalid input with InputError; artist lookups that
   * fail degrade to the Unknown genre instead of failing the album.
   */
  async assemble(request: AlbumRequest): Promise<Album> {
    const artists = this.validate(request);
    const requestedGenres = [...new Set(request.genres)];

    console.log(`[Assembler] Generating ${request.trackCount} tracks from ${artists.length} artist(s)`);

    // One lookup at a time; each waits at most its own timeout
    const resolved: ResolvedArtist[] = [];
    for (const name of artists) {
      resolved.push(await this.resolveArtist(name));
    }

    const union: GenreTag[] = [...requestedGenres];
    for (const { credit } of resolved) {
      for (const tag of credit.genres) {
        if (!union.includes(tag)) union.push(tag);
      }
    }
    if (union.length === 0) union.push(UNKNOWN_GENRE);

    const language: Language =
      request.language === 'en' || request.language === 'fr'
        ? request.language
        : majorityLanguage(resolved.map(({ credit }) => credit.language));

    const theme = collapseWhitespace(request.theme) || this.catalog.words[language].defaultTheme;
    const dominant = dominantGenre(union, [requestedGenres, ...resolved.map(({ credit }) => credit.genres)]);

    const tracks = this.titles.generate(union, theme, request.trackCount, {
      language,
      influences: resolved.map(({ influence }) => influence),
    });

    const album: Album = {
      id: this.createId(),
      title: this.titles.albumTitle(theme, dominant, language),
      theme,
      language,
      narration: this.titles.narration(theme, dominant, language),
      genres: union,
      requestedGenres,
      artists: resolved.map(({ credit }) => credit),
      tracks,
      createdAt: this.now().toISOString(),
    };

    const unresolved = resolved.filter(({ credit }) => !credit.resolved).length;
    console.log(
      `[Assembler] Built "${album.title}" (${tracks.length} tracks, ${resolved.length - unresolved}/${resolved.length} artists resolved)`
    );
    return freezeAlbum(album);
  }

  /**
   * Trimmed, de-duplicated artist names, or an InputError
   */
  private validate(request: AlbumRequest): string[] {
    const seen = new Set<string>();
    const artists: string[] = [];
    for (const raw of request.artists) {
      const name = collapseWhitespace(raw);
      const key = normalizeArtistName(name);
      if (!name || seen.has(key)) continue;
      seen.add(key);
      artists.push(name);
    }

    if (artists.length === 0) {
      throw new InputError('Add at least one artist');
    }
    if (artists.length > GENERATOR_LIMITS.maxArtists) {
      throw new InputError(`At most ${GENERATOR_LIMITS.maxArtists} artists per album`, {
        artists: artists.length,
      });
    }

    const { trackCount } = request;
    if (!Number.isInteger(trackCount) || trackCount < GENERATOR_LIMITS.minTracks) {
      throw new InputError(`Track count must be a whole number of at least ${GENERATOR_LIMITS.minTracks}`, {
        trackCount,
      });
    }
    if (trackCount > GENERATOR_LIMITS.maxTracks) {
      throw new InputError(`At most ${GENERATOR_LIMITS.maxTracks} tracks per album`, { trackCount });
    }
    return artists;
  }

  private async resolveArtist(name: string): Promise<ResolvedArtist> {
    try {
      const profile = await this.lookup.get(name);
      const detected = this.languages.detect(name, profile.genres);
      const language = detected === 'fr' ? detected : this.languages.detect(profile.name);

      return {
        credit: {
          name,
          resolved: true,
          url: profile.url,
          genres: [...this.classifier.classify(profile.genres)],
          language,
        },
        influence: { name, url: profile.url, averageTrackDuration: profile.averageTrackDuration },
      };
    } catch (error) {
      if (!(error instanceof LookupError)) throw error;
      console.warn(`[Assembler] Using a generic profile for "${name}": ${error.message}`);

      return {
        credit: {
          name,
          resolved: false,
          url: null,
          genres: [UNKNOWN_GENRE],
          language: this.languages.detect(name),
        },
        influence: { name, url: null, averageTrackDuration: null },
      };
    }
  }
}
