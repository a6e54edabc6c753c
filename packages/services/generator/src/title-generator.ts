// ABOUTME: Template-driven track and album titles, plus per-track mood, tempo and duration.
// ABOUTME: All choices come from an injected random source so a seed replays an album exactly.

import { TRACK_DEFAULTS } from '@albumsmith/config';
import {
  UNKNOWN_GENRE,
  capitalize,
  pick,
  pickTwo,
  randomInt,
  type GenreTag,
  type Language,
  type RandomSource,
  type Track,
} from '@albumsmith/shared';
import { genreDefinition, getDefaultCatalog, type GeneratorCatalog } from './catalog';

/** Artist a track can be credited to */
export interface TrackInfluence {
  name: string;
  url: string | null;
  /** Seconds, null when unknown */
  averageTrackDuration: number | null;
}

export interface GenerateOptions {
  language?: Language;
  influences?: readonly TrackInfluence[];
}

export interface TemplateValues {
  a: string;
  b: string;
  theme: string;
  genre: string;
}

/**
 * Fill {a} {b} {a_lower} {b_lower} {theme} {Theme} {genre}. Unknown placeholders are left as-is.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  const replacements: Record<string, string> = {
    a: values.a,
    b: values.b,
    a_lower: values.a.toLowerCase(),
    b_lower: values.b.toLowerCase(),
    theme: values.theme,
    Theme: capitalize(values.theme),
    genre: values.genre,
  };
  return template.replace(/\{([^}]*)\}/g, (whole, name: string) => replacements[name] ?? whole);
}

export class TrackTitleGenerator {
  constructor(
    private random: RandomSource = Math.random,
    private catalog: GeneratorCatalog = getDefaultCatalog()
  ) {}

  /**
   * Generate `count` tracks, positions 1..count. Each position independently
   * draws its genre, credited artist, title, mood, tempo and duration. Sub-themes
   * rotate through the language pool so none repeats before all have been used.
   */
  generate(genres: Iterable<GenreTag>, theme: string, count: number, options: GenerateOptions = {}): Track[] {
    const pool = [...genres];
    if (pool.length === 0) pool.push(UNKNOWN_GENRE);
    const language = options.language ?? 'en';
    const influences = options.influences ?? [];
    const subThemes = this.catalog.words[language].themes;
    const usedThemes = new Set<string>();

    const tracks: Track[] = [];
    for (let position = 1; position <= count; position++) {
      const genre = pick(this.random, pool);
      const influence = influences.length > 0 ? pick(this.random, influences) : null;
      const subTheme = this.nextSubTheme(subThemes, usedThemes);
      const definition = genreDefinition(this.catalog, genre);

      const title = this.trackTitle(genre, theme, language);
      const mood = pick(this.random, definition.moods[language]);

      const boost =
        influence?.averageTrackDuration != null &&
        influence.averageTrackDuration < TRACK_DEFAULTS.shortTrackSeconds
          ? TRACK_DEFAULTS.shortTrackTempoBoost
          : 0;
      const [minTempo, maxTempo] = definition.tempo;
      const tempo = randomInt(this.random, minTempo + boost, maxTempo + boost);
      const duration = randomInt(this.random, TRACK_DEFAULTS.duration.min, TRACK_DEFAULTS.duration.max);

      tracks.push({
        position,
        title,
        genre,
        mood,
        theme: subTheme,
        tempo,
        duration,
        artist: influence?.name ?? null,
        link: influence?.url ?? null,
      });
    }
    return tracks;
  }

  private nextSubTheme(pool: readonly string[], used: Set<string>): string {
    let available = pool.filter((theme) => !used.has(theme));
    if (available.length === 0) {
      used.clear();
      available = [...pool];
    }
    const theme = pick(this.random, available);
    used.add(theme);
    return theme;
  }

  /**
   * One track title: two distinct words from the language keywords and the
   * genre's moods, dropped into a common or genre-specific template.
   */
  trackTitle(genre: GenreTag, theme: string, language: Language): string {
    const definition = genreDefinition(this.catalog, genre);
    const pack = this.catalog.templates[language];

    const words = [...this.catalog.words[language].keywords, ...definition.moods[language].map(capitalize)];
    const [a, b] = pickTwo(this.random, words);
    const template = pick(this.random, [...pack.track, ...(pack.genreTracks[genre] ?? [])]);

    return renderTemplate(template, { a, b, theme, genre: definition.label[language] });
  }

  albumTitle(theme: string, dominant: GenreTag, language: Language): string {
    const word = pick(this.random, this.catalog.words[language].albumWords);
    const template = pick(this.random, this.catalog.templates[language].album);
    const genre = genreDefinition(this.catalog, dominant).label[language];

    return renderTemplate(template, { a: word, b: word, theme, genre });
  }

  narration(theme: string, dominant: GenreTag, language: Language): string {
    const genre = genreDefinition(this.catalog, dominant).label[language];
    return renderTemplate(this.catalog.templates[language].narration, { a: '', b: '', theme, genre });
  }
}
