// ABOUTME: Loads the generator's data files (genre aliases, templates, word pools, presets).
// ABOUTME: Everything is validated once at start-up; a bad file fails loudly before any request.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  GENRE_TAGS,
  LANGUAGES,
  UNKNOWN_GENRE,
  genreTagSchema,
  normalizeArtistName,
  stripDiacritics,
  type GenreTag,
  type Language,
  type Preset,
} from '@albumsmith/shared';

const localized = <T extends z.ZodTypeAny>(schema: T) => z.object({ en: schema, fr: schema });

const genreDefinitionSchema = z.object({
  tag: genreTagSchema,
  aliases: z.array(z.string().min(1)),
  tempo: z.tuple([z.number().int().positive(), z.number().int().positive()]).refine(([min, max]) => min <= max, {
    message: 'tempo range must be ascending',
  }),
  moods: localized(z.array(z.string().min(1)).min(1)),
  label: localized(z.string().min(1)),
});

const templatePackSchema = z.object({
  track: z.array(z.string().min(1)).min(1),
  genreTracks: z.record(genreTagSchema, z.array(z.string().min(1))),
  album: z.array(z.string().min(1)).min(1),
  narration: z.string().min(1),
});

const wordPackSchema = z.object({
  keywords: z.array(z.string().min(1)).min(2),
  themes: z.array(z.string().min(1)).min(1),
  albumWords: z.array(z.string().min(1)).min(1),
  defaultTheme: z.string().min(1),
});

const presetSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  genres: z.array(genreTagSchema).min(1),
  theme: z.string().min(1),
});

const frenchArtistsSchema = z.object({
  genreMarkers: z.array(z.string().min(1)),
  artists: z.array(z.string().min(1)),
});

export type GenreDefinition = z.infer<typeof genreDefinitionSchema>;
export type TemplatePack = z.infer<typeof templatePackSchema>;
export type WordPack = z.infer<typeof wordPackSchema>;

export interface GeneratorCatalog {
  genres: ReadonlyMap<GenreTag, GenreDefinition>;
  templates: Record<Language, TemplatePack>;
  words: Record<Language, WordPack>;
  presets: Preset[];
  /** Normalized (lower-case, unaccented) names */
  frenchArtists: ReadonlySet<string>;
  frenchGenreMarkers: string[];
}

export const TRACK_PLACEHOLDERS = ['a', 'b', 'a_lower', 'b_lower', 'theme', 'Theme', 'genre'] as const;
export const ALBUM_PLACEHOLDERS = ['a', 'a_lower', 'theme', 'Theme', 'genre'] as const;

export class CatalogError extends Error {
  constructor(file: string, problem: string) {
    super(`Invalid generator data in ${file}: ${problem}`);
    this.name = 'CatalogError';
  }
}

const DEFAULT_DATA_DIR = new URL('../data/', import.meta.url);

function readJson<T extends z.ZodTypeAny>(dataDir: URL, file: string, schema: T): z.output<T> {
  const raw: unknown = JSON.parse(readFileSync(new URL(file, dataDir), 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogError(file, parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  return parsed.data;
}

function placeholdersIn(template: string): string[] {
  return [...template.matchAll(/\{([^}]*)\}/g)].map((match) => match[1]);
}

function checkTemplates(file: string, templates: readonly string[], allowed: readonly string[]): void {
  for (const template of templates) {
    const unknown = placeholdersIn(template).filter((name) => !allowed.includes(name));
    if (unknown.length > 0) {
      throw new CatalogError(file, `unknown placeholder {${unknown[0]}} in "${template}"`);
    }
  }
}

/**
 * Turn a free-text name into the form the French-artist list is stored in
 */
export function languageKey(value: string): string {
  return stripDiacritics(normalizeArtistName(value));
}

function buildGenres(definitions: GenreDefinition[]): Map<GenreTag, GenreDefinition> {
  const genres = new Map<GenreTag, GenreDefinition>();
  for (const definition of definitions) {
    if (genres.has(definition.tag)) {
      throw new CatalogError('genres.json', `duplicate genre ${definition.tag}`);
    }
    const aliases = definition.aliases.map((alias) => alias.toLowerCase());
    if (definition.tag === UNKNOWN_GENRE) {
      if (aliases.length > 0) throw new CatalogError('genres.json', 'Unknown must not have aliases');
    } else if (!aliases.includes(definition.tag.toLowerCase())) {
      // Classifying a tag's own name must give the tag back
      throw new CatalogError('genres.json', `${definition.tag} must list "${definition.tag.toLowerCase()}" as an alias`);
    }
    genres.set(definition.tag, { ...definition, aliases });
  }

  const missing = GENRE_TAGS.filter((tag) => !genres.has(tag));
  if (missing.length > 0) {
    throw new CatalogError('genres.json', `missing genres: ${missing.join(', ')}`);
  }
  return genres;
}

/**
 * Read and validate every data file from a directory (defaults to the bundled data/)
 */
export function loadCatalog(dataDir: URL = DEFAULT_DATA_DIR): GeneratorCatalog {
  const genres = buildGenres(readJson(dataDir, 'genres.json', z.array(genreDefinitionSchema)));
  const templates = readJson(dataDir, 'templates.json', localized(templatePackSchema));
  const words = readJson(dataDir, 'words.json', localized(wordPackSchema));
  const presets = readJson(dataDir, 'presets.json', z.array(presetSchema));
  const french = readJson(dataDir, 'french-artists.json', frenchArtistsSchema);

  for (const language of LANGUAGES) {
    const pack = templates[language];
    checkTemplates('templates.json', pack.track, TRACK_PLACEHOLDERS);
    for (const extra of Object.values(pack.genreTracks)) {
      checkTemplates('templates.json', extra ?? [], TRACK_PLACEHOLDERS);
    }
    checkTemplates('templates.json', pack.album, ALBUM_PLACEHOLDERS);
    for (const template of pack.album) {
      const used = placeholdersIn(template);
      if (!used.includes('genre') || !(used.includes('theme') || used.includes('Theme'))) {
        throw new CatalogError('templates.json', `album template "${template}" must use the theme and {genre}`);
      }
    }
    checkTemplates('templates.json', [pack.narration], ['theme', 'Theme', 'genre']);
  }

  return {
    genres,
    templates,
    words,
    presets,
    frenchArtists: new Set(french.artists.map(languageKey)),
    frenchGenreMarkers: french.genreMarkers.map(languageKey),
  };
}

let defaultCatalog: GeneratorCatalog | null = null;

/**
 * Bundled catalog, loaded on first use
 */
export function getDefaultCatalog(): GeneratorCatalog {
  defaultCatalog ??= loadCatalog();
  return defaultCatalog;
}

export function genreDefinition(catalog: GeneratorCatalog, tag: GenreTag): GenreDefinition {
  const definition = catalog.genres.get(tag);
  if (!definition) {
    throw new CatalogError('genres.json', `no definition for ${tag}`);
  }
  return definition;
}
