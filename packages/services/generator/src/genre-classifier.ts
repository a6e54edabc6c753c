// ABOUTME: Maps free-form provider genre strings onto the fixed genre vocabulary.
// ABOUTME: Case-insensitive substring matching; the longest overlapping alias wins.

import { UNKNOWN_GENRE, compareGenreTags, type GenreTag } from '@albumsmith/shared';
import { getDefaultCatalog, type GeneratorCatalog } from './catalog';

interface AliasEntry {
  alias: string;
  tag: GenreTag;
}

interface Occurrence {
  start: number;
  end: number;
  tag: GenreTag;
}

export class GenreClassifier {
  private readonly aliases: AliasEntry[];

  constructor(catalog: GeneratorCatalog = getDefaultCatalog()) {
    this.aliases = [...catalog.genres.values()].flatMap((definition) =>
      definition.aliases.map((alias) => ({ alias, tag: definition.tag }))
    );
  }

  /**
   * Classify raw genre strings. Unmatched strings are dropped; when nothing
   * matches the result is {Unknown}. Tags come back in vocabulary order.
   */
  classify(rawGenres: readonly string[]): Set<GenreTag> {
    const tags = new Set<GenreTag>();
    for (const raw of rawGenres) {
      for (const tag of this.classifyOne(raw)) {
        tags.add(tag);
      }
    }

    if (tags.size === 0) {
      return new Set([UNKNOWN_GENRE]);
    }
    return new Set([...tags].sort(compareGenreTags));
  }

  private classifyOne(raw: string): GenreTag[] {
    const text = raw.trim().toLowerCase();
    if (!text) return [];

    const occurrences: Occurrence[] = [];
    for (const { alias, tag } of this.aliases) {
      let start = text.indexOf(alias);
      while (start !== -1) {
        occurrences.push({ start, end: start + alias.length, tag });
        start = text.indexOf(alias, start + 1);
      }
    }

    // "trap" contains "rap", "neo-jazz" contains "jazz": drop matches inside a longer one
    const kept = occurrences.filter(
      (inner) =>
        !occurrences.some(
          (outer) =>
            outer.end - outer.start > inner.end - inner.start &&
            outer.start <= inner.start &&
            outer.end >= inner.end
        )
    );
    return kept.map((occurrence) => occurrence.tag);
  }
}
