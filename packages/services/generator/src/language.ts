// Detects whether an artist (and so an album) should get French or English titles

import type { Language } from '@albumsmith/shared';
import { getDefaultCatalog, languageKey, type GeneratorCatalog } from './catalog';

export class LanguageDetector {
  constructor(private catalog: GeneratorCatalog = getDefaultCatalog()) {}

  /**
   * French when the provider's genres mention a French scene or the artist
   * is on the known French-artist list; English otherwise.
   */
  detect(artistName: string, rawGenres: readonly string[] = []): Language {
    const genres = rawGenres.map(languageKey).join(' | ');
    if (this.catalog.frenchGenreMarkers.some((marker) => genres.includes(marker))) {
      return 'fr';
    }
    return this.catalog.frenchArtists.has(languageKey(artistName)) ? 'fr' : 'en';
  }
}

/**
 * French only with a strict majority of French artists
 */
export function majorityLanguage(languages: readonly Language[]): Language {
  const french = languages.filter((language) => language === 'fr').length;
  return french > languages.length - french ? 'fr' : 'en';
}
