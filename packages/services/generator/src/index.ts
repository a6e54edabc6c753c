// Generator service - genre classification, titles and album assembly

export { AlbumAssembler, dominantGenre } from './assembler';
export type { AlbumAssemblerOptions } from './assembler';

export {
  CatalogError,
  genreDefinition,
  getDefaultCatalog,
  languageKey,
  loadCatalog,
} from './catalog';
export type { GenreDefinition, GeneratorCatalog, TemplatePack, WordPack } from './catalog';

export { GenreClassifier } from './genre-classifier';

export { LanguageDetector, majorityLanguage } from './language';

export { TrackTitleGenerator, renderTemplate } from './title-generator';
export type { GenerateOptions, TemplateValues, TrackInfluence } from './title-generator';
