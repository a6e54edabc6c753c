// Main entry point for @albumsmith/config package

export * from './cache';
export * from './generator';
export * from './services';

// Site-wide constants
export const SITE_CONFIG = {
  name: 'Albumsmith',
  description: 'Concept albums generated from the artists, genres and themes you pick.',
  historyPageSize: 25,
} as const;
