// Main entry point for @albumsmith/shared package

export * from './types';
export * from './schemas';
export * from './utils/errors';
export * from './utils/fetch';
export * from './utils/kv';
export * from './utils/random';
export * from './utils/slug';
export * from './utils/text';
