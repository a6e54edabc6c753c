// Shared type definitions for the Hono application
// Used across all route handlers to ensure type consistency

import type { Database } from '@albumsmith/db';
import type { AlbumAssembler, GeneratorCatalog } from '@albumsmith/generator';

// Everything a request handler may touch, built once in server.ts
export interface AppServices {
  db: Database;
  assembler: AlbumAssembler;
  catalog: GeneratorCatalog;
  /** Directory that POST /api/albums/:id/export writes into */
  exportDir: string;
}

// Context variables (set by middleware)
export type Variables = AppServices;

// Combined app context type for Hono
export type AppContext = { Variables: Variables };
