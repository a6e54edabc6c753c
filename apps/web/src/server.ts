// ABOUTME: Node entry point: reads the environment, wires services together and serves the app.
// ABOUTME: SIGINT/SIGTERM close the HTTP server and the database before exiting.

import { config } from 'dotenv';
import { serve } from '@hono/node-server';
import { Database } from '@albumsmith/db';
import { DeezerService } from '@albumsmith/deezer';
import { AlbumAssembler, getDefaultCatalog } from '@albumsmith/generator';
import { MemoryKV } from '@albumsmith/shared';
import { loadEnv } from './env';
import { createApp } from './index';

config();
const env = loadEnv();

const db = Database.open(env.DATABASE_PATH);
if (env.CACHE_PERSIST) {
  const purged = db.cache.purgeExpired();
  if (purged > 0) {
    console.log(`[Cache] Purged ${purged} expired lookup(s)`);
  }
}

const catalog = getDefaultCatalog();
const deezer = new DeezerService({
  cache: env.CACHE_PERSIST ? db.cache : new MemoryKV(),
  apiBase: env.DEEZER_API_BASE,
});
const assembler = new AlbumAssembler(deezer.lookup, { catalog });

const app = createApp({ db, assembler, catalog, exportDir: env.EXPORT_DIR });

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  console.log(`[Server] Listening on http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      console.error('[Server] Error while closing:', error);
    }
    db.close();
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
