// ABOUTME: Reads server settings from the environment (and .env via dotenv in server.ts).
// ABOUTME: Every value has a default so a bare checkout starts without configuration.

import { z } from 'zod';
import { AppError } from '@albumsmith/shared';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default('data/albumsmith.db'),
  EXPORT_DIR: z.string().min(1).default('exports'),
  CACHE_PERSIST: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  DEEZER_API_BASE: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(`Invalid environment: ${problems.join('; ')}`, 'CONFIG_ERROR', 500, {
      issues: problems,
    });
  }
  return parsed.data;
}
