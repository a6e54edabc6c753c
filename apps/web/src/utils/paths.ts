// Export targets requested over the API must resolve inside the export directory

import { isAbsolute, relative, resolve } from 'node:path';
import { InputError } from '@albumsmith/shared';

export function resolveExportPath(exportDir: string, requested: string | undefined, fallback: string): string {
  const root = resolve(exportDir);
  const target = resolve(root, requested || fallback);
  const rel = relative(root, target);

  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new InputError('Export path must name a file inside the export directory', {
      path: requested ?? null,
    });
  }
  return target;
}
