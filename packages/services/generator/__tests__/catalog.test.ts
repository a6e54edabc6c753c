// Generator data loading and validation tests

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { cpSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { GENRE_TAGS } from '@albumsmith/shared';
import { CatalogError, getDefaultCatalog, loadCatalog } from '../src/index';

const bundledData = fileURLToPath(new URL('../data/', import.meta.url));

describe('loadCatalog', () => {
  it('loads the bundled data', () => {
    const catalog = getDefaultCatalog();

    expect([...catalog.genres.keys()]).toEqual([...GENRE_TAGS]);
    expect(catalog.presets.map((preset) => preset.name)).toEqual([
      'Introspective',
      'Energetic',
      'Nocturnal',
      'Urban',
      'Experimental',
    ]);
    expect(catalog.words.fr.defaultTheme).toBe('liberté');
    expect(catalog.frenchArtists.has('heuss l\'enfoire')).toBe(true);
  });

  it('memoizes the default catalog', () => {
    expect(getDefaultCatalog()).toBe(getDefaultCatalog());
  });

  describe('with edited data files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'albumsmith-catalog-'));
      cpSync(bundledData, dir, { recursive: true });
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function edit(file: string, change: (text: string) => string): void {
      const path = join(dir, file);
      writeFileSync(path, change(readFileSync(path, 'utf8')));
    }

    const load = () => loadCatalog(pathToFileURL(`${dir}/`));

    it('loads an unedited copy', () => {
      expect(load().genres.size).toBe(GENRE_TAGS.length);
    });

    it('requires each tag to be its own alias', () => {
      edit('genres.json', (text) => text.replace('"aliases": ["trap"]', '"aliases": ["piège"]'));

      expect(load).toThrow(CatalogError);
      expect(load).toThrow('Trap must list "trap" as an alias');
    });

    it('rejects unknown template placeholders', () => {
      edit('templates.json', (text) => text.replace('"{a} & {b}"', '"{a} & {c}"'));

      expect(load).toThrow('unknown placeholder {c} in "{a} & {c}"');
    });

    it('rejects album templates without the genre', () => {
      edit('templates.json', (text) => text.replace('"{Theme}: {genre} {a}"', '"{Theme}: {a}"'));

      expect(load).toThrow('album template "{Theme}: {a}" must use the theme and {genre}');
    });

    it('reports schema problems with their path', () => {
      edit('presets.json', (text) => text.replace('"Lo-Fi", "Ambient", "Neo-Jazz"', '"Lo-Fi", "Shoegaze"'));

      expect(load).toThrow(/presets\.json: 0\.genres\.1/);
    });
  });
});
