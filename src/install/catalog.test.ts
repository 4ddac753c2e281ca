import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PackageCatalogError, loadPackageCatalog, parsePackageCatalog } from './catalog.js';

describe('package catalog', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'stepstone-catalog-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the bundled catalog', async () => {
    const catalog = await loadPackageCatalog();

    expect(catalog.base).toEqual(['base', 'nodejs']);
    expect(catalog.categories[0]).toMatchObject({ id: 'kernel', defaults: ['linux'] });
    expect(catalog.categories.find((category) => category.guessMicrocode === true)?.id).toBe(
      'microcode'
    );
    expect(catalog.categories.find((category) => category.id === 'text-editor')?.defaultConfigKey).toBe(
      'text_editor'
    );
  });

  it('keeps optional fields only when present', () => {
    const catalog = parsePackageCatalog({
      base: ['base'],
      categories: [
        {
          id: 'kernel',
          intro: 'Choose a kernel.',
          suggestions: [{ name: 'linux' }, { name: 'linux-lts', note: 'long-term support' }],
          defaults: ['linux'],
        },
      ],
    });

    expect(catalog.categories[0]).toEqual({
      id: 'kernel',
      intro: 'Choose a kernel.',
      suggestions: [{ name: 'linux' }, { name: 'linux-lts', note: 'long-term support' }],
      defaults: ['linux'],
    });
  });

  it('names the first malformed field', () => {
    try {
      parsePackageCatalog({ base: ['base'], categories: [{ id: 'x', suggestions: [], defaults: [] }] });
      expect.fail('expected a PackageCatalogError');
    } catch (error) {
      expect(error).toBeInstanceOf(PackageCatalogError);
      expect(error).toMatchObject({
        field: 'categories[0].intro',
        message: "Invalid value for 'categories[0].intro': expected non-empty string",
      });
    }
  });

  it('rejects a non-boolean microcode flag', () => {
    expect(() =>
      parsePackageCatalog({
        base: [],
        categories: [{ id: 'x', intro: 'y', suggestions: [], defaults: [], guessMicrocode: 'yes' }],
      })
    ).toThrow("Invalid type for 'categories[0].guessMicrocode': expected boolean");
  });

  it('rejects files that are not JSON', async () => {
    const path = join(tempDir, 'broken.json');
    await writeFile(path, '{ not json');
    await expect(loadPackageCatalog(path)).rejects.toThrow(`Invalid JSON in '${path}'`);
  });
});
