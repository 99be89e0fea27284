import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadRegionTable, lookupRegion } from '@/modules/sanitization/index.js';

describe('loadRegionTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'region-table-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeJson = async (name: string, contents: string): Promise<string> => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, contents, 'utf8');
    return filePath;
  };

  it('loads the bundled DE/AT/CH table', async () => {
    const table = (
      await loadRegionTable(path.resolve(process.cwd(), 'data/city-regions.json'))
    )._unsafeUnwrap();

    expect(lookupRegion(table, 'München')).toBe('Bayern');
    expect(lookupRegion(table, 'Graz')).toBe('Steiermark');
    expect(lookupRegion(table, 'Genf')).toBe('Genf');
    expect(lookupRegion(table, 'Freiburg')).toBe('Freiburg');
    expect(lookupRegion(table, 'Freiburg im Breisgau')).toBe('Baden-Württemberg');
  });

  it('reports a missing file', async () => {
    const error = (await loadRegionTable(path.join(dir, 'none.json')))._unsafeUnwrapErr();

    expect(error.type).toBe('NotFound');
  });

  it('reports malformed JSON', async () => {
    const filePath = await writeJson('broken.json', '{ "version": 1, ');

    expect((await loadRegionTable(filePath))._unsafeUnwrapErr().type).toBe('ParseError');
  });

  it('lists schema violations with their paths', async () => {
    const filePath = await writeJson(
      'invalid.json',
      JSON.stringify({ version: 1, entries: [{ city: 'Paris', region: 'Île-de-France', country: 'FR' }] })
    );

    const error = (await loadRegionTable(filePath))._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
    if (error.type === 'SchemaValidationError') {
      expect(error.details.some((detail) => detail.startsWith('/entries/0/country'))).toBe(true);
    }
  });

  it('rejects conflicting duplicates', async () => {
    const filePath = await writeJson(
      'conflict.json',
      JSON.stringify({
        version: 1,
        entries: [
          { city: 'Zürich', region: 'Zürich', country: 'CH' },
          { city: 'Zurich', region: 'Bern', country: 'CH' },
        ],
      })
    );

    expect((await loadRegionTable(filePath))._unsafeUnwrapErr().type).toBe('ConflictingCity');
  });
});
