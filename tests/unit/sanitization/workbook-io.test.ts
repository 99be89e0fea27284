import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  readTable,
  sanitizeDataset,
  toFactSheet,
  toWideSheet,
  writeWorkbook,
} from '@/modules/sanitization/index.js';

import { makePersonRow, makeRawTable, makeRegionTable } from '../../fixtures/builders.js';

describe('workbook adapters', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sheet-report-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads back the sheets it wrote', async () => {
    const { dataset } = sanitizeDataset(
      { regionTable: makeRegionTable() },
      makeRawTable([
        makePersonRow({ name: 'Anna Schmidt', partTime: 'Ja' }),
        makePersonRow({ name: 'Ben Vogel', city: 'Wien', revenue: [10.5, 0] }),
      ])
    )._unsafeUnwrap();
    const wide = toWideSheet(dataset);
    const facts = toFactSheet(dataset);
    const filePath = path.join(dir, 'out.xlsx');

    (await writeWorkbook(filePath, [wide, facts]))._unsafeUnwrap();

    const wideBack = (await readTable(filePath, { sheetName: 'data' }))._unsafeUnwrap();
    expect(wideBack.headers).toEqual(wide.headers);
    expect(wideBack.rows).toEqual(wide.rows);

    const factsBack = (await readTable(filePath, { sheetName: 'facts_long' }))._unsafeUnwrap();
    expect(factsBack.headers).toEqual(facts.headers);
    expect(factsBack.rows).toHaveLength(4);
  });

  it('reads the first worksheet when no sheet is named', async () => {
    const filePath = path.join(dir, 'first.xlsx');
    (
      await writeWorkbook(filePath, [
        { name: 'Tabelle1', headers: ['Name', 'Alter'], rows: [['Anna Schmidt', 34]] },
        { name: 'Tabelle2', headers: ['Andere'], rows: [['x']] },
      ])
    )._unsafeUnwrap();

    const table = (await readTable(filePath))._unsafeUnwrap();

    expect(table).toEqual({ headers: ['Name', 'Alter'], rows: [['Anna Schmidt', 34]] });
  });

  it('prefers a named worksheet and falls back to the first one', async () => {
    const filePath = path.join(dir, 'preferred.xlsx');
    (
      await writeWorkbook(filePath, [
        { name: 'Tabelle1', headers: ['Erste'], rows: [['a']] },
        { name: 'data', headers: ['Zweite'], rows: [['b']] },
      ])
    )._unsafeUnwrap();

    const preferred = (await readTable(filePath, { preferredSheet: 'data' }))._unsafeUnwrap();
    const fallback = (await readTable(filePath, { preferredSheet: 'fehlt' }))._unsafeUnwrap();

    expect(preferred.headers).toEqual(['Zweite']);
    expect(fallback.headers).toEqual(['Erste']);
  });

  it('leaves no temporary file behind', async () => {
    const filePath = path.join(dir, 'clean.xlsx');
    (await writeWorkbook(filePath, [{ name: 'data', headers: ['A'], rows: [[1]] }]))._unsafeUnwrap();

    expect(await fs.readdir(dir)).toEqual(['clean.xlsx']);
  });

  it('fails for a missing worksheet', async () => {
    const filePath = path.join(dir, 'sheets.xlsx');
    (await writeWorkbook(filePath, [{ name: 'other', headers: ['A'], rows: [[1]] }]))._unsafeUnwrap();

    const error = (await readTable(filePath, { sheetName: 'data' }))._unsafeUnwrapErr();

    expect(error.type).toBe('EmptySheet');
  });

  it('fails for a missing file', async () => {
    const error = (await readTable(path.join(dir, 'missing.xlsx')))._unsafeUnwrapErr();

    expect(error.type).toBe('NotFound');
  });

  it('rejects unsupported extensions', async () => {
    const error = (await readTable(path.join(dir, 'input.ods')))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'UnsupportedFormat',
      message: `Unsupported input format '.ods' for ${path.join(dir, 'input.ods')}; use .xlsx or .csv`,
      extension: '.ods',
    });
  });

  it('reads CSV files through the same entry point', async () => {
    const filePath = path.join(dir, 'input.csv');
    await fs.writeFile(filePath, 'Name;Alter\nAnna Schmidt;34\n', 'utf8');

    const table = (await readTable(filePath))._unsafeUnwrap();

    expect(table).toEqual({ headers: ['Name', 'Alter'], rows: [['Anna Schmidt', '34']] });
  });
});
