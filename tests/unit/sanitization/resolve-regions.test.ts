import { describe, expect, it } from 'vitest';

import {
  createRegionTable,
  lookupRegion,
  sanitizeDataset,
  UNKNOWN_REGION,
} from '@/modules/sanitization/index.js';

import { makePersonRow, makeRawTable, makeRegionTable } from '../../fixtures/builders.js';

describe('createRegionTable', () => {
  it('keeps one entry for identical duplicates', () => {
    const table = createRegionTable([
      { city: 'Wien', region: 'Wien', country: 'AT' },
      { city: 'wien', region: 'Wien', country: 'AT' },
    ])._unsafeUnwrap();

    expect(table.size).toBe(1);
  });

  it('rejects cities that normalise to the same key with different regions', () => {
    const error = createRegionTable([
      { city: 'Freiburg', region: 'Freiburg', country: 'CH' },
      { city: 'FREIBURG', region: 'Baden-Württemberg', country: 'DE' },
    ])._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'ConflictingCity',
      message: "City 'FREIBURG' maps to both 'Freiburg' and 'Baden-Württemberg'",
      city: 'FREIBURG',
      regions: ['Freiburg', 'Baden-Württemberg'],
    });
  });
});

describe('lookupRegion', () => {
  const table = makeRegionTable();

  it('ignores case, surrounding whitespace and diacritics', () => {
    expect(lookupRegion(table, '  MÜNCHEN ')).toBe('Bayern');
    expect(lookupRegion(table, 'zurich')).toBe('Zürich');
    expect(lookupRegion(table, 'Koln')).toBe('Nordrhein-Westfalen');
  });

  it('returns null for unknown cities', () => {
    expect(lookupRegion(table, 'Nirgendwo')).toBeNull();
  });
});

describe('region fallback in the pipeline', () => {
  it('assigns Unknown and adds exactly one warning for an unknown city', () => {
    const table = makeRawTable([
      makePersonRow({ name: 'Anna Schmidt', city: 'Berlin' }),
      makePersonRow({ name: 'Ben Vogel', city: 'Nirgendwo' }),
    ]);

    const { dataset, diagnostics } = sanitizeDataset(
      { regionTable: makeRegionTable() },
      table
    )._unsafeUnwrap();

    const ben = dataset.records.find((record) => record.lastName === 'Vogel');
    expect(ben?.region).toBe(UNKNOWN_REGION);
    expect(diagnostics.warningCount).toBe(1);
    expect(diagnostics.countsByKind.UnknownCity).toBe(1);
    expect(diagnostics.unknownCities).toEqual(['Nirgendwo']);
    expect(diagnostics.warnings).toEqual([{ type: 'UnknownCity', row: 3, city: 'Nirgendwo' }]);
  });

  it('warns once per affected record but lists each city once', () => {
    const table = makeRawTable([
      makePersonRow({ name: 'Anna Schmidt', city: 'Nirgendwo' }),
      makePersonRow({ name: 'Ben Vogel', city: 'Nirgendwo' }),
    ]);

    const { diagnostics } = sanitizeDataset({ regionTable: makeRegionTable() }, table)
      ._unsafeUnwrap();

    expect(diagnostics.countsByKind.UnknownCity).toBe(2);
    expect(diagnostics.unknownCities).toEqual(['Nirgendwo']);
  });
});
