import { describe, expect, it } from 'vitest';

import {
  normalizeTypes,
  splitFullName,
  splitNames,
  validateSchema,
  type RawTable,
} from '@/modules/sanitization/index.js';

import { makePersonRow, makeRawTable } from '../../fixtures/builders.js';

const namedRows = (table: RawTable) => {
  const layout = validateSchema(table.headers)._unsafeUnwrap();
  const { rows } = normalizeTypes(table, layout)._unsafeUnwrap();
  return splitNames(rows, layout);
};

describe('splitFullName', () => {
  it('splits on the last whitespace boundary', () => {
    expect(splitFullName('Anna Maria Schmidt')).toEqual({
      firstName: 'Anna Maria',
      lastName: 'Schmidt',
    });
  });

  it('collapses whitespace before splitting', () => {
    expect(splitFullName('  Jonas \t  Weber ')).toEqual({ firstName: 'Jonas', lastName: 'Weber' });
  });

  it('uses a single token as the last name', () => {
    expect(splitFullName('Madonna')).toEqual({ firstName: '', lastName: 'Madonna' });
  });

  it('does not recognise particle surnames', () => {
    expect(splitFullName('Sanne van der Berg')).toEqual({
      firstName: 'Sanne van der',
      lastName: 'Berg',
    });
  });
});

describe('splitNames', () => {
  it('splits the combined name column', () => {
    const rows = namedRows(makeRawTable([makePersonRow({ name: 'Anna Maria Schmidt' })]))
      ._unsafeUnwrap();

    expect(rows[0]?.firstName).toBe('Anna Maria');
    expect(rows[0]?.lastName).toBe('Schmidt');
  });

  it('only trims and collapses existing split columns', () => {
    const table: RawTable = {
      headers: ['Vorname', 'Nachname', 'Stadt', 'Abteilung', 'Beruf', 'Teilzeit', 'Alter', 'Umsatz_2024-01'],
      rows: [['  Anna Maria ', ' von   Berg ', 'Berlin', 'IT', 'Entwickler', 'Nein', 30, 10]],
    };

    const rows = namedRows(table)._unsafeUnwrap();

    expect(rows[0]?.firstName).toBe('Anna Maria');
    expect(rows[0]?.lastName).toBe('von Berg');
  });

  it('fails when the last name is empty', () => {
    const error = namedRows(
      makeRawTable([makePersonRow(), makePersonRow({ name: '   ' })])
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'TypeCoercionError',
      message: "Row 3, column 'Name': last name is empty (got '   ')",
      row: 3,
      column: 'Name',
      value: '   ',
    });
  });
});
