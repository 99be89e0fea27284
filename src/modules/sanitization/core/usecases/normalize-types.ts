import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createTypeCoercionError,
  type DataQualityWarning,
  type TypeCoercionError,
} from '../errors.js';
import { cellToText, collapseWhitespace, isBlankCell } from '../text.js';

import type {
  CellValue,
  ColumnRef,
  RawNames,
  RawRow,
  RawTable,
  SchemaLayout,
  TypedRow,
} from '../types.js';

const AFFIRMATIVE = new Set(['ja', 'j', 'yes', 'y', 'true', '1']);
const NEGATIVE = new Set(['nein', 'n', 'no', 'false', '0']);

const INTEGER_TEXT_RE = /^\+?\d+(?:[.,]0+)?$/;
const NEGATIVE_NUMBER_TEXT_RE = /^-\d+(?:[.,]\d+)?$/;
const DECIMAL_COMMA_RE = /^[+-]?\d+,\d+$/;
// Decimal.js also reads 0x, 0b and 0o prefixes; revenue text must be base 10.
const PLAIN_DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

export interface NormalizedRows {
  readonly rows: readonly TypedRow[];
  readonly warnings: readonly DataQualityWarning[];
}

export interface RevenueCell {
  readonly value: Decimal;
  readonly warning: DataQualityWarning | null;
}

/** 1-based spreadsheet row number of a data row (the header occupies row 1). */
export const toSourceRow = (rowIndex: number): number => rowIndex + 2;

const cellAt = (row: RawRow, column: ColumnRef): CellValue => row[column.index] ?? null;

/**
 * Parses an age cell. Ages are identity data, so anything that is not a
 * non-negative whole number is fatal rather than filled in.
 */
export const parseAge = (
  cell: CellValue,
  row: number,
  column: string
): Result<number, TypeCoercionError> => {
  const text = cellToText(cell).trim();

  if (typeof cell === 'number') {
    if (!Number.isInteger(cell)) {
      return err(createTypeCoercionError(row, column, text, 'age must be a whole number'));
    }
    if (cell < 0) {
      return err(createTypeCoercionError(row, column, text, 'age must not be negative'));
    }
    return ok(cell);
  }

  if (typeof cell === 'string' && INTEGER_TEXT_RE.test(text)) {
    return ok(Number.parseInt(text.replace(/^\+/, ''), 10));
  }

  if (typeof cell === 'string' && NEGATIVE_NUMBER_TEXT_RE.test(text)) {
    return err(createTypeCoercionError(row, column, text, 'age must not be negative'));
  }

  return err(
    createTypeCoercionError(row, column, text, text === '' ? 'age is missing' : 'age is not a whole number')
  );
};

/**
 * Parses the part-time flag against the yes/no vocabulary (case-insensitive).
 */
export const parsePartTime = (
  cell: CellValue,
  row: number,
  column: string
): Result<boolean, TypeCoercionError> => {
  if (typeof cell === 'boolean') {
    return ok(cell);
  }

  const text = cellToText(cell).trim();
  const key = text.toLowerCase();

  if (AFFIRMATIVE.has(key)) return ok(true);
  if (NEGATIVE.has(key)) return ok(false);

  return err(
    createTypeCoercionError(
      row,
      column,
      text,
      'expected one of Ja/Nein, Yes/No, True/False, 1/0'
    )
  );
};

const toDecimal = (cell: CellValue): Decimal | null => {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? new Decimal(cell) : null;
  }
  if (typeof cell !== 'string') {
    return null;
  }

  const text = cell.trim().replace(/\s+/g, '');
  const candidate = DECIMAL_COMMA_RE.test(text) ? text.replace(',', '.') : text;
  if (!PLAIN_DECIMAL_RE.test(candidate)) {
    return null;
  }

  const value = new Decimal(candidate);
  return value.isFinite() ? value : null;
};

/**
 * Parses a revenue cell. Gaps are expected in real data, so blank,
 * unparseable and negative values become zero and carry a warning.
 */
export const parseRevenue = (cell: CellValue, row: number, column: string): RevenueCell => {
  if (isBlankCell(cell)) {
    return { value: new Decimal(0), warning: { type: 'BlankRevenue', row, column } };
  }

  const value = toDecimal(cell);
  if (value === null) {
    return {
      value: new Decimal(0),
      warning: { type: 'UnparseableRevenue', row, column, value: cellToText(cell) },
    };
  }

  if (value.isNegative() && !value.isZero()) {
    return {
      value: new Decimal(0),
      warning: { type: 'NegativeRevenue', row, column, value: value.toString() },
    };
  }

  // -0 and 0 alike
  return { value: value.abs(), warning: null };
};

const readNames = (row: RawRow, layout: SchemaLayout): RawNames => {
  if (layout.names.mode === 'combined') {
    return { mode: 'combined', fullName: cellToText(cellAt(row, layout.names.name)) };
  }

  return {
    mode: 'split',
    firstName: cellToText(cellAt(row, layout.names.firstName)),
    lastName: cellToText(cellAt(row, layout.names.lastName)),
  };
};

const readText = (row: RawRow, column: ColumnRef): string =>
  collapseWhitespace(cellToText(cellAt(row, column)));

/**
 * Coerces raw cells into canonical types per column role.
 * Stops at the first fatal cell; warnings are accumulated in row order.
 */
export const normalizeTypes = (
  table: RawTable,
  layout: SchemaLayout
): Result<NormalizedRows, TypeCoercionError> => {
  const rows: TypedRow[] = [];
  const warnings: DataQualityWarning[] = [];

  for (const [rowIndex, row] of table.rows.entries()) {
    const sourceRow = toSourceRow(rowIndex);

    const age = parseAge(cellAt(row, layout.age), sourceRow, layout.age.header);
    if (age.isErr()) {
      return err(age.error);
    }

    const partTime = parsePartTime(cellAt(row, layout.partTime), sourceRow, layout.partTime.header);
    if (partTime.isErr()) {
      return err(partTime.error);
    }

    const revenue = new Map<string, Decimal>();
    for (const column of layout.monthColumns) {
      const parsed = parseRevenue(cellAt(row, column), sourceRow, column.header);
      revenue.set(column.key.label, parsed.value);
      if (parsed.warning !== null) {
        warnings.push(parsed.warning);
      }
    }

    rows.push({
      sourceRow,
      names: readNames(row, layout),
      city: readText(row, layout.city),
      department: readText(row, layout.department),
      profession: readText(row, layout.profession),
      partTime: partTime.value,
      age: age.value,
      revenue,
    });
  }

  return ok({ rows, warnings });
};
