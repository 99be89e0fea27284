import { MONTH_COLUMN_PREFIX, type MonthKey } from './types.js';

const MONTH_COLUMN_RE = /^Umsatz_(\d{4})-(0[1-9]|1[0-2])$/i;
const MONTH_LABEL_RE = /^(\d{4})-(0[1-9]|1[0-2])$/;

const toMonthKey = (year: string, month: string): MonthKey => ({
  year: Number.parseInt(year, 10),
  month: Number.parseInt(month, 10),
  label: `${year}-${month}`,
});

/**
 * Parses an `Umsatz_YYYY-MM` header (case-insensitive, surrounding whitespace ignored).
 * Returns null for any other header, including out-of-range months like `Umsatz_2023-13`.
 */
export const parseMonthColumn = (header: string): MonthKey | null => {
  const match = MONTH_COLUMN_RE.exec(header.trim());
  if (match === null) return null;

  const [, year, month] = match;
  if (year === undefined || month === undefined) return null;

  return toMonthKey(year, month);
};

/**
 * Parses a bare `YYYY-MM` label.
 */
export const parseMonthLabel = (label: string): MonthKey | null => {
  const match = MONTH_LABEL_RE.exec(label);
  if (match === null) return null;

  const [, year, month] = match;
  if (year === undefined || month === undefined) return null;

  return toMonthKey(year, month);
};

export const compareMonthKeys = (a: MonthKey, b: MonthKey): number =>
  a.year !== b.year ? a.year - b.year : a.month - b.month;

/**
 * Chronological order, independent of the input order.
 */
export const sortMonthKeys = (keys: readonly MonthKey[]): MonthKey[] =>
  [...keys].sort(compareMonthKeys);

export const toMonthColumnHeader = (key: MonthKey): string => `${MONTH_COLUMN_PREFIX}${key.label}`;
