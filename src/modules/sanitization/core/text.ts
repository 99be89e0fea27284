import type { CellValue } from './types.js';

const WHITESPACE_RUN = /\s+/g;
const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Trims and collapses internal whitespace runs to a single space.
 */
export const collapseWhitespace = (value: string): string =>
  value.replace(WHITESPACE_RUN, ' ').trim();

/**
 * Lookup key for case-, whitespace- and diacritic-insensitive matching.
 * "  Zürich " and "zurich" share the key "zurich".
 */
export const toLookupKey = (value: string): string =>
  collapseWhitespace(value).normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase();

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Text form of a cell. Dates become `YYYY-MM-DD`, blanks the empty string.
 */
export const cellToText = (cell: CellValue): string => {
  if (cell === null) return '';
  if (cell instanceof Date) {
    return `${String(cell.getUTCFullYear())}-${pad(cell.getUTCMonth() + 1)}-${pad(cell.getUTCDate())}`;
  }
  return String(cell);
};

export const isBlankCell = (cell: CellValue): boolean =>
  cell === null || (typeof cell === 'string' && cell.trim() === '');
