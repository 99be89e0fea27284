import fs from 'node:fs/promises';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { toSourceReadError } from './read-errors.js';

import type { SourceReadError } from '../../core/errors.js';
import type { CellValue, RawTable } from '../../core/types.js';

/**
 * Picks `;` when the header line has more semicolons than commas.
 * Semicolon files are common where the decimal separator is a comma.
 */
export const detectDelimiter = (content: string): ',' | ';' => {
  const firstLine = content.split(/\r?\n/, 1)[0] ?? '';
  const semicolons = firstLine.split(';').length - 1;
  const commas = firstLine.split(',').length - 1;
  return semicolons > commas ? ';' : ',';
};

const isStringRow = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

/**
 * Parses CSV text into a raw table. Empty cells become blanks.
 */
export const parseCsvTable = (content: string): Result<RawTable, SourceReadError> => {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      delimiter: detectDelimiter(content),
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    return err({ type: 'ParseError', message: `Failed to parse CSV: ${(error as Error).message}` });
  }

  if (!Array.isArray(records) || !records.every(isStringRow)) {
    return err({ type: 'ParseError', message: 'CSV parser returned an unexpected shape' });
  }

  const [header, ...body] = records;
  if (header === undefined) {
    return err({ type: 'EmptySheet', message: 'CSV input has no header row' });
  }

  const rows = body.map((record) =>
    header.map((_, index): CellValue => {
      const cell = record[index] ?? '';
      return cell === '' ? null : cell;
    })
  );

  return ok({ headers: header, rows });
};

export const readCsvTable = async (filePath: string): Promise<Result<RawTable, SourceReadError>> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(toSourceReadError(error, filePath));
  }

  return parseCsvTable(content);
};
