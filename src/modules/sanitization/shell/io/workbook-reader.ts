import fs from 'node:fs/promises';

import ExcelJS from 'exceljs';
import { err, ok, type Result } from 'neverthrow';

import { toSourceReadError } from './read-errors.js';
import { cellToText } from '../../core/text.js';

import type { SourceReadError } from '../../core/errors.js';
import type { CellValue, RawTable } from '../../core/types.js';

/**
 * Flattens an exceljs cell value: formulas yield their cached result,
 * rich text and hyperlinks their text, error cells a blank.
 */
export const toCellValue = (value: ExcelJS.CellValue): CellValue => {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : toCellValue(value.result);
  }
  return null;
};

const isBlankRow = (cells: readonly CellValue[]): boolean =>
  cells.every((cell) => cell === null || (typeof cell === 'string' && cell.trim() === ''));

export interface SheetSelection {
  /** Worksheet that must exist. */
  sheetName?: string;
  /** Worksheet to use when present; the first sheet otherwise. */
  preferredSheet?: string;
}

const pickSheet = (
  workbook: ExcelJS.Workbook,
  selection: SheetSelection
): ExcelJS.Worksheet | undefined => {
  if (selection.sheetName !== undefined) {
    return workbook.getWorksheet(selection.sheetName);
  }
  const preferred =
    selection.preferredSheet === undefined
      ? undefined
      : workbook.getWorksheet(selection.preferredSheet);
  return preferred ?? workbook.worksheets[0];
};

/**
 * Reads one worksheet into a raw table. Row 1 is the header row;
 * fully blank rows are skipped.
 */
export const readWorkbookTable = async (
  filePath: string,
  selection: SheetSelection = {}
): Promise<Result<RawTable, SourceReadError>> => {
  const { sheetName } = selection;
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    return err(toSourceReadError(error, filePath));
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(buffer);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse workbook ${filePath}: ${(error as Error).message}`,
    });
  }

  const sheet = pickSheet(workbook, selection);
  if (sheet === undefined || sheet.rowCount === 0) {
    return err({
      type: 'EmptySheet',
      message:
        sheetName === undefined
          ? `Workbook ${filePath} has no data`
          : `Workbook ${filePath} has no sheet '${sheetName}' with data`,
    });
  }

  const width = sheet.columnCount;
  const readRow = (rowNumber: number): CellValue[] => {
    const row = sheet.getRow(rowNumber);
    return Array.from({ length: width }, (_, index) => toCellValue(row.getCell(index + 1).value));
  };

  const headers = readRow(1).map((cell) => cellToText(cell).trim());
  const rows: CellValue[][] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const cells = readRow(rowNumber);
    if (!isBlankRow(cells)) {
      rows.push(cells);
    }
  }

  return ok({ headers, rows });
};
