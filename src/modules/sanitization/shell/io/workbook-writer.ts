import fs from 'node:fs/promises';

import ExcelJS from 'exceljs';
import { err, ok, type Result } from 'neverthrow';

import type { SinkWriteError } from '../../core/errors.js';
import type { SheetData } from '../../core/types.js';

const HEADER_FONT_ARGB = 'FFFFFFFF';
const HEADER_FILL_ARGB = 'FF2D4A6B';
const MIN_COLUMN_WIDTH = 10;

const addSheet = (workbook: ExcelJS.Workbook, sheet: SheetData): void => {
  const worksheet = workbook.addWorksheet(sheet.name, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  worksheet.columns = sheet.headers.map((header) => ({
    width: Math.max(MIN_COLUMN_WIDTH, header.length + 2),
  }));

  worksheet.addRow([...sheet.headers]);
  for (const row of sheet.rows) {
    worksheet.addRow([...row]);
  }

  worksheet.getRow(1).eachCell((cell) => {
    cell.font = { bold: true, color: { argb: HEADER_FONT_ARGB } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
    cell.alignment = { horizontal: 'center' };
  });
};

/**
 * Writes the sheets to an .xlsx file.
 *
 * The workbook is written next to the target and renamed into place,
 * so a failed write never leaves a partial file at `filePath`.
 */
export const writeWorkbook = async (
  filePath: string,
  sheets: readonly SheetData[]
): Promise<Result<void, SinkWriteError>> => {
  const workbook = new ExcelJS.Workbook();
  for (const sheet of sheets) {
    addSheet(workbook, sheet);
  }

  const tempPath = `${filePath}.${String(process.pid)}.tmp`;
  try {
    await workbook.xlsx.writeFile(tempPath);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    return err({
      type: 'WriteError',
      message: `Failed to write workbook ${filePath}: ${(error as Error).message}`,
    });
  }

  return ok(undefined);
};
