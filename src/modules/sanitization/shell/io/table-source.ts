import path from 'node:path';

import { err, type Result } from 'neverthrow';

import { readCsvTable } from './csv-reader.js';
import { readWorkbookTable, type SheetSelection } from './workbook-reader.js';

import type { SourceReadError } from '../../core/errors.js';
import type { RawTable } from '../../core/types.js';

/** Worksheet choice for workbooks; CSV sources ignore it. */
export type ReadTableOptions = SheetSelection;

/**
 * Reads a tabular source, picking the adapter by file extension.
 */
export const readTable = async (
  filePath: string,
  options: ReadTableOptions = {}
): Promise<Result<RawTable, SourceReadError>> => {
  const extension = path.extname(filePath).toLowerCase();

  switch (extension) {
    case '.xlsx':
      return readWorkbookTable(filePath, options);
    case '.csv':
    case '.txt':
      return readCsvTable(filePath);
    default:
      return err({
        type: 'UnsupportedFormat',
        message: `Unsupported input format '${extension}' for ${filePath}; use .xlsx or .csv`,
        extension,
      });
  }
};
