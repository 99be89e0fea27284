/**
 * Sanitization service
 *
 * Connects the pure pipeline to its I/O boundaries: reads a tabular source,
 * sanitizes it, reports warnings once and writes the two-sheet workbook.
 * Nothing is written unless the whole run succeeds.
 */

import { err, ok, type Result } from 'neverthrow';

import { createChildLogger, type Logger } from '../../../../infra/logger/index.js';
import { toFactSheet, toWideSheet } from '../../core/usecases/arrange-dataset.js';
import {
  sanitizeDataset,
  type SanitizedDataset,
} from '../../core/usecases/sanitize-dataset.js';
import { readTable, type ReadTableOptions } from '../io/table-source.js';
import { writeWorkbook } from '../io/workbook-writer.js';

import type { SanitizationError, SinkWriteError, SourceReadError } from '../../core/errors.js';
import type { RegionTable } from '../../core/types.js';

export interface SanitizationServiceDeps {
  logger: Logger;
  regionTable: RegionTable;
  locale: string;
}

export type LoadDatasetError = SourceReadError | SanitizationError;
export type SanitizeFileError = LoadDatasetError | SinkWriteError;

export interface SanitizeFileInput {
  inputPath: string;
  outputPath: string;
}

/**
 * Reads and sanitizes a source without writing anything.
 * A sanitized workbook passes through unchanged, so this also loads pipeline output.
 */
export const loadDataset = async (
  deps: SanitizationServiceDeps,
  inputPath: string,
  options: ReadTableOptions = {}
): Promise<Result<SanitizedDataset, LoadDatasetError>> => {
  const log = createChildLogger(deps.logger, { module: 'sanitization', input: inputPath });

  const table = await readTable(inputPath, options);
  if (table.isErr()) {
    return err(table.error);
  }
  log.debug(
    { columns: table.value.headers.length, rows: table.value.rows.length },
    'Read input table'
  );

  const sanitized = sanitizeDataset(
    { regionTable: deps.regionTable, locale: deps.locale },
    table.value
  );
  if (sanitized.isErr()) {
    return err(sanitized.error);
  }

  const { diagnostics } = sanitized.value;
  if (diagnostics.warningCount > 0) {
    log.warn(
      {
        warningCount: diagnostics.warningCount,
        countsByKind: diagnostics.countsByKind,
        unknownCities: diagnostics.unknownCities,
      },
      'Data quality warnings'
    );
  }

  return ok(sanitized.value);
};

/**
 * Sanitizes `inputPath` and writes the wide and long sheets to `outputPath`.
 */
export const sanitizeFile = async (
  deps: SanitizationServiceDeps,
  input: SanitizeFileInput
): Promise<Result<SanitizedDataset, SanitizeFileError>> => {
  const loaded = await loadDataset(deps, input.inputPath);
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const { dataset } = loaded.value;
  const written = await writeWorkbook(input.outputPath, [
    toWideSheet(dataset),
    toFactSheet(dataset),
  ]);
  if (written.isErr()) {
    return err(written.error);
  }

  deps.logger.info(
    { output: input.outputPath, records: dataset.records.length, facts: dataset.facts.length },
    'Wrote sanitized workbook'
  );

  return ok(loaded.value);
};
