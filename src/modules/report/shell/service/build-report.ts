/**
 * Report service
 *
 * Loads a (sanitized) workbook, applies a filter and writes the JSON payload
 * a renderer consumes.
 */

import { err, ok, type Result } from 'neverthrow';

import { createChildLogger } from '../../../../infra/logger/index.js';
import {
  loadDataset,
  WIDE_SHEET_NAME,
  type LoadDatasetError,
  type SanitizationServiceDeps,
} from '../../../sanitization/index.js';
import { aggregateReport } from '../../core/usecases/aggregate-report.js';
import { createDefaultFilter, describeFilter } from '../../core/usecases/apply-filter.js';
import { listFilterOptions } from '../../core/usecases/list-filter-options.js';
import { writeReportPayload } from '../io/payload-writer.js';
import { loadReportFilter } from '../repo/filter-file.js';

import type { FilterFileError, PayloadWriteError } from '../../core/errors.js';
import type { ReportFilter, ReportPayload } from '../../core/types.js';

export interface ReportServiceDeps extends SanitizationServiceDeps {
  monthWindow: number;
  topProfessions: number;
  histogramBins: number;
  /** Injected for deterministic payloads in tests. */
  now?: () => Date;
}

export interface BuildReportInput {
  inputPath: string;
  outputPath: string;
  filterPath?: string;
}

export type BuildReportError = LoadDatasetError | FilterFileError | PayloadWriteError;

/**
 * Builds the report payload for `inputPath` under the filter file, or the
 * default filter when none is given, and writes it to `outputPath`.
 */
export const buildReport = async (
  deps: ReportServiceDeps,
  input: BuildReportInput
): Promise<Result<ReportPayload, BuildReportError>> => {
  const log = createChildLogger(deps.logger, { module: 'report', input: input.inputPath });

  const loaded = await loadDataset(deps, input.inputPath, { preferredSheet: WIDE_SHEET_NAME });
  if (loaded.isErr()) {
    return err(loaded.error);
  }
  const { dataset } = loaded.value;

  let filter: ReportFilter;
  if (input.filterPath === undefined) {
    filter = createDefaultFilter(dataset.months, deps.monthWindow);
  } else {
    const parsed = await loadReportFilter(input.filterPath);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    filter = parsed.value;
  }

  const snapshot = aggregateReport(dataset, filter, {
    topProfessions: deps.topProfessions,
    histogramBins: deps.histogramBins,
    locale: deps.locale,
  });

  const payload: ReportPayload = {
    generatedAt: (deps.now ?? (() => new Date()))().toISOString(),
    filterDescription: describeFilter(filter),
    filterOptions: listFilterOptions(dataset, deps.locale),
    snapshot,
  };

  const written = await writeReportPayload(input.outputPath, payload);
  if (written.isErr()) {
    return err(written.error);
  }

  log.info(
    {
      output: input.outputPath,
      headcount: snapshot.kpis.headcount,
      activeMonths: snapshot.kpis.activeMonthCount,
      filter: payload.filterDescription,
    },
    'Wrote report payload'
  );

  return ok(payload);
};
