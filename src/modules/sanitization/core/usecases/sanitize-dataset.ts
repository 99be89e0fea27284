/**
 * Sanitize Dataset Use Case
 *
 * Runs the pipeline stages in order, each a pure function over an immutable input:
 * 1. Validate schema
 * 2. Normalize types
 * 3. Split names
 * 4. Resolve regions
 * 5. Harmonize revenue
 * 6. Arrange rows and columns
 *
 * Fatal errors stop the run before anything is produced. Warnings from every
 * stage are collected into one diagnostics report.
 */

import { err, ok, type Result } from 'neverthrow';

import { arrangeDataset } from './arrange-dataset.js';
import { discoverMonths, harmonizeRevenue } from './harmonize-revenue.js';
import { normalizeTypes } from './normalize-types.js';
import { resolveRegions } from './resolve-regions.js';
import { splitNames } from './split-names.js';
import { validateSchema } from './validate-schema.js';
import { buildDiagnostics, type DiagnosticsReport } from '../diagnostics.js';

import type { SanitizationError } from '../errors.js';
import type { EnrichedDataset, RawTable, RegionTable } from '../types.js';

export interface SanitizeDatasetDeps {
  regionTable: RegionTable;
  /** Collation locale for row ordering. Defaults to `de`. */
  locale?: string;
}

export interface SanitizedDataset {
  readonly dataset: EnrichedDataset;
  readonly diagnostics: DiagnosticsReport;
}

const DEFAULT_LOCALE = 'de';

export const sanitizeDataset = (
  deps: SanitizeDatasetDeps,
  table: RawTable
): Result<SanitizedDataset, SanitizationError> => {
  const layout = validateSchema(table.headers);
  if (layout.isErr()) {
    return err(layout.error);
  }

  const normalized = normalizeTypes(table, layout.value);
  if (normalized.isErr()) {
    return err(normalized.error);
  }

  const named = splitNames(normalized.value.rows, layout.value);
  if (named.isErr()) {
    return err(named.error);
  }

  const located = resolveRegions(named.value, deps.regionTable);

  const months = discoverMonths(layout.value.monthColumns);
  const harmonized = harmonizeRevenue(located.rows, months);

  const dataset = arrangeDataset(
    harmonized.records,
    harmonized.facts,
    harmonized.months,
    deps.locale ?? DEFAULT_LOCALE
  );

  return ok({
    dataset,
    diagnostics: buildDiagnostics([...normalized.value.warnings, ...located.warnings]),
  });
};
