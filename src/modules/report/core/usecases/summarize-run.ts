import { createDefaultFilter, describeFilter, DEFAULT_MONTH_WINDOW } from './apply-filter.js';

import type { ReportFilter } from '../types.js';
import type { SanitizedDataset, WarningKind } from '../../../sanitization/index.js';

/**
 * What a pipeline run printed for the operator.
 */
export interface RunSummary {
  recordCount: number;
  monthCount: number;
  firstMonth: string | null;
  lastMonth: string | null;
  warningCount: number;
  countsByKind: Readonly<Record<WarningKind, number>>;
  unknownCities: readonly string[];
  defaultFilter: ReportFilter;
  defaultFilterDescription: string;
}

export const summarizeRun = (
  sanitized: SanitizedDataset,
  monthWindow: number = DEFAULT_MONTH_WINDOW
): RunSummary => {
  const { dataset, diagnostics } = sanitized;
  const defaultFilter = createDefaultFilter(dataset.months, monthWindow);

  return {
    recordCount: dataset.records.length,
    monthCount: dataset.months.length,
    firstMonth: dataset.months[0]?.label ?? null,
    lastMonth: dataset.months.at(-1)?.label ?? null,
    warningCount: diagnostics.warningCount,
    countsByKind: diagnostics.countsByKind,
    unknownCities: diagnostics.unknownCities,
    defaultFilter,
    defaultFilterDescription: describeFilter(defaultFilter),
  };
};

export const formatRunSummary = (summary: RunSummary): string[] => {
  const range =
    summary.firstMonth === null || summary.lastMonth === null
      ? ''
      : ` (${summary.firstMonth} to ${summary.lastMonth})`;

  const kinds = Object.entries(summary.countsByKind)
    .filter(([, count]) => count > 0)
    .map(([kind, count]) => `${kind}: ${String(count)}`);

  const lines = [
    `Records: ${String(summary.recordCount)}`,
    `Revenue months: ${String(summary.monthCount)}${range}`,
    kinds.length === 0
      ? `Warnings: ${String(summary.warningCount)}`
      : `Warnings: ${String(summary.warningCount)} (${kinds.join(', ')})`,
  ];

  if (summary.unknownCities.length > 0) {
    lines.push(`Unknown cities: ${summary.unknownCities.join(', ')}`);
  }
  lines.push(`Default filter: ${summary.defaultFilterDescription}`);

  return lines;
};
