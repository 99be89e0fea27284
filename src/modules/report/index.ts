/**
 * Report Module Public API
 */

// Use cases
export { aggregateReport } from './core/usecases/aggregate-report.js';
export {
  createDefaultFilter,
  createPersonPredicate,
  describeFilter,
  resolveActiveMonths,
  selectFacts,
  selectRecords,
  DEFAULT_MONTH_WINDOW,
} from './core/usecases/apply-filter.js';
export { listFilterOptions } from './core/usecases/list-filter-options.js';
export { formatRunSummary, summarizeRun, type RunSummary } from './core/usecases/summarize-run.js';
export { buildHistogram, mean, median } from './core/statistics.js';
export { departmentColor, departmentColors } from './core/department-colors.js';

// Shell
export { loadReportFilter, parseReportFilter } from './shell/repo/filter-file.js';
export { writeReportPayload } from './shell/io/payload-writer.js';
export {
  buildReport,
  type BuildReportError,
  type BuildReportInput,
  type ReportServiceDeps,
} from './shell/service/build-report.js';

// Types
export { ReportFilterSchema, DEFAULT_AGGREGATION_OPTIONS } from './core/types.js';
export type {
  AggregationOptions,
  FilterOptions,
  PartTimeFilter,
  ReportFilter,
  ReportKpis,
  ReportPayload,
  ReportSnapshot,
} from './core/types.js';

// Errors
export type { FilterFileError, PayloadWriteError } from './core/errors.js';
