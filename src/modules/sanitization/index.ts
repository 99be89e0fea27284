// Pipeline
export {
  sanitizeDataset,
  type SanitizeDatasetDeps,
  type SanitizedDataset,
} from './core/usecases/sanitize-dataset.js';
export { validateSchema } from './core/usecases/validate-schema.js';
export {
  normalizeTypes,
  parseAge,
  parsePartTime,
  parseRevenue,
  type NormalizedRows,
} from './core/usecases/normalize-types.js';
export { splitNames, splitFullName, type SplitName } from './core/usecases/split-names.js';
export {
  createRegionTable,
  lookupRegion,
  resolveRegions,
} from './core/usecases/resolve-regions.js';
export { discoverMonths, harmonizeRevenue } from './core/usecases/harmonize-revenue.js';
export {
  arrangeDataset,
  toFactSheet,
  toWideSheet,
  wideColumns,
  FACT_COLUMNS,
} from './core/usecases/arrange-dataset.js';
export { buildDiagnostics, type DiagnosticsReport } from './core/diagnostics.js';
export { compareMonthKeys, parseMonthColumn, parseMonthLabel } from './core/month-key.js';

// Shell
export { loadRegionTable } from './shell/repo/region-table-loader.js';
export { readTable, type ReadTableOptions } from './shell/io/table-source.js';
export { writeWorkbook } from './shell/io/workbook-writer.js';
export {
  loadDataset,
  sanitizeFile,
  type SanitizationServiceDeps,
  type SanitizeFileError,
  type SanitizeFileInput,
  type LoadDatasetError,
} from './shell/service/sanitize-file.js';

// Types
export {
  COLUMN,
  UNKNOWN_REGION,
  WIDE_SHEET_NAME,
  FACT_SHEET_NAME,
  PART_TIME_LABEL,
} from './core/types.js';
export type {
  CellValue,
  RawTable,
  SheetData,
  MonthKey,
  PersonAttributes,
  PersonRecord,
  Fact,
  WideDataset,
  EnrichedDataset,
  RegionTable,
  CityRegionEntry,
} from './core/types.js';

// Errors
export {
  formatSanitizationError,
  formatSchemaErrors,
  type SchemaError,
  type TypeCoercionError,
  type SanitizationError,
  type DataQualityWarning,
  type WarningKind,
  type SourceReadError,
  type SinkWriteError,
  type RegionTableError,
} from './core/errors.js';
export { WARNING_KINDS } from './core/errors.js';
