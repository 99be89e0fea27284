/**
 * Sanitization Module - Errors and warnings
 *
 * Fatal errors halt the pipeline before any output is produced.
 * Data quality warnings never halt it; they are counted and reported once.
 */

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Fatal errors
// ─────────────────────────────────────────────────────────────────────────────

export interface MissingRequirement {
  readonly requirement: string;
  readonly hint: string;
}

/**
 * Required columns are absent or ambiguous. Lists every problem at once.
 */
export interface SchemaError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly missing: readonly MissingRequirement[];
}

/**
 * A strictly typed cell (age, part-time flag, name) could not be parsed.
 */
export interface TypeCoercionError {
  readonly type: 'TypeCoercionError';
  readonly message: string;
  readonly row: number;
  readonly column: string;
  readonly value: string;
}

export type SanitizationError = SchemaError | TypeCoercionError;

export const createSchemaError = (missing: readonly MissingRequirement[]): SchemaError => ({
  type: 'SchemaError',
  message: `Input is missing ${String(missing.length)} required column(s)`,
  missing,
});

export const createTypeCoercionError = (
  row: number,
  column: string,
  value: string,
  reason: string
): TypeCoercionError => ({
  type: 'TypeCoercionError',
  message: `Row ${String(row)}, column '${column}': ${reason} (got '${value}')`,
  row,
  column,
  value,
});

// ─────────────────────────────────────────────────────────────────────────────
// Data quality warnings
// ─────────────────────────────────────────────────────────────────────────────

export type DataQualityWarning =
  | { readonly type: 'UnknownCity'; readonly row: number; readonly city: string }
  | {
      readonly type: 'NegativeRevenue';
      readonly row: number;
      readonly column: string;
      readonly value: string;
    }
  | { readonly type: 'BlankRevenue'; readonly row: number; readonly column: string }
  | {
      readonly type: 'UnparseableRevenue';
      readonly row: number;
      readonly column: string;
      readonly value: string;
    };

export type WarningKind = DataQualityWarning['type'];

export const WARNING_KINDS: readonly WarningKind[] = [
  'UnknownCity',
  'NegativeRevenue',
  'BlankRevenue',
  'UnparseableRevenue',
];

// ─────────────────────────────────────────────────────────────────────────────
// Adapter errors
// ─────────────────────────────────────────────────────────────────────────────

export type SourceReadError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'UnsupportedFormat'; message: string; extension: string }
  | { type: 'EmptySheet'; message: string };

export interface SinkWriteError {
  type: 'WriteError';
  message: string;
}

export type RegionTableError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'ConflictingCity'; message: string; city: string; regions: [string, string] };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

/**
 * Renders a fatal pipeline error as log-friendly lines.
 */
export const formatSanitizationError = (error: SanitizationError): string[] => {
  if (error.type === 'TypeCoercionError') {
    return [error.message];
  }

  return [
    error.message,
    ...error.missing.map((item) => `  - ${item.requirement}: ${item.hint}`),
  ];
};
