import type { DataQualityWarning, WarningKind } from './errors.js';

/**
 * Non-fatal findings of one pipeline run, reported once in the run summary.
 */
export interface DiagnosticsReport {
  readonly warnings: readonly DataQualityWarning[];
  readonly warningCount: number;
  readonly countsByKind: Readonly<Record<WarningKind, number>>;
  /** Distinct unknown cities in first-seen order. */
  readonly unknownCities: readonly string[];
}

export const buildDiagnostics = (warnings: readonly DataQualityWarning[]): DiagnosticsReport => {
  const countsByKind: Record<WarningKind, number> = {
    UnknownCity: 0,
    NegativeRevenue: 0,
    BlankRevenue: 0,
    UnparseableRevenue: 0,
  };
  const unknownCities = new Set<string>();

  for (const warning of warnings) {
    countsByKind[warning.type] += 1;
    if (warning.type === 'UnknownCity') {
      unknownCities.add(warning.city);
    }
  }

  return Object.freeze({
    warnings: Object.freeze([...warnings]),
    warningCount: warnings.length,
    countsByKind: Object.freeze(countsByKind),
    unknownCities: Object.freeze([...unknownCities]),
  });
};
