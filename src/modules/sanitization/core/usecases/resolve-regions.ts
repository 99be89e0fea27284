import { err, ok, type Result } from 'neverthrow';

import { toLookupKey } from '../text.js';
import { UNKNOWN_REGION } from '../types.js';

import type { DataQualityWarning, RegionTableError } from '../errors.js';
import type { CityRegionEntry, LocatedRow, NamedRow, RegionTable } from '../types.js';

export interface ResolvedRegions {
  readonly rows: readonly LocatedRow[];
  readonly warnings: readonly DataQualityWarning[];
}

/**
 * Builds the immutable lookup table from its entries.
 * Two entries whose cities normalise to the same key must agree on the region.
 */
export const createRegionTable = (
  entries: readonly CityRegionEntry[]
): Result<RegionTable, RegionTableError> => {
  const table = new Map<string, CityRegionEntry>();

  for (const entry of entries) {
    const key = toLookupKey(entry.city);
    const existing = table.get(key);

    if (existing !== undefined && existing.region !== entry.region) {
      return err({
        type: 'ConflictingCity',
        message: `City '${entry.city}' maps to both '${existing.region}' and '${entry.region}'`,
        city: entry.city,
        regions: [existing.region, entry.region],
      });
    }

    if (existing === undefined) {
      table.set(key, entry);
    }
  }

  return ok(table);
};

/**
 * Region for a city, or null when the table has no entry for it.
 */
export const lookupRegion = (table: RegionTable, city: string): string | null =>
  table.get(toLookupKey(city))?.region ?? null;

/**
 * Attaches a region to every row. Unknown cities resolve to `Unknown`
 * and add one warning per affected row.
 */
export const resolveRegions = (
  rows: readonly NamedRow[],
  table: RegionTable
): ResolvedRegions => {
  const warnings: DataQualityWarning[] = [];

  const located = rows.map((row): LocatedRow => {
    const region = lookupRegion(table, row.city);
    if (region === null) {
      warnings.push({ type: 'UnknownCity', row: row.sourceRow, city: row.city });
      return { ...row, region: UNKNOWN_REGION };
    }
    return { ...row, region };
  });

  return { rows: located, warnings };
};
