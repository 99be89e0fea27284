import { Decimal } from 'decimal.js';

import { sortMonthKeys } from '../month-key.js';

import type { Fact, LocatedRow, MonthColumn, MonthKey, PersonRecord } from '../types.js';

export interface HarmonizedRevenue {
  readonly months: readonly MonthKey[];
  readonly records: readonly PersonRecord[];
  readonly facts: readonly Fact[];
}

const AVERAGE_DECIMAL_PLACES = 2;

/**
 * Month keys in chronological order, whatever the column order was.
 */
export const discoverMonths = (columns: readonly MonthColumn[]): MonthKey[] =>
  sortMonthKeys(columns.map((column) => column.key));

/**
 * Computes per-record totals and emits the long-format facts.
 *
 * - `totalRevenue` sums every discovered month.
 * - `averageMonthlyRevenue` divides by the number of discovered months, idle
 *   months included, rounded half-up to two decimals.
 * - One fact per (record, month), carrying every identity field.
 */
export const harmonizeRevenue = (
  rows: readonly LocatedRow[],
  months: readonly MonthKey[]
): HarmonizedRevenue => {
  const records: PersonRecord[] = [];
  const facts: Fact[] = [];

  for (const row of rows) {
    const revenue = new Map<string, Decimal>();
    let total = new Decimal(0);

    for (const month of months) {
      const amount = row.revenue.get(month.label) ?? new Decimal(0);
      revenue.set(month.label, amount);
      total = total.plus(amount);

      facts.push({
        sourceRow: row.sourceRow,
        firstName: row.firstName,
        lastName: row.lastName,
        city: row.city,
        region: row.region,
        department: row.department,
        profession: row.profession,
        partTime: row.partTime,
        age: row.age,
        month: month.label,
        revenue: amount,
      });
    }

    const average =
      months.length > 0
        ? total.div(months.length).toDecimalPlaces(AVERAGE_DECIMAL_PLACES, Decimal.ROUND_HALF_UP)
        : new Decimal(0);

    records.push({ ...row, revenue, totalRevenue: total, averageMonthlyRevenue: average });
  }

  return { months, records, facts };
};
