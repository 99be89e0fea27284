import { toMonthColumnHeader } from '../month-key.js';
import {
  COLUMN,
  FACT_SHEET_NAME,
  PART_TIME_LABEL,
  WIDE_SHEET_NAME,
  type CellValue,
  type EnrichedDataset,
  type Fact,
  type MonthKey,
  type PersonRecord,
  type SheetData,
} from '../types.js';

const IDENTITY_COLUMNS = [
  COLUMN.firstName,
  COLUMN.lastName,
  COLUMN.city,
  COLUMN.region,
  COLUMN.department,
  COLUMN.profession,
  COLUMN.partTime,
  COLUMN.age,
] as const;

/**
 * Canonical wide column order: identity, months (chronological), totals.
 */
export const wideColumns = (months: readonly MonthKey[]): string[] => [
  ...IDENTITY_COLUMNS,
  ...months.map(toMonthColumnHeader),
  COLUMN.totalRevenue,
  COLUMN.averageMonthlyRevenue,
];

export const FACT_COLUMNS: readonly string[] = [...IDENTITY_COLUMNS, COLUMN.month, COLUMN.revenue];

/**
 * Orders records by department, profession, then last name (locale-aware).
 * Ties keep input order. Facts follow their record, months stay chronological.
 * The returned dataset is frozen.
 */
export const arrangeDataset = (
  records: readonly PersonRecord[],
  facts: readonly Fact[],
  months: readonly MonthKey[],
  locale: string
): EnrichedDataset => {
  const collator = new Intl.Collator(locale);

  const sortedRecords = [...records].sort(
    (a, b) =>
      collator.compare(a.department, b.department) ||
      collator.compare(a.profession, b.profession) ||
      collator.compare(a.lastName, b.lastName) ||
      a.sourceRow - b.sourceRow
  );

  const position = new Map(sortedRecords.map((record, index) => [record.sourceRow, index]));
  const rank = (fact: Fact): number => position.get(fact.sourceRow) ?? Number.MAX_SAFE_INTEGER;

  // Array#sort is stable, so each record's facts keep their month order
  const sortedFacts = [...facts].sort((a, b) => rank(a) - rank(b));

  return Object.freeze({
    records: Object.freeze(sortedRecords),
    months: Object.freeze([...months]),
    facts: Object.freeze(sortedFacts),
  });
};

const identityCells = (person: PersonRecord | Fact): CellValue[] => [
  person.firstName,
  person.lastName,
  person.city,
  person.region,
  person.department,
  person.profession,
  person.partTime ? PART_TIME_LABEL.yes : PART_TIME_LABEL.no,
  person.age,
];

/**
 * The "wide" view: one row per person.
 */
export const toWideSheet = (dataset: EnrichedDataset): SheetData => ({
  name: WIDE_SHEET_NAME,
  headers: wideColumns(dataset.months),
  rows: dataset.records.map((record) => [
    ...identityCells(record),
    ...dataset.months.map((month) => record.revenue.get(month.label)?.toNumber() ?? 0),
    record.totalRevenue.toNumber(),
    record.averageMonthlyRevenue.toNumber(),
  ]),
});

/**
 * The long/tidy view: one row per (person, month).
 */
export const toFactSheet = (dataset: EnrichedDataset): SheetData => ({
  name: FACT_SHEET_NAME,
  headers: FACT_COLUMNS,
  rows: dataset.facts.map((fact) => [...identityCells(fact), fact.month, fact.revenue.toNumber()]),
});
