import { type Static, Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Raw tabular input
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A single cell as delivered by the input adapters.
 * Formula results, rich text and hyperlinks are already flattened.
 */
export type CellValue = string | number | boolean | Date | null;

export type RawRow = readonly CellValue[];

/**
 * Header row plus data rows, cells aligned with `headers` by index.
 */
export interface RawTable {
  readonly headers: readonly string[];
  readonly rows: readonly RawRow[];
}

/**
 * A two-dimensional view written to one sheet of the output workbook.
 */
export interface SheetData {
  readonly name: string;
  readonly headers: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Canonical column names
// ─────────────────────────────────────────────────────────────────────────────

export const COLUMN = {
  name: 'Name',
  firstName: 'Vorname',
  lastName: 'Nachname',
  city: 'Stadt',
  region: 'Bundesland',
  department: 'Abteilung',
  profession: 'Beruf',
  partTime: 'Teilzeit',
  age: 'Alter',
  totalRevenue: 'Umsatz_Gesamt',
  averageMonthlyRevenue: 'Umsatz_Ø_Monat',
  month: 'Datum',
  revenue: 'Umsatz',
} as const;

export const MONTH_COLUMN_PREFIX = 'Umsatz_';

export const WIDE_SHEET_NAME = 'data';
export const FACT_SHEET_NAME = 'facts_long';

/** Region assigned to cities missing from the lookup table. */
export const UNKNOWN_REGION = 'Unknown';

export const PART_TIME_LABEL = {
  yes: 'Ja',
  no: 'Nein',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Schema layout
// ─────────────────────────────────────────────────────────────────────────────

export interface MonthKey {
  readonly year: number;
  readonly month: number;
  /** `YYYY-MM` */
  readonly label: string;
}

export interface ColumnRef {
  readonly header: string;
  readonly index: number;
}

export interface MonthColumn extends ColumnRef {
  readonly key: MonthKey;
}

export type NameColumns =
  | { readonly mode: 'combined'; readonly name: ColumnRef }
  | { readonly mode: 'split'; readonly firstName: ColumnRef; readonly lastName: ColumnRef };

/**
 * Where each column role lives in the raw table, as resolved by the schema validator.
 */
export interface SchemaLayout {
  readonly names: NameColumns;
  readonly city: ColumnRef;
  readonly department: ColumnRef;
  readonly profession: ColumnRef;
  readonly partTime: ColumnRef;
  readonly age: ColumnRef;
  /** Month columns in input order. */
  readonly monthColumns: readonly MonthColumn[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attributes every filter predicate reads. Shared by records and facts.
 */
export interface PersonAttributes {
  readonly city: string;
  readonly region: string;
  readonly department: string;
  readonly profession: string;
  readonly partTime: boolean;
  readonly age: number;
}

export type RawNames =
  | { readonly mode: 'combined'; readonly fullName: string }
  | { readonly mode: 'split'; readonly firstName: string; readonly lastName: string };

/**
 * Output of the type normalizer.
 * `revenue` holds exactly one value per month column, keyed by month label.
 */
export interface TypedRow extends Omit<PersonAttributes, 'region'> {
  /** 1-based spreadsheet row number (the header is row 1). */
  readonly sourceRow: number;
  readonly names: RawNames;
  readonly revenue: ReadonlyMap<string, Decimal>;
}

export interface NamedRow extends Omit<TypedRow, 'names'> {
  readonly firstName: string;
  readonly lastName: string;
}

export interface LocatedRow extends NamedRow {
  readonly region: string;
}

export interface PersonRecord extends LocatedRow {
  readonly totalRevenue: Decimal;
  readonly averageMonthlyRevenue: Decimal;
}

/**
 * One (record, month) revenue observation in long format.
 * `sourceRow` links the fact back to its record.
 */
export interface Fact extends PersonAttributes {
  readonly sourceRow: number;
  readonly firstName: string;
  readonly lastName: string;
  readonly month: string;
  readonly revenue: Decimal;
}

export interface WideDataset {
  readonly records: readonly PersonRecord[];
  /** Strictly increasing, duplicate free. */
  readonly months: readonly MonthKey[];
}

export interface EnrichedDataset extends WideDataset {
  readonly facts: readonly Fact[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Region lookup
// ─────────────────────────────────────────────────────────────────────────────

const CountryCodeSchema = Type.Union([Type.Literal('DE'), Type.Literal('AT'), Type.Literal('CH')]);

const CityRegionEntrySchema = Type.Object({
  city: Type.String({ minLength: 1 }),
  region: Type.String({ minLength: 1 }),
  country: CountryCodeSchema,
});

/**
 * On-disk format of the city -> region lookup table (`data/city-regions.json`).
 */
export const RegionTableFileSchema = Type.Object({
  version: Type.Literal(1),
  entries: Type.Array(CityRegionEntrySchema),
});

export type RegionTableFileDTO = Static<typeof RegionTableFileSchema>;

export type CountryCode = Static<typeof CountryCodeSchema>;

export type CityRegionEntry = Readonly<Static<typeof CityRegionEntrySchema>>;

/**
 * Immutable city -> region table keyed by the normalized city name.
 */
export type RegionTable = ReadonlyMap<string, CityRegionEntry>;
