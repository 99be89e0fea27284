import { err, ok, type Result } from 'neverthrow';

import { createSchemaError, type MissingRequirement, type SchemaError } from '../errors.js';
import { parseMonthColumn } from '../month-key.js';
import { COLUMN, type ColumnRef, type MonthColumn, type NameColumns, type SchemaLayout } from '../types.js';

type RequiredRole = 'city' | 'profession' | 'department' | 'partTime' | 'age';

const REQUIRED_COLUMNS: readonly { role: RequiredRole; header: string; hint: string }[] = [
  {
    role: 'city',
    header: COLUMN.city,
    hint: `Add a '${COLUMN.city}' column holding each person's city, or rename the existing one.`,
  },
  {
    role: 'profession',
    header: COLUMN.profession,
    hint: `Add a '${COLUMN.profession}' column holding each person's profession, or rename the existing one.`,
  },
  {
    role: 'department',
    header: COLUMN.department,
    hint: `Add an '${COLUMN.department}' column holding each person's department, or rename the existing one.`,
  },
  {
    role: 'partTime',
    header: COLUMN.partTime,
    hint: `Add a '${COLUMN.partTime}' column with Ja/Nein values, or rename the existing one.`,
  },
  {
    role: 'age',
    header: COLUMN.age,
    hint: `Add an '${COLUMN.age}' column with whole-number ages, or rename the existing one.`,
  },
];

/**
 * Indexes headers by their trimmed, lower-cased form. The first occurrence wins.
 */
const indexHeaders = (headers: readonly string[]): Map<string, ColumnRef> => {
  const index = new Map<string, ColumnRef>();
  headers.forEach((header, position) => {
    const key = header.trim().toLowerCase();
    if (key !== '' && !index.has(key)) {
      index.set(key, { header, index: position });
    }
  });
  return index;
};

const resolveNameColumns = (index: Map<string, ColumnRef>): NameColumns | null => {
  const firstName = index.get(COLUMN.firstName.toLowerCase());
  const lastName = index.get(COLUMN.lastName.toLowerCase());
  if (firstName !== undefined && lastName !== undefined) {
    return { mode: 'split', firstName, lastName };
  }

  const name = index.get(COLUMN.name.toLowerCase());
  if (name !== undefined) {
    return { mode: 'combined', name };
  }

  return null;
};

const discoverMonthColumns = (
  headers: readonly string[]
): { columns: MonthColumn[]; duplicates: MissingRequirement[] } => {
  const columns: MonthColumn[] = [];
  const duplicates: MissingRequirement[] = [];
  const seen = new Map<string, string>();

  headers.forEach((header, position) => {
    const key = parseMonthColumn(header);
    if (key === null) return;

    const existing = seen.get(key.label);
    if (existing !== undefined) {
      duplicates.push({
        requirement: `Unique revenue column for ${key.label}`,
        hint: `Columns '${existing}' and '${header}' both hold revenue for ${key.label}; merge or remove one.`,
      });
      return;
    }

    seen.set(key.label, header);
    columns.push({ header, index: position, key });
  });

  return { columns, duplicates };
};

/**
 * Checks column presence before any transformation runs.
 *
 * Requires identity columns (`Name`, or both `Vorname` and `Nachname`), `Stadt`,
 * `Beruf`, `Abteilung`, `Teilzeit`, `Alter` and at least one `Umsatz_YYYY-MM`
 * column. Every problem is collected, so a single run reports all of them.
 */
export const validateSchema = (headers: readonly string[]): Result<SchemaLayout, SchemaError> => {
  const index = indexHeaders(headers);
  const missing: MissingRequirement[] = [];

  const names = resolveNameColumns(index);
  if (names === null) {
    missing.push({
      requirement: `${COLUMN.name} or ${COLUMN.firstName} + ${COLUMN.lastName}`,
      hint: `Add a combined '${COLUMN.name}' column, or both '${COLUMN.firstName}' and '${COLUMN.lastName}' columns.`,
    });
  }

  const resolved = new Map<RequiredRole, ColumnRef>();
  for (const column of REQUIRED_COLUMNS) {
    const ref = index.get(column.header.toLowerCase());
    if (ref === undefined) {
      missing.push({ requirement: column.header, hint: column.hint });
    } else {
      resolved.set(column.role, ref);
    }
  }

  const { columns: monthColumns, duplicates } = discoverMonthColumns(headers);
  if (monthColumns.length === 0) {
    missing.push({
      requirement: 'Umsatz_YYYY-MM',
      hint: 'Add at least one monthly revenue column named like Umsatz_2024-01 (month 01 to 12).',
    });
  }
  missing.push(...duplicates);

  const city = resolved.get('city');
  const profession = resolved.get('profession');
  const department = resolved.get('department');
  const partTime = resolved.get('partTime');
  const age = resolved.get('age');

  if (
    missing.length > 0 ||
    names === null ||
    city === undefined ||
    profession === undefined ||
    department === undefined ||
    partTime === undefined ||
    age === undefined
  ) {
    return err(createSchemaError(missing));
  }

  return ok({ names, city, profession, department, partTime, age, monthColumns });
};
