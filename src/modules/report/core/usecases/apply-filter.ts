import { compareMonthKeys, parseMonthLabel } from '../../../sanitization/index.js';

import type { ReportFilter } from '../types.js';
import type { Fact, MonthKey, PersonAttributes, PersonRecord } from '../../../sanitization/index.js';

export const DEFAULT_MONTH_WINDOW = 12;

/**
 * Default filter: the most recent `monthWindow` months (all when fewer exist),
 * every categorical predicate unset.
 */
export const createDefaultFilter = (
  months: readonly MonthKey[],
  monthWindow: number = DEFAULT_MONTH_WINDOW
): ReportFilter => {
  const last = months.at(-1);
  const first = months[Math.max(0, months.length - monthWindow)];
  if (last === undefined || first === undefined) {
    return {};
  }

  return { monthRange: { start: first.label, end: last.label } };
};

/**
 * Months of the dataset inside the filter's month range, in order.
 * A start after the end selects nothing.
 */
export const resolveActiveMonths = (
  months: readonly MonthKey[],
  filter: ReportFilter
): MonthKey[] => {
  const range = filter.monthRange;
  const start = range?.start === undefined ? null : parseMonthLabel(range.start);
  const end = range?.end === undefined ? null : parseMonthLabel(range.end);

  return months.filter(
    (month) =>
      (start === null || compareMonthKeys(month, start) >= 0) &&
      (end === null || compareMonthKeys(month, end) <= 0)
  );
};

const toSet = (values: readonly string[] | undefined): ReadonlySet<string> | null =>
  values === undefined || values.length === 0 ? null : new Set(values);

/**
 * Compiles the person-level predicates of a filter once.
 */
export const createPersonPredicate = (
  filter: ReportFilter
): ((person: PersonAttributes) => boolean) => {
  const departments = toSet(filter.departments);
  const regions = toSet(filter.regions);
  const cities = toSet(filter.cities);
  const professions = toSet(filter.professions);
  const partTime = filter.partTime ?? 'both';
  const minAge = filter.ageRange?.min ?? Number.NEGATIVE_INFINITY;
  const maxAge = filter.ageRange?.max ?? Number.POSITIVE_INFINITY;

  return (person) =>
    (departments === null || departments.has(person.department)) &&
    (regions === null || regions.has(person.region)) &&
    (cities === null || cities.has(person.city)) &&
    (professions === null || professions.has(person.profession)) &&
    (partTime === 'both' || person.partTime === (partTime === 'yes')) &&
    person.age >= minAge &&
    person.age <= maxAge;
};

/**
 * Records matching the person predicates.
 */
export const selectRecords = (
  records: readonly PersonRecord[],
  filter: ReportFilter
): PersonRecord[] => records.filter(createPersonPredicate(filter));

/**
 * Facts matching the person predicates and falling inside the active months.
 */
export const selectFacts = (
  facts: readonly Fact[],
  filter: ReportFilter,
  activeMonths: ReadonlySet<string>
): Fact[] => {
  const matches = createPersonPredicate(filter);
  return facts.filter((fact) => activeMonths.has(fact.month) && matches(fact));
};

const listOrAll = (label: string, values: readonly string[] | undefined): string | null =>
  values === undefined || values.length === 0 ? null : `${label}: ${values.join(', ')}`;

/**
 * One-line description of the active predicates.
 */
export const describeFilter = (filter: ReportFilter): string => {
  const parts: string[] = [];

  if (filter.monthRange !== undefined) {
    parts.push(
      `Months ${filter.monthRange.start ?? 'first'} to ${filter.monthRange.end ?? 'last'}`
    );
  }

  parts.push(listOrAll('Departments', filter.departments) ?? 'All departments');

  for (const part of [
    listOrAll('Regions', filter.regions),
    listOrAll('Cities', filter.cities),
    listOrAll('Professions', filter.professions),
  ]) {
    if (part !== null) parts.push(part);
  }

  if (filter.partTime === 'yes') parts.push('Part-time only');
  if (filter.partTime === 'no') parts.push('Full-time only');

  if (filter.ageRange !== undefined) {
    const { min, max } = filter.ageRange;
    if (min !== undefined || max !== undefined) {
      parts.push(`Age ${String(min ?? 0)} to ${max === undefined ? 'any' : String(max)}`);
    }
  }

  return parts.join('; ');
};
