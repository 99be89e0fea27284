import type { FilterOptions } from '../types.js';
import type { EnrichedDataset } from '../../../sanitization/index.js';

const distinctSorted = (values: Iterable<string>, collator: Intl.Collator): string[] =>
  [...new Set(values)].sort(collator.compare);

/**
 * Distinct values per filterable field, for a renderer's filter controls.
 */
export const listFilterOptions = (dataset: EnrichedDataset, locale = 'de'): FilterOptions => {
  const collator = new Intl.Collator(locale);
  const { records } = dataset;

  let minAge = Number.POSITIVE_INFINITY;
  let maxAge = Number.NEGATIVE_INFINITY;
  for (const record of records) {
    minAge = Math.min(minAge, record.age);
    maxAge = Math.max(maxAge, record.age);
  }

  return {
    departments: distinctSorted(
      records.map((record) => record.department),
      collator
    ),
    regions: distinctSorted(
      records.map((record) => record.region),
      collator
    ),
    cities: distinctSorted(
      records.map((record) => record.city),
      collator
    ),
    professions: distinctSorted(
      records.map((record) => record.profession),
      collator
    ),
    months: dataset.months.map((month) => month.label),
    age: records.length === 0 ? { min: 0, max: 0 } : { min: minAge, max: maxAge },
  };
};
