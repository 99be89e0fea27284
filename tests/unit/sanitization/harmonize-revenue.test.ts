import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { sanitizeDataset, type EnrichedDataset } from '@/modules/sanitization/index.js';

import {
  makePersonRow,
  makeRawTable,
  makeRegionTable,
  type PersonRowInput,
} from '../../fixtures/builders.js';

const sanitize = (people: PersonRowInput[], monthHeaders?: string[]): EnrichedDataset =>
  sanitizeDataset({ regionTable: makeRegionTable() }, makeRawTable(people, monthHeaders))
    ._unsafeUnwrap().dataset;

describe('harmonizeRevenue', () => {
  it('orders months chronologically regardless of column order', () => {
    const dataset = sanitize([makePersonRow({ revenue: [100, 200] })], [
      'Umsatz_2023-06',
      'Umsatz_2022-01',
    ]);

    expect(dataset.months.map((month) => month.label)).toEqual(['2022-01', '2023-06']);
    expect(dataset.facts.map((fact) => [fact.month, fact.revenue.toNumber()])).toEqual([
      ['2022-01', 200],
      ['2023-06', 100],
    ]);
  });

  it('keeps gaps between discovered months', () => {
    const dataset = sanitize([makePersonRow({ revenue: [1, 2, 3] })], [
      'Umsatz_2024-03',
      'Umsatz_2023-11',
      'Umsatz_2024-01',
    ]);

    expect(dataset.months.map((month) => month.label)).toEqual(['2023-11', '2024-01', '2024-03']);
  });

  it('emits one fact per record and month', () => {
    const dataset = sanitize(
      [
        makePersonRow({ name: 'Anna Schmidt', revenue: [1, 2, 3] }),
        makePersonRow({ name: 'Ben Vogel', revenue: [4, 5, 6] }),
      ],
      ['Umsatz_2024-01', 'Umsatz_2024-02', 'Umsatz_2024-03']
    );

    expect(dataset.facts).toHaveLength(dataset.records.length * dataset.months.length);
    expect(dataset.facts).toHaveLength(6);
  });

  it('conserves revenue between facts and record totals', () => {
    const dataset = sanitize([
      makePersonRow({ name: 'Anna Schmidt', revenue: [0.1, 0.2] }),
      makePersonRow({ name: 'Ben Vogel', revenue: ['1234,56', 7890.44] }),
    ]);

    for (const record of dataset.records) {
      const factSum = dataset.facts
        .filter((fact) => fact.sourceRow === record.sourceRow)
        .reduce((sum, fact) => sum.plus(fact.revenue), new Decimal(0));
      expect(factSum.equals(record.totalRevenue)).toBe(true);
    }

    const anna = dataset.records.find((record) => record.lastName === 'Schmidt');
    expect(anna?.totalRevenue.toString()).toBe('0.3');
  });

  it('averages over every discovered month, rounded half-up to two decimals', () => {
    const dataset = sanitize(
      [
        makePersonRow({ name: 'Anna Schmidt', revenue: [100, 0.01, 0] }),
        makePersonRow({ name: 'Ben Vogel', revenue: [0.01, 0, 0.005] }),
      ],
      ['Umsatz_2024-01', 'Umsatz_2024-02', 'Umsatz_2024-03']
    );

    const byLastName = new Map(dataset.records.map((record) => [record.lastName, record]));
    // 100.01 / 3 = 33.33666...
    expect(byLastName.get('Schmidt')?.averageMonthlyRevenue.toString()).toBe('33.34');
    // 0.015 / 3 = 0.005
    expect(byLastName.get('Vogel')?.averageMonthlyRevenue.toString()).toBe('0.01');
  });
});
