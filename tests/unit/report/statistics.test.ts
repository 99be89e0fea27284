import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  buildHistogram,
  departmentColor,
  departmentColors,
  mean,
  median,
} from '@/modules/report/index.js';

const decimals = (...values: number[]): Decimal[] => values.map((value) => new Decimal(value));

describe('mean and median', () => {
  it('return zero for no values', () => {
    expect(mean([])).toBe(0);
    expect(median([])).toBe(0);
  });

  it('take the middle value, or the average of the two middle values', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(mean([1, 2, 3, 6])).toBe(3);
  });
});

describe('buildHistogram', () => {
  it('returns no bins for no values', () => {
    expect(buildHistogram([], 15)).toEqual({ binWidth: 0, bins: [] });
  });

  it('collapses equal values into one bin', () => {
    expect(buildHistogram(decimals(5, 5, 5), 15)).toEqual({
      binWidth: 0,
      bins: [{ lower: 5, upper: 5, count: 3 }],
    });
  });

  it('splits the range into equal-width bins with the maximum in the last one', () => {
    expect(buildHistogram(decimals(0, 3.9, 4, 10), 5)).toEqual({
      binWidth: 2,
      bins: [
        { lower: 0, upper: 2, count: 1 },
        { lower: 2, upper: 4, count: 1 },
        { lower: 4, upper: 6, count: 1 },
        { lower: 6, upper: 8, count: 0 },
        { lower: 8, upper: 10, count: 1 },
      ],
    });
  });
});

describe('departmentColor', () => {
  it('falls back to grey for departments outside the palette', () => {
    expect(departmentColor('Vertrieb')).toBe('#3B82F6');
    expect(departmentColor('Forschung')).toBe('#9CA3AF');
  });

  it('ignores names inherited from Object.prototype', () => {
    expect(departmentColor('constructor')).toBe('#9CA3AF');
    expect(departmentColor('__proto__')).toBe('#9CA3AF');
    expect(departmentColors(['toString', 'IT'])).toEqual({ toString: '#9CA3AF', IT: '#10B981' });
  });
});
