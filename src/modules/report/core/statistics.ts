import { Decimal } from 'decimal.js';

import type { RevenueHistogram } from './types.js';

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

export const median = (values: readonly number[]): number => {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;

  if (sorted.length % 2 === 1) return upper;

  const lower = sorted[middle - 1] ?? 0;
  return (lower + upper) / 2;
};

export const sumDecimals = (values: Iterable<Decimal>): Decimal => {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
};

/**
 * Safe division: zero when the divisor is zero.
 */
export const divideOrZero = (dividend: Decimal, divisor: Decimal.Value): Decimal => {
  const denominator = new Decimal(divisor);
  return denominator.isZero() ? new Decimal(0) : dividend.div(denominator);
};

/**
 * Equal-width histogram between the smallest and largest value.
 *
 * Width is `(max - min) / binCount`; values land in
 * `floor((value - min) / width)`, with the maximum in the last bin.
 * When every value is equal the histogram is a single bin `[min, max]`.
 */
export const buildHistogram = (values: readonly Decimal[], binCount: number): RevenueHistogram => {
  const [first, ...rest] = values;
  if (first === undefined || binCount < 1) {
    return { binWidth: 0, bins: [] };
  }

  let min = first;
  let max = first;
  for (const value of rest) {
    if (value.lessThan(min)) min = value;
    if (value.greaterThan(max)) max = value;
  }

  const width = max.minus(min).div(binCount);
  if (width.isZero()) {
    return {
      binWidth: 0,
      bins: [{ lower: min.toNumber(), upper: max.toNumber(), count: values.length }],
    };
  }

  const counts: number[] = Array.from({ length: binCount }, () => 0);
  for (const value of values) {
    const index = Math.min(value.minus(min).div(width).floor().toNumber(), binCount - 1);
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return {
    binWidth: width.toNumber(),
    bins: counts.map((count, index) => ({
      lower: min.plus(width.mul(index)).toNumber(),
      upper: index === binCount - 1 ? max.toNumber() : min.plus(width.mul(index + 1)).toNumber(),
      count,
    })),
  };
};
