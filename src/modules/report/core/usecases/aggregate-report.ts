/**
 * Aggregate Report Use Case
 *
 * Computes KPIs and chart series for one filter application:
 * 1. Resolve the active months
 * 2. Select matching records and facts (one scan each)
 * 3. Fold facts into per-person period revenue and the month x department grid
 * 4. Fold records into department, profession, part-time and age statistics
 *
 * Every statistic is derived from those two subsets. An empty selection is
 * not an error: it produces a snapshot of zeros and empty series.
 */

import { Decimal } from 'decimal.js';

import { resolveActiveMonths, selectFacts, selectRecords } from './apply-filter.js';
import { departmentColors } from '../department-colors.js';
import { buildHistogram, divideOrZero, mean, median } from '../statistics.js';
import { DEFAULT_AGGREGATION_OPTIONS } from '../types.js';

import type {
  AggregationOptions,
  DepartmentRevenue,
  HeatmapMatrix,
  PartTimeStatistics,
  ProfessionRevenue,
  ReportFilter,
  ReportSnapshot,
  TimeSeries,
} from '../types.js';
import type { EnrichedDataset, Fact, PersonRecord } from '../../../sanitization/index.js';

interface GroupTotal {
  revenue: Decimal;
  headcount: number;
}

const ZERO = new Decimal(0);

const addToGroup = (groups: Map<string, GroupTotal>, key: string, revenue: Decimal): void => {
  const existing = groups.get(key);
  if (existing === undefined) {
    groups.set(key, { revenue, headcount: 1 });
  } else {
    existing.revenue = existing.revenue.plus(revenue);
    existing.headcount += 1;
  }
};

/**
 * Revenue descending, then name ascending.
 */
const byRevenueThenName =
  (collator: Intl.Collator) =>
  (a: [string, GroupTotal], b: [string, GroupTotal]): number =>
    b[1].revenue.comparedTo(a[1].revenue) || collator.compare(a[0], b[0]);

const sharePercent = (revenue: Decimal, total: Decimal): number =>
  divideOrZero(revenue, total).mul(100).toNumber();

/**
 * Month -> department -> revenue grid of the selected facts.
 */
class MonthDepartmentGrid {
  private readonly cells = new Map<string, Map<string, Decimal>>();

  add(fact: Fact): void {
    let row = this.cells.get(fact.month);
    if (row === undefined) {
      row = new Map();
      this.cells.set(fact.month, row);
    }
    row.set(fact.department, (row.get(fact.department) ?? ZERO).plus(fact.revenue));
  }

  get(month: string, department: string): Decimal {
    return this.cells.get(month)?.get(department) ?? ZERO;
  }
}

const buildTimeSeries = (
  grid: MonthDepartmentGrid,
  months: readonly string[],
  departments: readonly string[]
): TimeSeries => ({
  departments: [...departments],
  points: months.map((month) => {
    const values = departments.map(
      (department) => [department, grid.get(month, department)] as const
    );
    return {
      month,
      total: values.reduce((sum, [, value]) => sum.plus(value), ZERO).toNumber(),
      byDepartment: Object.fromEntries(
        values.map(([department, value]) => [department, value.toNumber()])
      ),
    };
  }),
});

const buildHeatmap = (
  grid: MonthDepartmentGrid,
  months: readonly string[],
  departments: readonly string[]
): HeatmapMatrix => {
  const values = departments.map((department) =>
    months.map((month) => grid.get(month, department).toNumber())
  );
  const max = values.reduce((rowMax, row) => row.reduce((m, v) => Math.max(m, v), rowMax), 0);

  return { departments: [...departments], months: [...months], values, max };
};

const buildPartTime = (
  partTime: GroupTotal,
  fullTime: GroupTotal,
  headcount: number
): PartTimeStatistics => ({
  partTimeCount: partTime.headcount,
  fullTimeCount: fullTime.headcount,
  partTimeRatio: headcount === 0 ? 0 : partTime.headcount / headcount,
  averageRevenuePartTime: divideOrZero(partTime.revenue, partTime.headcount).toNumber(),
  averageRevenueFullTime: divideOrZero(fullTime.revenue, fullTime.headcount).toNumber(),
});

const emptySnapshot = (
  filter: ReportFilter,
  activeMonths: string[],
  totalHeadcount: number
): ReportSnapshot => ({
  filter,
  activeMonths,
  kpis: {
    headcount: 0,
    totalHeadcount,
    totalRevenue: 0,
    averageRevenuePerPerson: 0,
    averageMonthlyRevenuePerPerson: 0,
    activeMonthCount: activeMonths.length,
  },
  revenueByDepartment: [],
  topDepartment: null,
  age: { mean: 0, median: 0 },
  partTime: {
    partTimeCount: 0,
    fullTimeCount: 0,
    partTimeRatio: 0,
    averageRevenuePartTime: 0,
    averageRevenueFullTime: 0,
  },
  timeSeries: { departments: [], points: [] },
  topProfessions: [],
  revenueDistribution: { binWidth: 0, bins: [] },
  heatmap: { departments: [], months: [], values: [], max: 0 },
  departmentColors: {},
});

/**
 * Computes the report snapshot for `filter` over the enriched dataset.
 */
export const aggregateReport = (
  dataset: EnrichedDataset,
  filter: ReportFilter,
  options: Partial<AggregationOptions> = {}
): ReportSnapshot => {
  const { topProfessions, histogramBins, locale } = { ...DEFAULT_AGGREGATION_OPTIONS, ...options };
  const collator = new Intl.Collator(locale);

  const activeMonths = resolveActiveMonths(dataset.months, filter).map((month) => month.label);

  const records: PersonRecord[] = selectRecords(dataset.records, filter);
  if (records.length === 0) {
    return emptySnapshot(filter, activeMonths, dataset.records.length);
  }
  const facts: Fact[] = selectFacts(dataset.facts, filter, new Set(activeMonths));

  // Facts: per-person revenue inside the active months, month x department grid
  const periodRevenue = new Map<number, Decimal>();
  const grid = new MonthDepartmentGrid();
  for (const fact of facts) {
    const previous = periodRevenue.get(fact.sourceRow) ?? ZERO;
    periodRevenue.set(fact.sourceRow, previous.plus(fact.revenue));
    grid.add(fact);
  }

  // Records: every person-level statistic
  const byDepartment = new Map<string, GroupTotal>();
  const byProfession = new Map<string, GroupTotal>();
  const partTime: GroupTotal = { revenue: ZERO, headcount: 0 };
  const fullTime: GroupTotal = { revenue: ZERO, headcount: 0 };
  const personRevenues: Decimal[] = [];
  const ages: number[] = [];
  let totalRevenue = ZERO;

  for (const record of records) {
    const revenue = periodRevenue.get(record.sourceRow) ?? ZERO;
    totalRevenue = totalRevenue.plus(revenue);
    personRevenues.push(revenue);
    ages.push(record.age);

    addToGroup(byDepartment, record.department, revenue);
    addToGroup(byProfession, record.profession, revenue);

    const subset = record.partTime ? partTime : fullTime;
    subset.revenue = subset.revenue.plus(revenue);
    subset.headcount += 1;
  }

  const headcount = records.length;
  const compareGroups = byRevenueThenName(collator);

  const revenueByDepartment: DepartmentRevenue[] = [...byDepartment.entries()]
    .sort(compareGroups)
    .map(([department, group]) => ({
      department,
      revenue: group.revenue.toNumber(),
      headcount: group.headcount,
      sharePercent: sharePercent(group.revenue, totalRevenue),
    }));

  const top = revenueByDepartment[0];

  const professions: ProfessionRevenue[] = [...byProfession.entries()]
    .sort(compareGroups)
    .slice(0, topProfessions)
    .map(([profession, group]) => ({
      profession,
      revenue: group.revenue.toNumber(),
      headcount: group.headcount,
      averageRevenue: divideOrZero(group.revenue, group.headcount).toNumber(),
    }));

  const departments = [...byDepartment.keys()].sort(collator.compare);

  return {
    filter,
    activeMonths,
    kpis: {
      headcount,
      totalHeadcount: dataset.records.length,
      totalRevenue: totalRevenue.toNumber(),
      averageRevenuePerPerson: divideOrZero(totalRevenue, headcount).toNumber(),
      averageMonthlyRevenuePerPerson: divideOrZero(
        totalRevenue,
        headcount * activeMonths.length
      ).toNumber(),
      activeMonthCount: activeMonths.length,
    },
    revenueByDepartment,
    topDepartment:
      top === undefined
        ? null
        : { department: top.department, revenue: top.revenue, sharePercent: top.sharePercent },
    age: { mean: mean(ages), median: median(ages) },
    partTime: buildPartTime(partTime, fullTime, headcount),
    timeSeries: buildTimeSeries(grid, activeMonths, departments),
    topProfessions: professions,
    revenueDistribution: buildHistogram(personRevenues, histogramBins),
    heatmap: buildHeatmap(grid, activeMonths, departments),
    departmentColors: departmentColors(departments),
  };
};
