import { type Static, Type } from '@sinclair/typebox';

const MonthLabelSchema = Type.String({
  pattern: '^\\d{4}-(0[1-9]|1[0-2])$',
  description: 'Month key as YYYY-MM',
});

const PartTimeFilterSchema = Type.Union([
  Type.Literal('yes'),
  Type.Literal('no'),
  Type.Literal('both'),
]);

/**
 * Filter specification. Every predicate is optional; an absent predicate
 * or an empty list matches everything. Ranges are inclusive.
 */
export const ReportFilterSchema = Type.Object(
  {
    departments: Type.Optional(Type.Array(Type.String())),
    regions: Type.Optional(Type.Array(Type.String())),
    cities: Type.Optional(Type.Array(Type.String())),
    professions: Type.Optional(Type.Array(Type.String())),
    partTime: Type.Optional(PartTimeFilterSchema),
    ageRange: Type.Optional(
      Type.Object(
        {
          min: Type.Optional(Type.Integer({ minimum: 0 })),
          max: Type.Optional(Type.Integer({ minimum: 0 })),
        },
        { additionalProperties: false }
      )
    ),
    monthRange: Type.Optional(
      Type.Object(
        {
          start: Type.Optional(MonthLabelSchema),
          end: Type.Optional(MonthLabelSchema),
        },
        { additionalProperties: false }
      )
    ),
  },
  { additionalProperties: false }
);

export type ReportFilter = Static<typeof ReportFilterSchema>;

export type PartTimeFilter = Static<typeof PartTimeFilterSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation options
// ─────────────────────────────────────────────────────────────────────────────

export interface AggregationOptions {
  /** Number of professions in the top list. */
  topProfessions: number;
  /** Number of bins in the revenue histogram. */
  histogramBins: number;
  /** Collation locale for category ordering. */
  locale: string;
}

export const DEFAULT_AGGREGATION_OPTIONS: AggregationOptions = {
  topProfessions: 10,
  histogramBins: 15,
  locale: 'de',
};

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation result
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Revenue figures cover the active month range only.
 */
export interface ReportKpis {
  headcount: number;
  /** Records in the dataset before filtering. */
  totalHeadcount: number;
  totalRevenue: number;
  averageRevenuePerPerson: number;
  /** totalRevenue / headcount / active months */
  averageMonthlyRevenuePerPerson: number;
  activeMonthCount: number;
}

export interface DepartmentRevenue {
  department: string;
  revenue: number;
  headcount: number;
  /** Share of the filtered total, 0-100. */
  sharePercent: number;
}

export interface TopDepartment {
  department: string;
  revenue: number;
  sharePercent: number;
}

export interface AgeStatistics {
  mean: number;
  median: number;
}

export interface PartTimeStatistics {
  partTimeCount: number;
  fullTimeCount: number;
  /** Part-time headcount / headcount, 0-1. */
  partTimeRatio: number;
  averageRevenuePartTime: number;
  averageRevenueFullTime: number;
}

export interface TimeSeriesPoint {
  month: string;
  total: number;
  byDepartment: Record<string, number>;
}

/**
 * Monthly revenue per department, for stacked rendering.
 */
export interface TimeSeries {
  departments: string[];
  points: TimeSeriesPoint[];
}

export interface ProfessionRevenue {
  profession: string;
  revenue: number;
  headcount: number;
  averageRevenue: number;
}

export interface HistogramBin {
  lower: number;
  upper: number;
  count: number;
}

export interface RevenueHistogram {
  binWidth: number;
  bins: HistogramBin[];
}

/**
 * Department x month revenue matrix: `values[departmentIndex][monthIndex]`.
 */
export interface HeatmapMatrix {
  departments: string[];
  months: string[];
  values: number[][];
  /** Largest cell, for colour scaling. */
  max: number;
}

/**
 * KPIs and chart series for one filter application. Recomputed on every
 * filter change, never mutated.
 */
export interface ReportSnapshot {
  filter: ReportFilter;
  activeMonths: string[];
  kpis: ReportKpis;
  revenueByDepartment: DepartmentRevenue[];
  topDepartment: TopDepartment | null;
  age: AgeStatistics;
  partTime: PartTimeStatistics;
  timeSeries: TimeSeries;
  topProfessions: ProfessionRevenue[];
  revenueDistribution: RevenueHistogram;
  heatmap: HeatmapMatrix;
  departmentColors: Record<string, string>;
}

/**
 * Values a renderer offers in its filter controls.
 */
export interface FilterOptions {
  departments: string[];
  regions: string[];
  cities: string[];
  professions: string[];
  months: string[];
  age: { min: number; max: number };
}

/**
 * The structured payload handed to the rendering layer.
 */
export interface ReportPayload {
  generatedAt: string;
  filterDescription: string;
  filterOptions: FilterOptions;
  snapshot: ReportSnapshot;
}
