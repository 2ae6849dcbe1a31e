import {
  type CategoryField,
  type Comparison,
  CovidPeriod,
  type DataQualityIssue,
  type Description,
  type GradeRecord,
  type GradeTable,
  type GroupRank,
  type OutlierSet,
  type StudentRollup,
  type TrendPoint
} from '../types';
import { DEFAULT_SETTINGS } from '../constants';
import { categoryValue } from './filterService';
import { averageRanks, mean, quantileSorted, sampleStd, sortAscending, welchTTest } from './statistics';

interface Accumulator {
  sum: number;
  count: number;
}

function add(acc: Accumulator | undefined, grade: number): Accumulator {
  if (!acc) return { sum: grade, count: 1 };
  acc.sum += grade;
  acc.count += 1;
  return acc;
}

function toTrend(byYear: Map<number, Accumulator>): TrendPoint[] {
  return [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, acc]) => ({ year, meanGrade: acc.sum / acc.count, count: acc.count }));
}

/** Mean grade per academic year, ascending. Years without rows are absent. */
export function trendByYear(table: GradeTable): TrendPoint[] {
  const byYear = new Map<number, Accumulator>();
  for (const r of table.records) {
    byYear.set(r.year, add(byYear.get(r.year), r.grade));
  }
  return toTrend(byYear);
}

/**
 * One trend series per category value, keyed in first-seen order. Returns
 * undefined when asked for major type on a table without that column.
 */
export function trendByYearAndCategory(table: GradeTable, field: CategoryField): Map<string, TrendPoint[]> | undefined {
  if (field === 'majorType' && !table.hasMajorType) return undefined;

  const groups = new Map<string, Map<number, Accumulator>>();
  for (const r of table.records) {
    const key = categoryValue(r, field);
    if (key === null) continue;
    let byYear = groups.get(key);
    if (!byYear) {
      byYear = new Map();
      groups.set(key, byYear);
    }
    byYear.set(r.year, add(byYear.get(r.year), r.grade));
  }

  const result = new Map<string, TrendPoint[]>();
  for (const [key, byYear] of groups) result.set(key, toTrend(byYear));
  return result;
}

// Attributes that should never vary across a student's rows.
const INVARIANT_FIELDS = [
  'registrationYear',
  'birthYear',
  'gender',
  'origin',
  'department',
  'majorType',
  'major'
] as const;

export interface RollupResult {
  rollups: StudentRollup[];
  issues: DataQualityIssue[];
}

/**
 * Per-student rollup in first-seen order. Descriptive attributes come from
 * the student's first row; if any of them differs on a later row the
 * conflict is reported as a data-quality issue rather than resolved.
 */
export function studentRollup(table: GradeTable): RollupResult {
  interface Group {
    first: GradeRecord;
    semesters: Set<number>;
    credits: number;
    grades: number[];
    conflicts: Map<(typeof INVARIANT_FIELDS)[number], Set<string | number | null>>;
  }

  const groups = new Map<number, Group>();
  for (const r of table.records) {
    const group = groups.get(r.studentId);
    if (!group) {
      groups.set(r.studentId, {
        first: r,
        semesters: new Set([r.semester]),
        credits: r.credits ?? 0,
        grades: [r.grade],
        conflicts: new Map()
      });
      continue;
    }

    group.semesters.add(r.semester);
    group.credits += r.credits ?? 0;
    group.grades.push(r.grade);
    for (const field of INVARIANT_FIELDS) {
      if (r[field] !== group.first[field]) {
        const values = group.conflicts.get(field) ?? new Set([group.first[field]]);
        values.add(r[field]);
        group.conflicts.set(field, values);
      }
    }
  }

  const rollups: StudentRollup[] = [];
  const issues: DataQualityIssue[] = [];
  for (const [studentId, g] of groups) {
    rollups.push({
      studentId,
      registrationYear: g.first.registrationYear,
      birthYear: g.first.birthYear,
      gender: g.first.gender,
      origin: g.first.origin,
      department: g.first.department,
      majorType: g.first.majorType,
      major: g.first.major,
      semesterCount: g.semesters.size,
      totalCredits: g.credits,
      meanGrade: mean(g.grades)
    });
    for (const [field, values] of g.conflicts) {
      issues.push({ studentId, field, values: [...values] });
    }
  }
  return { rollups, issues };
}

/** Groups ranked by mean grade, 1 = highest. Ties share the average rank. */
export function rankByMeanGrade(table: GradeTable, field: CategoryField): GroupRank[] {
  const groups = new Map<string, Accumulator>();
  for (const r of table.records) {
    const key = categoryValue(r, field);
    if (key === null) continue;
    groups.set(key, add(groups.get(key), r.grade));
  }

  const entries = [...groups.entries()].map(([group, acc]) => ({
    group,
    meanGrade: acc.sum / acc.count,
    count: acc.count
  }));
  const ranks = averageRanks(entries.map(e => e.meanGrade), 'descending');

  return entries
    .map((e, i) => ({ ...e, rank: ranks[i] }))
    .sort((a, b) => a.rank - b.rank || a.group.localeCompare(b.group));
}

/**
 * Mean year-over-year change in percent. The first year has no
 * predecessor and is left out; undefined below two points or when a
 * previous mean is zero.
 */
export function percentChangeSeries(series: readonly TrendPoint[]): number | undefined {
  if (series.length < 2) return undefined;
  const changes: number[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1].meanGrade;
    const change = ((series[i].meanGrade - prev) / prev) * 100;
    if (!Number.isFinite(change)) return undefined;
    changes.push(change);
  }
  return mean(changes);
}

/** Percent change between the first and last points. */
export function overallChange(series: readonly TrendPoint[]): number | undefined {
  if (series.length < 2) return undefined;
  const first = series[0].meanGrade;
  const change = ((series[series.length - 1].meanGrade - first) / first) * 100;
  return Number.isFinite(change) ? change : undefined;
}

/** Highest mean grade; the earliest year wins a tie. */
export function peakYear(series: readonly TrendPoint[]): TrendPoint | undefined {
  let best: TrendPoint | undefined;
  for (const point of series) {
    if (!best || point.meanGrade > best.meanGrade) best = point;
  }
  return best;
}

/**
 * Records outside [Q1 - k*IQR, Q3 + k*IQR], with quartiles taken from this
 * table only.
 */
export function iqrOutliers(table: GradeTable, multiplier: number = DEFAULT_SETTINGS.iqrMultiplier): OutlierSet | undefined {
  if (table.records.length === 0) return undefined;

  const sorted = sortAscending(table.records.map(r => r.grade));
  const q1 = quantileSorted(sorted, 0.25);
  const q3 = quantileSorted(sorted, 0.75);
  const iqr = q3 - q1;
  const lower = q1 - multiplier * iqr;
  const upper = q3 + multiplier * iqr;

  return {
    bounds: { q1, q3, iqr, lower, upper },
    records: table.records.filter(r => r.grade < lower || r.grade > upper)
  };
}

/** Welch comparison of two samples; undefined when either has fewer than two values. */
export function twoSampleComparison(a: readonly number[], b: readonly number[]): Comparison | undefined {
  if (a.length < 2 || b.length < 2) return undefined;
  const { t, df, p } = welchTTest(a, b);
  return { t, df, p, meanA: mean(a), meanB: mean(b), nA: a.length, nB: b.length };
}

export function describe(values: readonly number[]): Description {
  if (values.length === 0) {
    return { count: 0, mean: NaN, std: NaN, min: NaN, q1: NaN, median: NaN, q3: NaN, max: NaN };
  }
  const sorted = sortAscending(values);
  return {
    count: sorted.length,
    mean: mean(sorted),
    std: sampleStd(sorted),
    min: sorted[0],
    q1: quantileSorted(sorted, 0.25),
    median: quantileSorted(sorted, 0.5),
    q3: quantileSorted(sorted, 0.75),
    max: sorted[sorted.length - 1]
  };
}

export function grades(table: GradeTable): number[] {
  return table.records.map(r => r.grade);
}

export function partitionByPeriod(table: GradeTable): { pre: GradeTable; post: GradeTable } {
  return {
    pre: { ...table, records: table.records.filter(r => r.covidPeriod === CovidPeriod.Pre) },
    post: { ...table, records: table.records.filter(r => r.covidPeriod === CovidPeriod.Post) }
  };
}
