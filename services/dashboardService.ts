import type {
  AnalysisSettings,
  Description,
  FilterState,
  GradeTable,
  GroupRank,
  PeriodComparison,
  TrendPoint
} from '../types';
import { DEFAULT_SETTINGS } from '../constants';
import { type DashboardWarning, type ViewResult, emptySelection, missingColumn, ok } from './errors';
import { applyFilters, applySetFilter, distinctValues, yearBounds } from './filterService';
import {
  type RollupResult,
  describe,
  grades,
  iqrOutliers,
  overallChange,
  partitionByPeriod,
  peakYear,
  percentChangeSeries,
  rankByMeanGrade,
  studentRollup,
  trendByYear,
  trendByYearAndCategory,
  twoSampleComparison
} from './aggregationService';
import { withCovidThreshold } from './schemaService';
import { createLogger } from './logger';

const log = createLogger('dashboard');

export interface DashboardViews {
  filtered: GradeTable;
  overallTrend: ViewResult<TrendPoint[]>;
  departmentTrend: ViewResult<TrendPoint[]>;
  majorTrend: ViewResult<TrendPoint[]>;
  majorTypeTrends: ViewResult<Map<string, TrendPoint[]>>;
  genderTrends: ViewResult<Map<string, TrendPoint[]>>;
  departmentComparison: ViewResult<Map<string, TrendPoint[]>>;
  departmentRanking: GroupRank[];
  students: RollupResult;
  gradeSummary: Description;
  periodComparison: ViewResult<PeriodComparison>;
  inflationRate: number | undefined;
  overallChange: number | undefined;
  peak: TrendPoint | undefined;
  warnings: DashboardWarning[];
}

/**
 * Default selection: everything in range and allowed, first department and
 * major picked, first two departments compared.
 */
export function createInitialFilters(table: GradeTable): FilterState {
  const departments = distinctValues(table, 'department');
  const majors = distinctValues(table, 'major');
  return {
    yearRange: yearBounds(table) ?? [0, 0],
    departmentAllowlist: new Set(departments),
    majorTypeAllowlist: new Set(distinctValues(table, 'majorType')),
    selectedDepartment: departments[0] ?? '',
    selectedMajor: majors[0] ?? '',
    selectedDepartmentsForComparison: new Set(departments.slice(0, 2))
  };
}

function singleSeries(table: GradeTable, view: string, label: string): ViewResult<TrendPoint[]> {
  if (table.records.length === 0) {
    return { status: 'empty', warning: emptySelection(view, `No grades for ${label || 'this selection'} in the current filters.`) };
  }
  return ok(trendByYear(table));
}

function comparePeriods(table: GradeTable, settings: AnalysisSettings): PeriodComparison {
  const { pre, post } = partitionByPeriod(table);
  const preGrades = grades(pre);
  const postGrades = grades(post);
  return {
    pre: describe(preGrades),
    post: describe(postGrades),
    test: twoSampleComparison(preGrades, postGrades),
    preOutliers: iqrOutliers(pre, settings.iqrMultiplier),
    postOutliers: iqrOutliers(post, settings.iqrMultiplier)
  };
}

const NO_ROWS_MESSAGE = 'No grades match the current filters. Please widen the year range or select departments and major types.';

/**
 * Recomputes every dashboard view from the base table and the current
 * selection. Each view degrades on its own; none blocks the others.
 */
export function buildDashboard(
  table: GradeTable,
  filters: FilterState,
  settings: AnalysisSettings = DEFAULT_SETTINGS
): DashboardViews {
  const applied = applyFilters(table, filters);
  const filtered = withCovidThreshold(applied.table, settings.covidThresholdYear);
  const warnings = applied.warnings;

  // With no rows left, every whole-selection view shows the same placeholder.
  const noRows = filtered.records.length === 0 ? emptySelection('dashboard', NO_ROWS_MESSAGE) : undefined;
  if (noRows) warnings.push(noRows);
  const unlessEmpty = <T>(compute: () => T): ViewResult<T> =>
    noRows ? { status: 'empty', warning: noRows } : ok(compute());

  const trend = trendByYear(filtered);
  const overallTrend = unlessEmpty(() => trend);

  const departmentTrend = singleSeries(
    applySetFilter(filtered, 'department', [filters.selectedDepartment]),
    'departmentTrend',
    filters.selectedDepartment
  );

  const majorTrend = singleSeries(
    applySetFilter(filtered, 'major', [filters.selectedMajor]),
    'majorTrend',
    filters.selectedMajor
  );

  const byMajorType = trendByYearAndCategory(filtered, 'majorType');
  const majorTypeTrends: ViewResult<Map<string, TrendPoint[]>> = byMajorType
    ? unlessEmpty(() => byMajorType)
    : { status: 'skipped', warning: missingColumn('majorTypeTrends', 'Major_Type') };

  let departmentComparison: ViewResult<Map<string, TrendPoint[]>>;
  const compared = applySetFilter(filtered, 'department', filters.selectedDepartmentsForComparison);
  if (compared.records.length === 0) {
    departmentComparison = { status: 'empty', warning: emptySelection('departmentComparison', 'Please select at least one department to compare.') };
  } else {
    departmentComparison = ok(trendByYearAndCategory(compared, 'department') ?? new Map<string, TrendPoint[]>());
  }

  for (const view of [departmentTrend, majorTrend, majorTypeTrends, departmentComparison]) {
    if (view.status !== 'ok' && view.warning !== noRows) warnings.push(view.warning);
  }

  const students = studentRollup(filtered);
  if (students.issues.length > 0) {
    log.warn('Students with inconsistent attributes', { count: students.issues.length });
  }

  return {
    filtered,
    overallTrend,
    departmentTrend,
    majorTrend,
    majorTypeTrends,
    genderTrends: unlessEmpty(() => trendByYearAndCategory(filtered, 'gender') ?? new Map<string, TrendPoint[]>()),
    departmentComparison,
    departmentRanking: rankByMeanGrade(filtered, 'department'),
    students,
    gradeSummary: describe(grades(filtered)),
    periodComparison: unlessEmpty(() => comparePeriods(filtered, settings)),
    inflationRate: percentChangeSeries(trend),
    overallChange: overallChange(trend),
    peak: peakYear(trend),
    warnings
  };
}
