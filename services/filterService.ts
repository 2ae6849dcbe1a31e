import type { CategoryField, FilterState, GradeRecord, GradeTable, NumericField } from '../types';
import { type DashboardWarning, missingColumn } from './errors';

/** Keys of `Row` holding a number or null. */
export type NumericKey<Row> = { [K in keyof Row]-?: Row[K] extends number | null ? K : never }[keyof Row];

/** Keys of `Row` holding a string or null. */
export type CategoryKey<Row> = { [K in keyof Row]-?: Row[K] extends string | null ? K : never }[keyof Row];

export function numericValue(record: GradeRecord, field: NumericField): number | null {
  return record[field];
}

export function categoryValue(record: GradeRecord, field: CategoryField): string | null {
  return record[field];
}

/**
 * Keeps rows with lo <= field <= hi. Null cells never match. Works on any
 * row type, so record tables and per-student rollups filter the same way.
 */
export function filterRowsByRange<Row, K extends NumericKey<Row>>(
  rows: readonly Row[],
  field: K,
  [lo, hi]: readonly [number, number]
): Row[] {
  return rows.filter(r => {
    const v = r[field];
    return typeof v === 'number' && v >= lo && v <= hi;
  });
}

/** Keeps rows whose field is in `allowedValues`. An empty allowlist selects nothing. */
export function filterRowsBySet<Row, K extends CategoryKey<Row>>(
  rows: readonly Row[],
  field: K,
  allowedValues: Iterable<string>
): Row[] {
  const allowed = new Set(allowedValues);
  return rows.filter(r => {
    const v = r[field];
    return typeof v === 'string' && allowed.has(v);
  });
}

function withRecords(table: GradeTable, records: GradeRecord[]): GradeTable {
  return { ...table, records };
}

export function applyRangeFilter(table: GradeTable, field: NumericField, range: readonly [number, number]): GradeTable {
  return withRecords(table, filterRowsByRange(table.records, field, range));
}

export function applySetFilter(table: GradeTable, field: CategoryField, allowedValues: Iterable<string>): GradeTable {
  return withRecords(table, filterRowsBySet(table.records, field, allowedValues));
}

export interface FilterResult {
  table: GradeTable;
  warnings: DashboardWarning[];
}

export function applyFilters(table: GradeTable, filters: FilterState): FilterResult {
  const warnings: DashboardWarning[] = [];

  let result = applyRangeFilter(table, 'year', filters.yearRange);
  result = applySetFilter(result, 'department', filters.departmentAllowlist);

  if (table.hasMajorType) {
    result = applySetFilter(result, 'majorType', filters.majorTypeAllowlist);
  } else {
    warnings.push(missingColumn('majorTypeFilter', 'Major_Type'));
  }

  return { table: result, warnings };
}

/** Distinct non-null values in first-seen order. */
export function distinctValues(table: GradeTable, field: CategoryField): string[] {
  const seen = new Set<string>();
  for (const r of table.records) {
    const v = categoryValue(r, field);
    if (v !== null) seen.add(v);
  }
  return [...seen];
}

export function yearBounds(table: GradeTable): [number, number] | undefined {
  if (table.records.length === 0) return undefined;
  let min = Infinity;
  let max = -Infinity;
  for (const r of table.records) {
    if (r.year < min) min = r.year;
    if (r.year > max) max = r.year;
  }
  return [min, max];
}
