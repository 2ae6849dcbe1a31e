import type { Comparison, Description, GradeRecord, TrendPoint } from '../types';
import { PLACEHOLDER } from '../constants';

export type FormatSpec =
  | 'integerIfWhole'
  | 'fixed2'
  | 'percentString'
  | 'rankAsInt'
  | 'pValue'
  | { kind: 'valueWithYear'; year: number };

/**
 * Display string for a single number. Missing, NaN and infinite values
 * all render as the placeholder.
 */
export function formatValue(value: number | null | undefined, format: FormatSpec): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return PLACEHOLDER;

  if (typeof format === 'object') {
    return `${value.toFixed(2)} (${format.year})`;
  }

  switch (format) {
    case 'integerIfWhole':
      return Number.isInteger(value) ? value.toFixed(0) : value.toFixed(2);
    case 'fixed2':
      return value.toFixed(2);
    case 'percentString':
      return `${value.toFixed(2)}%`;
    case 'rankAsInt':
      return String(Math.trunc(value));
    case 'pValue':
      return value < 0.001 ? '< 0.001' : value.toFixed(3);
  }
}

export function formatPeak(point: TrendPoint | undefined): string {
  if (!point) return PLACEHOLDER;
  return formatValue(point.meanGrade, { kind: 'valueWithYear', year: point.year });
}

export interface LabelledValue {
  label: string;
  value: string;
}

export function formatDescription(d: Description): LabelledValue[] {
  return [
    { label: 'Count', value: formatValue(d.count, 'integerIfWhole') },
    { label: 'Mean', value: formatValue(d.mean, 'fixed2') },
    { label: 'Std', value: formatValue(d.std, 'fixed2') },
    { label: 'Min', value: formatValue(d.min, 'fixed2') },
    { label: '25%', value: formatValue(d.q1, 'fixed2') },
    { label: '50%', value: formatValue(d.median, 'fixed2') },
    { label: '75%', value: formatValue(d.q3, 'fixed2') },
    { label: 'Max', value: formatValue(d.max, 'fixed2') }
  ];
}

export function formatComparison(c: Comparison | undefined): LabelledValue[] {
  if (!c) return [{ label: 'Welch t-test', value: PLACEHOLDER }];
  return [
    { label: 't-statistic', value: formatValue(c.t, 'fixed2') },
    { label: 'Degrees of freedom', value: formatValue(c.df, 'fixed2') },
    { label: 'p-value', value: formatValue(c.p, 'pValue') }
  ];
}

export const RECORD_COLUMNS = [
  'StudentID',
  'RegistrationYear',
  'BirthYear',
  'Gender',
  'Origin',
  'Department',
  'Major_Type',
  'Major',
  'Semester',
  'Year',
  'COVID_Period',
  'Credits',
  'Grade'
] as const;

export type RecordRow = Record<(typeof RECORD_COLUMNS)[number], string>;

/** Row for the filtered data table; identifiers and years print without decimals. */
export function formatRecordRow(r: GradeRecord): RecordRow {
  return {
    StudentID: formatValue(r.studentId, 'integerIfWhole'),
    RegistrationYear: formatValue(r.registrationYear, 'integerIfWhole'),
    BirthYear: formatValue(r.birthYear, 'integerIfWhole'),
    Gender: r.gender,
    Origin: r.origin,
    Department: r.department,
    Major_Type: r.majorType ?? PLACEHOLDER,
    Major: r.major,
    Semester: formatValue(r.semester, 'integerIfWhole'),
    Year: formatValue(r.year, 'integerIfWhole'),
    COVID_Period: r.covidPeriod,
    Credits: formatValue(r.credits, 'integerIfWhole'),
    Grade: formatValue(r.grade, 'integerIfWhole')
  };
}
