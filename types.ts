
export enum CovidPeriod {
  Pre = 'Pre',
  Post = 'Post'
}

/** One cell-per-column row as it arrives from the spreadsheet export. */
export type RawRow = Record<string, string | undefined>;

export interface GradeRecord {
  studentId: number;
  registrationYear: number | null;
  birthYear: number | null;
  gender: string;
  origin: string;
  department: string;
  majorType: string | null; // null when the source has no Major_Type column
  major: string;
  semester: number; // e.g. 20211 = 2021, first term
  credits: number | null;
  grade: number;
  year: number;
  covidPeriod: CovidPeriod;
}

export interface GradeTable {
  records: readonly GradeRecord[];
  hasMajorType: boolean;
  excludedRows: number; // rows dropped for a blank or non-numeric grade
}

export type NumericField =
  | 'studentId'
  | 'registrationYear'
  | 'birthYear'
  | 'semester'
  | 'year'
  | 'credits'
  | 'grade';

export type CategoryField = 'gender' | 'origin' | 'department' | 'majorType' | 'major' | 'covidPeriod';

export interface FilterState {
  yearRange: [number, number];
  departmentAllowlist: ReadonlySet<string>;
  majorTypeAllowlist: ReadonlySet<string>;
  selectedDepartment: string;
  selectedMajor: string;
  selectedDepartmentsForComparison: ReadonlySet<string>;
}

export interface AnalysisSettings {
  covidThresholdYear: number;
  iqrMultiplier: number;
  significanceLevel: number;
}

export interface TrendPoint {
  year: number;
  meanGrade: number;
  count: number;
}

export interface StudentRollup {
  studentId: number;
  registrationYear: number | null;
  birthYear: number | null;
  gender: string;
  origin: string;
  department: string;
  majorType: string | null;
  major: string;
  semesterCount: number;
  totalCredits: number;
  meanGrade: number;
}

export interface DataQualityIssue {
  studentId: number;
  field: keyof StudentRollup;
  values: (string | number | null)[];
}

export interface GroupRank {
  group: string;
  meanGrade: number;
  count: number;
  rank: number;
}

export interface Description {
  count: number;
  mean: number;
  std: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
}

export interface OutlierSet {
  bounds: { q1: number; q3: number; iqr: number; lower: number; upper: number };
  records: GradeRecord[];
}

export interface Comparison {
  t: number;
  df: number;
  p: number;
  meanA: number;
  meanB: number;
  nA: number;
  nB: number;
}

export interface PeriodComparison {
  pre: Description;
  post: Description;
  test: Comparison | undefined;
  preOutliers: OutlierSet | undefined;
  postOutliers: OutlierSet | undefined;
}
