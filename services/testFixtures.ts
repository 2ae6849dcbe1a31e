import type { GradeRecord, GradeTable } from '../types';
import { classifyCovidPeriod } from './schemaService';

type RecordInput = Partial<Omit<GradeRecord, 'covidPeriod'>>;

/** Builds a record; semester and period follow from `year` unless given. */
export function makeRecord(input: RecordInput = {}): GradeRecord {
  const year = input.year ?? (input.semester !== undefined ? Math.floor(input.semester / 10) : 2019);
  return {
    studentId: 1,
    registrationYear: 2018,
    birthYear: 2000,
    gender: 'F',
    origin: 'Domestic',
    department: 'CS',
    majorType: 'Bachelor',
    major: 'Software Engineering',
    semester: year * 10 + 1,
    credits: 6,
    grade: 8,
    ...input,
    year,
    covidPeriod: classifyCovidPeriod(year)
  };
}

export function makeTable(records: readonly GradeRecord[], hasMajorType = true): GradeTable {
  return { records, hasMajorType, excludedRows: 0 };
}
