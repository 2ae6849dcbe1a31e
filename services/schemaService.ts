import { z } from 'zod';
import { CovidPeriod, type GradeRecord, type GradeTable, type RawRow } from '../types';
import { DEFAULT_SETTINGS, MAJOR_TYPE_COLUMN, REQUIRED_COLUMNS } from '../constants';
import { SchemaError } from './errors';
import { createLogger } from './logger';

const log = createLogger('schema');

const cell = z
  .string()
  .optional()
  .transform(v => (v ?? '').trim());

const requiredText = cell.pipe(z.string().min(1, 'must not be blank'));

const requiredNumber = requiredText
  .transform(Number)
  .pipe(z.number({ invalid_type_error: 'must be numeric' }).finite('must be numeric'));

const nullableNumber = cell
  .transform(v => (v === '' ? null : Number(v)))
  .pipe(z.number().finite('must be numeric').nullable());

const rowSchema = z.object({
  StudentID: requiredNumber,
  RegistrationYear: nullableNumber,
  BirthYear: nullableNumber,
  Gender: cell,
  Origin: cell,
  Department: requiredText,
  Major_Type: cell,
  Major: requiredText,
  Credits: nullableNumber
});

export function assertColumns(columns: readonly string[]): void {
  const present = new Set(columns.map(c => c.trim()));
  const missing = REQUIRED_COLUMNS.filter(c => !present.has(c));
  if (missing.length > 0) {
    throw new SchemaError(`Missing required column(s): ${missing.join(', ')}`, { missingColumns: missing });
  }
}

export function deriveYear(semester: number): number {
  if (!Number.isInteger(semester)) {
    throw new SchemaError(`Semester code ${semester} is not an integer`);
  }
  return Math.floor(semester / 10);
}

export function classifyCovidPeriod(year: number, thresholdYear: number = DEFAULT_SETTINGS.covidThresholdYear): CovidPeriod {
  return year < thresholdYear ? CovidPeriod.Pre : CovidPeriod.Post;
}

function parseSemester(value: string | undefined, row: number): number {
  const text = (value ?? '').trim();
  const semester = Number(text);
  if (text === '' || !Number.isInteger(semester)) {
    throw new SchemaError(`Row ${row}: Semester "${text}" is missing or not an integer`, { row });
  }
  return semester;
}

function parseGrade(value: string | undefined): number | null {
  const text = (value ?? '').trim();
  if (text === '') return null;
  const grade = Number(text);
  return Number.isFinite(grade) ? grade : null;
}

export interface NormalizeOptions {
  covidThresholdYear?: number;
}

/**
 * Turns raw spreadsheet rows into typed records with the derived Year and
 * COVID period. Every row is validated first; rows that pass but have no
 * usable grade are then dropped and counted.
 */
export function normalizeRows(rows: readonly RawRow[], columns: readonly string[], options: NormalizeOptions = {}): GradeTable {
  assertColumns(columns);
  const hasMajorType = columns.some(c => c.trim() === MAJOR_TYPE_COLUMN);
  const threshold = options.covidThresholdYear ?? DEFAULT_SETTINGS.covidThresholdYear;

  const records: GradeRecord[] = [];
  let excludedRows = 0;

  rows.forEach((raw, index) => {
    const rowNumber = index + 1;
    const semester = parseSemester(raw.Semester, rowNumber);
    const year = deriveYear(semester);

    const parsed = rowSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SchemaError(`Row ${rowNumber}: ${issue.path.join('.')} ${issue.message}`, { row: rowNumber });
    }
    const r = parsed.data;

    const grade = parseGrade(raw.Grade);
    if (grade === null) {
      excludedRows++;
      return;
    }

    records.push({
      studentId: r.StudentID,
      registrationYear: r.RegistrationYear,
      birthYear: r.BirthYear,
      gender: r.Gender,
      origin: r.Origin,
      department: r.Department,
      majorType: hasMajorType ? r.Major_Type : null,
      major: r.Major,
      semester,
      credits: r.Credits,
      grade,
      year,
      covidPeriod: classifyCovidPeriod(year, threshold)
    });
  });

  if (excludedRows > 0) {
    log.warn('Excluded rows without a numeric grade', { excludedRows });
  }
  log.debug('Normalized grade table', { records: records.length, hasMajorType });

  return { records, hasMajorType, excludedRows };
}

/** Same records, periods reclassified against a different threshold year. */
export function withCovidThreshold(table: GradeTable, thresholdYear: number): GradeTable {
  return {
    ...table,
    records: table.records.map(r => ({ ...r, covidPeriod: classifyCovidPeriod(r.year, thresholdYear) }))
  };
}
