import { describe, expect, it } from 'vitest';
import { DEMO_CSV } from '../constants';
import { CovidPeriod } from '../types';
import { SchemaError } from './errors';
import { type DatasetCache, createDatasetCache, loadGradeTable, loadUpload, parseGradeCsv } from './dataService';

describe('parseGradeCsv', () => {
  it('trims header names and skips blank lines', () => {
    const { rows, columns } = parseGradeCsv(' StudentID , Grade \n1,8\n\n2,7\n');
    expect(columns).toEqual(['StudentID', 'Grade']);
    expect(rows).toEqual([
      { StudentID: '1', Grade: '8' },
      { StudentID: '2', Grade: '7' }
    ]);
  });

  it('skips rows made only of delimiters', () => {
    const { rows } = parseGradeCsv('StudentID,Grade\n1,8\n,\n , \n2,7\n');
    expect(rows).toEqual([
      { StudentID: '1', Grade: '8' },
      { StudentID: '2', Grade: '7' }
    ]);
  });

  it('fails on an unterminated quoted field', () => {
    expect(() => parseGradeCsv('StudentID,Grade\n1,"8\n')).toThrow(SchemaError);
    expect(() => parseGradeCsv('StudentID,Grade\n1,"8\n')).toThrow(/Malformed CSV/);
  });
});

describe('loadGradeTable', () => {
  it('loads the bundled sample', () => {
    const table = loadGradeTable(DEMO_CSV);
    expect(table.records).toHaveLength(20);
    expect(table.hasMajorType).toBe(true);
    expect(table.excludedRows).toBe(0);
  });

  it('ignores blank spreadsheet rows at the end of an export', () => {
    const table = loadGradeTable(`${DEMO_CSV},,,,,,,,,,\n,,,,,,,,,,\n`);
    expect(table.records).toHaveLength(20);
    expect(table.excludedRows).toBe(0);
  });

  it('rejects an export without the required columns', () => {
    try {
      loadGradeTable('StudentID,Department,Semester,Grade\n1,CS,20201,8\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (err instanceof SchemaError) {
        expect(err.missingColumns).toEqual(['RegistrationYear', 'BirthYear', 'Gender', 'Origin', 'Major', 'Credits']);
      }
    }
  });
});

describe('createDatasetCache', () => {
  it('parses a source once and hands back the same table', () => {
    const cache = createDatasetCache();
    const first = cache.load('demo', DEMO_CSV);
    const second = cache.load('demo', 'not even csv');
    expect(second).toBe(first);
    expect(cache.has('demo')).toBe(true);
  });

  it('replaces the cached table on reload', () => {
    const cache = createDatasetCache();
    const first = cache.load('demo', DEMO_CSV);
    const reloaded = cache.reload('demo', DEMO_CSV);
    expect(reloaded).not.toBe(first);
    expect(reloaded).toEqual(first);
    expect(cache.load('demo', DEMO_CSV)).toBe(reloaded);
  });

  it('drops the cached table when a reload fails', () => {
    const cache = createDatasetCache();
    cache.load('upload', DEMO_CSV);
    expect(() => cache.reload('upload', 'StudentID\n1\n')).toThrow(SchemaError);
    expect(cache.has('upload')).toBe(false);
  });

  it('forgets everything on clear', () => {
    const cache = createDatasetCache();
    cache.load('demo', DEMO_CSV);
    cache.clear();
    expect(cache.has('demo')).toBe(false);
  });

  it('applies the configured threshold year', () => {
    const cache = createDatasetCache({ covidThresholdYear: 2023 });
    const table = cache.load('demo', DEMO_CSV);
    expect(table.records.every(r => r.covidPeriod === CovidPeriod.Pre)).toBe(true);
  });
});

describe('loadUpload', () => {
  it('returns the loaded table and caches it under the file name', () => {
    const cache = createDatasetCache();
    const result = loadUpload(cache, 'grades.csv', DEMO_CSV);
    expect(result.status).toBe('loaded');
    if (result.status === 'loaded') expect(result.table.records).toHaveLength(20);
    expect(cache.has('grades.csv')).toBe(true);
  });

  it('turns a schema failure into its message', () => {
    const result = loadUpload(createDatasetCache(), 'short.csv', 'StudentID,Grade\n1,8\n');
    expect(result).toEqual({
      status: 'rejected',
      message: 'Missing required column(s): RegistrationYear, BirthYear, Gender, Origin, Department, Major, Semester, Credits'
    });
  });

  it('reports any other failure without throwing', () => {
    const broken: DatasetCache = {
      ...createDatasetCache(),
      reload: () => {
        throw new TypeError('reader exploded');
      }
    };
    expect(loadUpload(broken, 'grades.csv', DEMO_CSV)).toEqual({ status: 'rejected', message: 'Could not load grades.csv.' });
  });
});
