import { describe as suite, expect, it } from 'vitest';
import { CovidPeriod, type TrendPoint } from '../types';
import {
  describe,
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
import { makeRecord, makeTable } from './testFixtures';

const csByYear = makeTable(
  [8.0, 8.5, 9.0, 7.5, 8.0].map((grade, i) => makeRecord({ studentId: 100 + i, year: 2018 + i, department: 'CS', grade }))
);

suite('trendByYear', () => {
  it('returns one point per year in ascending order', () => {
    expect(trendByYear(csByYear)).toEqual([
      { year: 2018, meanGrade: 8.0, count: 1 },
      { year: 2019, meanGrade: 8.5, count: 1 },
      { year: 2020, meanGrade: 9.0, count: 1 },
      { year: 2021, meanGrade: 7.5, count: 1 },
      { year: 2022, meanGrade: 8.0, count: 1 }
    ]);
  });

  it('averages within a year and omits years without rows', () => {
    const table = makeTable([
      makeRecord({ year: 2021, grade: 6 }),
      makeRecord({ year: 2018, grade: 7 }),
      makeRecord({ year: 2021, grade: 9 })
    ]);
    expect(trendByYear(table)).toEqual([
      { year: 2018, meanGrade: 7, count: 1 },
      { year: 2021, meanGrade: 7.5, count: 2 }
    ]);
  });

  it('is empty for an empty table', () => {
    expect(trendByYear(makeTable([]))).toEqual([]);
  });
});

suite('trendByYearAndCategory', () => {
  const table = makeTable([
    makeRecord({ year: 2019, department: 'CS', grade: 7 }),
    makeRecord({ year: 2019, department: 'History', grade: 8 }),
    makeRecord({ year: 2020, department: 'CS', grade: 9 }),
    makeRecord({ year: 2020, department: 'CS', grade: 8 }),
    makeRecord({ year: 2021, department: 'History', grade: 6 })
  ]);

  it('partitions the trend by category without zero-filling', () => {
    const result = trendByYearAndCategory(table, 'department');
    expect(result).toEqual(
      new Map([
        ['CS', [{ year: 2019, meanGrade: 7, count: 1 }, { year: 2020, meanGrade: 8.5, count: 2 }]],
        ['History', [{ year: 2019, meanGrade: 8, count: 1 }, { year: 2021, meanGrade: 6, count: 1 }]]
      ])
    );
  });

  it('accounts for every row exactly once', () => {
    const result = trendByYearAndCategory(table, 'department') ?? new Map<string, TrendPoint[]>();
    const total = [...result.values()].flat().reduce((sum, p) => sum + p.count, 0);
    expect(total).toBe(table.records.length);
  });

  it('returns undefined for major type when the column is absent', () => {
    expect(trendByYearAndCategory(makeTable(table.records, false), 'majorType')).toBeUndefined();
  });
});

suite('studentRollup', () => {
  it('aggregates semesters, credits and mean grade per student', () => {
    const table = makeTable([
      makeRecord({ studentId: 1, semester: 20181, credits: 6, grade: 8 }),
      makeRecord({ studentId: 2, semester: 20181, credits: 5, grade: 6 }),
      makeRecord({ studentId: 1, semester: 20182, credits: 5, grade: 9 }),
      makeRecord({ studentId: 1, semester: 20182, credits: null, grade: 7 })
    ]);
    const { rollups, issues } = studentRollup(table);
    expect(rollups.map(r => r.studentId)).toEqual([1, 2]);
    expect(rollups[0]).toMatchObject({ semesterCount: 2, totalCredits: 11, meanGrade: 8, department: 'CS' });
    expect(rollups[1]).toMatchObject({ semesterCount: 1, totalCredits: 5, meanGrade: 6 });
    expect(issues).toEqual([]);
  });

  it('reports attributes that change across a student\'s rows', () => {
    const table = makeTable([
      makeRecord({ studentId: 2, department: 'CS' }),
      makeRecord({ studentId: 2, department: 'Economics' })
    ]);
    const { rollups, issues } = studentRollup(table);
    expect(rollups[0].department).toBe('CS');
    expect(issues).toEqual([{ studentId: 2, field: 'department', values: ['CS', 'Economics'] }]);
  });
});

suite('rankByMeanGrade', () => {
  it('ranks the highest mean first and averages tied ranks', () => {
    const table = makeTable([
      makeRecord({ department: 'CS', grade: 8 }),
      makeRecord({ department: 'Economics', grade: 9 }),
      makeRecord({ department: 'History', grade: 7 }),
      makeRecord({ department: 'History', grade: 9 })
    ]);
    expect(rankByMeanGrade(table, 'department')).toEqual([
      { group: 'Economics', meanGrade: 9, count: 1, rank: 1 },
      { group: 'CS', meanGrade: 8, count: 1, rank: 2.5 },
      { group: 'History', meanGrade: 8, count: 2, rank: 2.5 }
    ]);
  });
});

suite('percentChangeSeries', () => {
  it('averages the year-over-year changes after the first year', () => {
    // +6.25%, +5.88%, -16.67%, +6.67%
    expect(percentChangeSeries(trendByYear(csByYear))).toBeCloseTo(0.533088, 5);
  });

  it('is exactly zero for a constant series', () => {
    const flat = [2018, 2019, 2020].map(year => ({ year, meanGrade: 7.5, count: 3 }));
    expect(percentChangeSeries(flat)).toBe(0);
  });

  it('is undefined with fewer than two years', () => {
    expect(percentChangeSeries([{ year: 2020, meanGrade: 8, count: 1 }])).toBeUndefined();
    expect(percentChangeSeries([])).toBeUndefined();
  });

  it('is undefined when a previous mean is zero', () => {
    expect(percentChangeSeries([
      { year: 2020, meanGrade: 0, count: 1 },
      { year: 2021, meanGrade: 5, count: 1 }
    ])).toBeUndefined();
  });
});

suite('overallChange and peakYear', () => {
  it('measures first to last year', () => {
    expect(overallChange(trendByYear(csByYear))).toBe(0);
    expect(overallChange([{ year: 2018, meanGrade: 8, count: 1 }, { year: 2022, meanGrade: 9, count: 1 }])).toBe(12.5);
    expect(overallChange([])).toBeUndefined();
  });

  it('picks the highest mean, earliest year on ties', () => {
    expect(peakYear(trendByYear(csByYear))).toEqual({ year: 2020, meanGrade: 9, count: 1 });
    expect(peakYear([
      { year: 2019, meanGrade: 8, count: 1 },
      { year: 2021, meanGrade: 8, count: 1 }
    ])?.year).toBe(2019);
    expect(peakYear([])).toBeUndefined();
  });
});

suite('iqrOutliers', () => {
  const table = makeTable([1, 7, 7.5, 8, 8.5, 9, 15].map((grade, i) => makeRecord({ studentId: i, grade })));

  it('flags grades outside the 1.5 IQR fences', () => {
    const result = iqrOutliers(table);
    expect(result?.bounds).toEqual({ q1: 7.25, q3: 8.75, iqr: 1.5, lower: 5, upper: 11 });
    expect(result?.records.map(r => r.grade)).toEqual([1, 15]);
  });

  it('returns a subset of the input with repeatable bounds', () => {
    const first = iqrOutliers(table);
    const second = iqrOutliers(table);
    expect(second?.bounds).toEqual(first?.bounds);
    for (const r of first?.records ?? []) expect(table.records).toContain(r);
  });

  it('widens the fences with a larger multiplier', () => {
    expect(iqrOutliers(table, 5)?.records).toEqual([]);
  });

  it('is undefined for an empty partition', () => {
    expect(iqrOutliers(makeTable([]))).toBeUndefined();
  });
});

suite('twoSampleComparison', () => {
  const a = [7.0, 7.5, 8.0, 6.5];
  const b = [8.0, 8.5, 9.0, 7.5, 8.0, 9.5];

  it('negates t and keeps p when the samples are swapped', () => {
    const ab = twoSampleComparison(a, b);
    const ba = twoSampleComparison(b, a);
    expect(ab && ba).toBeTruthy();
    expect(ba?.t).toBe(-(ab?.t ?? NaN));
    expect(ba?.p).toBe(ab?.p);
  });

  it('reports group means and sizes', () => {
    const result = twoSampleComparison(a, b);
    expect(result).toMatchObject({ meanA: 7.25, nA: 4, nB: 6 });
    expect(result?.meanB).toBeCloseTo(8.416667, 6);
  });

  it('gives t near 0 and p near 1 for identical groups', () => {
    const result = twoSampleComparison([7, 8, 9], [7, 8, 9]);
    expect(result?.t).toBeCloseTo(0, 10);
    expect(result?.p).toBeCloseTo(1, 10);
  });

  it('is undefined below two observations per group', () => {
    expect(twoSampleComparison([8], [7, 9])).toBeUndefined();
    expect(twoSampleComparison([7, 9], [])).toBeUndefined();
  });
});

suite('describe', () => {
  it('summarises a column with sample std and linear percentiles', () => {
    const d = describe([4, 1, 3, 2]);
    expect(d.count).toBe(4);
    expect(d.mean).toBe(2.5);
    expect(d.std).toBeCloseTo(1.290994, 6);
    expect(d).toMatchObject({ min: 1, q1: 1.75, median: 2.5, q3: 3.25, max: 4 });
  });

  it('has NaN std for a single value', () => {
    const d = describe([8]);
    expect(d.count).toBe(1);
    expect(d.std).toBeNaN();
    expect(d).toMatchObject({ mean: 8, min: 8, q1: 8, median: 8, q3: 8, max: 8 });
  });

  it('is all NaN for no values', () => {
    const d = describe([]);
    expect(d.count).toBe(0);
    expect(d.mean).toBeNaN();
    expect(d.max).toBeNaN();
  });
});

suite('partitionByPeriod', () => {
  it('splits on the record period', () => {
    const { pre, post } = partitionByPeriod(csByYear);
    expect(pre.records.map(r => r.year)).toEqual([2018, 2019]);
    expect(post.records.map(r => r.year)).toEqual([2020, 2021, 2022]);
    expect(post.records.every(r => r.covidPeriod === CovidPeriod.Post)).toBe(true);
  });
});
