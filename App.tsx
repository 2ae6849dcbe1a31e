import React, { useState, useMemo, useRef } from 'react';
import type { AnalysisSettings, FilterState, GradeTable, PeriodComparison, TrendPoint } from './types';
import { DEMO_CSV, DEMO_SOURCE_KEY } from './constants';
import { createDatasetCache, loadUpload } from './services/dataService';
import { buildDashboard, createInitialFilters } from './services/dashboardService';
import { distinctValues, yearBounds } from './services/filterService';
import { loadSettings } from './services/config';
import { createLogger } from './services/logger';
import {
  RECORD_COLUMNS,
  formatComparison,
  formatDescription,
  formatPeak,
  formatRecordRow,
  formatValue
} from './services/formatService';
import GradeTrendChart, { type TrendSeries } from './components/GradeTrendChart';
import FilterPanel, { type FilterOptions } from './components/FilterPanel';
import SettingsPanel from './components/SettingsPanel';
import SignificanceBadge from './components/SignificanceBadge';
import SummaryTable from './components/SummaryTable';
import ViewNotice from './components/ViewNotice';

const log = createLogger('app');

const MAX_TABLE_ROWS = 100;

function toSeries(byCategory: Map<string, TrendPoint[]>): TrendSeries[] {
  return [...byCategory.entries()].map(([name, points]) => ({ name, points }));
}

const Card: React.FC<{ title: string; children: React.ReactNode }> = ({ title, children }) => (
  <div className="bg-white p-6 rounded-3xl shadow-sm border border-slate-200">
    <h2 className="text-[10px] font-black text-slate-900 uppercase tracking-widest mb-4">{title}</h2>
    {children}
  </div>
);

const Stat: React.FC<{ label: string; value: string; accent: string }> = ({ label, value, accent }) => (
  <div className="bg-white p-6 rounded-3xl shadow-sm border border-slate-200 hover:shadow-md transition-shadow">
    <p className="text-[10px] text-slate-500 font-black uppercase tracking-widest mb-2">{label}</p>
    <p className={`text-3xl font-black leading-none ${accent}`}>{value}</p>
  </div>
);

const PeriodPanels: React.FC<{ comparison: PeriodComparison; alpha: number }> = ({ comparison, alpha }) => (
  <>
    <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
      <SummaryTable title="Pre-COVID grades" rows={formatDescription(comparison.pre)} />
      <SummaryTable title="Post-COVID grades" rows={formatDescription(comparison.post)} />
      <div className="space-y-3">
        <SummaryTable title="Welch t-test (Pre vs Post)" rows={formatComparison(comparison.test)} />
        <SignificanceBadge comparison={comparison.test} alpha={alpha} />
      </div>
    </div>

    <Card title="Outliers by period">
      <table className="w-full text-left text-sm border-collapse">
        <thead>
          <tr className="text-slate-500 text-[10px] font-black uppercase tracking-widest border-b border-slate-100">
            <th className="py-2">Period</th>
            <th className="py-2 text-center">Lower bound</th>
            <th className="py-2 text-center">Upper bound</th>
            <th className="py-2 text-right">Outliers</th>
          </tr>
        </thead>
        <tbody className="divide-y divide-slate-100">
          {([['Pre', comparison.preOutliers], ['Post', comparison.postOutliers]] as const).map(([label, set]) => (
            <tr key={label}>
              <td className="py-2 font-black text-slate-800">{label}</td>
              <td className="py-2 text-center">{formatValue(set?.bounds.lower, 'fixed2')}</td>
              <td className="py-2 text-center">{formatValue(set?.bounds.upper, 'fixed2')}</td>
              <td className="py-2 text-right font-black">{formatValue(set?.records.length, 'integerIfWhole')}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </Card>
  </>
);

const App: React.FC = () => {
  const cache = useRef(createDatasetCache());
  const fileInputRef = useRef<HTMLInputElement>(null);

  const [table, setTable] = useState<GradeTable | null>(() => {
    try {
      return cache.current.load(DEMO_SOURCE_KEY, DEMO_CSV);
    } catch (err) {
      log.error('Demo dataset failed to load', err);
      return null;
    }
  });
  const [sourceName, setSourceName] = useState('Demo dataset');
  const [filters, setFilters] = useState<FilterState | null>(() => (table ? createInitialFilters(table) : null));
  const [settings, setSettings] = useState<AnalysisSettings>(loadSettings);
  const [error, setError] = useState<string | null>(null);

  const options: FilterOptions | null = useMemo(() => {
    if (!table) return null;
    return {
      yearBounds: yearBounds(table) ?? [0, 0],
      departments: distinctValues(table, 'department'),
      majorTypes: distinctValues(table, 'majorType'),
      majors: distinctValues(table, 'major'),
      hasMajorType: table.hasMajorType
    };
  }, [table]);

  const views = useMemo(() => {
    if (!table || !filters) return null;
    return buildDashboard(table, filters, settings);
  }, [table, filters, settings]);

  const handleFileUpload = (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;
    const reader = new FileReader();
    reader.onload = (e) => {
      const text = e.target?.result;
      if (typeof text !== 'string') return;
      const result = loadUpload(cache.current, file.name, text);
      if (result.status === 'loaded') {
        setTable(result.table);
        setFilters(createInitialFilters(result.table));
        setSourceName(file.name);
        setError(null);
      } else {
        setError(result.message);
      }
      if (fileInputRef.current) fileInputRef.current.value = '';
    };
    reader.readAsText(file);
  };

  return (
    <div className="min-h-screen flex flex-col bg-slate-50">
      <header className="bg-slate-900 text-white p-4 sticky top-0 z-50 shadow-xl">
        <div className="max-w-7xl mx-auto flex flex-col md:flex-row justify-between items-center gap-4">
          <div>
            <h1 className="text-xl font-black tracking-tighter">Grade Inflation Dashboard</h1>
            <p className="text-[9px] text-slate-400 uppercase tracking-widest font-bold">{sourceName}</p>
          </div>
          <div className="flex items-center gap-3">
            <input type="file" ref={fileInputRef} onChange={handleFileUpload} className="hidden" accept=".csv" />
            <button
              onClick={() => fileInputRef.current?.click()}
              className="bg-blue-600 hover:bg-blue-700 text-white px-4 py-2 rounded-xl text-xs font-black uppercase tracking-widest shadow-lg transition-all"
            >
              Load Grade CSV
            </button>
          </div>
        </div>
      </header>

      {error && (
        <div role="alert" className="max-w-7xl mx-auto w-full mt-4 px-4">
          <div className="bg-red-50 border border-red-200 text-red-700 rounded-2xl p-4 text-sm font-bold">{error}</div>
        </div>
      )}

      {views && filters && options ? (
        <main className="flex-1 max-w-7xl mx-auto w-full p-4 lg:p-6 grid grid-cols-1 lg:grid-cols-12 gap-8">
          <div className="col-span-12 lg:col-span-8 space-y-6">
            <div className="grid grid-cols-1 md:grid-cols-4 gap-6">
              <Stat label="Average grade" value={formatValue(views.gradeSummary.mean, 'fixed2')} accent="text-slate-900" />
              <Stat label="Avg yearly change" value={formatValue(views.inflationRate, 'percentString')} accent="text-red-600" />
              <Stat label="Overall change" value={formatValue(views.overallChange, 'percentString')} accent="text-indigo-600" />
              <Stat label="Peak year" value={formatPeak(views.peak)} accent="text-blue-600" />
            </div>

            <Card title="Trend of average grades">
              {views.overallTrend.status === 'ok'
                ? <GradeTrendChart series={[{ name: 'Average grade', points: views.overallTrend.value }]} />
                : <ViewNotice warning={views.overallTrend.warning} />}
            </Card>

            <Card title={`Average grade trend for ${filters.selectedDepartment}`}>
              {views.departmentTrend.status === 'ok'
                ? <GradeTrendChart series={[{ name: filters.selectedDepartment, points: views.departmentTrend.value }]} />
                : <ViewNotice warning={views.departmentTrend.warning} />}
            </Card>

            <Card title={`Average grade trend for ${filters.selectedMajor}`}>
              {views.majorTrend.status === 'ok'
                ? <GradeTrendChart series={[{ name: filters.selectedMajor, points: views.majorTrend.value }]} />
                : <ViewNotice warning={views.majorTrend.warning} />}
            </Card>

            <Card title="Average grade per major type">
              {views.majorTypeTrends.status === 'ok'
                ? <GradeTrendChart series={toSeries(views.majorTypeTrends.value)} />
                : <ViewNotice warning={views.majorTypeTrends.warning} />}
            </Card>

            <Card title="Average grade by gender">
              {views.genderTrends.status === 'ok'
                ? <GradeTrendChart series={toSeries(views.genderTrends.value)} />
                : <ViewNotice warning={views.genderTrends.warning} />}
            </Card>

            <Card title="Department comparison">
              {views.departmentComparison.status === 'ok'
                ? <GradeTrendChart series={toSeries(views.departmentComparison.value)} />
                : <ViewNotice warning={views.departmentComparison.warning} />}
            </Card>

            {views.periodComparison.status === 'ok' ? (
              <PeriodPanels comparison={views.periodComparison.value} alpha={settings.significanceLevel} />
            ) : (
              <Card title="Pre vs Post COVID">
                <ViewNotice warning={views.periodComparison.warning} />
              </Card>
            )}

            <Card title="Department ranking">
              <table className="w-full text-left text-sm border-collapse">
                <thead>
                  <tr className="text-slate-500 text-[10px] font-black uppercase tracking-widest border-b border-slate-100">
                    <th className="py-2">Rank</th>
                    <th className="py-2">Department</th>
                    <th className="py-2 text-right">Mean grade</th>
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {views.departmentRanking.map(r => (
                    <tr key={r.group}>
                      <td className="py-2 font-black">{formatValue(r.rank, 'rankAsInt')}</td>
                      <td className="py-2">{r.group}</td>
                      <td className="py-2 text-right">{formatValue(r.meanGrade, 'fixed2')}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
            </Card>

            <Card title={`Students (${views.students.rollups.length})`}>
              {views.students.issues.length > 0 && (
                <p className="mb-3 text-xs font-bold text-orange-600">
                  {views.students.issues.length} attribute conflict(s) found; first-seen values are shown.
                </p>
              )}
              <div className="overflow-x-auto">
                <table className="w-full text-left text-sm border-collapse">
                  <thead>
                    <tr className="text-slate-500 text-[10px] font-black uppercase tracking-widest border-b border-slate-100">
                      <th className="py-2">Student</th>
                      <th className="py-2">Department</th>
                      <th className="py-2">Major</th>
                      <th className="py-2 text-center">Semesters</th>
                      <th className="py-2 text-center">Credits</th>
                      <th className="py-2 text-right">Mean grade</th>
                    </tr>
                  </thead>
                  <tbody className="divide-y divide-slate-100">
                    {views.students.rollups.slice(0, MAX_TABLE_ROWS).map(s => (
                      <tr key={s.studentId}>
                        <td className="py-2 font-black">{formatValue(s.studentId, 'integerIfWhole')}</td>
                        <td className="py-2">{s.department}</td>
                        <td className="py-2">{s.major}</td>
                        <td className="py-2 text-center">{s.semesterCount}</td>
                        <td className="py-2 text-center">{formatValue(s.totalCredits, 'integerIfWhole')}</td>
                        <td className="py-2 text-right">{formatValue(s.meanGrade, 'fixed2')}</td>
                      </tr>
                    ))}
                  </tbody>
                </table>
              </div>
            </Card>

            <Card title={`Filtered data (${views.filtered.records.length} rows)`}>
              <div className="overflow-x-auto">
                <table className="w-full text-left text-xs border-collapse">
                  <thead>
                    <tr className="text-slate-500 text-[10px] font-black uppercase tracking-widest border-b border-slate-100">
                      {RECORD_COLUMNS.map(c => <th key={c} className="py-2 pr-4">{c}</th>)}
                    </tr>
                  </thead>
                  <tbody className="divide-y divide-slate-100">
                    {views.filtered.records.slice(0, MAX_TABLE_ROWS).map((r, i) => {
                      const row = formatRecordRow(r);
                      return (
                        <tr key={i}>
                          {RECORD_COLUMNS.map(c => <td key={c} className="py-1.5 pr-4">{row[c]}</td>)}
                        </tr>
                      );
                    })}
                  </tbody>
                </table>
              </div>
            </Card>
          </div>

          <div className="col-span-12 lg:col-span-4 space-y-6">
            <FilterPanel filters={filters} options={options} onChange={setFilters} />
            <SettingsPanel settings={settings} onUpdate={setSettings} />
          </div>
        </main>
      ) : (
        <main className="flex-1 flex items-center justify-center p-20 text-slate-400 font-black uppercase tracking-widest">
          Load a grade CSV to begin
        </main>
      )}
    </div>
  );
};

export default App;
