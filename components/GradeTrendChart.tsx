import React from 'react';
import { LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { TrendPoint } from '../types';

const SERIES_COLORS = ['#3b82f6', '#ef4444', '#10b981', '#f59e0b', '#8b5cf6', '#ec4899', '#14b8a6', '#64748b'];

export interface TrendSeries {
  name: string;
  points: TrendPoint[];
}

export interface ChartRow {
  year: number;
  [series: string]: number;
}

/**
 * One row per year across all series. A series missing a year simply has
 * no key on that row, so the line skips it instead of dropping to zero.
 */
export function mergeSeries(series: TrendSeries[]): ChartRow[] {
  const rows = new Map<number, ChartRow>();
  for (const s of series) {
    for (const p of s.points) {
      const row: ChartRow = rows.get(p.year) ?? { year: p.year };
      row[s.name] = p.meanGrade;
      rows.set(p.year, row);
    }
  }
  return [...rows.values()].sort((a, b) => a.year - b.year);
}

interface TrendProps {
  series: TrendSeries[];
  showLegend?: boolean;
}

const GradeTrendChart: React.FC<TrendProps> = ({ series, showLegend = series.length > 1 }) => {
  const data = mergeSeries(series);

  return (
    <div className="h-64 w-full">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data} margin={{ top: 5, right: 20, bottom: 5, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
          <XAxis
            dataKey="year"
            allowDecimals={false}
            tick={{ fontSize: 12, fill: '#64748b' }}
            axisLine={false}
            tickLine={false}
          />
          <YAxis
            domain={['auto', 'auto']}
            tick={{ fontSize: 12, fill: '#64748b' }}
            tickFormatter={(v: number) => v.toFixed(1)}
            axisLine={false}
            tickLine={false}
          />
          <Tooltip
            formatter={value => (typeof value === 'number' ? value.toFixed(2) : String(value))}
            contentStyle={{ borderRadius: '8px', border: 'none', boxShadow: '0 4px 6px -1px rgb(0 0 0 / 0.1)' }}
          />
          {showLegend && <Legend wrapperStyle={{ fontSize: 12 }} />}
          {series.map((s, i) => (
            <Line
              key={s.name}
              type="monotone"
              dataKey={s.name}
              stroke={SERIES_COLORS[i % SERIES_COLORS.length]}
              strokeWidth={3}
              connectNulls
              dot={{ r: 4, fill: SERIES_COLORS[i % SERIES_COLORS.length] }}
              activeDot={{ r: 6 }}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
};

export default GradeTrendChart;
