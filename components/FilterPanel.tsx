import React from 'react';
import type { FilterState } from '../types';

export interface FilterOptions {
  yearBounds: [number, number];
  departments: string[];
  majorTypes: string[];
  majors: string[];
  hasMajorType: boolean;
}

interface FilterPanelProps {
  filters: FilterState;
  options: FilterOptions;
  onChange: (next: FilterState) => void;
}

export function toggleValue(set: ReadonlySet<string>, value: string): Set<string> {
  const next = new Set(set);
  if (next.has(value)) {
    next.delete(value);
  } else {
    next.add(value);
  }
  return next;
}

interface CheckboxGroupProps {
  legend: string;
  values: string[];
  selected: ReadonlySet<string>;
  onToggle: (value: string) => void;
}

const CheckboxGroup: React.FC<CheckboxGroupProps> = ({ legend, values, selected, onToggle }) => (
  <fieldset>
    <legend className="text-[10px] font-black text-slate-500 uppercase tracking-widest mb-2">{legend}</legend>
    <div className="flex flex-wrap gap-2">
      {values.map(v => (
        <label key={v} className="flex items-center gap-1.5 text-xs font-bold text-slate-700 bg-slate-50 border border-slate-200 rounded-lg px-2 py-1 cursor-pointer">
          <input type="checkbox" checked={selected.has(v)} onChange={() => onToggle(v)} className="accent-blue-600" />
          {v}
        </label>
      ))}
    </div>
  </fieldset>
);

const FilterPanel: React.FC<FilterPanelProps> = ({ filters, options, onChange }) => {
  const [minYear, maxYear] = options.yearBounds;

  const setYear = (index: 0 | 1, value: string) => {
    const year = parseInt(value, 10);
    if (Number.isNaN(year)) return;
    const yearRange: [number, number] = index === 0 ? [year, filters.yearRange[1]] : [filters.yearRange[0], year];
    onChange({ ...filters, yearRange });
  };

  return (
    <div className="bg-white p-6 rounded-3xl shadow-sm border border-slate-200 space-y-6">
      <h3 className="text-xs font-black text-slate-900 uppercase tracking-widest">Filters</h3>

      <div className="grid grid-cols-2 gap-3">
        <label className="text-[10px] font-black text-slate-500 uppercase tracking-widest">
          From year
          <input
            type="number"
            min={minYear}
            max={maxYear}
            value={filters.yearRange[0]}
            onChange={(e) => setYear(0, e.target.value)}
            className="mt-1 w-full border border-slate-200 rounded-xl px-3 py-2 text-sm font-bold text-slate-800"
          />
        </label>
        <label className="text-[10px] font-black text-slate-500 uppercase tracking-widest">
          To year
          <input
            type="number"
            min={minYear}
            max={maxYear}
            value={filters.yearRange[1]}
            onChange={(e) => setYear(1, e.target.value)}
            className="mt-1 w-full border border-slate-200 rounded-xl px-3 py-2 text-sm font-bold text-slate-800"
          />
        </label>
      </div>

      <CheckboxGroup
        legend="Departments"
        values={options.departments}
        selected={filters.departmentAllowlist}
        onToggle={v => onChange({ ...filters, departmentAllowlist: toggleValue(filters.departmentAllowlist, v) })}
      />

      {options.hasMajorType && (
        <CheckboxGroup
          legend="Major types"
          values={options.majorTypes}
          selected={filters.majorTypeAllowlist}
          onToggle={v => onChange({ ...filters, majorTypeAllowlist: toggleValue(filters.majorTypeAllowlist, v) })}
        />
      )}

      <label className="block text-[10px] font-black text-slate-500 uppercase tracking-widest">
        Department trend
        <select
          value={filters.selectedDepartment}
          onChange={(e) => onChange({ ...filters, selectedDepartment: e.target.value })}
          className="mt-1 w-full border border-slate-200 rounded-xl px-3 py-2 text-sm font-bold text-slate-800"
        >
          {options.departments.map(d => <option key={d} value={d}>{d}</option>)}
        </select>
      </label>

      <label className="block text-[10px] font-black text-slate-500 uppercase tracking-widest">
        Major trend
        <select
          value={filters.selectedMajor}
          onChange={(e) => onChange({ ...filters, selectedMajor: e.target.value })}
          className="mt-1 w-full border border-slate-200 rounded-xl px-3 py-2 text-sm font-bold text-slate-800"
        >
          {options.majors.map(m => <option key={m} value={m}>{m}</option>)}
        </select>
      </label>

      <CheckboxGroup
        legend="Compare departments"
        values={options.departments}
        selected={filters.selectedDepartmentsForComparison}
        onToggle={v => onChange({
          ...filters,
          selectedDepartmentsForComparison: toggleValue(filters.selectedDepartmentsForComparison, v)
        })}
      />
    </div>
  );
};

export default FilterPanel;
