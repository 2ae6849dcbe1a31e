import React from 'react';
import type { AnalysisSettings } from '../types';

interface SettingsProps {
  settings: AnalysisSettings;
  onUpdate: (next: AnalysisSettings) => void;
}

interface SliderSpec {
  key: keyof AnalysisSettings;
  label: string;
  min: number;
  max: number;
  step: number;
  digits: number;
}

const SLIDERS: SliderSpec[] = [
  { key: 'covidThresholdYear', label: 'COVID threshold year', min: 2015, max: 2025, step: 1, digits: 0 },
  { key: 'iqrMultiplier', label: 'Outlier IQR multiplier', min: 0.5, max: 3, step: 0.1, digits: 1 },
  { key: 'significanceLevel', label: 'Significance level', min: 0.01, max: 0.1, step: 0.01, digits: 2 }
];

const SettingsPanel: React.FC<SettingsProps> = ({ settings, onUpdate }) => {
  const handleChange = (key: keyof AnalysisSettings, val: string) => {
    const parsed = parseFloat(val);
    if (Number.isNaN(parsed)) return;
    onUpdate({ ...settings, [key]: parsed });
  };

  return (
    <div className="bg-white p-6 rounded-xl shadow-sm border border-slate-200">
      <h3 className="text-lg font-bold mb-4">Analysis Settings</h3>
      <div className="space-y-6">
        {SLIDERS.map(({ key, label, min, max, step, digits }) => (
          <div key={key}>
            <div className="flex justify-between mb-2">
              <label htmlFor={`setting-${key}`} className="text-sm font-medium text-slate-700">
                {label}
              </label>
              <span className="text-sm font-bold text-blue-600">{settings[key].toFixed(digits)}</span>
            </div>
            <input
              id={`setting-${key}`}
              type="range"
              min={min}
              max={max}
              step={step}
              value={settings[key]}
              onChange={(e) => handleChange(key, e.target.value)}
              className="w-full h-2 bg-slate-200 rounded-lg appearance-none cursor-pointer accent-blue-600"
            />
          </div>
        ))}
      </div>
      <div className="mt-8 p-4 bg-blue-50 rounded-lg border border-blue-100 text-xs text-blue-800">
        <p className="font-bold mb-1">How it works:</p>
        Years before the threshold count as Pre-COVID. Grades beyond the multiplier times the
        interquartile range of their own period are listed as outliers.
      </div>
    </div>
  );
};

export default SettingsPanel;
