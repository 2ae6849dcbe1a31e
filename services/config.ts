import { z } from 'zod';
import type { AnalysisSettings } from '../types';
import { DEFAULT_SETTINGS } from '../constants';
import { createLogger } from './logger';

const log = createLogger('config');

const envNumber = z
  .string()
  .trim()
  .min(1)
  .transform(Number)
  .pipe(z.number().finite());

const settingsEnvSchema = z.object({
  VITE_COVID_THRESHOLD_YEAR: envNumber.pipe(z.number().int().min(1900).max(2100)).optional(),
  VITE_IQR_MULTIPLIER: envNumber.pipe(z.number().positive()).optional(),
  VITE_SIGNIFICANCE_LEVEL: envNumber.pipe(z.number().gt(0).lt(1)).optional()
});

export type SettingsEnv = Partial<Record<keyof z.input<typeof settingsEnvSchema>, string>>;

/**
 * Builds analysis settings from env overrides. Each invalid variable is
 * logged and falls back to its default; the others still apply.
 */
export function resolveSettings(env: SettingsEnv, defaults: AnalysisSettings = DEFAULT_SETTINGS): AnalysisSettings {
  const settings: AnalysisSettings = { ...defaults };
  const shape = settingsEnvSchema.shape;

  const year = shape.VITE_COVID_THRESHOLD_YEAR.safeParse(env.VITE_COVID_THRESHOLD_YEAR);
  if (year.success) {
    if (year.data !== undefined) settings.covidThresholdYear = year.data;
  } else {
    log.warn('Ignoring invalid VITE_COVID_THRESHOLD_YEAR', { value: env.VITE_COVID_THRESHOLD_YEAR });
  }

  const multiplier = shape.VITE_IQR_MULTIPLIER.safeParse(env.VITE_IQR_MULTIPLIER);
  if (multiplier.success) {
    if (multiplier.data !== undefined) settings.iqrMultiplier = multiplier.data;
  } else {
    log.warn('Ignoring invalid VITE_IQR_MULTIPLIER', { value: env.VITE_IQR_MULTIPLIER });
  }

  const alpha = shape.VITE_SIGNIFICANCE_LEVEL.safeParse(env.VITE_SIGNIFICANCE_LEVEL);
  if (alpha.success) {
    if (alpha.data !== undefined) settings.significanceLevel = alpha.data;
  } else {
    log.warn('Ignoring invalid VITE_SIGNIFICANCE_LEVEL', { value: env.VITE_SIGNIFICANCE_LEVEL });
  }

  return settings;
}

export function loadSettings(): AnalysisSettings {
  return resolveSettings({
    VITE_COVID_THRESHOLD_YEAR: import.meta.env.VITE_COVID_THRESHOLD_YEAR,
    VITE_IQR_MULTIPLIER: import.meta.env.VITE_IQR_MULTIPLIER,
    VITE_SIGNIFICANCE_LEVEL: import.meta.env.VITE_SIGNIFICANCE_LEVEL
  });
}
