import { ConfigError } from '../../shared/errors.js';

export type Theme = 'light' | 'dark' | 'system';

export const THEMES: readonly Theme[] = ['light', 'dark', 'system'];

export interface AnalysisSettings {
  dbscanEps: number;
  dbscanMinSamples: number;
  denoise: boolean;
  normalize: boolean;
  /** `null` means the default location under the data directory. */
  resultsPath: string | null;
  logsPath: string | null;
  theme: Theme;
}

export const EPS_RANGE = { min: 0.01, max: 5 } as const;
export const MIN_SAMPLES_RANGE = { min: 1, max: 100 } as const;

export const DEFAULT_SETTINGS: AnalysisSettings = {
  dbscanEps: 0.35,
  dbscanMinSamples: 8,
  denoise: false,
  normalize: false,
  resultsPath: null,
  logsPath: null,
  theme: 'system',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTheme(value: unknown): value is Theme {
  return typeof value === 'string' && (THEMES as readonly string[]).includes(value);
}

function inRange(value: unknown, range: { min: number; max: number }): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= range.min && value <= range.max;
}

function optionalPath(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

/** Reads stored settings field by field; anything missing or invalid falls back to its default. */
export function normalizeSettings(data: unknown): AnalysisSettings {
  if (!isRecord(data)) {
    return { ...DEFAULT_SETTINGS };
  }
  return {
    dbscanEps: inRange(data.dbscanEps, EPS_RANGE) ? data.dbscanEps : DEFAULT_SETTINGS.dbscanEps,
    dbscanMinSamples:
      inRange(data.dbscanMinSamples, MIN_SAMPLES_RANGE) && Number.isInteger(data.dbscanMinSamples)
        ? data.dbscanMinSamples
        : DEFAULT_SETTINGS.dbscanMinSamples,
    denoise: typeof data.denoise === 'boolean' ? data.denoise : DEFAULT_SETTINGS.denoise,
    normalize: typeof data.normalize === 'boolean' ? data.normalize : DEFAULT_SETTINGS.normalize,
    resultsPath: optionalPath(data.resultsPath),
    logsPath: optionalPath(data.logsPath),
    theme: isTheme(data.theme) ? data.theme : DEFAULT_SETTINGS.theme,
  };
}

export const SETTING_KEYS = ['eps', 'min-samples', 'denoise', 'normalize', 'results-path', 'logs-path', 'theme'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

export function isSettingKey(value: string): value is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(value);
}

function parseBoolean(key: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (['true', 'on', 'yes', '1'].includes(value)) return true;
  if (['false', 'off', 'no', '0'].includes(value)) return false;
  throw new ConfigError(`Invalid value for ${key}: "${raw}" (expected true or false)`);
}

function parseNumber(key: string, raw: string, range: { min: number; max: number }, integer: boolean): number {
  const value = Number(raw);
  if (!raw.trim() || !inRange(value, range) || (integer && !Number.isInteger(value))) {
    const kind = integer ? 'an integer' : 'a number';
    throw new ConfigError(`Invalid value for ${key}: "${raw}" (expected ${kind} between ${range.min} and ${range.max})`);
  }
  return value;
}

/** Returns a copy of `settings` with one CLI-style key updated. */
export function applySetting(settings: AnalysisSettings, key: string, raw: string): AnalysisSettings {
  if (!isSettingKey(key)) {
    throw new ConfigError(`Unknown setting: ${key}. Valid keys: ${SETTING_KEYS.join(', ')}`);
  }
  switch (key) {
    case 'eps':
      return { ...settings, dbscanEps: parseNumber(key, raw, EPS_RANGE, false) };
    case 'min-samples':
      return { ...settings, dbscanMinSamples: parseNumber(key, raw, MIN_SAMPLES_RANGE, true) };
    case 'denoise':
      return { ...settings, denoise: parseBoolean(key, raw) };
    case 'normalize':
      return { ...settings, normalize: parseBoolean(key, raw) };
    case 'results-path':
      return { ...settings, resultsPath: optionalPath(raw) };
    case 'logs-path':
      return { ...settings, logsPath: optionalPath(raw) };
    case 'theme': {
      const theme = raw.trim().toLowerCase();
      if (!isTheme(theme)) {
        throw new ConfigError(`Invalid value for theme: "${raw}" (expected one of ${THEMES.join(', ')})`);
      }
      return { ...settings, theme };
    }
  }
}
