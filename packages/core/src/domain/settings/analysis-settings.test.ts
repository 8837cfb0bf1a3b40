import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../shared/errors.js';
import { DEFAULT_SETTINGS, applySetting, normalizeSettings } from './analysis-settings.js';

describe('normalizeSettings', () => {
  it('should return defaults for non-object input', () => {
    expect(normalizeSettings(null)).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings('dark')).toEqual(DEFAULT_SETTINGS);
  });

  it('should keep valid fields and replace invalid ones with defaults', () => {
    expect(
      normalizeSettings({
        dbscanEps: 1.25,
        dbscanMinSamples: 8.5,
        denoise: 'yes',
        normalize: true,
        resultsPath: '/srv/results',
        logsPath: '   ',
        theme: 'sepia',
        extra: 42,
      }),
    ).toEqual({
      dbscanEps: 1.25,
      dbscanMinSamples: 8,
      denoise: false,
      normalize: true,
      resultsPath: '/srv/results',
      logsPath: null,
      theme: 'system',
    });
  });

  it('should reject out-of-range numbers', () => {
    const settings = normalizeSettings({ dbscanEps: 9, dbscanMinSamples: 0 });
    expect(settings.dbscanEps).toBe(0.35);
    expect(settings.dbscanMinSamples).toBe(8);
  });
});

describe('applySetting', () => {
  it('should parse numeric settings within their ranges', () => {
    expect(applySetting(DEFAULT_SETTINGS, 'eps', '0.5').dbscanEps).toBe(0.5);
    expect(applySetting(DEFAULT_SETTINGS, 'min-samples', '12').dbscanMinSamples).toBe(12);
  });

  it('should reject numbers outside their range or of the wrong kind', () => {
    expect(() => applySetting(DEFAULT_SETTINGS, 'eps', '0')).toThrow(
      'Invalid value for eps: "0" (expected a number between 0.01 and 5)',
    );
    expect(() => applySetting(DEFAULT_SETTINGS, 'min-samples', '2.5')).toThrow(ConfigError);
    expect(() => applySetting(DEFAULT_SETTINGS, 'eps', '')).toThrow(ConfigError);
  });

  it('should parse boolean flags', () => {
    expect(applySetting(DEFAULT_SETTINGS, 'denoise', 'on').denoise).toBe(true);
    expect(applySetting({ ...DEFAULT_SETTINGS, normalize: true }, 'normalize', 'FALSE').normalize).toBe(false);
    expect(() => applySetting(DEFAULT_SETTINGS, 'denoise', 'maybe')).toThrow(ConfigError);
  });

  it('should set and clear paths', () => {
    const withPath = applySetting(DEFAULT_SETTINGS, 'results-path', '/tmp/results');
    expect(withPath.resultsPath).toBe('/tmp/results');
    expect(applySetting(withPath, 'results-path', '').resultsPath).toBeNull();
  });

  it('should accept known themes only', () => {
    expect(applySetting(DEFAULT_SETTINGS, 'theme', 'Dark').theme).toBe('dark');
    expect(() => applySetting(DEFAULT_SETTINGS, 'theme', 'neon')).toThrow(ConfigError);
  });

  it('should reject unknown keys', () => {
    expect(() => applySetting(DEFAULT_SETTINGS, 'colour', 'red')).toThrow(
      'Unknown setting: colour. Valid keys: eps, min-samples, denoise, normalize, results-path, logs-path, theme',
    );
  });

  it('should leave the input settings untouched', () => {
    const before = { ...DEFAULT_SETTINGS };
    applySetting(before, 'eps', '1');
    expect(before).toEqual(DEFAULT_SETTINGS);
  });
});
