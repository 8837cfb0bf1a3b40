import { join } from 'node:path';
import { DEFAULT_STAGE_DELAY_MS } from '../domain/analysis/stages.js';
import {
  DEFAULT_SETTINGS,
  applySetting,
  type AnalysisSettings,
} from '../domain/settings/analysis-settings.js';
import type { SettingsStore } from '../ports/settings-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export const LOG_FILE_NAME = 'app.log';

export interface AnalysisConfig {
  resultsDir: string;
  logsDir: string;
  logFile: string;
  stageDelayMs: number;
  settings: AnalysisSettings;
}

function parseDelay(raw: string): number {
  const value = Number(raw);
  if (!raw.trim() || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`SETI_STAGE_DELAY_MS must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export class ConfigService {
  constructor(
    private settingsStore: SettingsStore,
    private dataDir: string,
  ) {}

  async resolve(): Promise<AnalysisConfig> {
    // Environment variables take precedence over stored settings
    const envResultsDir = process.env.SETI_RESULTS_DIR ?? '';
    const envLogsDir = process.env.SETI_LOGS_DIR ?? '';
    const envDelay = process.env.SETI_STAGE_DELAY_MS ?? '';

    const settings = await this.settingsStore.load();

    const resultsDir = envResultsDir || settings.resultsPath || join(this.dataDir, 'results');
    const logsDir = envLogsDir || settings.logsPath || join(this.dataDir, 'logs');
    const stageDelayMs = envDelay ? parseDelay(envDelay) : DEFAULT_STAGE_DELAY_MS;

    log.debug(`resolve: results in ${resultsDir}, logs in ${logsDir}, stage delay ${stageDelayMs}ms`);

    return {
      resultsDir,
      logsDir,
      logFile: join(logsDir, LOG_FILE_NAME),
      stageDelayMs,
      settings,
    };
  }

  async updateSetting(key: string, value: string): Promise<AnalysisSettings> {
    const updated = applySetting(await this.settingsStore.load(), key, value);
    await this.settingsStore.save(updated);
    return updated;
  }

  async reset(): Promise<AnalysisSettings> {
    const defaults = { ...DEFAULT_SETTINGS };
    await this.settingsStore.save(defaults);
    return defaults;
  }
}
