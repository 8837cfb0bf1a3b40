import {
  ConfigService,
  JsonHistoryStore,
  JsonResultRepository,
  JsonSettingsStore,
  type AnalysisConfig,
} from '@seti-analyzer/core';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export interface CliContext {
  configService: ConfigService;
  config: AnalysisConfig;
  historyStore: JsonHistoryStore;
  resultRepository: JsonResultRepository;
}

/** Wires the JSON-backed stores under the XDG directories and resolves the effective config. */
export async function loadContext(): Promise<CliContext> {
  const configDir = getConfigDir();
  const configService = new ConfigService(new JsonSettingsStore(configDir), getDataDir());
  const config = await configService.resolve();

  return {
    configService,
    config,
    historyStore: new JsonHistoryStore(configDir),
    resultRepository: new JsonResultRepository(config.resultsDir),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
