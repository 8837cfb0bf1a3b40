import type { AnalysisSettings } from '../domain/settings/analysis-settings.js';

export interface SettingsStore {
  load(): Promise<AnalysisSettings>;
  save(settings: AnalysisSettings): Promise<void>;
}
