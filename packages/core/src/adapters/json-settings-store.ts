import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { normalizeSettings, type AnalysisSettings } from '../domain/settings/analysis-settings.js';
import type { SettingsStore } from '../ports/settings-store.js';

export class JsonSettingsStore implements SettingsStore {
  constructor(private readonly configDir: string) {}

  get settingsPath(): string {
    return join(this.configDir, 'settings.json');
  }

  async load(): Promise<AnalysisSettings> {
    try {
      const data = await readFile(this.settingsPath, 'utf-8');
      return normalizeSettings(JSON.parse(data));
    } catch {
      return normalizeSettings(undefined);
    }
  }

  async save(settings: AnalysisSettings): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.settingsPath, JSON.stringify(settings, null, 2), 'utf-8');
  }
}
