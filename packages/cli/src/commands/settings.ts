import type { Command } from 'commander';
import { SETTING_KEYS, type AnalysisConfig } from '@seti-analyzer/core';
import { getConfigDir } from '../adapters/xdg-paths.js';
import { errorMessage, loadContext } from '../context.js';

export function settingsLines(config: AnalysisConfig): string[] {
  const { settings } = config;
  return [
    `  DBSCAN eps:     ${settings.dbscanEps}`,
    `  Min samples:    ${settings.dbscanMinSamples}`,
    `  Denoise:        ${settings.denoise}`,
    `  Normalize:      ${settings.normalize}`,
    `  Theme:          ${settings.theme}`,
    `  Results dir:    ${config.resultsDir}`,
    `  Logs dir:       ${config.logsDir}`,
    `  Stage delay:    ${config.stageDelayMs} ms`,
  ];
}

export function registerSettingsCommand(program: Command): void {
  const settings = program
    .command('settings')
    .description('Manage analysis settings');

  const show = settings
    .command('show')
    .description('Show the effective settings')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const { config } = await loadContext();
      if (opts.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }
      console.log(`\n  Settings:`);
      for (const line of settingsLines(config)) console.log(line);
      console.log(`  Config dir:     ${getConfigDir()}`);
      console.log();
    });

  settings
    .command('set')
    .description('Set a setting')
    .argument('<key>', `Setting key (${SETTING_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set; an empty string clears a path')
    .action(async (key: string, value: string) => {
      const { configService } = await loadContext();
      try {
        await configService.updateSetting(key, value);
        console.log(`${key} set to: ${value || '(default)'}`);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });

  settings
    .command('reset')
    .description('Reset settings to defaults')
    .action(async () => {
      const { configService } = await loadContext();
      await configService.reset();
      console.log('Settings reset to defaults.');
    });

  settings
    .command('path')
    .description('Print the config directory')
    .action(() => {
      console.log(getConfigDir());
    });

  // Default: show settings when no subcommand
  settings.action(async () => {
    await show.parseAsync([], { from: 'user' });
  });
}
