import type { Command } from 'commander';
import { ANALYSIS_PRESETS, DEFAULT_PRESET_ID } from '@seti-analyzer/core';
import { formatTable } from '../ui/format.js';

export function registerPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List the available analysis presets')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      if (opts.json) {
        console.log(JSON.stringify(ANALYSIS_PRESETS, null, 2));
        return;
      }

      const rows = ANALYSIS_PRESETS.map((p) => [
        p.id === DEFAULT_PRESET_ID ? `${p.id} *` : p.id,
        p.label,
        p.description,
      ]);
      console.log();
      for (const line of formatTable(['ID', 'Label', 'Description'], rows)) {
        console.log(`  ${line}`);
      }
      console.log(`\n  * default\n`);
    });
}
