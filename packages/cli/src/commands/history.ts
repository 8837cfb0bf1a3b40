import type { Command } from 'commander';
import { JsonHistoryStore } from '@seti-analyzer/core';
import { getConfigDir } from '../adapters/xdg-paths.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List recently analyzed files')
    .option('--json', 'Output as JSON')
    .option('--clear', 'Forget all recent files')
    .action(async (opts: { json?: boolean; clear?: boolean }) => {
      const store = new JsonHistoryStore(getConfigDir());

      if (opts.clear) {
        await store.clear();
        console.log('History cleared.');
        return;
      }

      const paths = await store.list();
      if (opts.json) {
        console.log(JSON.stringify(paths, null, 2));
        return;
      }
      if (paths.length === 0) {
        console.log('No recent files.');
        return;
      }

      paths.forEach((path, i) => console.log(`  ${String(i + 1).padStart(2)}. ${path}`));
    });
}
