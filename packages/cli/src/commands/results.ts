import type { Command } from 'commander';
import { filterResult } from '@seti-analyzer/core';
import { errorMessage, loadContext } from '../context.js';
import { renderResult } from '../formatters/formatter.js';
import { PlainFormatter } from '../formatters/plain.js';
import { formatDate, formatTable } from '../ui/format.js';

interface ResultsOptions {
  json?: boolean;
  last?: boolean;
  search?: string;
  onlyRfi?: boolean;
  onlyInteresting?: boolean;
}

export function registerResultsCommand(program: Command): void {
  program
    .command('results')
    .description('List or view saved analysis results')
    .argument('[run-id]', 'View a specific result by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent result')
    .option('--search <text>', 'Only show window and candidate rows containing this text')
    .option('--only-rfi', 'Only show candidates flagged as RFI')
    .option('--only-interesting', 'Only show candidates flagged as interesting')
    .action(async (runId: string | undefined, opts: ResultsOptions) => {
      const { resultRepository: repo } = await loadContext();

      if (opts.last) {
        const results = await repo.list();
        if (results.length === 0) {
          console.log('No results found.');
          return;
        }
        runId = results[0].id;
      }

      if (runId) {
        try {
          const result = filterResult(await repo.load(runId), opts);
          if (opts.json) {
            console.log(JSON.stringify(result, null, 2));
          } else {
            console.log(`Run: ${result.id}`);
            console.log(`Date: ${formatDate(result.createdAt)}`);
            console.log(`Input: ${result.inputPath}`);
            console.log(`Preset: ${result.preset}`);
            console.log(`Status: ${result.status}\n`);
            renderResult(new PlainFormatter(), result);
          }
        } catch (err) {
          console.error(errorMessage(err));
          process.exitCode = 1;
        }
        return;
      }

      const results = await repo.list();
      if (opts.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }
      if (results.length === 0) {
        console.log('No results found.');
        return;
      }

      const rows = results.map((r) => [r.id, formatDate(r.createdAt), r.status, String(r.candidateCount), r.inputPath]);
      console.log();
      for (const line of formatTable(['ID', 'Date', 'Status', 'Candidates', 'Input'], rows)) {
        console.log(`  ${line}`);
      }
      console.log();
    });
}
