import { readFile } from 'node:fs/promises';
import { InvalidArgumentError, type Command } from 'commander';
import { loadContext } from '../context.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Last `count` lines of `text`, ignoring a trailing newline. */
export function tailLines(text: string, count: number): string[] {
  const lines = text.split('\n');
  if (lines.at(-1) === '') lines.pop();
  return lines.slice(-count);
}

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Print the log file location, or its last lines')
    .option('-n, --tail <lines>', 'Print the last n lines of the log', parsePositiveInt)
    .action(async (opts: { tail?: number }) => {
      const { config } = await loadContext();
      if (opts.tail === undefined) {
        console.log(config.logFile);
        return;
      }

      let text: string;
      try {
        text = await readFile(config.logFile, 'utf-8');
      } catch {
        console.log(`No log file yet at ${config.logFile}`);
        return;
      }
      for (const line of tailLines(text, opts.tail)) console.log(line);
    });
}
