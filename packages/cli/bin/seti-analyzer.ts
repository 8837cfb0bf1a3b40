#!/usr/bin/env -S node --import tsx

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { registerAnalyzeCommand } from '../src/commands/analyze.js';
import { registerHistoryCommand } from '../src/commands/history.js';
import { registerLogsCommand } from '../src/commands/logs.js';
import { registerPresetsCommand } from '../src/commands/presets.js';
import { registerResultsCommand } from '../src/commands/results.js';
import { registerSettingsCommand } from '../src/commands/settings.js';

loadEnv();

const require = createRequire(import.meta.url);
const { version }: { version: string } = require('../package.json');

const program = new Command();

program
  .name('seti-analyzer')
  .description('Staged analysis of radio telescope recordings with progress reporting and preview artifacts')
  .version(version);

registerAnalyzeCommand(program);
registerPresetsCommand(program);
registerHistoryCommand(program);
registerResultsCommand(program);
registerSettingsCommand(program);
registerLogsCommand(program);

await program.parseAsync();
