import { join, resolve } from 'node:path';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import {
  AnalysisRunner,
  AnalysisService,
  ConfigError,
  DEFAULT_PRESET_ID,
  consoleSink,
  createFileSink,
  createLogger,
  filterResult,
  isFailedResult,
  resolvePreset,
  setLogLevel,
  type AnalysisEvents,
  type AnalysisResult,
  type ResultFilter,
} from '@seti-analyzer/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { errorMessage, loadContext } from '../context.js';
import { createFormatter, isOutputFormat, renderResult, type OutputFormat } from '../formatters/formatter.js';
import { App } from '../ui/App.js';
import { analysisReducer, initialState, type Action, type AnalysisViewState } from '../ui/analysis-state.js';

interface AnalyzeOptions {
  preset?: string;
  format?: string;
  json?: boolean;
  search?: string;
  onlyRfi?: boolean;
  onlyInteresting?: boolean;
  save?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const EXIT_CANCELLED = 130;

/** `--json` wins over `--format`; without a TTY the default is plain text. */
export function resolveOutputFormat(opts: Pick<AnalyzeOptions, 'format' | 'json'>, isTTY: boolean): OutputFormat | 'interactive' {
  if (opts.json) return 'json';
  const format = opts.format ?? (isTTY ? 'interactive' : 'plain');
  if (format === 'interactive') return isTTY ? 'interactive' : 'plain';
  if (isOutputFormat(format)) return format;
  throw new ConfigError(`Unknown format "${format}". Valid formats: interactive, md, plain, json`);
}

export function exitCodeFor(result: AnalysisResult): number {
  if (result.status === 'cancelled') return EXIT_CANCELLED;
  return isFailedResult(result) ? 1 : 0;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Run a staged analysis over a recording')
    .argument('<file>', 'Path to the recording to analyze')
    .option('-p, --preset <preset>', 'Analysis preset id or label (see `seti-analyzer presets`)', DEFAULT_PRESET_ID)
    .option('--format <type>', 'Output format: interactive (default), md, plain')
    .option('--json', 'Output the result record as JSON')
    .option('--search <text>', 'Only show window and candidate rows containing this text')
    .option('--only-rfi', 'Only show candidates flagged as RFI')
    .option('--only-interesting', 'Only show candidates flagged as interesting')
    .option('--no-save', "Don't persist the result")
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (file: string, opts: AnalyzeOptions) => {
      if (opts.verbose) setLogLevel('debug');
      if (opts.quiet) setLogLevel('error');

      const filter: ResultFilter = {
        search: opts.search,
        onlyRfi: opts.onlyRfi,
        onlyInteresting: opts.onlyInteresting,
      };

      let format: OutputFormat | 'interactive';
      let preset: string;
      try {
        format = resolveOutputFormat(opts, Boolean(process.stdout.isTTY) && !opts.quiet);
        preset = resolvePreset(opts.preset ?? DEFAULT_PRESET_ID).id;
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
        return;
      }

      const context = await loadContext();
      const { config } = context;
      const isInteractive = format === 'interactive';

      // Ink owns the terminal in interactive mode; runner output goes to the log file only.
      if (isInteractive && !opts.verbose) setLogLevel('error');
      const logger = createLogger('analyzer', {
        sinks: isInteractive ? [createFileSink(config.logFile)] : [createFileSink(config.logFile), consoleSink],
      });
      const runner = new AnalysisRunner({
        outputDir: join(config.resultsDir, 'artifacts'),
        logger,
        stageDelayMs: config.stageDelayMs,
      });

      let events: AnalysisEvents;
      let finish: () => Promise<void> = async () => {};
      let reportError = (message: string) => console.error(`Error: ${message}`);

      if (format === 'interactive') {
        let state: AnalysisViewState = initialState;
        const ink = inkRender(React.createElement(App, { state }), { exitOnCtrlC: false });
        const dispatch = (action: Action) => {
          state = analysisReducer(state, action);
          ink.rerender(React.createElement(App, { state }));
        };

        events = createCallbackEventBridge({
          onStage: (stage) => dispatch({ type: 'STAGE', stage }),
          onProgress: (percent) => dispatch({ type: 'PROGRESS', percent }),
          onDone: (result) => dispatch({ type: 'DONE', result: filterResult(result, filter) }),
        });
        finish = async () => {
          ink.unmount();
          await ink.waitUntilExit();
        };
        reportError = (message) => dispatch({ type: 'ERROR', error: message });
        dispatch({ type: 'START', inputPath: resolve(file), preset });
      } else {
        const formatter = createFormatter(format);
        const showStages = format !== 'json' && !opts.quiet;
        events = createCallbackEventBridge({
          onStage: (stage) => {
            if (showStages) process.stderr.write(`  ${stage}\n`);
          },
          onDone: (result) => renderResult(formatter, filterResult(result, filter)),
        });
      }

      const service = new AnalysisService({
        runner,
        events,
        historyStore: context.historyStore,
        resultRepository: opts.save === false ? undefined : context.resultRepository,
      });

      const onSigint = () => {
        if (!service.cancel()) process.exit(EXIT_CANCELLED);
      };
      process.on('SIGINT', onSigint);

      try {
        const inputPath = await service.selectInput(file.trim() && resolve(file.trim()));
        const result = await service.run({ inputPath, preset });
        await finish();
        process.exitCode = exitCodeFor(result);
      } catch (err) {
        reportError(errorMessage(err));
        await finish();
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
