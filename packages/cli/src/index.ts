import { join } from 'node:path';
import {
  AnalysisRunner,
  AnalysisService,
  DEFAULT_PRESET_ID,
  JsonResultRepository,
  createFileSink,
  createLogger,
  resolvePreset,
  type AnalysisResult,
} from '@seti-analyzer/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { loadContext } from './context.js';

export interface SetiAnalyzerOptions {
  inputPath: string;
  /** Preset id or label; defaults to the fast DBSCAN preset. */
  preset?: string;
  resultsDir?: string;
  stageDelayMs?: number;
  onProgress?: EventHandler;
  save?: boolean;
  signal?: AbortSignal;
}

/**
 * High-level convenience function for running one analysis.
 * Suitable for use as a programmatic API or agent skill.
 */
export async function analyze(options: SetiAnalyzerOptions): Promise<AnalysisResult> {
  const preset = resolvePreset(options.preset ?? DEFAULT_PRESET_ID);
  const context = await loadContext();
  const resultsDir = options.resultsDir ?? context.config.resultsDir;

  const runner = new AnalysisRunner({
    outputDir: join(resultsDir, 'artifacts'),
    logger: createLogger('analyzer', { sinks: [createFileSink(context.config.logFile)] }),
    stageDelayMs: options.stageDelayMs ?? context.config.stageDelayMs,
  });

  const service = new AnalysisService({
    runner,
    events: createCallbackEventBridge(options.onProgress ?? {}),
    historyStore: context.historyStore,
    resultRepository: options.save === false ? undefined : new JsonResultRepository(resultsDir),
  });

  const inputPath = await service.selectInput(options.inputPath);
  return service.run({ inputPath, preset: preset.id }, options.signal);
}

export { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
export { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

// Re-export everything from core for advanced usage
export * from '@seti-analyzer/core';
