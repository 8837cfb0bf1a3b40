import type { AnalysisResult } from '../domain/analysis/analysis-result.js';
import { validateRunRequest, type RunRequest } from '../domain/analysis/run-request.js';
import type { AnalysisRunner, RunHandle } from '../domain/runner/analysis-runner.js';
import type { AnalysisEvents } from '../ports/analysis-events.js';
import type { HistoryStore } from '../ports/history-store.js';
import type { ResultRepository } from '../ports/result-repository.js';
import { InputValidationError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('analysis-service');

export interface AnalysisDeps {
  runner: AnalysisRunner;
  events: AnalysisEvents;
  historyStore?: HistoryStore;
  resultRepository?: ResultRepository;
}

export class AnalysisService {
  private activeRun: RunHandle | null = null;

  constructor(private deps: AnalysisDeps) {}

  get isRunning(): boolean {
    return this.activeRun !== null;
  }

  /** Records a chosen input file in the recent-files history. */
  async selectInput(path: string): Promise<string> {
    const inputPath = path.trim();
    if (!inputPath) {
      throw new InputValidationError('No input file selected. Provide a path to the file to analyze.');
    }
    if (this.deps.historyStore) {
      await this.deps.historyStore.add(inputPath);
    }
    return inputPath;
  }

  async run(input: RunRequest, signal?: AbortSignal): Promise<AnalysisResult> {
    const request = validateRunRequest(input);
    const handle = this.deps.runner.start(request, this.deps.events, signal);
    this.activeRun = handle;
    log.info(`run: started ${handle.id} for ${request.inputPath} (${request.preset})`);

    try {
      const result = await handle.done;
      log.info(`run: ${handle.id} finished with status ${result.status}`);

      if (result.status === 'succeeded' && this.deps.resultRepository) {
        try {
          const savedTo = await this.deps.resultRepository.save(result);
          log.info(`run: ${handle.id} saved to ${savedTo}`);
        } catch (err) {
          log.error(`run: failed to save ${handle.id}:`, err);
        }
      }
      return result;
    } finally {
      this.activeRun = null;
    }
  }

  cancel(): boolean {
    if (!this.activeRun) return false;
    log.info(`cancel: cancelling ${this.activeRun.id}`);
    this.activeRun.cancel();
    return true;
  }
}
