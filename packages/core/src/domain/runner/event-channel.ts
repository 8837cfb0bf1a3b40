import type { AnalysisResult } from '../analysis/analysis-result.js';
import type { AnalysisEvents } from '../../ports/analysis-events.js';
import type { Logger } from '../../shared/logger.js';

/**
 * Ordered, single-terminal wrapper around an {@link AnalysisEvents} listener.
 * Progress never moves backwards and `onDone` fires at most once.
 */
export class RunEventChannel {
  private lastProgress = 0;
  private closed = false;

  constructor(
    private readonly listener: AnalysisEvents,
    private readonly log: Logger,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get progress(): number {
    return this.lastProgress;
  }

  stage(name: string): void {
    if (this.rejectAfterClose('stage')) return;
    this.deliver('onStage', () => this.listener.onStage(name));
  }

  reportProgress(percent: number): void {
    if (this.rejectAfterClose('progress')) return;
    const value = Number.isFinite(percent) ? Math.trunc(percent) : this.lastProgress;
    this.lastProgress = Math.min(100, Math.max(this.lastProgress, value));
    const delivered = this.lastProgress;
    this.deliver('onProgress', () => this.listener.onProgress(delivered));
  }

  /** Returns false when a terminal event was already delivered. */
  complete(result: AnalysisResult): boolean {
    if (this.rejectAfterClose('done')) return false;
    this.closed = true;
    this.deliver('onDone', () => this.listener.onDone(result));
    return true;
  }

  private rejectAfterClose(kind: string): boolean {
    if (this.closed) {
      this.log.warn(`dropping ${kind} event emitted after completion`);
    }
    return this.closed;
  }

  private deliver(handler: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.log.error(`listener ${handler} threw:`, err);
    }
  }
}
