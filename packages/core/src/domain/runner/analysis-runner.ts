import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setImmediate as nextTurn, setTimeout as delay } from 'node:timers/promises';
import {
  cancelledResult,
  emptyArtifacts,
  failedResult,
  succeededResult,
  type AnalysisResult,
  type ArtifactKind,
  type ResultPayload,
  type RunIdentity,
} from '../analysis/analysis-result.js';
import {
  ARTIFACT_FILE_NAMES,
  DEFAULT_ARTIFACT_RENDERERS,
  type ArtifactRenderer,
} from '../analysis/artifacts.js';
import { createRandom, seedFromString } from '../analysis/random.js';
import type { RunRequest } from '../analysis/run-request.js';
import {
  ANALYSIS_STAGES,
  DEFAULT_STAGE_DELAY_MS,
  DEFAULT_SUB_STEPS,
  DONE_STAGE,
  stageProgressSteps,
  type StageDefinition,
} from '../analysis/stages.js';
import { buildStubPayload } from '../analysis/stub-payload.js';
import type { AnalysisEvents } from '../../ports/analysis-events.js';
import { ArtifactError, RunnerBusyError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import { RunEventChannel } from './event-channel.js';

export interface StageWorkContext {
  stage: StageDefinition;
  /** 1-based position of the stage. */
  index: number;
  total: number;
  signal: AbortSignal;
  reportProgress(percent: number): void;
}

/**
 * The work done inside one stage. It must report progress up to the stage's
 * end percent and should stop early once `signal` is aborted.
 */
export type StageWork = (context: StageWorkContext) => Promise<void>;

/** Paces a stage with fixed delays between interpolated progress values. */
export function pacedStageWork(delayMs = DEFAULT_STAGE_DELAY_MS, subSteps = DEFAULT_SUB_STEPS): StageWork {
  return async ({ index, total, signal, reportProgress }) => {
    for (const percent of stageProgressSteps(index, total, subSteps)) {
      await delay(delayMs, undefined, { signal });
      reportProgress(percent);
    }
  };
}

export type RunnerState = 'idle' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface RunHandle {
  id: string;
  /** Resolves with the record delivered to `onDone`; never rejects. */
  done: Promise<AnalysisResult>;
  cancel(): void;
}

export interface AnalysisRunnerOptions {
  /** Root directory for preview artifacts; each run writes into `<outputDir>/<runId>`. */
  outputDir: string;
  logger?: Logger;
  stages?: readonly StageDefinition[];
  stageDelayMs?: number;
  subSteps?: number;
  stageWork?: StageWork;
  renderers?: Partial<Record<ArtifactKind, ArtifactRenderer>>;
  buildPayload?: (request: RunRequest) => ResultPayload;
}

export class AnalysisRunner {
  private state: RunnerState = 'idle';
  private activeRunId: string | null = null;
  private readonly log: Logger;
  private readonly stages: readonly StageDefinition[];
  private readonly stageWork: StageWork;
  private readonly renderers: Record<ArtifactKind, ArtifactRenderer>;
  private readonly buildPayload: (request: RunRequest) => ResultPayload;

  constructor(private readonly options: AnalysisRunnerOptions) {
    this.log = options.logger ?? createLogger('analyzer');
    this.stages = options.stages ?? ANALYSIS_STAGES;
    this.stageWork = options.stageWork ?? pacedStageWork(options.stageDelayMs, options.subSteps);
    this.renderers = { ...DEFAULT_ARTIFACT_RENDERERS, ...options.renderers };
    this.buildPayload = options.buildPayload ?? buildStubPayload;
  }

  get status(): RunnerState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.state !== 'idle';
  }

  start(request: RunRequest, listener: AnalysisEvents, signal?: AbortSignal): RunHandle {
    if (this.activeRunId !== null) {
      throw new RunnerBusyError(this.activeRunId);
    }

    const identity: RunIdentity = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      inputPath: request.inputPath,
      preset: request.preset,
    };
    this.state = 'running';
    this.activeRunId = identity.id;

    const abortController = new AbortController();
    const forwardAbort = () => abortController.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const channel = new RunEventChannel(listener, this.log);
    const done = this.execute(identity, request, channel, abortController.signal).finally(() =>
      signal?.removeEventListener('abort', forwardAbort),
    );

    return {
      id: identity.id,
      done,
      cancel: () => abortController.abort(),
    };
  }

  private async execute(
    identity: RunIdentity,
    request: RunRequest,
    channel: RunEventChannel,
    signal: AbortSignal,
  ): Promise<AnalysisResult> {
    let result: AnalysisResult = failedResult(identity, 'Run ended without a result');
    try {
      // Never emit from inside start(): the caller gets its handle first.
      await nextTurn();
      result = await this.produce(identity, request, channel, signal);
    } catch (err) {
      if (signal.aborted) {
        result = cancelledResult(identity);
        this.log.info(`Analysis cancelled for ${request.inputPath} at ${channel.progress}%`);
      } else {
        result = failedResult(identity, err instanceof Error ? err.message : String(err));
        this.log.error(`Analysis failed for ${request.inputPath}:`, err);
      }
    } finally {
      this.state = result.status;
      channel.complete(result);
      this.state = 'idle';
      this.activeRunId = null;
    }
    return result;
  }

  private async produce(
    identity: RunIdentity,
    request: RunRequest,
    channel: RunEventChannel,
    signal: AbortSignal,
  ): Promise<AnalysisResult> {
    const payload = this.buildPayload(request);
    const artifacts = emptyArtifacts();
    const artifactDir = join(this.options.outputDir, identity.id);
    const total = this.stages.length;

    for (const [i, stage] of this.stages.entries()) {
      signal.throwIfAborted();
      this.log.info(`${stage.name}: ${request.inputPath}`);
      channel.stage(stage.name);

      await this.stageWork({
        stage,
        index: i + 1,
        total,
        signal,
        reportProgress: (percent) => channel.reportProgress(percent),
      });

      for (const kind of stage.artifacts) {
        artifacts[kind] = await this.writeArtifact(kind, request, artifactDir);
      }
    }
    signal.throwIfAborted();

    channel.reportProgress(100);
    channel.stage(DONE_STAGE);
    this.log.info(`Analysis finished for ${request.inputPath}`);

    return succeededResult(identity, payload, artifacts);
  }

  /** Failures leave the artifact absent; the run carries on. */
  private async writeArtifact(kind: ArtifactKind, request: RunRequest, dir: string): Promise<string | null> {
    try {
      const svg = this.renderers[kind]({
        inputPath: request.inputPath,
        preset: request.preset,
        random: createRandom(seedFromString(`${request.inputPath}:${request.preset}:${kind}`)),
      });
      if (!svg) {
        throw new ArtifactError(`renderer produced no output`, kind);
      }
      await mkdir(dir, { recursive: true });
      const filePath = join(dir, ARTIFACT_FILE_NAMES[kind]);
      await writeFile(filePath, svg, 'utf-8');
      return filePath;
    } catch (err) {
      this.log.warn(`Artifact ${kind} failed for ${request.inputPath}:`, err instanceof Error ? err.message : err);
      return null;
    }
  }
}
