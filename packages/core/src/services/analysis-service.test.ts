import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AnalysisResult } from '../domain/analysis/analysis-result.js';
import { AnalysisRunner } from '../domain/runner/analysis-runner.js';
import type { AnalysisEvents } from '../ports/analysis-events.js';
import type { HistoryStore } from '../ports/history-store.js';
import type { ResultRepository } from '../ports/result-repository.js';
import { InputValidationError } from '../shared/errors.js';
import { createLogger, setLogLevel } from '../shared/logger.js';
import { AnalysisService } from './analysis-service.js';

const silent = createLogger('test', { sinks: [] });

function makeEvents(): AnalysisEvents & { stages: string[] } {
  const stages: string[] = [];
  return { stages, onStage: (s) => stages.push(s), onProgress: () => {}, onDone: () => {} };
}

function makeRepository(): ResultRepository & { saved: AnalysisResult[] } {
  const saved: AnalysisResult[] = [];
  return {
    saved,
    save: vi.fn(async (result: AnalysisResult) => {
      saved.push(result);
      return `/results/runs/${result.id}.json`;
    }),
    load: vi.fn(),
    list: vi.fn(async () => []),
  };
}

function makeHistory(): HistoryStore & { paths: string[] } {
  const paths: string[] = [];
  return {
    paths,
    list: async () => [...paths],
    add: async (path) => {
      paths.unshift(path);
      return [...paths];
    },
    clear: async () => {
      paths.length = 0;
    },
  };
}

describe('AnalysisService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'seti-service-'));
    setLogLevel('error');
  });

  afterEach(async () => {
    setLogLevel('debug');
    await rm(outputDir, { recursive: true, force: true });
  });

  function createService(deps: { history?: HistoryStore; repository?: ResultRepository; events?: AnalysisEvents } = {}) {
    const runner = new AnalysisRunner({ outputDir, logger: silent, stageDelayMs: 0 });
    return new AnalysisService({
      runner,
      events: deps.events ?? makeEvents(),
      historyStore: deps.history,
      resultRepository: deps.repository,
    });
  }

  it('should run an analysis and save the succeeded result', async () => {
    const repository = makeRepository();
    const events = makeEvents();
    const service = createService({ repository, events });

    const result = await service.run({ inputPath: ' sample.h5 ', preset: 'dbscan-fast' });

    expect(result.status).toBe('succeeded');
    expect(result.inputPath).toBe('sample.h5');
    expect(repository.saved).toEqual([result]);
    expect(events.stages.at(-1)).toBe('done');
    expect(service.isRunning).toBe(false);
  });

  it('should reject an empty input before starting', async () => {
    const service = createService();
    await expect(service.run({ inputPath: '  ', preset: 'dbscan-fast' })).rejects.toThrow(InputValidationError);
    expect(service.isRunning).toBe(false);
  });

  it('should still return the result when saving fails', async () => {
    const repository = makeRepository();
    vi.mocked(repository.save).mockRejectedValueOnce(new Error('disk full'));
    const service = createService({ repository });

    const result = await service.run({ inputPath: 'sample.h5', preset: 'spectral' });

    expect(result.status).toBe('succeeded');
  });

  it('should cancel the active run and skip saving it', async () => {
    const repository = makeRepository();
    const service = createService({ repository });

    const pending = service.run({ inputPath: 'sample.h5', preset: 'dbscan-fast' });
    expect(service.isRunning).toBe(true);
    expect(service.cancel()).toBe(true);

    const result = await pending;
    expect(result.status).toBe('cancelled');
    expect(repository.saved).toEqual([]);
    expect(service.cancel()).toBe(false);
  });

  it('should record selected inputs in history', async () => {
    const history = makeHistory();
    const service = createService({ history });

    expect(await service.selectInput('  /data/a.h5 ')).toBe('/data/a.h5');
    await expect(service.selectInput('   ')).rejects.toThrow('No input file selected');
    expect(history.paths).toEqual(['/data/a.h5']);
  });
});
