import { describe, expect, it } from 'vitest';
import { cancelledResult, failedResult, type AnalysisResult } from '@seti-analyzer/core';
import { analysisReducer, initialState, isFinished, type Action, type AnalysisViewState } from './analysis-state.js';

const identity = { id: 'run-1', createdAt: '2026-01-01T00:00:00.000Z', inputPath: '/data/obs.h5', preset: 'spectral' };

function reduce(actions: Action[], from: AnalysisViewState = initialState): AnalysisViewState {
  return actions.reduce(analysisReducer, from);
}

describe('analysisReducer', () => {
  it('should start from a clean state for the new input', () => {
    const dirty = reduce([{ type: 'STAGE', stage: 'Loading file' }, { type: 'PROGRESS', percent: 40 }]);
    const state = analysisReducer(dirty, { type: 'START', inputPath: '/data/obs.h5', preset: 'spectral' });
    expect(state).toEqual({ ...initialState, inputPath: '/data/obs.h5', preset: 'spectral' });
  });

  it('should keep an append-only log of stages', () => {
    const state = reduce([
      { type: 'STAGE', stage: 'Loading file' },
      { type: 'STAGE', stage: 'Preprocessing' },
    ]);
    expect(state.stage).toBe('Preprocessing');
    expect(state.stages).toEqual(['Loading file', 'Preprocessing']);
  });

  it('should never move progress backwards or past 100', () => {
    expect(reduce([{ type: 'PROGRESS', percent: 10 }, { type: 'PROGRESS', percent: 5 }]).progress).toBe(10);
    expect(reduce([{ type: 'PROGRESS', percent: 33.7 }]).progress).toBe(33);
    expect(reduce([{ type: 'PROGRESS', percent: 150 }]).progress).toBe(100);
  });

  it('should carry the failure message of a terminal record', () => {
    const result: AnalysisResult = failedResult(identity, 'disk full');
    const state = reduce([{ type: 'DONE', result }]);
    expect(state.result).toBe(result);
    expect(state.error).toBe('disk full');
    expect(state.done).toBe(true);
  });

  it('should ignore stage and progress events after completion', () => {
    const done = reduce([{ type: 'PROGRESS', percent: 20 }, { type: 'DONE', result: cancelledResult(identity) }]);
    const state = reduce([{ type: 'STAGE', stage: 'Writing results' }, { type: 'PROGRESS', percent: 90 }], done);
    expect(state).toBe(done);
    expect(state.error).toBeNull();
  });

  it('should record errors raised outside the runner', () => {
    expect(reduce([{ type: 'ERROR', error: 'No input file selected.' }])).toMatchObject({
      error: 'No input file selected.',
      done: true,
    });
  });
});

describe('isFinished', () => {
  it('should be true once the done stage arrives', () => {
    expect(isFinished(initialState)).toBe(false);
    expect(isFinished(reduce([{ type: 'STAGE', stage: 'done' }]))).toBe(true);
  });
});
