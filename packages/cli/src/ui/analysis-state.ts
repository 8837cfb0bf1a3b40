import { DONE_STAGE, type AnalysisResult } from '@seti-analyzer/core';

export interface AnalysisViewState {
  inputPath: string;
  preset: string;
  stage: string | null;
  progress: number;
  /** Every stage reported so far, in arrival order. */
  stages: string[];
  result: AnalysisResult | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'START'; inputPath: string; preset: string }
  | { type: 'STAGE'; stage: string }
  | { type: 'PROGRESS'; percent: number }
  | { type: 'DONE'; result: AnalysisResult }
  | { type: 'ERROR'; error: string };

export const initialState: AnalysisViewState = {
  inputPath: '',
  preset: '',
  stage: null,
  progress: 0,
  stages: [],
  result: null,
  error: null,
  done: false,
};

export function analysisReducer(state: AnalysisViewState, action: Action): AnalysisViewState {
  switch (action.type) {
    case 'START':
      return { ...initialState, inputPath: action.inputPath, preset: action.preset };

    case 'STAGE':
      if (state.done) return state;
      return { ...state, stage: action.stage, stages: [...state.stages, action.stage] };

    case 'PROGRESS': {
      if (state.done) return state;
      const percent = Math.min(100, Math.max(state.progress, Math.trunc(action.percent)));
      return percent === state.progress ? state : { ...state, progress: percent };
    }

    case 'DONE':
      return {
        ...state,
        result: action.result,
        error: action.result.errorMessage,
        done: true,
      };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export function isFinished(state: AnalysisViewState): boolean {
  return state.stage === DONE_STAGE || state.done;
}
