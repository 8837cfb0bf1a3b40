import type { ArtifactKind } from './analysis-result.js';

export interface StageDefinition {
  name: string;
  /** Previews written once the stage's work has finished. */
  artifacts: readonly ArtifactKind[];
}

export const ANALYSIS_STAGES: readonly StageDefinition[] = [
  { name: 'Loading file', artifacts: [] },
  { name: 'Preprocessing', artifacts: [] },
  { name: 'Building waterfall', artifacts: ['waterfall', 'activity'] },
  { name: 'Clustering windows', artifacts: ['windowPreview'] },
  { name: 'Searching candidates', artifacts: ['candidatePreview'] },
  { name: 'Writing results', artifacts: [] },
];

export const DONE_STAGE = 'done';

export const DEFAULT_SUB_STEPS = 5;
export const DEFAULT_STAGE_DELAY_MS = 200;

/** Start and end percent of a 1-based stage index, both truncated. */
export function stageBounds(index: number, total: number): [number, number] {
  if (!Number.isInteger(index) || !Number.isInteger(total) || total < 1 || index < 1 || index > total) {
    throw new RangeError(`Stage index ${index} is outside 1..${total}`);
  }
  return [Math.trunc(((index - 1) / total) * 100), Math.trunc((index / total) * 100)];
}

/**
 * Progress values reported while a stage runs, interpolated linearly between
 * its bounds. The final value always equals the stage's end percent.
 */
export function stageProgressSteps(index: number, total: number, subSteps = DEFAULT_SUB_STEPS): number[] {
  if (!Number.isInteger(subSteps) || subSteps < 1) {
    throw new RangeError(`subSteps must be a positive integer, got ${subSteps}`);
  }
  const [start, end] = stageBounds(index, total);
  const steps: number[] = [];
  for (let step = 1; step <= subSteps; step++) {
    steps.push(start + Math.trunc((step / subSteps) * (end - start)));
  }
  return steps;
}
