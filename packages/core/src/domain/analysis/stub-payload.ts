import { basename } from 'node:path';
import type { Candidate, ResultPayload, WindowScore } from './analysis-result.js';
import type { RunRequest } from './run-request.js';

// Placeholder data until a real clustering and detection pipeline exists.
export const DEMO_FILE_SIZE = '42 MB (demo)';
export const WINDOW_COUNT = 5;
export const CANDIDATE_COUNT = 8;
export const BASE_FREQUENCY_MHZ = 1420;
export const FREQUENCY_STEP_MHZ = 0.5;

export function buildStubPayload(request: RunRequest): ResultPayload {
  const windowScores: WindowScore[] = Array.from({ length: WINDOW_COUNT }, (_, i) => ({
    windowId: String(i).padStart(3, '0'),
    score: `${90 - i}%`,
    cluster: 'A',
  }));

  const candidates: Candidate[] = Array.from({ length: CANDIDATE_COUNT }, (_, i) => ({
    id: `C-${String(i).padStart(2, '0')}`,
    frequency: `${(BASE_FREQUENCY_MHZ + i * FREQUENCY_STEP_MHZ).toFixed(1)} MHz`,
    status: i % 2 === 0 ? 'RFI' : 'Interesting',
  }));

  return {
    metadata: [
      { label: 'File', value: basename(request.inputPath) },
      { label: 'Size', value: DEMO_FILE_SIZE },
      { label: 'Preset', value: request.preset },
    ],
    windowScores,
    candidates,
  };
}
