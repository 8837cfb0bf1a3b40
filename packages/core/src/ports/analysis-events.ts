import type { AnalysisResult } from '../domain/analysis/analysis-result.js';

export interface AnalysisEvents {
  onStage(stage: string): void;
  onProgress(percent: number): void;
  onDone(result: AnalysisResult): void;
}
