import type { AnalysisResult, RunStatus } from '../domain/analysis/analysis-result.js';

export interface ResultSummary {
  id: string;
  createdAt: string;
  inputPath: string;
  preset: string;
  status: RunStatus;
  candidateCount: number;
}

export interface ResultRepository {
  save(result: AnalysisResult): Promise<string>;
  load(id: string): Promise<AnalysisResult>;
  list(): Promise<ResultSummary[]>;
}
