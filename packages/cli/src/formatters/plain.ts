import type { AnalysisResult } from '@seti-analyzer/core';
import { describeArtifacts } from '../ui/artifacts.js';
import { formatTable } from '../ui/format.js';
import type { OutputFormatter } from './formatter.js';

export function resultLines(result: AnalysisResult, exists?: (path: string) => boolean): string[] {
  const lines = result.metadata.map((entry) => `${entry.label}: ${entry.value}`);

  lines.push('');
  for (const artifact of describeArtifacts(result.artifacts, exists)) {
    lines.push(`${artifact.title}: ${artifact.text}`);
  }

  lines.push('', 'Windows');
  if (result.windowScores.length === 0) {
    lines.push('No matching windows.');
  } else {
    lines.push(...formatTable(['Window', 'Score', 'Cluster'], result.windowScores.map((w) => [w.windowId, w.score, w.cluster])));
  }

  lines.push('', 'Candidates');
  if (result.candidates.length === 0) {
    lines.push('No matching candidates.');
  } else {
    lines.push(...formatTable(['ID', 'Frequency', 'Status'], result.candidates.map((c) => [c.id, c.frequency, c.status])));
  }
  return lines;
}

export class PlainFormatter implements OutputFormatter {
  constructor(private readonly exists?: (path: string) => boolean) {}

  renderComplete(result: AnalysisResult): void {
    console.log(resultLines(result, this.exists).join('\n'));
  }

  renderCancelled(result: AnalysisResult): void {
    console.log(`Analysis of ${result.inputPath} was cancelled.`);
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
