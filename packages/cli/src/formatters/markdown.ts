import type { AnalysisResult } from '@seti-analyzer/core';
import { describeArtifacts } from '../ui/artifacts.js';
import type { OutputFormatter } from './formatter.js';

function markdownTable(headers: string[], rows: string[][]): string {
  const line = (cells: string[]) => `| ${cells.join(' | ')} |`;
  return [line(headers), line(headers.map(() => '---')), ...rows.map(line)].join('\n');
}

export class MarkdownFormatter implements OutputFormatter {
  constructor(private readonly exists?: (path: string) => boolean) {}

  renderComplete(result: AnalysisResult): void {
    console.log(`# SETI Analysis\n`);
    console.log(`**Input:** ${result.inputPath}\n`);
    console.log(`**Date:** ${result.createdAt}\n`);

    console.log(`## Metadata\n`);
    for (const entry of result.metadata) {
      console.log(`- **${entry.label}:** ${entry.value}`);
    }
    console.log();

    console.log(`## Artifacts\n`);
    for (const artifact of describeArtifacts(result.artifacts, this.exists)) {
      console.log(artifact.present ? `- ${artifact.title}: \`${artifact.text}\`` : `- ${artifact.title}: _${artifact.text}_`);
    }
    console.log();

    console.log(`## Windows\n`);
    console.log(
      result.windowScores.length > 0
        ? markdownTable(['Window', 'Score', 'Cluster'], result.windowScores.map((w) => [w.windowId, w.score, w.cluster]))
        : '_No matching windows._',
    );
    console.log();

    console.log(`## Candidates\n`);
    console.log(
      result.candidates.length > 0
        ? markdownTable(['ID', 'Frequency', 'Status'], result.candidates.map((c) => [c.id, c.frequency, c.status]))
        : '_No matching candidates._',
    );
    console.log();
  }

  renderCancelled(result: AnalysisResult): void {
    console.log(`## Cancelled\n\nAnalysis of ${result.inputPath} was cancelled.`);
  }

  renderError(error: string): void {
    console.error(`## Error\n\n${error}`);
  }
}
