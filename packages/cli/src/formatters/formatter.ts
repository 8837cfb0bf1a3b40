import type { AnalysisResult } from '@seti-analyzer/core';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export interface OutputFormatter {
  renderComplete(result: AnalysisResult): void;
  renderCancelled(result: AnalysisResult): void;
  renderError(error: string): void;
}

export type OutputFormat = 'plain' | 'md' | 'json';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'plain' || value === 'md' || value === 'json';
}

export function createFormatter(format: OutputFormat, exists?: (path: string) => boolean): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter(exists);
    case 'plain':
      return new PlainFormatter(exists);
  }
}

/** Dispatches a terminal record to the matching formatter method. */
export function renderResult(formatter: OutputFormatter, result: AnalysisResult): void {
  if (result.status === 'cancelled') {
    formatter.renderCancelled(result);
  } else if (result.errorMessage) {
    formatter.renderError(result.errorMessage);
  } else {
    formatter.renderComplete(result);
  }
}
