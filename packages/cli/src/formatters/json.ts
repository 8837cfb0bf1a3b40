import type { AnalysisResult } from '@seti-analyzer/core';
import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  renderComplete(result: AnalysisResult): void {
    console.log(JSON.stringify(result, null, 2));
  }

  renderCancelled(result: AnalysisResult): void {
    console.log(JSON.stringify(result, null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
