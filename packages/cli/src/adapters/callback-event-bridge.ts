import type { AnalysisEvents, AnalysisResult } from '@seti-analyzer/core';

export type EventHandler = {
  onStage?: (stage: string) => void;
  onProgress?: (percent: number) => void;
  onDone?: (result: AnalysisResult) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): AnalysisEvents {
  return {
    onStage: (stage) => handlers.onStage?.(stage),
    onProgress: (percent) => handlers.onProgress?.(percent),
    onDone: (result) => handlers.onDone?.(result),
  };
}
