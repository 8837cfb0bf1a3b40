import React from 'react';
import { Box, Text } from 'ink';
import { isFinished, type AnalysisViewState } from './analysis-state.js';
import { StageIndicator } from './components/StageIndicator.js';
import { ProgressBar } from './components/ProgressBar.js';
import { ResultSummary } from './components/ResultSummary.js';
import { ResultTables } from './components/ResultTables.js';

interface RunViewProps {
  state: AnalysisViewState;
}

export function RunView({ state }: RunViewProps) {
  const { result } = state;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color="gray">
        {state.inputPath} ({state.preset})
      </Text>
      <Box marginY={1}>
        <ProgressBar percent={state.progress} />
      </Box>
      <StageIndicator currentStage={state.stage} finished={isFinished(state)} />

      {result?.status === 'succeeded' && (
        <>
          <ResultSummary result={result} />
          <ResultTables windowScores={result.windowScores} candidates={result.candidates} />
        </>
      )}

      {result?.status === 'cancelled' && (
        <Text color="yellow" bold>Analysis cancelled.</Text>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
