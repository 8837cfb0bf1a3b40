import React from 'react';
import { Box, Text } from 'ink';
import type { AnalysisViewState } from './analysis-state.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: AnalysisViewState;
}

export function App({ state }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">SETI Analyzer</Text>
        <Text color="gray"> · staged signal analysis</Text>
      </Box>
      <RunView state={state} />
    </Box>
  );
}
