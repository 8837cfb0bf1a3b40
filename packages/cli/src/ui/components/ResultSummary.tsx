import React from 'react';
import { Box, Text } from 'ink';
import type { AnalysisResult } from '@seti-analyzer/core';
import { describeArtifacts } from '../artifacts.js';

export function ResultSummary({ result }: { result: AnalysisResult }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      {result.metadata.map((entry) => (
        <Text key={entry.label}>
          <Text bold>{entry.label}:</Text> {entry.value}
        </Text>
      ))}
      <Box flexDirection="column" marginTop={1}>
        <Text bold color="yellow">Previews</Text>
        {describeArtifacts(result.artifacts).map((artifact) => (
          <Text key={artifact.kind}>
            {artifact.title}: <Text color={artifact.present ? undefined : 'gray'}>{artifact.text}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
