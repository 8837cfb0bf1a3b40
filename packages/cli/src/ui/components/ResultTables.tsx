import React from 'react';
import { Box, Text } from 'ink';
import type { Candidate, WindowScore } from '@seti-analyzer/core';
import { formatTable } from '../format.js';

function Table({ title, lines, empty }: { title: string; lines: string[]; empty: string }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold color="yellow">{title}</Text>
      {lines.length === 0 ? (
        <Text color="gray">{empty}</Text>
      ) : (
        lines.map((line, i) => (
          <Text key={i} color={i < 2 ? 'gray' : undefined}>
            {line}
          </Text>
        ))
      )}
    </Box>
  );
}

interface ResultTablesProps {
  windowScores: readonly WindowScore[];
  candidates: readonly Candidate[];
}

export function ResultTables({ windowScores, candidates }: ResultTablesProps) {
  const windowLines =
    windowScores.length > 0
      ? formatTable(['Window', 'Score', 'Cluster'], windowScores.map((w) => [w.windowId, w.score, w.cluster]))
      : [];
  const candidateLines =
    candidates.length > 0
      ? formatTable(['ID', 'Frequency', 'Status'], candidates.map((c) => [c.id, c.frequency, c.status]))
      : [];

  return (
    <Box flexDirection="column">
      <Table title="Windows" lines={windowLines} empty="No matching windows." />
      <Table title="Candidates" lines={candidateLines} empty="No matching candidates." />
    </Box>
  );
}
