import React from 'react';
import { Text, Box } from 'ink';
import { ANALYSIS_STAGES, DONE_STAGE } from '@seti-analyzer/core';
import { Spinner } from './Spinner.js';

interface StageIndicatorProps {
  currentStage: string | null;
  finished: boolean;
}

export function StageIndicator({ currentStage, finished }: StageIndicatorProps) {
  const activeIndex =
    currentStage === DONE_STAGE ? ANALYSIS_STAGES.length : ANALYSIS_STAGES.findIndex((s) => s.name === currentStage);

  return (
    <Box flexDirection="column" marginBottom={1}>
      {ANALYSIS_STAGES.map((stage, i) => {
        const isDone = i < activeIndex;
        const isActive = i === activeIndex && !finished;
        const icon = isDone ? '✓' : isActive ? '▶' : '○';
        const color = isDone ? 'green' : isActive ? 'cyan' : 'gray';

        return (
          <Text key={stage.name} color={color} bold={isActive}>
            {icon} {stage.name}
          </Text>
        );
      })}
      {currentStage !== null && !finished && (
        <Box marginTop={1}>
          <Spinner text={currentStage} />
        </Box>
      )}
    </Box>
  );
}
