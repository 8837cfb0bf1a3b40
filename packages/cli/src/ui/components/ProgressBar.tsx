import React from 'react';
import { Text } from 'ink';
import { formatProgressBar } from '../format.js';

export function ProgressBar({ percent }: { percent: number }) {
  return <Text color={percent >= 100 ? 'green' : 'cyan'}>{formatProgressBar(percent)}</Text>;
}
