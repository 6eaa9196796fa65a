/**
 * Progress bar component
 */

import React from 'react';
import { Text } from 'ink';

interface ProgressBarProps {
  percent: number;
  width?: number;
}

export function ProgressBar({ percent, width = 20 }: ProgressBarProps) {
  const clamped = Math.min(Math.max(Math.round(percent), 0), 100);
  const filled = Math.round((clamped / 100) * width);

  return (
    <Text>
      [<Text color="green">{'█'.repeat(filled)}</Text>
      <Text color="gray">{'░'.repeat(width - filled)}</Text>] {clamped}%
    </Text>
  );
}
