/**
 * Sidebar listing the wizard steps and their results
 */

import React from 'react';
import { Box, Text } from 'ink';
import { STEP_LABELS, type MenuItem, type StepResult } from '@modegreet/onboard';

interface StepListProps {
  menu: MenuItem[];
  results: StepResult[];
  selected: number;
  focused: boolean;
  /** Spinner frame shown on the selected step while a task runs */
  busyFrame: string | null;
}

function StepIcon({ result }: { result: StepResult }) {
  switch (result) {
    case 'completed':
      return <Text color="green">✓</Text>;
    case 'failed':
      return <Text color="red">✗</Text>;
    case 'skipped':
      return <Text color="gray">-</Text>;
    case 'locked':
      return <Text color="gray">#</Text>;
    default:
      return <Text color="gray">○</Text>;
  }
}

export function StepList({ menu, results, selected, focused, busyFrame }: StepListProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={focused ? 'cyan' : 'gray'} paddingX={1} width={20}>
      {menu.map((item, index) => {
        const result = results[index] ?? 'pending';
        const isSelected = index === selected;
        return (
          <Box key={item.id}>
            <Box width={3}>
              <Text color="gray">{index + 1}</Text>
            </Box>
            <Box width={2}>
              {isSelected && busyFrame !== null ? <Text color="cyan">{busyFrame}</Text> : <StepIcon result={result} />}
            </Box>
            <Text
              color={isSelected ? 'cyan' : result === 'locked' ? 'gray' : undefined}
              bold={isSelected}
              dimColor={result === 'locked'}
            >
              {STEP_LABELS[item.id]}
            </Text>
          </Box>
        );
      })}
    </Box>
  );
}
