/**
 * Task progress list for user creation, configuration and package commands
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { TaskStatus } from '@modegreet/onboard';
import { ProgressBar } from '../components/ProgressBar.js';

interface TaskListProps {
  tasks: TaskStatus[];
}

function TaskIcon({ state }: { state: TaskStatus['state'] }) {
  switch (state) {
    case 'success':
      return <Text color="green">✓</Text>;
    case 'running':
      return (
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
      );
    case 'failed':
      return <Text color="red">✗</Text>;
    default:
      return <Text color="gray">○</Text>;
  }
}

export function TaskList({ tasks }: TaskListProps) {
  return (
    <Box flexDirection="column" marginY={1}>
      {tasks.map((task, index) => (
        <Box key={`${index}-${task.name}`} flexDirection="column">
          <Box>
            <Box width={3}>
              <TaskIcon state={task.state} />
            </Box>
            <Text color={task.state === 'running' ? 'cyan' : task.state === 'failed' ? 'red' : undefined}>
              {task.name}
            </Text>
            {task.state === 'running' && task.progress !== undefined && (
              <Box marginLeft={2}>
                <ProgressBar percent={task.progress} />
              </Box>
            )}
          </Box>
          {task.output ? (
            <Box marginLeft={3}>
              <Text color={task.state === 'failed' ? 'red' : 'gray'} dimColor wrap="truncate-end">
                {task.output.split('\n').slice(-3).join(' | ')}
              </Text>
            </Box>
          ) : null}
        </Box>
      ))}
    </Box>
  );
}
