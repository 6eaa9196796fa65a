/**
 * Bottom status line: mode badge, message or command line, key hints
 */

import React from 'react';
import { Box, Text } from 'ink';
import { MODE_LABELS, type EditMode } from '@modegreet/core';

interface StatusBarProps {
  mode: EditMode;
  commandLine: string;
  message: { text: string; isError: boolean } | null;
  left?: string;
  right?: string;
}

const MODE_COLORS: Record<EditMode, string> = {
  normal: 'blue',
  insert: 'green',
  command: 'yellow',
};

export function StatusBar({ mode, commandLine, message, left = '', right = '' }: StatusBarProps) {
  return (
    <Box flexDirection="column">
      <Box>
        {mode === 'command' ? (
          <Text>
            :{commandLine}
            <Text inverse> </Text>
          </Text>
        ) : message ? (
          <Text color={message.isError ? 'red' : 'green'}>{message.text}</Text>
        ) : (
          <Text> </Text>
        )}
      </Box>
      <Box justifyContent="space-between">
        <Box>
          <Text backgroundColor={MODE_COLORS[mode]} color="black" bold>
            {` ${MODE_LABELS[mode]} `}
          </Text>
          <Text color="gray"> {left}</Text>
        </Box>
        <Text color="gray" dimColor>
          {right}
        </Text>
      </Box>
    </Box>
  );
}
