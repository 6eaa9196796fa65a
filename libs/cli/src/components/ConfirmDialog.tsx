/**
 * Yes/no confirmation box. Keys are handled by the controller.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface ConfirmDialogProps {
  question: string;
}

export function ConfirmDialog({ question }: ConfirmDialogProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={2} paddingY={1}>
      <Text bold color="yellow">
        {question}
      </Text>
      <Box marginTop={1}>
        <Text color="green" bold>
          [Y]es
        </Text>
        <Text> / </Text>
        <Text color="red" bold>
          [N]o
        </Text>
      </Box>
    </Box>
  );
}
