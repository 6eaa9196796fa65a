/**
 * Key reference overlay
 */

import React from 'react';
import { Box, Text } from 'ink';

export type HelpEntry = [keys: string, description: string];

interface HelpOverlayProps {
  title: string;
  entries: HelpEntry[];
}

export function HelpOverlay({ title, entries }: HelpOverlayProps) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2} paddingY={1}>
      <Text bold color="cyan">
        {title}
      </Text>
      <Box flexDirection="column" marginTop={1}>
        {entries.map(([keys, description]) => (
          <Box key={keys}>
            <Box width={18}>
              <Text color="yellow">{keys}</Text>
            </Box>
            <Text>{description}</Text>
          </Box>
        ))}
      </Box>
      <Box marginTop={1}>
        <Text color="gray" dimColor>
          Esc or q to close
        </Text>
      </Box>
    </Box>
  );
}
