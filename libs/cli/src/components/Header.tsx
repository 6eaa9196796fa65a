/**
 * Screen header component
 */

import React from 'react';
import { Box, Text } from 'ink';

interface HeaderProps {
  title: string;
  subtitle?: string;
}

export function Header({ title, subtitle }: HeaderProps) {
  return (
    <Box flexDirection="column" marginBottom={1} alignItems="center">
      <Text bold color="cyan">
        {title}
      </Text>
      {subtitle ? <Text color="gray">{subtitle}</Text> : null}
    </Box>
  );
}
