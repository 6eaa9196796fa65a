/**
 * Single-line text field backed by a TextBuffer
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { EditMode, TextBuffer } from '@modegreet/core';

interface FieldProps {
  label: string;
  buffer: TextBuffer;
  focused: boolean;
  mode: EditMode;
  width?: number;
}

export function Field({ label, buffer, focused, mode, width = 34 }: FieldProps) {
  const chars = Array.from(buffer.display('•'));
  const cursor = Math.min(buffer.cursor, chars.length);
  const borderColor = !focused ? 'gray' : mode === 'insert' ? 'green' : 'cyan';

  return (
    <Box>
      <Box width={12} marginTop={1}>
        <Text color={focused ? 'cyan' : 'gray'} bold={focused}>
          {label}
        </Text>
      </Box>
      <Box borderStyle="round" borderColor={borderColor} width={width} paddingX={1}>
        {focused ? (
          <Text>
            {chars.slice(0, cursor).join('')}
            <Text inverse>{chars[cursor] ?? ' '}</Text>
            {chars.slice(cursor + 1).join('')}
          </Text>
        ) : (
          <Text>{chars.join('')}</Text>
        )}
      </Box>
    </Box>
  );
}
