/**
 * Scrolling list with a highlighted selection
 */

import React from 'react';
import { Box, Text } from 'ink';

interface PickerListProps {
  items: string[];
  selected: number;
  height: number;
  emptyText?: string;
}

export function PickerList({ items, selected, height, emptyText = 'No matches' }: PickerListProps) {
  if (items.length === 0) {
    return <Text color="gray">{emptyText}</Text>;
  }

  const visible = Math.max(height, 1);
  const start = Math.min(Math.max(selected - Math.floor(visible / 2), 0), Math.max(items.length - visible, 0));
  const window = items.slice(start, start + visible);

  return (
    <Box flexDirection="column">
      {window.map((item, offset) => {
        const isSelected = start + offset === selected;
        return (
          <Text key={item} color={isSelected ? 'cyan' : undefined} bold={isSelected}>
            {isSelected ? '› ' : '  '}
            {item}
          </Text>
        );
      })}
      {items.length > visible && (
        <Text color="gray" dimColor>
          {selected + 1}/{items.length}
        </Text>
      )}
    </Box>
  );
}
