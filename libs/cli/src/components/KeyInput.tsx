/**
 * Invisible component forwarding terminal input to the event loop
 */

import { useInput } from 'ink';
import type { KeyEvent } from '@modegreet/core';
import { fromInkInput } from '../runtime/keys.js';

interface KeyInputProps {
  onKey: (key: KeyEvent) => void;
}

export function KeyInput({ onKey }: KeyInputProps) {
  useInput((input, key) => {
    for (const event of fromInkInput(input, key)) {
      onKey(event);
    }
  });
  return null;
}
