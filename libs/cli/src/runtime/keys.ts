/**
 * Translation of ink's `useInput` callbacks into key events
 *
 * ink strips the escape prefix from unknown sequences and flags them as
 * `meta`, so function keys arrive as their remaining characters.
 */

import type { Key } from 'ink';
import { charKey, namedKey, type KeyEvent, type NamedKey } from '@modegreet/core';

const ESCAPE_SEQUENCES: Record<string, NamedKey> = {
  OP: 'f1',
  '[11~': 'f1',
  OQ: 'f2',
  '[12~': 'f2',
  OR: 'f3',
  '[13~': 'f3',
  '[24~': 'f12',
  '[H': 'home',
  OH: 'home',
  '[1~': 'home',
  '[7~': 'home',
  '[F': 'end',
  OF: 'end',
  '[4~': 'end',
  '[8~': 'end',
};

export function fromInkInput(input: string, key: Key): KeyEvent[] {
  if (key.return) return [namedKey('enter')];
  if (key.tab) return [namedKey(key.shift ? 'backtab' : 'tab')];
  if (key.escape) return [namedKey('escape')];
  if (key.upArrow) return [namedKey('up')];
  if (key.downArrow) return [namedKey('down')];
  if (key.leftArrow) return [namedKey('left')];
  if (key.rightArrow) return [namedKey('right')];
  if (key.pageUp) return [namedKey('pageup')];
  if (key.pageDown) return [namedKey('pagedown')];

  // 0x7f arrives as `delete`; the real Delete key is ESC [3~
  if (key.delete) return [namedKey(key.meta ? 'delete' : 'backspace')];
  // 0x08 is what terminals send for Ctrl-H
  if (key.backspace) return [charKey('h', true)];

  if (key.meta) {
    const named = Object.prototype.hasOwnProperty.call(ESCAPE_SEQUENCES, input) ? ESCAPE_SEQUENCES[input] : undefined;
    return named ? [namedKey(named)] : [];
  }

  if (key.ctrl) {
    return input.length > 0 ? [charKey(input.toLowerCase(), true)] : [];
  }

  // Pasted text arrives as one chunk
  return Array.from(input, (char) => charKey(char));
}
