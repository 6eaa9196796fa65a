/**
 * Terminal-independent key model
 */

export type NamedKey =
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'tab'
  | 'backtab'
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'home'
  | 'end'
  | 'pageup'
  | 'pagedown'
  | 'f1'
  | 'f2'
  | 'f3'
  | 'f12';

export type KeyEvent =
  | { readonly code: 'char'; readonly char: string; readonly ctrl: boolean }
  | { readonly code: NamedKey };

/** A printable character, or a Ctrl chord when `ctrl` is set */
export function charKey(char: string, ctrl = false): KeyEvent {
  return { code: 'char', char, ctrl };
}

export function namedKey(code: NamedKey): KeyEvent {
  return { code };
}

export function isChar(key: KeyEvent, char: string): boolean {
  return key.code === 'char' && !key.ctrl && key.char === char;
}

export function isCtrl(key: KeyEvent, char: string): boolean {
  return key.code === 'char' && key.ctrl && key.char === char;
}
