/**
 * Modal input engine
 *
 * Translates key events into buffer edits or intents for the owning
 * controller. The engine owns the mode, the `:` command line and the
 * pending `d` of a `dd` chord; the focused buffer is passed in per key.
 *
 * Two keymaps exist for Normal mode:
 * - `field`: h/l and arrows move the cursor, `0 $ x dd a A I` edit the field
 * - `panel`: h/l and arrows navigate between panels, everything else that
 *   is not a mode key is left to the controller
 */

import { TextBuffer } from '../buffer/text-buffer.js';
import { type EditMode, type ModeAction, transition } from './mode.js';
import type { KeyEvent } from './keys.js';

export type Keymap = 'field' | 'panel';

export type NavigateDirection = 'up' | 'down' | 'left' | 'right' | 'next' | 'prev';

export type ModalIntent =
  | { type: 'none' }
  | { type: 'edited' }
  | { type: 'navigate'; direction: NavigateDirection }
  | { type: 'submit' }
  | { type: 'execute'; command: string }
  | { type: 'unhandled'; key: KeyEvent };

export interface ModalInputOptions {
  initialMode?: EditMode;
  keymap?: Keymap;
}

const NONE: ModalIntent = { type: 'none' };
const EDITED: ModalIntent = { type: 'edited' };

export class ModalInput {
  readonly keymap: Keymap;
  readonly commandLine = new TextBuffer();
  private current: EditMode;
  private pendingDelete = false;

  constructor(options: ModalInputOptions = {}) {
    this.current = options.initialMode ?? 'normal';
    this.keymap = options.keymap ?? 'field';
  }

  get mode(): EditMode {
    return this.current;
  }

  /** Apply a transition from the mode table */
  apply(action: ModeAction): EditMode {
    this.current = transition(this.current, action);
    return this.current;
  }

  /**
   * Force a mode outside the transition table, e.g. leaving Insert after
   * a field is submitted.
   */
  setMode(mode: EditMode): void {
    this.current = mode;
    this.pendingDelete = false;
    if (mode !== 'command') {
      this.commandLine.clear();
    }
  }

  handleKey(key: KeyEvent, buffer: TextBuffer | null): ModalIntent {
    switch (this.current) {
      case 'normal':
        return this.handleNormal(key, buffer);
      case 'insert':
        return this.handleInsert(key, buffer);
      case 'command':
        return this.handleCommand(key);
    }
  }

  private handleNormal(key: KeyEvent, buffer: TextBuffer | null): ModalIntent {
    const wasPendingDelete = this.pendingDelete;
    this.pendingDelete = false;

    switch (key.code) {
      case 'enter':
        return { type: 'submit' };
      case 'down':
      case 'tab':
        return { type: 'navigate', direction: 'down' };
      case 'up':
      case 'backtab':
        return { type: 'navigate', direction: 'up' };
      case 'left':
        return this.horizontal('left', buffer);
      case 'right':
        return this.horizontal('right', buffer);
      case 'char':
        break;
      default:
        return { type: 'unhandled', key };
    }

    if (key.ctrl) {
      return { type: 'unhandled', key };
    }

    switch (key.char) {
      case ':':
        this.apply('enter-command');
        this.commandLine.clear();
        return NONE;
      case 'j':
        return { type: 'navigate', direction: 'down' };
      case 'k':
        return { type: 'navigate', direction: 'up' };
      case 'h':
        return this.horizontal('left', buffer);
      case 'l':
        return this.horizontal('right', buffer);
      case 'i':
        return this.enterInsert(buffer, null);
      case 'a':
        return this.enterInsert(buffer, (b) => b.moveRight());
    }

    if (this.keymap === 'panel' || buffer === null) {
      return { type: 'unhandled', key };
    }

    switch (key.char) {
      case 'A':
        return this.enterInsert(buffer, (b) => b.moveEnd());
      case 'I':
        return this.enterInsert(buffer, (b) => b.moveStart());
      case '0':
        buffer.moveStart();
        return NONE;
      case '$':
        buffer.moveEnd();
        return NONE;
      case 'x':
        return buffer.deleteForward() ? EDITED : NONE;
      case 'd':
        if (wasPendingDelete) {
          buffer.clear();
          return EDITED;
        }
        this.pendingDelete = true;
        return NONE;
      default:
        return { type: 'unhandled', key };
    }
  }

  private handleInsert(key: KeyEvent, buffer: TextBuffer | null): ModalIntent {
    switch (key.code) {
      case 'escape':
        this.apply('escape');
        return NONE;
      case 'enter':
        return { type: 'submit' };
      case 'tab':
        return { type: 'navigate', direction: 'next' };
      case 'backtab':
        return { type: 'navigate', direction: 'prev' };
      case 'char':
        break;
      default:
        if (buffer === null) return { type: 'unhandled', key };
        return this.editNamed(key, buffer);
    }

    if (buffer === null) {
      return { type: 'unhandled', key };
    }

    if (!key.ctrl) {
      buffer.insert(key.char);
      return EDITED;
    }

    switch (key.char) {
      case 'w':
        return buffer.deleteWordBack() ? EDITED : NONE;
      case 'u':
        buffer.clear();
        return EDITED;
      case 'a':
        buffer.moveStart();
        return NONE;
      case 'e':
        buffer.moveEnd();
        return NONE;
      default:
        return { type: 'unhandled', key };
    }
  }

  private handleCommand(key: KeyEvent): ModalIntent {
    switch (key.code) {
      case 'escape':
        this.apply('escape');
        this.commandLine.clear();
        return NONE;
      case 'enter': {
        const command = this.commandLine.content().trim();
        this.apply('execute');
        this.commandLine.clear();
        return { type: 'execute', command };
      }
      case 'backspace':
        if (this.commandLine.isEmpty()) {
          this.apply('escape');
        } else {
          this.commandLine.deleteBack();
        }
        return NONE;
      case 'left':
        this.commandLine.moveLeft();
        return NONE;
      case 'right':
        this.commandLine.moveRight();
        return NONE;
      case 'char':
        if (!key.ctrl) {
          this.commandLine.insert(key.char);
        }
        return NONE;
      default:
        return NONE;
    }
  }

  private editNamed(key: KeyEvent, buffer: TextBuffer): ModalIntent {
    switch (key.code) {
      case 'backspace':
        return buffer.deleteBack() ? EDITED : NONE;
      case 'delete':
        return buffer.deleteForward() ? EDITED : NONE;
      case 'left':
        buffer.moveLeft();
        return NONE;
      case 'right':
        buffer.moveRight();
        return NONE;
      case 'home':
        buffer.moveStart();
        return NONE;
      case 'end':
        buffer.moveEnd();
        return NONE;
      default:
        return { type: 'unhandled', key };
    }
  }

  private horizontal(direction: 'left' | 'right', buffer: TextBuffer | null): ModalIntent {
    if (this.keymap === 'panel' || buffer === null) {
      return { type: 'navigate', direction };
    }
    if (direction === 'left') {
      buffer.moveLeft();
    } else {
      buffer.moveRight();
    }
    return NONE;
  }

  private enterInsert(buffer: TextBuffer | null, move: ((b: TextBuffer) => void) | null): ModalIntent {
    if (buffer === null) {
      return NONE;
    }
    move?.(buffer);
    this.apply('enter-insert');
    return NONE;
  }
}
