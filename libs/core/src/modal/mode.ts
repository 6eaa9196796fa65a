/**
 * Edit mode state machine
 */

export type EditMode = 'normal' | 'insert' | 'command';

export type ModeAction = 'enter-insert' | 'enter-command' | 'escape' | 'execute';

/**
 * Total transition function. Pairs not listed return the mode unchanged.
 */
export function transition(mode: EditMode, action: ModeAction): EditMode {
  switch (mode) {
    case 'normal':
      if (action === 'enter-insert') return 'insert';
      if (action === 'enter-command') return 'command';
      return mode;
    case 'insert':
      return action === 'escape' ? 'normal' : mode;
    case 'command':
      return action === 'escape' || action === 'execute' ? 'normal' : mode;
  }
}

export const MODE_LABELS: Record<EditMode, string> = {
  normal: 'NORMAL',
  insert: 'INSERT',
  command: 'COMMAND',
};
