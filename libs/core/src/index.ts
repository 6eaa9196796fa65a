/**
 * @modegreet/core
 *
 * Modal editing engine and secret-aware text buffer shared by the login
 * screen and the onboarding wizard, plus logging and the base error class.
 */

export { TextBuffer, type TextBufferOptions } from './buffer/text-buffer.js';
export { transition, MODE_LABELS, type EditMode, type ModeAction } from './modal/mode.js';
export { charKey, namedKey, isChar, isCtrl, type KeyEvent, type NamedKey } from './modal/keys.js';
export {
  ModalInput,
  type Keymap,
  type ModalIntent,
  type ModalInputOptions,
  type NavigateDirection,
} from './modal/engine.js';
export {
  parseCommand,
  splitCommandLine,
  type LoginCommand,
  type ParseResult,
} from './modal/command.js';
export { createLogger, initLogging, getLogger, type Logger, type LoggerOptions } from './logging/logger.js';
export { ModegreetError, errorMessage } from './errors.js';
export { runProcess, runInteractive, type RunOptions, type RunResult } from './process/run.js';
