/**
 * CLI error types
 */

import { ModegreetError } from '@modegreet/core';

/**
 * The controlling terminal is missing or cannot be put into raw mode.
 */
export class TerminalError extends ModegreetError {
  constructor(message: string) {
    super(message, 'TERMINAL_ERROR');
    this.name = 'TerminalError';
  }
}
