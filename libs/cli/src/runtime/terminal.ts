/**
 * Terminal guard
 *
 * Switches to the alternate screen and makes sure the terminal is handed
 * back in a usable state however the process ends: raw mode off, main
 * screen restored, cursor visible. Restoration runs once.
 */

import { errorMessage, getLogger } from '@modegreet/core';
import { TerminalError } from '../errors.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const SHOW_CURSOR = '\x1b[?25h';

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface TerminalStreams {
  stdin: { readonly isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  stdout: { write: (chunk: string) => boolean };
}

export class TerminalGuard {
  private readonly stdin: TerminalStreams['stdin'];
  private readonly stdout: TerminalStreams['stdout'];
  private active = false;
  private restored = false;

  private readonly onExit = (): void => this.restore();
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.restore();
    process.exit(SIGNAL_EXIT_CODES[signal] ?? 1);
  };
  private readonly onFatal = (reason: unknown): void => this.fatal(reason);

  constructor(streams: TerminalStreams = { stdin: process.stdin, stdout: process.stdout }) {
    this.stdin = streams.stdin;
    this.stdout = streams.stdout;
  }

  /**
   * Take over the terminal. Throws TerminalError when stdin is not a TTY.
   */
  install(): void {
    if (!this.stdin.isTTY) {
      throw new TerminalError('stdin is not a terminal');
    }
    if (this.active) return;

    this.stdout.write(ENTER_ALT_SCREEN);
    this.active = true;

    process.on('exit', this.onExit);
    process.on('SIGINT', this.onSignal);
    process.on('SIGTERM', this.onSignal);
    process.on('uncaughtException', this.onFatal);
    process.on('unhandledRejection', this.onFatal);
  }

  /**
   * Give the terminal to a child process; `resume()` takes it back.
   */
  suspend(): void {
    if (!this.active) return;
    this.resetModes();
    this.stdout.write(LEAVE_ALT_SCREEN);
  }

  resume(): void {
    if (!this.active) return;
    this.stdout.write(ENTER_ALT_SCREEN);
  }

  restore(): void {
    if (this.restored || !this.active) return;
    this.restored = true;
    this.active = false;

    this.resetModes();
    this.stdout.write(LEAVE_ALT_SCREEN);
    process.removeListener('exit', this.onExit);
    process.removeListener('SIGINT', this.onSignal);
    process.removeListener('SIGTERM', this.onSignal);
    process.removeListener('uncaughtException', this.onFatal);
    process.removeListener('unhandledRejection', this.onFatal);
  }

  private resetModes(): void {
    if (this.stdin.isTTY) {
      this.stdin.setRawMode?.(false);
    }
    this.stdout.write(SHOW_CURSOR);
  }

  private fatal(reason: unknown): void {
    getLogger('terminal').fatal({ err: reason }, 'Unhandled failure');
    this.restore();
    process.stderr.write(`Error: ${errorMessage(reason)}\n`);
    process.exit(1);
  }
}
