/**
 * `:` command vocabulary of the wizard
 */

import { splitCommandLine, type ParseResult } from '@modegreet/core';

export type WizardCommand =
  | 'start'
  | 'next'
  | 'skip'
  | 'cancel'
  | 'reboot'
  | 'poweroff'
  | 'help'
  | 'submit'
  | 'finish';

const ALIASES: Record<string, WizardCommand> = {
  start: 'start',
  run: 'start',
  next: 'next',
  n: 'next',
  skip: 'skip',
  s: 'skip',
  cancel: 'cancel',
  q: 'cancel',
  quit: 'cancel',
  reboot: 'reboot',
  poweroff: 'poweroff',
  shutdown: 'poweroff',
  help: 'help',
  h: 'help',
  submit: 'submit',
  create: 'submit',
  install: 'submit',
  update: 'submit',
  finish: 'finish',
  done: 'finish',
  login: 'finish',
};

/**
 * Match the first word, case-insensitively. Arguments are ignored.
 */
export function parseWizardCommand(input: string): ParseResult<WizardCommand> {
  const { keyword } = splitCommandLine(input);
  const command = Object.prototype.hasOwnProperty.call(ALIASES, keyword) ? ALIASES[keyword] : undefined;
  if (command === undefined) {
    return { success: false, error: `Unknown command: ${keyword}` };
  }
  return { success: true, command };
}
