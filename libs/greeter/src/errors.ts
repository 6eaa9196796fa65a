/**
 * Greeter error types
 */

import { ModegreetError } from '@modegreet/core';

export class PowerError extends ModegreetError {
  public readonly action: string;

  constructor(action: string, reason: string) {
    super(`${action === 'reboot' ? 'Reboot' : 'Poweroff'} failed: ${reason}`, 'POWER_FAILED');
    this.name = 'PowerError';
    this.action = action;
  }
}
