/**
 * Power control through systemd
 */

import { getLogger, runProcess } from '@modegreet/core';
import { PowerError } from '../errors.js';

export type PowerAction = 'reboot' | 'poweroff';

export interface PowerControl {
  run(action: PowerAction): Promise<void>;
}

export class SystemctlPower implements PowerControl {
  async run(action: PowerAction): Promise<void> {
    getLogger('power').info({ action }, 'Requesting power action');
    const result = await runProcess('systemctl', [action]);
    if (result.exitCode !== 0) {
      throw new PowerError(action, result.stderr.trim() || `systemctl exited with ${result.exitCode}`);
    }
  }
}

/** Records requested actions instead of performing them */
export class DemoPower implements PowerControl {
  readonly requested: PowerAction[] = [];

  async run(action: PowerAction): Promise<void> {
    getLogger('power').info({ action }, 'Demo mode: power action skipped');
    this.requested.push(action);
  }
}

export function createPowerControl(demo: boolean): PowerControl {
  return demo ? new DemoPower() : new SystemctlPower();
}
