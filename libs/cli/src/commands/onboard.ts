/**
 * Onboard command
 *
 * Runs the first-boot setup wizard. A dry run ends on the demo login
 * screen instead of rebooting.
 */

import { Command } from 'commander';
import { getLogger, initLogging } from '@modegreet/core';
import { DEFAULT_CONFIG_PATH } from '@modegreet/onboard';
import { TerminalGuard } from '../runtime/terminal.js';
import { runOnboard } from '../onboard/run.js';
import { runGreeter } from '../greeter/run.js';

interface OnboardCommandOptions {
  dryrun?: boolean;
  config?: string;
  logFile?: string;
}

export function createOnboardCommand(): Command {
  return new Command('onboard')
    .description('Run the first-boot setup wizard')
    .option('--dryrun', 'Simulate every system change')
    .option('--config <path>', 'Wizard configuration file', DEFAULT_CONFIG_PATH)
    .option('--log-file <path>', 'Append JSON logs to this file')
    .action(async (opts: OnboardCommandOptions) => {
      initLogging({ logFile: opts.logFile });

      const guard = new TerminalGuard();
      guard.install();
      try {
        const outcome = await runOnboard({ dryrun: opts.dryrun === true, config: opts.config }, guard);
        if (outcome === 'login') {
          getLogger('onboard').info('Continuing to the demo login screen');
          await runGreeter({ dryrun: true });
        }
      } finally {
        guard.restore();
      }
      process.exit(0);
    });
}
