/**
 * Greet command
 *
 * Runs the login screen as a greetd greeter.
 */

import { Command } from 'commander';
import { initLogging } from '@modegreet/core';
import { TerminalGuard } from '../runtime/terminal.js';
import { runGreeter } from '../greeter/run.js';

interface GreetCommandOptions {
  dryrun?: boolean;
  logFile?: string;
}

export function createGreetCommand(): Command {
  return new Command('greet')
    .description('Show the login screen and start the chosen session through greetd')
    .option('--dryrun', 'Use the demo transport and skip power actions')
    .option('--log-file <path>', 'Append JSON logs to this file')
    .action(async (opts: GreetCommandOptions) => {
      initLogging({ logFile: opts.logFile });

      const guard = new TerminalGuard();
      guard.install();
      try {
        await runGreeter({ dryrun: opts.dryrun === true });
      } finally {
        guard.restore();
      }
      process.exit(0);
    });
}
