#!/usr/bin/env node
/**
 * modegreet CLI
 *
 * Terminal login screen for greetd and the first-boot setup wizard.
 *
 * @example
 * ```bash
 * # Try the login screen without greetd
 * modegreet greet --dryrun
 *
 * # Run the setup wizard against a custom config
 * modegreet onboard --config ./onboard.toml --dryrun
 * ```
 */

import { Command } from 'commander';
import { errorMessage } from '@modegreet/core';
import { createGreetCommand, createOnboardCommand } from './commands/index.js';
import { VERSION } from './index.js';

/**
 * Create and configure the main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('modegreet')
    .description('Modal terminal greeter and onboarding wizard')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText(
      'after',
      `
Examples:
  $ modegreet greet                  Run as the greetd greeter
  $ modegreet greet --dryrun         Demo login screen (password: demo)
  $ modegreet onboard                First-boot setup wizard
  $ modegreet onboard --dryrun       Walk through setup without changing anything
`
    );

  program.addCommand(createGreetCommand());
  program.addCommand(createOnboardCommand());

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
