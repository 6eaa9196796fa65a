/**
 * Onboarding wizard runner
 *
 * Loads the configuration, picks the live or dry-run service and drives the
 * wizard controller from the event loop. Actions the controller hands back
 * (network helper, power, login screen) are carried out here.
 */

import React from 'react';
import { render, type Instance } from 'ink';
import { errorMessage, getLogger, runInteractive } from '@modegreet/core';
import { createPowerControl } from '@modegreet/greeter';
import {
  DryRunOnboardService,
  LiveOnboardService,
  OnboardController,
  loadConfig,
  type OnboardAction,
  type OnboardService,
} from '@modegreet/onboard';
import { EventLoop, type LoopEvent } from '../runtime/event-loop.js';
import type { TerminalGuard } from '../runtime/terminal.js';
import { KeyInput } from '../components/KeyInput.js';
import { WizardScreen } from './WizardScreen.js';

export interface OnboardRunOptions {
  dryrun: boolean;
  config?: string;
}

export type OnboardOutcome = 'exit' | 'reboot' | 'poweroff' | 'login';

export async function runOnboard(options: OnboardRunOptions, guard: TerminalGuard): Promise<OnboardOutcome> {
  const log = getLogger('onboard');
  const config = await loadConfig(options.config);
  if (options.dryrun) {
    config.general.dryrun = true;
  }
  const dryRun = config.general.dryrun;
  const service: OnboardService = dryRun ? new DryRunOnboardService() : new LiveOnboardService();
  const power = createPowerControl(dryRun);

  const controller = new OnboardController({ config, service });
  let columns = process.stdout.columns || 80;
  let rows = process.stdout.rows || 24;
  let outcome: OnboardOutcome = 'exit';

  const loop = new EventLoop({ onEvent: (event) => handle(event) });
  const view = () =>
    React.createElement(
      React.Fragment,
      null,
      React.createElement(WizardScreen, { controller, columns, rows }),
      React.createElement(KeyInput, { onKey: (key) => loop.push({ type: 'key', key }) }),
    );
  const mount = (): Instance => render(view(), { exitOnCtrlC: false });

  let app = mount();

  const launch = async (program: string, args: string[]): Promise<void> => {
    log.info({ program, args }, 'Handing the terminal to the network helper');
    app.unmount();
    guard.suspend();
    try {
      const exitCode = await runInteractive(program, args);
      controller.externalFinished(program, { exitCode });
    } catch (err) {
      controller.externalFinished(program, { error: errorMessage(err) });
    } finally {
      guard.resume();
      app = mount();
    }
  };

  const perform = async (action: OnboardAction): Promise<void> => {
    switch (action.type) {
      case 'launch-external':
        await launch(action.program, action.args);
        return;
      case 'reboot':
      case 'poweroff':
        log.info({ action: action.type }, 'Setup finished');
        await power.run(action.type);
        outcome = action.type;
        loop.stop();
        return;
      case 'transition-to-login':
        outcome = 'login';
        loop.stop();
        return;
    }
  };

  const handle = async (event: LoopEvent): Promise<void> => {
    switch (event.type) {
      case 'key': {
        const action = controller.handleKey(event.key);
        if (action) {
          await perform(action);
        }
        break;
      }
      case 'tick':
        controller.tick();
        break;
      case 'resize':
        columns = event.columns;
        rows = event.rows;
        break;
      case 'wake':
        break;
    }
    controller.processMessages();
    if (controller.shouldExit) {
      loop.stop();
    }
    app.rerender(view());
  };

  const onResize = () => loop.push({ type: 'resize', columns: process.stdout.columns || 80, rows: process.stdout.rows || 24 });
  controller.channel.onPost(() => loop.push({ type: 'wake' }));
  process.stdout.on('resize', onResize);
  controller.init();

  try {
    await loop.run();
    await controller.whenIdle();
  } finally {
    process.stdout.off('resize', onResize);
    app.unmount();
    // Secrets go before the login screen takes over
    controller.dispose();
  }

  log.info({ outcome }, 'Wizard finished');
  return outcome;
}
