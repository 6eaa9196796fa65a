/**
 * Login screen runner
 *
 * Wires the greeter controller to greetd (or the demo transport), renders
 * it with ink and feeds it events until a session starts or the user quits.
 */

import os from 'node:os';
import React from 'react';
import { render } from 'ink';
import { getLogger } from '@modegreet/core';
import { DemoTransport, GreetdClient, SocketTransport, type Transport } from '@modegreet/ipc';
import { GreeterController, createPowerControl, discoverSessions, discoverUsers } from '@modegreet/greeter';
import { EventLoop, type LoopEvent } from '../runtime/event-loop.js';
import { KeyInput } from '../components/KeyInput.js';
import { LoginScreen } from './LoginScreen.js';

export interface GreeterRunOptions {
  dryrun: boolean;
}

export interface GreeterOutcome {
  /** A session was started; greetd takes over once we exit */
  sessionStarted: boolean;
}

export async function runGreeter(options: GreeterRunOptions): Promise<GreeterOutcome> {
  const log = getLogger('greeter');
  const transport: Transport = options.dryrun ? new DemoTransport() : SocketTransport.fromEnv();
  const client = new GreetdClient(transport);

  const [sessions, users] = await Promise.all([discoverSessions(), discoverUsers()]);
  log.info({ sessions: sessions.length, users: users.length, demo: options.dryrun }, 'Greeter starting');

  const controller = new GreeterController({
    client,
    power: createPowerControl(options.dryrun),
    sessions,
    users,
  });

  const hostname = os.hostname();
  let columns = process.stdout.columns || 80;
  let rows = process.stdout.rows || 24;

  const loop = new EventLoop({ onEvent: (event) => handle(event) });
  const view = () =>
    React.createElement(
      React.Fragment,
      null,
      React.createElement(LoginScreen, { controller, hostname, demo: options.dryrun, columns, rows }),
      React.createElement(KeyInput, { onKey: (key) => loop.push({ type: 'key', key }) }),
    );

  const handle = (event: LoopEvent): void => {
    switch (event.type) {
      case 'key':
        controller.handleKey(event.key);
        break;
      case 'resize':
        columns = event.columns;
        rows = event.rows;
        break;
      default:
        break;
    }
    if (controller.shouldExit) {
      loop.stop();
      return;
    }
    app.rerender(view());
  };

  const onResize = () => loop.push({ type: 'resize', columns: process.stdout.columns || 80, rows: process.stdout.rows || 24 });
  const unsubscribe = controller.subscribe(() => loop.push({ type: 'wake' }));
  process.stdout.on('resize', onResize);

  const app = render(view(), { exitOnCtrlC: false });
  try {
    await loop.run();
    await controller.whenIdle();
  } finally {
    process.stdout.off('resize', onResize);
    unsubscribe();
    app.unmount();
    client.close();
    controller.dispose();
  }

  log.info({ sessionStarted: controller.exitSuccess }, 'Greeter finished');
  return { sessionStarted: controller.exitSuccess };
}
