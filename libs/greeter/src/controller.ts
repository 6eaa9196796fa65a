/**
 * Login screen controller
 *
 * Owns the username and password buffers, the pickers and dialogs, and the
 * greetd authentication conversation. Keys are fed in by the event loop;
 * greetd round trips and power actions run as tracked background
 * operations that update the state and notify subscribers when they land.
 *
 * A login attempt carries the generation it started in. Cancelling bumps
 * the generation, so a conversation still waiting on greetd drops its
 * result instead of acting on it.
 */

import {
  errorMessage,
  getLogger,
  isChar,
  isCtrl,
  ModalInput,
  parseCommand,
  TextBuffer,
  type EditMode,
  type KeyEvent,
  type LoginCommand,
} from '@modegreet/core';
import type { AuthExchange, GreetdClient } from '@modegreet/ipc';
import { PowerError } from './errors.js';
import type { PowerAction, PowerControl } from './system/power.js';
import { buildEnv, findSession, type SessionRecord } from './system/sessions.js';
import { findUser, type UserRecord } from './system/users.js';

export type FocusField = 'username' | 'password';

export interface StatusMessage {
  text: string;
  isError: boolean;
}

export type Overlay =
  | { kind: 'none' }
  | { kind: 'help' }
  | { kind: 'confirm'; action: PowerAction }
  | { kind: 'session-picker' }
  | { kind: 'user-picker' };

export interface GreeterControllerOptions {
  client: GreetdClient;
  power: PowerControl;
  sessions?: SessionRecord[];
  users?: UserRecord[];
}

type Listener = () => void;

export class GreeterController {
  readonly username = new TextBuffer();
  readonly password = TextBuffer.masked();
  readonly input = new ModalInput({ initialMode: 'insert', keymap: 'field' });

  readonly sessions: SessionRecord[];
  readonly users: UserRecord[];
  selectedSession = 0;
  selectedUser = 0;

  focus: FocusField = 'username';
  overlay: Overlay = { kind: 'none' };
  message: StatusMessage | null = null;

  /** A greetd request is outstanding */
  working = false;
  /** greetd asked a further question; the next submission answers it */
  awaitingAnswer = false;
  exitSuccess = false;
  shouldExit = false;

  private readonly client: GreetdClient;
  private readonly power: PowerControl;
  private readonly listeners = new Set<Listener>();
  private readonly pending = new Set<Promise<void>>();
  private generation = 0;
  private readonly log = getLogger('greeter');

  constructor(options: GreeterControllerOptions) {
    this.client = options.client;
    this.power = options.power;
    this.sessions = options.sessions ?? [];
    this.users = options.users ?? [];
  }

  get mode(): EditMode {
    return this.input.mode;
  }

  get focusedBuffer(): TextBuffer {
    return this.focus === 'username' ? this.username : this.password;
  }

  get currentSession(): SessionRecord | undefined {
    return this.sessions[this.selectedSession];
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every background operation started so far has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  handleKey(key: KeyEvent): void {
    if (this.message && !this.working) {
      this.message = null;
    }

    switch (this.overlay.kind) {
      case 'confirm':
        this.handleConfirmKey(key, this.overlay.action);
        break;
      case 'help':
        if (key.code === 'escape' || isChar(key, 'q')) {
          this.overlay = { kind: 'none' };
        }
        break;
      case 'session-picker':
      case 'user-picker':
        this.handlePickerKey(key, this.overlay.kind);
        break;
      case 'none':
        this.handleModalKey(key);
        break;
    }

    this.notify();
  }

  /**
   * Start a login attempt, or answer the question greetd is waiting on.
   */
  login(): void {
    if (this.working) {
      this.setError('Authentication in progress');
      return;
    }

    if (this.awaitingAnswer) {
      this.awaitingAnswer = false;
      this.working = true;
      const generation = this.generation;
      const answer = this.takePassword();
      this.track(this.converse(this.client.postAuthMessageResponse(answer), generation, true));
      return;
    }

    if (this.username.isEmpty()) {
      this.setError('Username is required');
      return;
    }

    this.working = true;
    this.message = null;
    const generation = ++this.generation;
    const username = this.username.content();
    this.log.debug({ username }, 'Creating session');
    this.track(this.converse(this.client.createSession(username), generation, false));
  }

  /** Wipe the secret field; called when the login screen goes away */
  dispose(): void {
    this.password.dispose();
  }

  cancel(): void {
    this.generation++;
    this.working = false;
    this.awaitingAnswer = false;
    this.password.clear();
    this.log.info('Login cancelled');
    this.track(this.client.cancelSession());
  }

  private async converse(first: Promise<AuthExchange>, generation: number, answered: boolean): Promise<void> {
    let passwordSent = answered;
    try {
      let exchange = await first;
      for (;;) {
        if (generation !== this.generation) {
          return;
        }

        if (exchange.kind === 'info') {
          this.setInfo(exchange.text);
          exchange = await this.client.postAuthMessageResponse(null);
          continue;
        }

        if (exchange.kind === 'prompt-secret' && !passwordSent) {
          passwordSent = true;
          exchange = await this.client.postAuthMessageResponse(this.takePassword());
          continue;
        }

        if (exchange.kind === 'prompt-secret' || exchange.kind === 'prompt-visible') {
          this.askFurther(exchange.prompt);
          return;
        }

        if (exchange.kind === 'error') {
          await this.fail(exchange.text);
          return;
        }

        this.log.info('Authentication successful');
        await this.startSession(generation);
        return;
      }
    } catch (err) {
      if (generation !== this.generation) {
        return;
      }
      this.log.error({ err }, 'greetd conversation failed');
      await this.fail(errorMessage(err));
    }
  }

  /** Copy the password out for the broker and wipe the field */
  private takePassword(): string {
    const secret = this.password.content();
    this.password.clear();
    return secret;
  }

  private askFurther(prompt: string): void {
    this.working = false;
    this.awaitingAnswer = true;
    this.setInfo(prompt);
    this.password.clear();
    this.focus = 'password';
    this.input.setMode('insert');
  }

  private async fail(text: string): Promise<void> {
    this.log.warn({ reason: text }, 'Authentication failed');
    this.working = false;
    this.awaitingAnswer = false;
    this.setError(text);
    this.password.clear();
    await this.client.cancelSession();
  }

  private async startSession(generation: number): Promise<void> {
    const session = this.currentSession;
    if (!session) {
      this.working = false;
      this.setError('No session selected');
      return;
    }

    this.log.info({ session: session.slug, cmd: session.command }, 'Starting session');
    try {
      await this.client.startSession(session.command, buildEnv(session));
    } catch (err) {
      if (generation !== this.generation) return;
      this.log.error({ err }, 'Session start failed');
      this.working = false;
      this.setError(errorMessage(err));
      return;
    }

    if (generation !== this.generation) return;
    this.working = false;
    this.exitSuccess = true;
    this.shouldExit = true;
  }

  private handleModalKey(key: KeyEvent): void {
    const intent = this.input.handleKey(key, this.focusedBuffer);

    switch (intent.type) {
      case 'none':
      case 'edited':
        return;
      case 'navigate':
        if (intent.direction !== 'left' && intent.direction !== 'right') {
          this.toggleFocus();
        }
        return;
      case 'submit':
        this.submit();
        return;
      case 'execute':
        this.executeCommand(intent.command);
        return;
      case 'unhandled':
        this.handleGlobalKey(intent.key);
        return;
    }
  }

  private submit(): void {
    if (this.input.mode === 'insert' && this.focus === 'username' && !this.username.isEmpty()) {
      this.focus = 'password';
      return;
    }
    if (this.focus === 'password') {
      this.input.setMode('normal');
    }
    this.login();
  }

  private handleGlobalKey(key: KeyEvent): void {
    if (isCtrl(key, 'c')) {
      if (this.working || this.awaitingAnswer) this.cancel();
      return;
    }

    switch (key.code) {
      case 'f1':
        this.overlay = { kind: 'help' };
        break;
      case 'f2':
        this.overlay = { kind: 'user-picker' };
        break;
      case 'f3':
        this.overlay = { kind: 'session-picker' };
        break;
      case 'f12':
        this.overlay = { kind: 'confirm', action: 'poweroff' };
        break;
      default:
        break;
    }
  }

  private executeCommand(line: string): void {
    const parsed = parseCommand(line);
    if (!parsed.success) {
      this.setError(parsed.error);
      return;
    }
    this.runCommand(parsed.command);
  }

  private runCommand(command: LoginCommand): void {
    switch (command.kind) {
      case 'reboot':
      case 'poweroff':
        this.overlay = { kind: 'confirm', action: command.kind };
        return;
      case 'session':
        if (command.name === undefined) {
          this.overlay = { kind: 'session-picker' };
          return;
        }
        this.selectSessionByName(command.name);
        return;
      case 'user':
        if (command.name === undefined) {
          this.overlay = { kind: 'user-picker' };
          return;
        }
        this.selectUserByName(command.name);
        return;
      case 'login':
      case 'quit':
        this.login();
        return;
      case 'cancel':
        this.cancel();
        return;
      case 'help':
        this.overlay = { kind: 'help' };
        return;
    }
  }

  private selectSessionByName(name: string): void {
    const index = findSession(this.sessions, name);
    if (index === -1) {
      this.setError(`Session not found: ${name}`);
      return;
    }
    this.selectedSession = index;
  }

  private selectUserByName(name: string): void {
    const index = findUser(this.users, name);
    const user = this.users[index];
    if (!user) {
      this.setError(`User not found: ${name}`);
      return;
    }
    this.selectedUser = index;
    this.username.set(user.username);
  }

  private handlePickerKey(key: KeyEvent, picker: 'session-picker' | 'user-picker'): void {
    const count = picker === 'session-picker' ? this.sessions.length : this.users.length;
    const current = picker === 'session-picker' ? this.selectedSession : this.selectedUser;
    let next = current;

    if (key.code === 'escape' || isChar(key, 'q')) {
      this.overlay = { kind: 'none' };
      return;
    }

    if (key.code === 'down' || isChar(key, 'j')) {
      next = Math.min(current + 1, Math.max(count - 1, 0));
    } else if (key.code === 'up' || isChar(key, 'k')) {
      next = Math.max(current - 1, 0);
    } else if (key.code === 'enter') {
      if (picker === 'user-picker') {
        const user = this.users[this.selectedUser];
        if (user) this.username.set(user.username);
      }
      this.overlay = { kind: 'none' };
      return;
    }

    if (picker === 'session-picker') {
      this.selectedSession = next;
    } else {
      this.selectedUser = next;
    }
  }

  private handleConfirmKey(key: KeyEvent, action: PowerAction): void {
    if (isChar(key, 'y') || isChar(key, 'Y')) {
      this.overlay = { kind: 'none' };
      this.track(this.runPower(action));
    } else if (isChar(key, 'n') || isChar(key, 'N') || key.code === 'escape') {
      this.overlay = { kind: 'none' };
    }
  }

  private async runPower(action: PowerAction): Promise<void> {
    try {
      await this.power.run(action);
    } catch (err) {
      this.log.error({ err, action }, 'Power action failed');
      this.setError(
        err instanceof PowerError
          ? err.message
          : `${action === 'reboot' ? 'Reboot' : 'Poweroff'} failed: ${errorMessage(err)}`,
      );
    }
  }

  private toggleFocus(): void {
    this.focus = this.focus === 'username' ? 'password' : 'username';
  }

  private setError(text: string): void {
    this.message = { text, isError: true };
  }

  private setInfo(text: string): void {
    this.message = { text, isError: false };
  }

  private track(operation: Promise<void>): void {
    const tracked = operation
      .catch((err: unknown) => {
        this.log.error({ err }, 'Background operation failed');
      })
      .finally(() => {
        this.pending.delete(tracked);
        this.notify();
      });
    this.pending.add(tracked);
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
