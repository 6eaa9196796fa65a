/**
 * greetd session client
 *
 * Wraps a transport with the greetd request vocabulary. Requests are
 * serialised: the protocol is strictly request-then-response, so a call
 * made while another round trip is in flight waits for it to finish.
 */

import { getLogger } from '@modegreet/core';
import { SessionStartError } from './errors.js';
import { DemoTransport, SocketTransport, type Transport } from './transport.js';
import type { AuthExchange, GreetdRequest, GreetdResponse } from './types.js';

export interface GreetdClientOptions {
  /** Use the scripted demo transport instead of the greetd socket */
  demo?: boolean;

  /** Environment to read GREETD_SOCK from */
  env?: NodeJS.ProcessEnv;

  /** Response timeout in ms for the socket transport */
  timeout?: number;
}

/**
 * Map a response to the authentication conversation vocabulary.
 */
export function toAuthExchange(response: GreetdResponse): AuthExchange {
  if (response.type === 'success') {
    return { kind: 'success' };
  }

  if (response.type === 'error') {
    return { kind: 'error', text: response.description || 'Authentication failed' };
  }

  switch (response.auth_message_type) {
    case 'secret':
      return { kind: 'prompt-secret', prompt: response.auth_message };
    case 'visible':
      return { kind: 'prompt-visible', prompt: response.auth_message };
    case 'info':
      return { kind: 'info', text: response.auth_message };
    case 'error':
      return { kind: 'error', text: response.auth_message };
  }
}

export class GreetdClient {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly transport: Transport) {}

  /**
   * Client for the socket in GREETD_SOCK, or the demo transport.
   * Throws SocketNotFoundError when the variable is missing.
   */
  static create(options: GreetdClientOptions = {}): GreetdClient {
    if (options.demo) {
      return new GreetdClient(new DemoTransport());
    }
    return new GreetdClient(SocketTransport.fromEnv(options.env, options.timeout));
  }

  async createSession(username: string): Promise<AuthExchange> {
    return toAuthExchange(await this.send({ type: 'create_session', username }));
  }

  async postAuthMessageResponse(response: string | null): Promise<AuthExchange> {
    return toAuthExchange(await this.send({ type: 'post_auth_message_response', response }));
  }

  /**
   * Ask greetd to start the session once the greeter exits.
   */
  async startSession(cmd: string[], env: string[]): Promise<void> {
    const response = await this.send({ type: 'start_session', cmd, env });
    if (response.type === 'success') {
      return;
    }
    const exchange = toAuthExchange(response);
    throw new SessionStartError(exchange.kind === 'error' ? exchange.text : `unexpected ${response.type} response`);
  }

  /**
   * Best-effort cancel; failures are only logged.
   */
  async cancelSession(): Promise<void> {
    try {
      await this.send({ type: 'cancel_session' });
    } catch (err) {
      getLogger('ipc').warn({ err }, 'cancel_session failed');
    }
  }

  close(): void {
    this.transport.close();
  }

  private send(request: GreetdRequest): Promise<GreetdResponse> {
    const next = this.queue.then(
      () => this.transport.roundTrip(request),
      () => this.transport.roundTrip(request),
    );
    this.queue = next.catch(() => undefined);
    return next;
  }
}
