/**
 * Transports for greetd requests
 *
 * `SocketTransport` keeps one Unix stream connection to the daemon open for
 * the whole process. `DemoTransport` answers from a fixed script without
 * any I/O and is used for dry runs.
 */

import * as net from 'node:net';
import { getLogger } from '@modegreet/core';
import { decodeResponse, encodeFrame, FrameDecoder } from './codec.js';
import { GREETD_SOCK_ENV } from './constants.js';
import { ProtocolError, SocketNotFoundError, TransportError } from './errors.js';
import type { GreetdRequest, GreetdResponse } from './types.js';

export interface Transport {
  /** Send one request and wait for its single response */
  roundTrip(request: GreetdRequest): Promise<GreetdResponse>;
  close(): void;
}

export interface SocketTransportOptions {
  /** Unix socket path */
  socketPath: string;

  /** Response timeout in ms */
  timeout?: number;
}

interface Waiter {
  resolve: (response: GreetdResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/** Request as it may be logged; the auth response is a credential */
function describe(request: GreetdRequest): Record<string, unknown> {
  return request.type === 'post_auth_message_response'
    ? { type: request.type, response: request.response === null ? null : '[REDACTED]' }
    : { ...request };
}

export class SocketTransport implements Transport {
  readonly socketPath: string;
  private timeout: number;
  private socket: net.Socket | null = null;
  private connecting: Promise<net.Socket> | null = null;
  private decoder = new FrameDecoder();
  private waiter: Waiter | null = null;

  constructor(options: SocketTransportOptions) {
    this.socketPath = options.socketPath;
    this.timeout = options.timeout || 30000;
  }

  /**
   * Transport for the socket named by GREETD_SOCK.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, timeout?: number): SocketTransport {
    const socketPath = env[GREETD_SOCK_ENV];
    if (!socketPath) {
      throw new SocketNotFoundError();
    }
    return new SocketTransport({ socketPath, timeout });
  }

  /** Open the connection now instead of on the first request */
  async connect(): Promise<void> {
    await this.ensureConnected();
  }

  async roundTrip(request: GreetdRequest): Promise<GreetdResponse> {
    const socket = await this.ensureConnected();
    const log = getLogger('ipc');

    return new Promise<GreetdResponse>((resolve, reject) => {
      if (this.waiter) {
        reject(new TransportError('A greetd request is already in flight', this.socketPath));
        return;
      }

      const timer = setTimeout(() => {
        this.fail(new TransportError('Timed out waiting for greetd', this.socketPath));
      }, this.timeout);

      this.waiter = { resolve, reject, timer };
      log.debug({ request: describe(request) }, 'greetd request');

      socket.write(encodeFrame(request), (err) => {
        if (err) {
          this.fail(new TransportError(`Failed to write to greetd: ${err.message}`, this.socketPath));
        }
      });
    });
  }

  close(): void {
    this.fail(new TransportError('Connection closed', this.socketPath));
    this.socket?.destroy();
    this.socket = null;
    this.connecting = null;
  }

  private ensureConnected(): Promise<net.Socket> {
    if (this.socket) return Promise.resolve(this.socket);
    if (this.connecting) return this.connecting;

    this.connecting = new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection(this.socketPath);

      const onConnectError = (err: Error) => {
        this.connecting = null;
        reject(new TransportError(`Cannot connect to greetd at ${this.socketPath}: ${err.message}`, this.socketPath));
      };

      socket.once('error', onConnectError);
      socket.once('connect', () => {
        socket.off('error', onConnectError);
        this.attach(socket);
        this.socket = socket;
        this.connecting = null;
        getLogger('ipc').info({ socketPath: this.socketPath }, 'connected to greetd');
        resolve(socket);
      });
    });

    return this.connecting;
  }

  private attach(socket: net.Socket): void {
    this.decoder.reset();

    socket.on('data', (chunk: Buffer) => {
      let frames: Buffer[];
      try {
        frames = this.decoder.push(chunk);
      } catch (err) {
        this.fail(err instanceof Error ? err : new ProtocolError(String(err)));
        socket.destroy();
        return;
      }

      for (const payload of frames) {
        const waiter = this.waiter;
        if (!waiter) {
          getLogger('ipc').warn({ bytes: payload.length }, 'unsolicited greetd frame dropped');
          continue;
        }
        this.waiter = null;
        clearTimeout(waiter.timer);
        try {
          const response = decodeResponse(payload);
          getLogger('ipc').debug({ response: response.type }, 'greetd response');
          waiter.resolve(response);
        } catch (err) {
          waiter.reject(err instanceof Error ? err : new ProtocolError(String(err)));
        }
      }
    });

    socket.on('error', (err) => {
      this.fail(new TransportError(`greetd connection error: ${err.message}`, this.socketPath));
    });

    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.fail(new TransportError('greetd closed the connection', this.socketPath));
    });
  }

  private fail(error: Error): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.reject(error);
  }
}

export const DEMO_PASSWORD = 'demo';

/**
 * Scripted stand-in for greetd. Accepts any user with the password `demo`.
 */
export class DemoTransport implements Transport {
  async roundTrip(request: GreetdRequest): Promise<GreetdResponse> {
    switch (request.type) {
      case 'create_session':
        return { type: 'auth_message', auth_message_type: 'secret', auth_message: 'Password: ' };
      case 'post_auth_message_response':
        if (request.response === DEMO_PASSWORD) {
          return { type: 'success' };
        }
        return {
          type: 'error',
          error_type: 'auth_error',
          description: `Invalid password (hint: use '${DEMO_PASSWORD}')`,
        };
      case 'start_session':
      case 'cancel_session':
        return { type: 'success' };
    }
  }

  close(): void {}
}
