/**
 * Typed error classes for greetd IPC
 */

import { ModegreetError } from '@modegreet/core';
import { GREETD_SOCK_ENV } from './constants.js';

export class SocketNotFoundError extends ModegreetError {
  constructor() {
    super(`greetd socket not found (${GREETD_SOCK_ENV} not set)`, 'SOCKET_NOT_FOUND');
    this.name = 'SocketNotFoundError';
  }
}

export class TransportError extends ModegreetError {
  public readonly socketPath?: string;

  constructor(message: string, socketPath?: string) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
    this.socketPath = socketPath;
  }
}

export class ProtocolError extends ModegreetError {
  constructor(message: string) {
    super(`Malformed greetd frame: ${message}`, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

export class SessionStartError extends ModegreetError {
  constructor(description: string) {
    super(`Failed to start session: ${description}`, 'SESSION_START_FAILED');
    this.name = 'SessionStartError';
  }
}
