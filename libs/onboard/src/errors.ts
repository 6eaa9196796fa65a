/**
 * Onboarding error types
 */

import { ModegreetError } from '@modegreet/core';

export class ConfigError extends ModegreetError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * A system command exited unsuccessfully or could not be started.
 */
export class CommandFailedError extends ModegreetError {
  public readonly command: string;

  constructor(message: string, command: string) {
    super(message, 'COMMAND_FAILED');
    this.name = 'CommandFailedError';
    this.command = command;
  }
}

export class UserCreationError extends ModegreetError {
  public readonly username: string;

  constructor(message: string, username: string) {
    super(message, 'USER_CREATION_FAILED');
    this.name = 'UserCreationError';
    this.username = username;
  }
}
