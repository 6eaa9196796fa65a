/**
 * Background task runners
 *
 * Each runner works from plain values copied out of the wizard state and
 * reports through the execution channel only. Task indices match the task
 * list the controller built before starting the runner.
 */

import { errorMessage, getLogger } from '@modegreet/core';
import type { CommandConfig } from './config/schema.js';
import type { ExecutionChannel } from './execution.js';
import type { CreateUserOptions, OnboardService } from './service/types.js';

export interface UserTaskInput extends CreateUserOptions {
  username: string;
  password: string;
}

export interface ReviewTaskInput extends UserTaskInput {
  locale?: string;
  keymap?: string;
  timezone?: string;
  /** Account already created by the user step; creation is not repeated */
  alreadyCreated: boolean;
}

export interface UpdateTaskInput {
  username: string;
  commands: CommandConfig[];
  sudoPassword: string;
}

export async function runUserCreation(
  service: OnboardService,
  channel: ExecutionChannel,
  input: UserTaskInput,
): Promise<void> {
  const log = getLogger('tasks');
  channel.post({ type: 'task-started', index: 0 });
  try {
    await service.createUser(input.username, input.password, input);
    channel.post({ type: 'task-succeeded', index: 0 });
    channel.post({ type: 'user-created', username: input.username });
    channel.post({ type: 'step-complete', result: 'completed' });
  } catch (err) {
    log.error({ err, username: input.username }, 'User creation failed');
    channel.post({ type: 'task-failed', index: 0, error: errorMessage(err) });
    channel.post({ type: 'user-created', username: null });
    channel.post({ type: 'step-complete', result: 'failed' });
  }
}

/**
 * Create the account, then apply locale, keymap and timezone. A failed
 * account ends the run; later failures are recorded and the run goes on.
 */
export async function runReview(
  service: OnboardService,
  channel: ExecutionChannel,
  input: ReviewTaskInput,
): Promise<void> {
  const log = getLogger('tasks');
  channel.post({ type: 'task-started', index: 0 });
  if (input.alreadyCreated) {
    channel.post({ type: 'task-succeeded', index: 0, output: 'Already created' });
  } else {
    try {
      await service.createUser(input.username, input.password, input);
      channel.post({ type: 'task-succeeded', index: 0 });
      channel.post({ type: 'user-created', username: input.username });
    } catch (err) {
      log.error({ err, username: input.username }, 'User creation failed');
      channel.post({ type: 'task-failed', index: 0, error: errorMessage(err) });
      channel.post({ type: 'user-created', username: null });
      channel.post({ type: 'review-complete', anyFailed: true });
      return;
    }
  }

  const steps: Array<() => Promise<void>> = [];
  if (input.locale !== undefined) {
    const locale = input.locale;
    steps.push(() => service.setLocale(locale));
  }
  if (input.keymap !== undefined) {
    const keymap = input.keymap;
    steps.push(() => service.setKeymap(keymap));
  }
  if (input.timezone !== undefined) {
    const timezone = input.timezone;
    steps.push(() => service.setTimezone(timezone));
  }

  let anyFailed = false;
  for (const [offset, apply] of steps.entries()) {
    const index = offset + 1;
    channel.post({ type: 'task-started', index });
    try {
      await apply();
      channel.post({ type: 'task-succeeded', index });
    } catch (err) {
      anyFailed = true;
      log.error({ err, index }, 'Configuration task failed');
      channel.post({ type: 'task-failed', index, error: errorMessage(err) });
    }
  }

  channel.post({ type: 'review-complete', anyFailed });
}

/**
 * Run the selected package commands in order as the created user.
 */
export async function runUpdate(
  service: OnboardService,
  channel: ExecutionChannel,
  input: UpdateTaskInput,
): Promise<void> {
  const log = getLogger('tasks');
  let anyFailed = false;

  for (const [index, command] of input.commands.entries()) {
    channel.post({ type: 'task-started', index });
    try {
      const output = command.sudo
        ? await service.runSudoAsUser(input.username, command.command, input.sudoPassword)
        : await service.runAsUser(input.username, command.command);
      channel.post({ type: 'task-succeeded', index, output: output.trim() || undefined });
    } catch (err) {
      anyFailed = true;
      log.error({ err, command: command.name }, 'Package command failed');
      channel.post({ type: 'task-failed', index, error: errorMessage(err) });
    }
  }

  channel.post({ type: 'update-complete', anyFailed });
}
