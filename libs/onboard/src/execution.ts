/**
 * Task status and the execution message channel
 *
 * Background operations never touch the wizard state. They post messages
 * to the channel, and the event loop drains it once per iteration and
 * hands the messages to the controller in arrival order.
 */

import type { StepId, StepResult } from './steps.js';

export type PickerStep = Extract<StepId, 'locale' | 'keyboard' | 'preferences'>;

export type TaskState = 'pending' | 'running' | 'success' | 'failed';

export interface TaskStatus {
  name: string;
  state: TaskState;
  output?: string;
  /** 0 to 100, only during simulation */
  progress?: number;
}

export type ExecutionMessage =
  | { type: 'task-started'; index: number }
  | { type: 'task-succeeded'; index: number; output?: string }
  | { type: 'task-failed'; index: number; error: string }
  | { type: 'user-created'; username: string | null }
  | { type: 'step-complete'; result: StepResult }
  | { type: 'review-complete'; anyFailed: boolean }
  | { type: 'update-complete'; anyFailed: boolean }
  /** `markStep` completes the network step when connected */
  | { type: 'network-status'; connected: boolean; markStep: boolean }
  | { type: 'picker-items'; step: PickerStep; items: string[] }
  | { type: 'setup-finished' };

export class ExecutionChannel {
  private queue: ExecutionMessage[] = [];
  private wake: (() => void) | null = null;

  /** Called after every post, e.g. to schedule a loop iteration */
  onPost(listener: () => void): void {
    this.wake = listener;
  }

  post(message: ExecutionMessage): void {
    this.queue.push(message);
    this.wake?.();
  }

  /** Remove and return everything posted so far */
  drain(): ExecutionMessage[] {
    const messages = this.queue;
    this.queue = [];
    return messages;
  }

  get size(): number {
    return this.queue.length;
  }
}

export function pendingTasks(names: string[], progress?: number): TaskStatus[] {
  return names.map((name) => (progress === undefined ? { name, state: 'pending' } : { name, state: 'pending', progress }));
}
