/**
 * Deterministic task progress for dry runs
 *
 * Driven by the UI tick; owns no timer. Each tick moves the active task
 * forward by 10%. The tick after the last task reaches 100% runs the
 * completion callback and stops the clock.
 */

import type { TaskStatus } from './execution.js';

export const PROGRESS_STEP = 10;

export class SimulationClock {
  private taskIndex = 0;
  private progress = 0;
  private onComplete: (() => void) | null = null;

  get active(): boolean {
    return this.onComplete !== null;
  }

  start(onComplete: () => void): void {
    this.taskIndex = 0;
    this.progress = 0;
    this.onComplete = onComplete;
  }

  stop(): void {
    this.onComplete = null;
  }

  /**
   * Advance the tasks in place. Returns true when the callback ran.
   */
  tick(tasks: TaskStatus[]): boolean {
    const onComplete = this.onComplete;
    if (onComplete === null) {
      return false;
    }

    const task = tasks[this.taskIndex];
    if (!task) {
      this.onComplete = null;
      onComplete();
      return true;
    }

    task.state = 'running';
    this.progress += PROGRESS_STEP;
    task.progress = this.progress;

    if (this.progress >= 100) {
      task.state = 'success';
      this.taskIndex++;
      this.progress = 0;
    }
    return false;
  }
}
