/**
 * Single-threaded UI event loop
 *
 * Events are consumed one at a time in arrival order. Keys come from the
 * ink input hook, ticks from an interval, resizes from stdout and wakes
 * from background work that has something to report. A handler may return
 * a promise (an external program holding the terminal); the loop waits for
 * it before taking the next event.
 */

import type { KeyEvent } from '@modegreet/core';

export type LoopEvent =
  | { type: 'key'; key: KeyEvent }
  | { type: 'tick' }
  | { type: 'resize'; columns: number; rows: number }
  | { type: 'wake' };

export interface EventLoopOptions {
  onEvent: (event: LoopEvent) => void | Promise<void>;
  /** Milliseconds between ticks */
  tickInterval?: number;
}

export const TICK_INTERVAL = 250;

export class EventLoop {
  private readonly queue: LoopEvent[] = [];
  private readonly onEvent: (event: LoopEvent) => void | Promise<void>;
  private readonly tickInterval: number;
  private wakeup: (() => void) | null = null;
  private stopped = false;
  private running = false;

  constructor(options: EventLoopOptions) {
    this.onEvent = options.onEvent;
    this.tickInterval = options.tickInterval || TICK_INTERVAL;
  }

  get pendingEvents(): number {
    return this.queue.length;
  }

  push(event: LoopEvent): void {
    if (this.stopped) return;
    // Consecutive wakes carry no information
    if (event.type === 'wake' && this.queue[this.queue.length - 1]?.type === 'wake') return;
    this.queue.push(event);
    this.signal();
  }

  stop(): void {
    this.stopped = true;
    this.signal();
  }

  /**
   * Consume events until `stop()`. Rejects with the first error a handler
   * throws; the tick timer is cleared either way.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Event loop is already running');
    }
    this.running = true;
    const timer = setInterval(() => this.push({ type: 'tick' }), this.tickInterval);

    try {
      while (!this.stopped) {
        const event = this.queue.shift();
        if (event === undefined) {
          await new Promise<void>((resolve) => {
            this.wakeup = resolve;
          });
          continue;
        }
        await this.onEvent(event);
      }
    } finally {
      clearInterval(timer);
      this.queue.length = 0;
      this.running = false;
    }
  }

  private signal(): void {
    const wakeup = this.wakeup;
    this.wakeup = null;
    wakeup?.();
  }
}
