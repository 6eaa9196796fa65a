import { charKey } from '@modegreet/core';
import { EventLoop, type LoopEvent } from '../runtime/event-loop';

describe('EventLoop', () => {
  it('delivers queued events in order and stops', async () => {
    const seen: LoopEvent[] = [];
    const loop = new EventLoop({
      onEvent: (event) => {
        seen.push(event);
        if (seen.length === 2) loop.stop();
      },
      tickInterval: 60_000,
    });

    loop.push({ type: 'key', key: charKey('a') });
    loop.push({ type: 'resize', columns: 100, rows: 30 });
    await loop.run();

    expect(seen).toEqual([
      { type: 'key', key: charKey('a') },
      { type: 'resize', columns: 100, rows: 30 },
    ]);
  });

  it('coalesces consecutive wakes', () => {
    const loop = new EventLoop({ onEvent: () => undefined });
    loop.push({ type: 'wake' });
    loop.push({ type: 'wake' });
    loop.push({ type: 'key', key: charKey('x') });
    loop.push({ type: 'wake' });
    expect(loop.pendingEvents).toBe(3);
  });

  it('ignores events pushed after stop', () => {
    const loop = new EventLoop({ onEvent: () => undefined });
    loop.stop();
    loop.push({ type: 'wake' });
    expect(loop.pendingEvents).toBe(0);
  });

  it('waits for an asynchronous handler before the next event', async () => {
    const order: string[] = [];
    const loop = new EventLoop({
      onEvent: async (event) => {
        if (event.type !== 'key' || event.key.code !== 'char') return;
        order.push(`start ${event.key.char}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(`end ${event.key.char}`);
        if (event.key.char === 'b') loop.stop();
      },
      tickInterval: 60_000,
    });

    loop.push({ type: 'key', key: charKey('a') });
    loop.push({ type: 'key', key: charKey('b') });
    await loop.run();

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('wakes up for events pushed while idle', async () => {
    const seen: string[] = [];
    const loop = new EventLoop({
      onEvent: (event) => {
        seen.push(event.type);
        loop.stop();
      },
      tickInterval: 60_000,
    });

    const running = loop.run();
    setTimeout(() => loop.push({ type: 'wake' }), 5);
    await running;

    expect(seen).toEqual(['wake']);
  });

  it('emits ticks on its interval', async () => {
    const loop = new EventLoop({
      onEvent: (event) => {
        if (event.type === 'tick') loop.stop();
      },
      tickInterval: 5,
    });
    await expect(loop.run()).resolves.toBeUndefined();
  });

  it('rejects with the handler error', async () => {
    const loop = new EventLoop({
      onEvent: () => {
        throw new Error('boom');
      },
      tickInterval: 60_000,
    });
    loop.push({ type: 'wake' });
    await expect(loop.run()).rejects.toThrow('boom');
  });

  it('refuses to run twice at once', async () => {
    const loop = new EventLoop({ onEvent: () => undefined, tickInterval: 60_000 });
    const first = loop.run();
    await expect(loop.run()).rejects.toThrow('Event loop is already running');
    loop.stop();
    await first;
  });
});
