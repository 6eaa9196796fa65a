import { pendingTasks } from '../execution';
import { SimulationClock } from '../simulation';

describe('SimulationClock', () => {
  it('advances one task at a time by ten percent per tick', () => {
    const tasks = pendingTasks(['one', 'two', 'three'], 0);
    const done = jest.fn();
    const clock = new SimulationClock();
    clock.start(done);

    for (let i = 0; i < 25; i++) clock.tick(tasks);

    expect(tasks.map((t) => [t.state, t.progress])).toEqual([
      ['success', 100],
      ['success', 100],
      ['running', 50],
    ]);
    expect(done).not.toHaveBeenCalled();
    expect(clock.active).toBe(true);
  });

  it('runs the callback on the tick after the last task finishes', () => {
    const tasks = pendingTasks(['one', 'two', 'three'], 0);
    const done = jest.fn();
    const clock = new SimulationClock();
    clock.start(done);

    for (let i = 0; i < 30; i++) clock.tick(tasks);
    expect(done).not.toHaveBeenCalled();
    expect(tasks.every((t) => t.state === 'success')).toBe(true);

    expect(clock.tick(tasks)).toBe(true);
    expect(done).toHaveBeenCalledTimes(1);
    expect(clock.active).toBe(false);

    expect(clock.tick(tasks)).toBe(false);
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('completes immediately without tasks', () => {
    const done = jest.fn();
    const clock = new SimulationClock();
    clock.start(done);

    expect(clock.tick([])).toBe(true);
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('does nothing until started or after stop', () => {
    const tasks = pendingTasks(['one'], 0);
    const clock = new SimulationClock();
    expect(clock.tick(tasks)).toBe(false);

    clock.start(jest.fn());
    clock.stop();
    clock.tick(tasks);
    expect(tasks[0]).toEqual({ name: 'one', state: 'pending', progress: 0 });
  });
});
