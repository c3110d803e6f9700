import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { GameLoop } from '@/engine/core/GameLoop';

/**
 * GameLoop timing tests
 *
 * Fake timers drive both the interval and performance.now(), so every tick sees
 * exactly the advanced time.
 */
describe('GameLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'performance'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks at the configured rate with a fixed step in seconds', () => {
    const updates: number[] = [];
    const loop = new GameLoop(20, (delta) => updates.push(delta));

    loop.start();
    vi.advanceTimersByTime(250);
    loop.stop();

    expect(updates).toEqual([0.05, 0.05, 0.05, 0.05, 0.05]);
  });

  it('respects tick rate changes while running', () => {
    const updates: number[] = [];
    const loop = new GameLoop(10, (delta) => updates.push(delta));

    loop.start();
    vi.advanceTimersByTime(300);
    expect(updates).toHaveLength(3);

    loop.setTickRate(5);
    expect(loop.getTickRate()).toBe(5);
    vi.advanceTimersByTime(400);
    loop.stop();

    expect(updates).toEqual([0.1, 0.1, 0.1, 0.2, 0.2]);
  });

  it('stops producing updates after stop', () => {
    const callback = vi.fn();
    const loop = new GameLoop(10, callback);

    loop.start();
    vi.advanceTimersByTime(100);
    loop.stop();
    vi.advanceTimersByTime(500);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(loop.isActive()).toBe(false);
  });

  it('ignores a second start', () => {
    const callback = vi.fn();
    const loop = new GameLoop(10, callback);

    loop.start();
    loop.start();
    vi.advanceTimersByTime(200);
    loop.dispose();

    expect(callback).toHaveBeenCalledTimes(2);
  });

  it('lets the callback stop the loop mid-catch-up', () => {
    let calls = 0;
    const loop = new GameLoop(10, () => {
      calls++;
      loop.stop();
    });

    loop.start();
    vi.advanceTimersByTime(300);

    expect(calls).toBe(1);
  });

  it('reports the leftover fraction of a step', () => {
    const loop = new GameLoop(10, () => undefined);
    loop.start();
    vi.advanceTimersByTime(100);

    expect(loop.getInterpolation()).toBe(0);
    loop.dispose();
  });
});
