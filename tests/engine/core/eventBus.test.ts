import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventBus } from '@/engine/core/EventBus';
import type { EventBusErrorsEventData } from '@/engine/core/GameEvents';

describe('EventBus', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers listeners and emits data', () => {
    const bus = new EventBus();
    const texts: string[] = [];

    bus.on('notification', (data) => texts.push(data.text));
    bus.emit('notification', { text: 'first', time: 0 });
    bus.emit('notification', { text: 'second', time: 1 });

    expect(texts).toEqual(['first', 'second']);
  });

  it('supports once listeners', () => {
    const bus = new EventBus();
    const callback = vi.fn();

    bus.once('save:complete', callback);
    bus.emit('save:complete', { slot: 'quicksave' });
    bus.emit('save:complete', { slot: 'quicksave' });

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith({ slot: 'quicksave' });
  });

  it('unsubscribes listeners and clears events', () => {
    const bus = new EventBus();
    const callback = vi.fn();

    const unsubscribe = bus.on('game:quit', callback);
    bus.emit('game:quit', {});
    unsubscribe();
    bus.emit('game:quit', {});

    expect(callback).toHaveBeenCalledTimes(1);
    expect(bus.hasListeners('game:quit')).toBe(false);

    bus.on('game:quit', callback);
    bus.on('notification', callback);
    expect(bus.listenerCount('game:quit')).toBe(1);

    bus.clear('game:quit');
    expect(bus.listenerCount('game:quit')).toBe(0);
    expect(bus.listenerCount('notification')).toBe(1);

    bus.clear();
    expect(bus.listenerCount('notification')).toBe(0);
  });

  it('does not call a listener removed by an earlier one in the same emit', () => {
    const bus = new EventBus();
    const calls: string[] = [];
    let removeSecond: () => void = () => undefined;

    bus.on('game:quit', () => {
      calls.push('first');
      removeSecond();
    });
    removeSecond = bus.on('game:quit', () => calls.push('second'));
    bus.on('game:quit', () => calls.push('third'));

    bus.emit('game:quit', {});

    expect(calls).toEqual(['first', 'third']);
  });

  it('keeps calling listeners after one throws and reports a summary', () => {
    const bus = new EventBus();
    const reports: EventBusErrorsEventData[] = [];
    const after = vi.fn();

    bus.on('eventbus:errors', (data) => reports.push(data));
    bus.on('notification', () => {
      throw new Error('hud detached');
    });
    bus.on('notification', after);

    bus.emit('notification', { text: 'hello', time: 0 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(reports).toEqual([
      { event: 'notification', errorCount: 1, errors: [{ handlerId: 1, message: 'hud detached' }] },
    ]);
  });

  it('does not report failures of the summary listeners themselves', () => {
    const bus = new EventBus();
    const summary = vi.fn(() => {
      throw new Error('summary failed');
    });
    bus.on('eventbus:errors', summary);
    bus.on('load:failed', () => {
      throw new Error('boom');
    });

    bus.emit('load:failed', { slot: 'quicksave', message: 'corrupted' });

    expect(summary).toHaveBeenCalledTimes(1);
  });
});
