import { describe, it, expect } from 'vitest';
import { createChannel, createMessageChannel } from '@/engine/core/MessageChannel';
import { makeHandle } from '@/engine/ecs/Handle';

describe('MessageChannel', () => {
  it('delivers messages in send order', () => {
    const { sender, receiver } = createChannel<number>();
    sender.send(1);
    sender.send(2);
    sender.send(3);

    expect(receiver.pending).toBe(3);
    expect([receiver.tryReceive(), receiver.tryReceive(), receiver.tryReceive()]).toEqual([1, 2, 3]);
    expect(receiver.tryReceive()).toBeUndefined();
    expect(receiver.pending).toBe(0);
  });

  it('interleaves clones into the same queue', () => {
    const { sender, receiver } = createChannel<string>();
    const clone = sender.clone();

    sender.send('a');
    clone.send('b');
    sender.send('c');

    expect([receiver.tryReceive(), receiver.tryReceive(), receiver.tryReceive()]).toEqual(['a', 'b', 'c']);
  });

  it('accepts sends made while draining', () => {
    const { sender, receiver } = createChannel<number>();
    sender.send(1);

    const seen: number[] = [];
    let message = receiver.tryReceive();
    while (message !== undefined) {
      seen.push(message);
      if (message < 3) sender.send(message + 1);
      message = receiver.tryReceive();
    }

    expect(seen).toEqual([1, 2, 3]);
  });

  it('keeps order across the compaction threshold', () => {
    const { sender, receiver } = createChannel<number>();
    for (let i = 0; i < 2000; i++) sender.send(i);

    const received: number[] = [];
    let message = receiver.tryReceive();
    while (message !== undefined) {
      received.push(message);
      message = receiver.tryReceive();
    }

    expect(received).toHaveLength(2000);
    expect(received[0]).toBe(0);
    expect(received[1023]).toBe(1023);
    expect(received[1024]).toBe(1024);
    expect(received[1999]).toBe(1999);
  });

  it('drops queued and future messages once closed', () => {
    const { sender, receiver } = createChannel<number>();
    const clone = sender.clone();
    sender.send(1);
    receiver.close();
    clone.send(2);

    expect(sender.isClosed()).toBe(true);
    expect(clone.isClosed()).toBe(true);
    expect(receiver.tryReceive()).toBeUndefined();
  });

  it('carries game messages', () => {
    const { sender, receiver } = createMessageChannel();
    sender.send({ type: 'REMOVE_ACTOR', actor: makeHandle(2, 1) });

    expect(receiver.tryReceive()).toEqual({ type: 'REMOVE_ACTOR', actor: { index: 2, generation: 1 } });
  });
});
