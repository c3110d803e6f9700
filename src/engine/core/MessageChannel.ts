import type { GameMessage } from './GameMessage';

/**
 * Producer side of a channel. Cheap to clone; every clone feeds the same queue.
 */
export interface Sender<T> {
  /** Enqueue a message. Never blocks; discarded once the receiver is closed. */
  send(message: T): void;
  clone(): Sender<T>;
  isClosed(): boolean;
}

/**
 * Consumer side of a channel. There is exactly one per channel.
 */
export interface Receiver<T> {
  /** Dequeue the oldest message, or undefined when the queue is empty */
  tryReceive(): T | undefined;
  close(): void;
  readonly pending: number;
}

export interface Channel<T> {
  sender: Sender<T>;
  receiver: Receiver<T>;
}

interface ChannelState<T> {
  queue: T[];
  head: number;
  closed: boolean;
}

// Compact the backing array once this many consumed entries accumulate
const COMPACT_THRESHOLD = 1024;

class QueueSender<T> implements Sender<T> {
  constructor(private readonly state: ChannelState<T>) {}

  public send(message: T): void {
    if (this.state.closed) return;
    this.state.queue.push(message);
  }

  public clone(): Sender<T> {
    return new QueueSender(this.state);
  }

  public isClosed(): boolean {
    return this.state.closed;
  }
}

class QueueReceiver<T> implements Receiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  public tryReceive(): T | undefined {
    const state = this.state;
    if (state.head >= state.queue.length) {
      if (state.head > 0) {
        state.queue.length = 0;
        state.head = 0;
      }
      return undefined;
    }

    const message = state.queue[state.head++];
    if (state.head >= COMPACT_THRESHOLD) {
      state.queue.splice(0, state.head);
      state.head = 0;
    }
    return message;
  }

  public close(): void {
    this.state.closed = true;
    this.state.queue.length = 0;
    this.state.head = 0;
  }

  public get pending(): number {
    return this.state.queue.length - this.state.head;
  }
}

/**
 * Unbounded single-consumer FIFO channel
 */
export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = { queue: [], head: 0, closed: false };
  return {
    sender: new QueueSender(state),
    receiver: new QueueReceiver(state),
  };
}

export type MessageSender = Sender<GameMessage>;
export type MessageReceiver = Receiver<GameMessage>;

export function createMessageChannel(): Channel<GameMessage> {
  return createChannel<GameMessage>();
}
