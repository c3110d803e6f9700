import { debugInitialization } from '@/utils/debugLogger';
import type { GameEventMap, GameEventName } from './GameEvents';

export type EventCallback<T> = (data: T) => void;

type SubscriptionTable = {
  [K in GameEventName]: Map<number, EventCallback<GameEventMap[K]>>;
};

function createSubscriptionTable(): SubscriptionTable {
  return {
    notification: new Map(),
    'match:started': new Map(),
    'match:over': new Map(),
    'save:complete': new Map(),
    'save:failed': new Map(),
    'load:complete': new Map(),
    'load:failed': new Map(),
    'game:quit': new Map(),
    'eventbus:errors': new Map(),
  };
}

/**
 * EventBus - typed pub/sub for presentation notifications
 *
 * Subscriptions are keyed by id for O(1) unsubscribe. Emitting iterates over a
 * snapshot of ids, so handlers may unsubscribe themselves or each other.
 */
export class EventBus {
  private readonly events: SubscriptionTable = createSubscriptionTable();
  private nextId = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  public on<K extends GameEventName>(event: K, callback: EventCallback<GameEventMap[K]>): () => void {
    const id = this.nextId++;
    this.events[event].set(id, callback);
    return () => this.off(event, id);
  }

  /**
   * Subscribe to an event, automatically unsubscribe after first emit
   */
  public once<K extends GameEventName>(event: K, callback: EventCallback<GameEventMap[K]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      callback(data);
    });
    return unsubscribe;
  }

  public off<K extends GameEventName>(event: K, id: number): void {
    this.events[event].delete(id);
  }

  /**
   * Emit an event to all subscribers. A throwing handler does not stop the
   * others; failures are summarized on 'eventbus:errors'.
   */
  public emit<K extends GameEventName>(event: K, data: GameEventMap[K]): void {
    const subscriptions = this.events[event];
    if (subscriptions.size === 0) return;

    const handlerIds = Array.from(subscriptions.keys());
    const errors: Array<{ id: number; error: unknown }> = [];

    for (const id of handlerIds) {
      const callback = subscriptions.get(id);
      if (!callback) continue;

      try {
        callback(data);
      } catch (error) {
        errors.push({ id, error });
        debugInitialization.error(`Error in event handler for ${event}:`, error);
      }
    }

    // No summary for failures inside the summary listeners themselves
    if (errors.length > 0 && event !== 'eventbus:errors' && this.hasListeners('eventbus:errors')) {
      this.emit('eventbus:errors', {
        event,
        errorCount: errors.length,
        errors: errors.map((e) => ({
          handlerId: e.id,
          message: e.error instanceof Error ? e.error.message : String(e.error),
        })),
      });
    }
  }

  /**
   * Clear all subscriptions for an event, or all events
   */
  public clear(event?: GameEventName): void {
    if (event) {
      this.events[event].clear();
      return;
    }
    for (const subscriptions of Object.values(this.events)) {
      subscriptions.clear();
    }
  }

  public hasListeners(event: GameEventName): boolean {
    return this.listenerCount(event) > 0;
  }

  public listenerCount(event: GameEventName): number {
    return this.events[event].size;
  }
}
