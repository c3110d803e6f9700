import { debugInitialization } from '@/utils/debugLogger';
import { type Handle, MAX_HANDLE_INDEX, formatHandle, makeHandle } from './Handle';

/**
 * Thrown when a handle that does not resolve is dereferenced with {@link Pool.get}.
 * Handles only ever come from the pool itself, so this is a logic error.
 */
export class InvalidHandleError extends Error {
  constructor(poolName: string, handle: Handle<unknown>) {
    super(`[${poolName}] ${formatHandle(handle)} does not refer to a live entry`);
    this.name = 'InvalidHandleError';
  }
}

/**
 * Thrown when a pool is spawned into or freed from while one of its iterators is open.
 * Such mutations must be deferred through the message queue.
 */
export class PoolMutationError extends Error {
  constructor(poolName: string, operation: 'spawn' | 'free' | 'clear') {
    super(`[${poolName}] ${operation} called while iterating`);
    this.name = 'PoolMutationError';
  }
}

export type FreeListener<T> = (handle: Handle<T>, value: T) => void;

interface Slot<T> {
  generation: number;
  value: T | null;
}

/** Serialized form of a pool; values are mapped through the caller's serializer */
export interface PoolSnapshot<S> {
  /** One entry per slot after the reserved slot 0; null for free slots */
  slots: Array<{ generation: number; value: S | null }>;
  freeList: number[];
}

/**
 * Read-only view of a pool, handed to entity updates so they can inspect other
 * entities without structural access.
 */
export interface ReadonlyPool<T> {
  readonly count: number;
  get(handle: Handle<T>): T;
  tryGet(handle: Handle<T>): T | undefined;
  contains(handle: Handle<T>): boolean;
  iter(): Generator<T, void, undefined>;
  handles(): Generator<Handle<T>, void, undefined>;
  pairIter(): Generator<[Handle<T>, T], void, undefined>;
}

/**
 * Pool - generational arena
 *
 * Owns its values; hands out {@link Handle}s. Freed indices are recycled through a
 * LIFO free list with the slot generation incremented, so stale handles fail
 * lookups instead of aliasing the new occupant.
 *
 * Iteration is in slot order over live entries only. Spawning or freeing while an
 * iterator is open throws {@link PoolMutationError}.
 */
export class Pool<T> implements ReadonlyPool<T> {
  public readonly name: string;

  // Slot 0 is reserved so that NONE_HANDLE never resolves
  private slots: Slot<T>[] = [{ generation: 0, value: null }];
  private freeList: number[] = [];
  private liveCount = 0;
  private openIterators = 0;
  private freeListeners: Set<FreeListener<T>> = new Set();

  constructor(name: string = 'Pool') {
    this.name = name;
  }

  public spawn(value: T): Handle<T> {
    this.assertNotIterating('spawn');

    let index: number;
    const recycled = this.freeList.pop();
    if (recycled !== undefined) {
      index = recycled;
      this.slots[index].value = value;
    } else {
      index = this.slots.length;
      if (index > MAX_HANDLE_INDEX) {
        throw new Error(`[${this.name}] Exceeded max capacity of ${MAX_HANDLE_INDEX} entries`);
      }
      this.slots.push({ generation: 0, value });
    }

    this.liveCount++;
    return makeHandle(index, this.slots[index].generation);
  }

  /**
   * Free the entry behind `handle` and return its value.
   * Invalid handles are ignored.
   */
  public free(handle: Handle<T>): T | undefined {
    this.assertNotIterating('free');

    const slot = this.resolveSlot(handle);
    if (!slot || slot.value === null) {
      debugInitialization.warn(`[${this.name}] Attempted to free invalid ${formatHandle(handle)}`);
      return undefined;
    }

    const value = slot.value;
    slot.value = null;
    slot.generation++;
    this.freeList.push(handle.index);
    this.liveCount--;

    for (const listener of Array.from(this.freeListeners)) {
      listener(handle, value);
    }

    return value;
  }

  /**
   * Subscribe to successful frees.
   * @returns Unsubscribe function
   */
  public onFree(listener: FreeListener<T>): () => void {
    this.freeListeners.add(listener);
    return () => {
      this.freeListeners.delete(listener);
    };
  }

  public get(handle: Handle<T>): T {
    const value = this.tryGet(handle);
    if (value === undefined) {
      throw new InvalidHandleError(this.name, handle);
    }
    return value;
  }

  public tryGet(handle: Handle<T>): T | undefined {
    const slot = this.resolveSlot(handle);
    return slot?.value ?? undefined;
  }

  public contains(handle: Handle<T>): boolean {
    return this.tryGet(handle) !== undefined;
  }

  public get count(): number {
    return this.liveCount;
  }

  public *iter(): Generator<T, void, undefined> {
    for (const [, value] of this.pairIter()) {
      yield value;
    }
  }

  public *handles(): Generator<Handle<T>, void, undefined> {
    for (const [handle] of this.pairIter()) {
      yield handle;
    }
  }

  public *pairIter(): Generator<[Handle<T>, T], void, undefined> {
    this.openIterators++;
    try {
      for (let index = 1; index < this.slots.length; index++) {
        const slot = this.slots[index];
        if (slot.value !== null) {
          yield [makeHandle(index, slot.generation), slot.value];
        }
      }
    } finally {
      this.openIterators--;
    }
  }

  /**
   * Free every entry for which `keep` returns false. The scan completes before
   * anything is freed, so free listeners may iterate the pool.
   */
  public retain(keep: (value: T, handle: Handle<T>) => boolean): T[] {
    const doomed: Handle<T>[] = [];
    for (const [handle, value] of this.pairIter()) {
      if (!keep(value, handle)) {
        doomed.push(handle);
      }
    }

    const removed: T[] = [];
    for (const handle of doomed) {
      const value = this.free(handle);
      if (value !== undefined) {
        removed.push(value);
      }
    }
    return removed;
  }

  public clear(): void {
    this.assertNotIterating('clear');
    this.slots = [{ generation: 0, value: null }];
    this.freeList.length = 0;
    this.liveCount = 0;
  }

  public toSnapshot<S>(serialize: (value: T) => S): PoolSnapshot<S> {
    const slots: PoolSnapshot<S>['slots'] = [];
    for (let index = 1; index < this.slots.length; index++) {
      const slot = this.slots[index];
      slots.push({
        generation: slot.generation,
        value: slot.value === null ? null : serialize(slot.value),
      });
    }
    return { slots, freeList: [...this.freeList] };
  }

  /**
   * Rebuild a pool with the exact indices and generations of a snapshot, so that
   * handles stored inside the snapshot keep resolving.
   */
  public static fromSnapshot<S, T>(
    name: string,
    snapshot: PoolSnapshot<S>,
    restore: (data: S) => T
  ): Pool<T> {
    const pool = new Pool<T>(name);
    for (const slot of snapshot.slots) {
      const value = slot.value === null ? null : restore(slot.value);
      pool.slots.push({ generation: slot.generation, value });
      if (value !== null) {
        pool.liveCount++;
      }
    }
    pool.freeList = snapshot.freeList.filter(
      (index) => index > 0 && index < pool.slots.length && pool.slots[index].value === null
    );
    return pool;
  }

  private resolveSlot(handle: Handle<T>): Slot<T> | undefined {
    if (!Number.isInteger(handle.index) || handle.index <= 0 || handle.index >= this.slots.length) return undefined;
    const slot = this.slots[handle.index];
    return slot.generation === handle.generation ? slot : undefined;
  }

  private assertNotIterating(operation: 'spawn' | 'free' | 'clear'): void {
    if (this.openIterators > 0) {
      throw new PoolMutationError(this.name, operation);
    }
  }
}
