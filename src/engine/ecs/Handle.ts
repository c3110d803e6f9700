/**
 * Generational handles
 *
 * A handle is a non-owning reference into a {@link Pool}: the slot index plus the
 * generation the slot had when the value was spawned. When a slot is freed its
 * generation increments, so any handle issued before the free stops resolving
 * (generation mismatch) even after the slot is reused.
 *
 * Handles are plain data: they compare with {@link handleEquals}, key maps through
 * {@link handleKey} and survive a JSON round-trip unchanged.
 */

/** Maximum slot index (20 bits); keys pack the generation above it */
export const MAX_HANDLE_INDEX = 0xFFFFF;

const INDEX_RANGE = MAX_HANDLE_INDEX + 1;

export interface Handle<T> {
  readonly index: number;
  readonly generation: number;
  /** Phantom marker, never set; keeps Handle<Bot> and Handle<Weapon> apart */
  readonly __type?: T;
}

/**
 * The handle that never resolves. Slot 0 of every pool is reserved for it.
 */
export const NONE_HANDLE: Handle<never> = Object.freeze({ index: 0, generation: 0 });

export function makeHandle<T>(index: number, generation: number): Handle<T> {
  return { index, generation };
}

export function isNone<T>(handle: Handle<T>): boolean {
  return handle.index === 0;
}

export function isSome<T>(handle: Handle<T>): boolean {
  return handle.index !== 0;
}

export function handleEquals<T>(a: Handle<T>, b: Handle<T>): boolean {
  return a.index === b.index && a.generation === b.generation;
}

/**
 * Pack a handle into a single number for use as a Map/Set key. The generation is
 * kept whole, so keys stay exact up to 2^33 reuses of a slot.
 */
export function handleKey<T>(handle: Handle<T>): number {
  return handle.generation * INDEX_RANGE + handle.index;
}

export function formatHandle<T>(handle: Handle<T>): string {
  return isNone(handle) ? 'Handle(NONE)' : `Handle(${handle.index}:${handle.generation})`;
}

/**
 * Narrow unknown JSON into a handle. Used when restoring snapshots.
 */
export function isHandleData(value: unknown): value is Handle<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  if (!('index' in value) || !('generation' in value)) return false;
  return isSlotNumber(value.index) && isSlotNumber(value.generation);
}

function isSlotNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}
