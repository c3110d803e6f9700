import { deflate, inflate } from 'pako';
import type { GameTime } from '../core/GameTime';
import type { LevelSnapshot } from '../level/Level';
import { isHandleData } from '../ecs/Handle';
import { isMatchOptions } from '../match/MatchOptions';
import { isBotKind, isItemKind, isProjectileKind, isWeaponKind } from '@/data';

/** Bumped whenever the snapshot layout changes; older saves are rejected */
export const SAVE_VERSION = 1;

export interface SaveFile {
  version: number;
  /** ISO timestamp */
  savedAt: string;
  time: GameTime;
  level: LevelSnapshot;
}

export class SaveGameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SaveGameError';
  }
}

export function createSaveFile(time: Readonly<GameTime>, level: LevelSnapshot, savedAt: Date = new Date()): SaveFile {
  return {
    version: SAVE_VERSION,
    savedAt: savedAt.toISOString(),
    time: { elapsed: time.elapsed, delta: time.delta },
    level,
  };
}

export function encodeSave(save: SaveFile): Uint8Array {
  return deflate(JSON.stringify(save), { level: 6 });
}

/**
 * @throws SaveGameError when the data is not a compressed save of the current version
 */
export function decodeSave(data: Uint8Array): SaveFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(inflate(data, { to: 'string' }));
  } catch (error) {
    throw new SaveGameError('Save data is corrupted', { cause: error });
  }

  if (!isRecord(parsed) || typeof parsed.version !== 'number') {
    throw new SaveGameError('Save data has no version');
  }
  if (parsed.version !== SAVE_VERSION) {
    throw new SaveGameError(`Unsupported save version ${parsed.version} (expected ${SAVE_VERSION})`);
  }
  if (!isSaveFile(parsed)) {
    throw new SaveGameError('Save data is incomplete');
  }
  return parsed;
}

type EntityCheck = (value: Record<string, unknown>) => boolean;

const CHARACTER_HANDLES = ['body', 'collider', 'pivot', 'weaponPivot'] as const;
const TEAMS: readonly unknown[] = ['NONE', 'RED', 'BLUE'];

const isActorSnapshot: EntityCheck = (actor) => {
  if (typeof actor.name !== 'string' || !TEAMS.includes(actor.team)) return false;
  if (!hasNumbers(actor, ['health', 'maxHealth', 'armor', 'currentWeaponIndex'])) return false;
  if (!hasHandles(actor, CHARACTER_HANDLES)) return false;
  if (!Array.isArray(actor.weapons) || !actor.weapons.every(isHandleData)) return false;

  switch (actor.kind) {
    case 'bot':
      return isBotKind(actor.botKind) && hasHandles(actor, ['model']) && isRecord(actor.clips);
    case 'player':
      return hasHandles(actor, ['camera', 'cameraPivot']) && hasNumbers(actor, ['yaw', 'pitch']);
    default:
      return false;
  }
};

/** Entity snapshots per level pool; every handle a snapshot carries must be handle data */
const LEVEL_POOLS: Record<'actors' | 'weapons' | 'projectiles' | 'items' | 'jumpPads', EntityCheck> = {
  actors: isActorSnapshot,
  weapons: (weapon) =>
    isWeaponKind(weapon.kind) &&
    hasHandles(weapon, ['model', 'laserDot', 'owner']) &&
    hasNumbers(weapon, ['ammo', 'lastShotTime']),
  projectiles: (projectile) =>
    isProjectileKind(projectile.kind) &&
    hasHandles(projectile, ['model', 'body', 'collider', 'owner']) &&
    hasNumbers(projectile, ['lifetime']),
  items: (item) => isItemKind(item.kind) && hasHandles(item, ['pivot', 'model']),
  jumpPads: (pad) => hasHandles(pad, ['collider']) && isRecord(pad.velocity),
};

export function isSaveFile(value: unknown): value is SaveFile {
  if (!isRecord(value)) return false;
  if (value.version !== SAVE_VERSION || typeof value.savedAt !== 'string') return false;

  const { time, level } = value;
  if (!isRecord(time) || typeof time.elapsed !== 'number' || typeof time.delta !== 'number') return false;
  if (!isRecord(level) || typeof level.time !== 'number' || !isMatchOptions(level.options)) return false;
  if (!hasHandles(level, ['mapRoot', 'mapCollider', 'player'])) return false;

  return Object.entries(LEVEL_POOLS).every(([pool, check]) => isPoolSnapshot(level[pool], check));
}

function isPoolSnapshot(value: unknown, check: EntityCheck): boolean {
  if (!isRecord(value) || !Array.isArray(value.slots) || !Array.isArray(value.freeList)) return false;
  if (!value.freeList.every((index) => Number.isInteger(index))) return false;

  return value.slots.every(
    (slot) =>
      isRecord(slot) &&
      Number.isInteger(slot.generation) &&
      (slot.value === null || (isRecord(slot.value) && check(slot.value)))
  );
}

function hasHandles(value: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((key) => isHandleData(value[key]));
}

function hasNumbers(value: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((key) => typeof value[key] === 'number');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
