/**
 * Data System - Central Export Point
 *
 * All per-kind values (bots, weapons, projectiles, items) live in definition
 * tables here, not in engine code. Import from '@/data' or, in hot paths,
 * directly from the module.
 *
 * @example
 * import { getWeaponDefinition, ITEM_DEFINITIONS } from '@/data';
 */

// ==================== BOTS ====================
export { BOT_KINDS, BOT_DEFINITIONS, getBotDefinition, isBotKind } from './bots';
export type { BotKind, BotDefinition, BotAnimationSet } from './bots';

// ==================== WEAPONS ====================
export { WEAPON_KINDS, WEAPON_DEFINITIONS, getWeaponDefinition, isWeaponKind } from './weapons';
export type { WeaponKind, WeaponDefinition } from './weapons';

// ==================== PROJECTILES ====================
export {
  PROJECTILE_KINDS,
  PROJECTILE_DEFINITIONS,
  getProjectileDefinition,
  isProjectileKind,
} from './projectiles';
export type { ProjectileKind, ProjectileDefinition, ProjectileVisual } from './projectiles';

// ==================== ITEMS ====================
export {
  ITEM_KINDS,
  ITEM_DEFINITIONS,
  ITEM_PICKUP_SOUND,
  WEAPON_DROP_ITEMS,
  getItemDefinition,
  isItemKind,
} from './items';
export type { ItemKind, ItemEffect, ItemDefinition } from './items';

// ==================== TUNING ====================
export * from './gameplay.config';
