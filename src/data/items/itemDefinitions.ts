/**
 * Item Definitions
 *
 * Map items respawn after `reactivationInterval`; dropped weapon items are
 * temporary and never reactivate.
 */

import type { WeaponKind } from '@/data/weapons';

export const ITEM_KINDS = [
  'MEDKIT',
  'PLASMA_AMMO',
  'AK47_AMMO',
  'M4_AMMO',
  'AK47',
  'M4',
  'PLASMA_GUN',
  'ROCKET_LAUNCHER',
] as const;

export type ItemKind = (typeof ITEM_KINDS)[number];

/** What consuming the item does to the actor */
export type ItemEffect =
  | { type: 'heal'; amount: number }
  | { type: 'ammo'; weapon: WeaponKind; amount: number }
  | { type: 'weapon'; weapon: WeaponKind; ammo: number };

export interface ItemDefinition {
  kind: ItemKind;
  name: string;
  model: string;
  scale: number;
  reactivationInterval: number;
  effect: ItemEffect;
}

export const ITEM_PICKUP_SOUND = 'data/sounds/item_pickup.ogg';

export const ITEM_DEFINITIONS: Record<ItemKind, ItemDefinition> = {
  MEDKIT: {
    kind: 'MEDKIT',
    name: 'Medkit',
    model: 'data/models/medkit.fbx',
    scale: 1.0,
    reactivationInterval: 20,
    effect: { type: 'heal', amount: 20 },
  },
  PLASMA_AMMO: {
    kind: 'PLASMA_AMMO',
    name: 'Plasma Cell',
    model: 'data/models/yellow_box.FBX',
    scale: 0.25,
    reactivationInterval: 15,
    effect: { type: 'ammo', weapon: 'PLASMA_RIFLE', amount: 20 },
  },
  AK47_AMMO: {
    kind: 'AK47_AMMO',
    name: '7.62mm Ammo',
    model: 'data/models/box_medium.FBX',
    scale: 0.3,
    reactivationInterval: 14,
    effect: { type: 'ammo', weapon: 'AK47', amount: 30 },
  },
  M4_AMMO: {
    kind: 'M4_AMMO',
    name: '5.56mm Ammo',
    model: 'data/models/box_small.FBX',
    scale: 0.3,
    reactivationInterval: 13,
    effect: { type: 'ammo', weapon: 'M4', amount: 30 },
  },
  AK47: {
    kind: 'AK47',
    name: 'AK-47',
    model: 'data/models/ak47.FBX',
    scale: 3.0,
    reactivationInterval: 30,
    effect: { type: 'weapon', weapon: 'AK47', ammo: 30 },
  },
  M4: {
    kind: 'M4',
    name: 'M4',
    model: 'data/models/m4.FBX',
    scale: 3.0,
    reactivationInterval: 30,
    effect: { type: 'weapon', weapon: 'M4', ammo: 30 },
  },
  PLASMA_GUN: {
    kind: 'PLASMA_GUN',
    name: 'Plasma Rifle',
    model: 'data/models/plasma_rifle.FBX',
    scale: 3.0,
    reactivationInterval: 30,
    effect: { type: 'weapon', weapon: 'PLASMA_RIFLE', ammo: 20 },
  },
  ROCKET_LAUNCHER: {
    kind: 'ROCKET_LAUNCHER',
    name: 'Rocket Launcher',
    model: 'data/models/Rpg7.FBX',
    scale: 3.0,
    reactivationInterval: 30,
    effect: { type: 'weapon', weapon: 'ROCKET_LAUNCHER', ammo: 5 },
  },
};

/** Item left behind when an actor holding a weapon of this kind is removed */
export const WEAPON_DROP_ITEMS: Record<WeaponKind, ItemKind> = {
  M4: 'M4',
  AK47: 'AK47',
  PLASMA_RIFLE: 'PLASMA_GUN',
  ROCKET_LAUNCHER: 'ROCKET_LAUNCHER',
};

export function getItemDefinition(kind: ItemKind): ItemDefinition {
  return ITEM_DEFINITIONS[kind];
}

export function isItemKind(value: unknown): value is ItemKind {
  return ITEM_KINDS.some((kind) => kind === value);
}
