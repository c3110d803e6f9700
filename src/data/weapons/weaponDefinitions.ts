/**
 * Weapon Definitions
 *
 * Every weapon fires one projectile kind; ammo is counted in shots.
 */

import type { ProjectileKind } from '@/data/projectiles';
import { DEFAULT_SHOOT_INTERVAL } from '@/data/gameplay.config';

export const WEAPON_KINDS = ['M4', 'AK47', 'PLASMA_RIFLE', 'ROCKET_LAUNCHER'] as const;

export type WeaponKind = (typeof WEAPON_KINDS)[number];

export interface WeaponDefinition {
  kind: WeaponKind;
  /** Display name used in notifications */
  name: string;
  model: string;
  shotSound: string;
  projectile: ProjectileKind;
  /** Minimum seconds between two shots */
  shootInterval: number;
  /** Ammo a freshly given weapon starts with */
  initialAmmo: number;
}

export const WEAPON_DEFINITIONS: Record<WeaponKind, WeaponDefinition> = {
  M4: {
    kind: 'M4',
    name: 'M4',
    model: 'data/models/m4.FBX',
    shotSound: 'data/sounds/m4_shot.ogg',
    projectile: 'BULLET',
    shootInterval: DEFAULT_SHOOT_INTERVAL,
    initialAmmo: 115,
  },
  AK47: {
    kind: 'AK47',
    name: 'AK-47',
    model: 'data/models/ak47.FBX',
    shotSound: 'data/sounds/ak47.ogg',
    projectile: 'BULLET',
    shootInterval: DEFAULT_SHOOT_INTERVAL,
    initialAmmo: 100,
  },
  PLASMA_RIFLE: {
    kind: 'PLASMA_RIFLE',
    name: 'Plasma Rifle',
    model: 'data/models/plasma_rifle.FBX',
    shotSound: 'data/sounds/plasma_shot.ogg',
    projectile: 'PLASMA',
    shootInterval: 0.2,
    initialAmmo: 40,
  },
  ROCKET_LAUNCHER: {
    kind: 'ROCKET_LAUNCHER',
    name: 'Rocket Launcher',
    model: 'data/models/Rpg7.FBX',
    shotSound: 'data/sounds/rpg_shot.ogg',
    projectile: 'ROCKET',
    shootInterval: 1.0,
    initialAmmo: 10,
  },
};

export function getWeaponDefinition(kind: WeaponKind): WeaponDefinition {
  return WEAPON_DEFINITIONS[kind];
}

export function isWeaponKind(value: unknown): value is WeaponKind {
  return WEAPON_KINDS.some((kind) => kind === value);
}
