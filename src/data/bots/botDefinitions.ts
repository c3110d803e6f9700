/**
 * Bot Definitions
 *
 * Model and animation paths are resolved through the scene graph port; a bot
 * whose assets are missing is not created at all.
 */

import type { WeaponKind } from '@/data/weapons';

export const BOT_KINDS = ['MUTANT', 'PARASITE', 'MAW'] as const;

export type BotKind = (typeof BOT_KINDS)[number];

export interface BotAnimationSet {
  idle: string;
  walk: string;
  aim: string;
  whip: string;
  jump: string;
  falling: string;
}

export interface BotDefinition {
  kind: BotKind;
  name: string;
  model: string;
  animations: BotAnimationSet;
  /** Units per second */
  walkSpeed: number;
  health: number;
  scale: number;
  weaponScale: number;
  /** Node inside the model the weapon pivot is attached to */
  weaponHandName: string;
  startingWeapon: WeaponKind;
}

function animationSet(folder: string): BotAnimationSet {
  return {
    idle: `data/animations/${folder}/idle.fbx`,
    walk: `data/animations/${folder}/walk.fbx`,
    aim: `data/animations/${folder}/aim.fbx`,
    whip: `data/animations/${folder}/whip.fbx`,
    jump: `data/animations/${folder}/jump.fbx`,
    falling: `data/animations/${folder}/falling.fbx`,
  };
}

export const BOT_DEFINITIONS: Record<BotKind, BotDefinition> = {
  MUTANT: {
    kind: 'MUTANT',
    name: 'Mutant',
    model: 'data/models/mutant.FBX',
    animations: animationSet('mutant'),
    walkSpeed: 3.5,
    health: 100,
    scale: 0.0085,
    weaponScale: 2.6,
    weaponHandName: 'Mutant:RightHand',
    startingWeapon: 'AK47',
  },
  PARASITE: {
    kind: 'PARASITE',
    name: 'Parasite',
    model: 'data/models/parasite.FBX',
    animations: animationSet('parasite'),
    walkSpeed: 4.0,
    health: 100,
    scale: 0.0085,
    weaponScale: 2.5,
    weaponHandName: 'RightHand',
    startingWeapon: 'AK47',
  },
  MAW: {
    kind: 'MAW',
    name: 'Maw',
    model: 'data/models/maw.fbx',
    animations: animationSet('maw'),
    walkSpeed: 4.0,
    health: 100,
    scale: 0.0085,
    weaponScale: 2.5,
    weaponHandName: 'RightHand',
    startingWeapon: 'AK47',
  },
};

export function getBotDefinition(kind: BotKind): BotDefinition {
  return BOT_DEFINITIONS[kind];
}

export function isBotKind(value: unknown): value is BotKind {
  return BOT_KINDS.some((kind) => kind === value);
}
