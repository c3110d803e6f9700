/**
 * Bot pose machines
 *
 * Parameters are recomputed by the bot every tick:
 * - distance: distance from the body to the current target
 * - verticalDirection: Y of the normalized direction to the target
 * - grounded: the body touches a walkable surface
 *
 * State clips name entries of the bot's animation set.
 */

import type { StateMachineConfig } from '../animation';
import type { BotAnimationSet } from '@/data';
import { CHASE_THRESHOLD, JUMP_DIRECTION_THRESHOLD, POSE_BLEND_TIME } from '@/data';

export type BotClip = keyof BotAnimationSet;

export const BOT_PARAMETERS = {
  distance: { type: 'float', default: 0 },
  verticalDirection: { type: 'float', default: 0 },
  grounded: { type: 'bool', default: true },
} as const satisfies StateMachineConfig['parameters'];

export type BotParameter = keyof typeof BOT_PARAMETERS;

const needsJump = [
  { param: 'verticalDirection', op: '>=', value: JUMP_DIRECTION_THRESHOLD },
  { param: 'grounded', op: '==', value: true },
] as const;

export const LOCOMOTION_MACHINE: StateMachineConfig = {
  defaultState: 'Idle',
  parameters: BOT_PARAMETERS,
  states: {
    Idle: {
      clip: 'idle',
      transitions: [
        { to: 'Jump', conditions: [...needsJump], blend: POSE_BLEND_TIME, priority: 1 },
        {
          to: 'Walk',
          conditions: [{ param: 'distance', op: '>', value: CHASE_THRESHOLD }],
          blend: POSE_BLEND_TIME,
        },
      ],
    },
    Walk: {
      clip: 'walk',
      transitions: [
        { to: 'Jump', conditions: [...needsJump], blend: POSE_BLEND_TIME, priority: 1 },
        {
          to: 'Idle',
          conditions: [{ param: 'distance', op: '<=', value: CHASE_THRESHOLD }],
          blend: POSE_BLEND_TIME,
        },
      ],
    },
    Jump: {
      clip: 'jump',
      loop: false,
      transitions: [
        { to: 'Falling', conditions: [{ param: 'grounded', op: '==', value: false }], blend: POSE_BLEND_TIME },
      ],
    },
    Falling: {
      clip: 'falling',
      transitions: [
        { to: 'Idle', conditions: [{ param: 'grounded', op: '==', value: true }], blend: POSE_BLEND_TIME },
      ],
    },
  },
};

export const COMBAT_MACHINE: StateMachineConfig = {
  defaultState: 'Aim',
  parameters: BOT_PARAMETERS,
  states: {
    Aim: {
      clip: 'aim',
      transitions: [
        {
          to: 'Whip',
          conditions: [{ param: 'distance', op: '<=', value: CHASE_THRESHOLD }],
          blend: POSE_BLEND_TIME,
        },
      ],
    },
    Whip: {
      clip: 'whip',
      transitions: [
        {
          to: 'Aim',
          conditions: [{ param: 'distance', op: '>', value: CHASE_THRESHOLD }],
          blend: POSE_BLEND_TIME,
        },
      ],
    },
  },
};

export function isBotClip(name: string): name is BotClip {
  return (
    name === 'idle' ||
    name === 'walk' ||
    name === 'aim' ||
    name === 'whip' ||
    name === 'jump' ||
    name === 'falling'
  );
}
