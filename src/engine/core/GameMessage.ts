/**
 * GameMessage - deferred world mutations
 *
 * Entities never mutate other entities or pools directly. They describe the
 * mutation as a message and send it; the level drains the queue in FIFO order
 * once per frame, after every entity has been updated.
 *
 * Pattern: discriminated union on `type`, like the command protocol of the rest
 * of the engine. Positions travel as THREE.Vector3 clones owned by the message.
 */

import type * as THREE from 'three';
import type { Handle } from '../ecs/Handle';
import type { Actor } from '../actors/Actor';
import type { Weapon } from '../weapons/Weapon';
import type { Item } from '../items/Item';
import type { EffectKind } from '../ports/EffectsPort';
import type { MatchOptions } from '../match/MatchOptions';
import type { BotKind, ItemKind, ProjectileKind, WeaponKind } from '@/data';

export type GameMessage =
  // Actors
  | { type: 'ADD_BOT'; kind: BotKind; position: THREE.Vector3; name?: string }
  | { type: 'SPAWN_BOT'; kind: BotKind; name?: string }
  | { type: 'SPAWN_PLAYER' }
  | { type: 'REMOVE_ACTOR'; actor: Handle<Actor> }
  | { type: 'RESPAWN_ACTOR'; actor: Handle<Actor> }
  | { type: 'DAMAGE_ACTOR'; actor: Handle<Actor>; who: Handle<Actor>; amount: number }
  // Weapons
  | { type: 'GIVE_NEW_WEAPON'; actor: Handle<Actor>; kind: WeaponKind }
  | { type: 'DROP_WEAPON'; actor: Handle<Actor>; weapon: Handle<Weapon> }
  | { type: 'SHOOT_WEAPON'; weapon: Handle<Weapon>; direction?: THREE.Vector3 }
  | { type: 'SHOW_WEAPON'; weapon: Handle<Weapon>; visible: boolean }
  | {
      type: 'CREATE_PROJECTILE';
      kind: ProjectileKind;
      position: THREE.Vector3;
      direction: THREE.Vector3;
      owner: Handle<Weapon>;
    }
  // Items
  | { type: 'GIVE_ITEM'; actor: Handle<Actor>; kind: ItemKind }
  | { type: 'PICK_UP_ITEM'; actor: Handle<Actor>; item: Handle<Item> }
  | {
      type: 'SPAWN_ITEM';
      kind: ItemKind;
      position: THREE.Vector3;
      /** Drop the item onto the first surface below `position` */
      adjustHeight: boolean;
      /** Seconds until the item disappears; omitted for permanent items */
      lifetime?: number;
    }
  // Presentation
  | {
      type: 'PLAY_SOUND';
      path: string;
      position: THREE.Vector3;
      gain?: number;
      radius?: number;
      rolloffFactor?: number;
    }
  | { type: 'CREATE_EFFECT'; kind: EffectKind; position: THREE.Vector3 }
  | { type: 'ADD_NOTIFICATION'; text: string }
  // Game shell
  | { type: 'SAVE_GAME'; slot?: string }
  | { type: 'LOAD_GAME'; slot?: string }
  | { type: 'START_NEW_GAME'; options: MatchOptions }
  | { type: 'QUIT_GAME' }
  | { type: 'SET_MUSIC_VOLUME'; volume: number }
  | { type: 'END_MATCH' };

export type GameMessageType = GameMessage['type'];

/** Extract the message variant with the given `type` */
export type MessageOf<T extends GameMessageType> = Extract<GameMessage, { type: T }>;
