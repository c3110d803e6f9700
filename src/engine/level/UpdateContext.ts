import type * as THREE from 'three';
import type { Handle } from '../ecs/Handle';
import type { ReadonlyPool } from '../ecs/Pool';
import type { GameTime } from '../core/GameTime';
import type { EnginePorts, RigidBody } from '../ports';
import type { Actor } from '../actors/Actor';
import type { Weapon } from '../weapons/Weapon';
import type { Item } from '../items/Item';
import type { JumpPad } from '../items/JumpPad';
import type { SeededRandom } from '@/utils/math';

/**
 * Frame-start view of one live actor. Built before any actor is updated, so
 * decisions made during the update pass all see the same world.
 */
export interface TargetDescriptor {
  handle: Handle<Actor>;
  health: number;
  position: THREE.Vector3;
  body: Handle<RigidBody>;
}

export interface ControlSettings {
  mouseSensitivity: number;
  invertMouseY: boolean;
}

/**
 * Read-only world access handed to each actor update. Structural changes go
 * through messages.
 */
export interface UpdateContext {
  time: Readonly<GameTime>;
  ports: EnginePorts;
  weapons: ReadonlyPool<Weapon>;
  items: ReadonlyPool<Item>;
  jumpPads: ReadonlyPool<JumpPad>;
  targets: readonly TargetDescriptor[];
  controls: ControlSettings;
  random: SeededRandom;
}
