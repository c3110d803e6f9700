import type { SceneGraphPort } from './SceneGraphPort';
import type { PhysicsPort } from './PhysicsPort';
import type { SoundPort } from './SoundPort';
import type { EffectsPort } from './EffectsPort';

/**
 * Everything the simulation needs from the host engine
 */
export interface EnginePorts {
  scene: SceneGraphPort;
  physics: PhysicsPort;
  sound: SoundPort;
  effects: EffectsPort;
}

export type {
  SceneGraphPort,
  SceneNode,
  AnimationClip,
  AnimationWeight,
  NamedNode,
} from './SceneGraphPort';
export { AssetNotFoundError, requireModel, requireAnimation } from './SceneGraphPort';
export type {
  PhysicsPort,
  RigidBody,
  Collider,
  BodyColliderPair,
  ContactInfo,
  RayHit,
} from './PhysicsPort';
export type { SoundPort, SoundOptions } from './SoundPort';
export { EFFECT_KINDS } from './EffectsPort';
export type { EffectsPort, EffectKind } from './EffectsPort';
