import * as THREE from 'three';
import type { Handle } from '../ecs/Handle';
import type { Collider } from '../ports';
import { JUMP_PAD_FORCE_SCALE } from '@/data';
import { UP, type Vec3Data, fromVec3Data, toVec3Data } from '@/utils/math';

export interface JumpPadSnapshot {
  collider: Handle<Collider>;
  velocity: Vec3Data;
}

/**
 * Trigger surface that overwrites the velocity of any actor touching it
 */
export class JumpPad {
  public readonly collider: Handle<Collider>;
  public readonly velocity: Readonly<THREE.Vector3>;

  constructor(collider: Handle<Collider>, velocity: Readonly<THREE.Vector3>) {
    this.collider = collider;
    this.velocity = velocity.clone();
  }

  /**
   * Launch velocity from the pad's begin/end markers: the marker direction
   * scaled by the marker distance times {@link JUMP_PAD_FORCE_SCALE}.
   */
  public static fromMarkers(
    collider: Handle<Collider>,
    begin: Readonly<THREE.Vector3>,
    end: Readonly<THREE.Vector3>
  ): JumpPad {
    const delta = new THREE.Vector3().subVectors(end, begin);
    const distance = delta.length();
    const direction = distance > 0 ? delta.divideScalar(distance) : new THREE.Vector3().copy(UP);
    return new JumpPad(collider, direction.multiplyScalar(distance * JUMP_PAD_FORCE_SCALE));
  }

  public toSnapshot(): JumpPadSnapshot {
    return { collider: this.collider, velocity: toVec3Data(this.velocity) };
  }

  public static fromSnapshot(snapshot: JumpPadSnapshot): JumpPad {
    return new JumpPad(snapshot.collider, fromVec3Data(snapshot.velocity));
  }
}
