import * as THREE from 'three';
import type { BotKind } from '@/data';
import { type Vec3Data, fromVec3Data, toVec3Data } from '@/utils/math';

/**
 * Place where actors may (re)appear
 */
export class SpawnPoint {
  public readonly position: THREE.Vector3;

  constructor(position: Readonly<THREE.Vector3>) {
    this.position = position.clone();
  }

  public toSnapshot(): Vec3Data {
    return toVec3Data(this.position);
  }

  public static fromSnapshot(data: Vec3Data): SpawnPoint {
    return new SpawnPoint(fromVec3Data(data));
  }
}

export interface DeathZoneSnapshot {
  min: Vec3Data;
  max: Vec3Data;
}

/**
 * Volume that forces a respawn of any actor found inside it
 */
export class DeathZone {
  public readonly bounds: THREE.Box3;

  constructor(bounds: Readonly<THREE.Box3>) {
    this.bounds = bounds.clone();
  }

  public contains(point: Readonly<THREE.Vector3>): boolean {
    return this.bounds.containsPoint(point);
  }

  public toSnapshot(): DeathZoneSnapshot {
    return { min: toVec3Data(this.bounds.min), max: toVec3Data(this.bounds.max) };
  }

  public static fromSnapshot(data: DeathZoneSnapshot): DeathZone {
    return new DeathZone(new THREE.Box3(fromVec3Data(data.min), fromVec3Data(data.max)));
  }
}

/** Pending respawn; `timeLeft` counts down in seconds */
export type RespawnEntry =
  | { kind: 'bot'; botKind: BotKind; name: string; timeLeft: number }
  | { kind: 'player'; timeLeft: number };
