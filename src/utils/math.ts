import * as THREE from 'three';

/** Vectors shorter than this are treated as having no direction */
export const DIRECTION_EPSILON = 1e-6;

export const UP: Readonly<THREE.Vector3> = new THREE.Vector3(0, 1, 0);

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Normalize `v` into `out`, or copy `fallback` when `v` is (nearly) zero-length.
 * Returns `out`.
 */
export function normalizeOr(
  v: Readonly<THREE.Vector3>,
  fallback: Readonly<THREE.Vector3>,
  out: THREE.Vector3 = new THREE.Vector3()
): THREE.Vector3 {
  const length = v.length();
  if (length <= DIRECTION_EPSILON) {
    return out.copy(fallback);
  }
  return out.copy(v).divideScalar(length);
}

/**
 * Ease `current` toward `target` by `factor` (0..1) in place.
 */
export function follow(current: THREE.Vector3, target: Readonly<THREE.Vector3>, factor: number): THREE.Vector3 {
  current.x += (target.x - current.x) * factor;
  current.y += (target.y - current.y) * factor;
  current.z += (target.z - current.z) * factor;
  return current;
}

/**
 * Yaw (rotation about +Y) that faces the horizontal part of `direction`.
 */
export function yawFromDirection(direction: Readonly<THREE.Vector3>): number {
  return Math.atan2(direction.x, direction.z);
}

/** Plain-data vector used in snapshots and messages that must survive JSON */
export interface Vec3Data {
  x: number;
  y: number;
  z: number;
}

export function toVec3Data(v: Readonly<THREE.Vector3>): Vec3Data {
  return { x: v.x, y: v.y, z: v.z };
}

export function fromVec3Data(data: Vec3Data): THREE.Vector3 {
  return new THREE.Vector3(data.x, data.y, data.z);
}

// Seeded random for reproducible spawn selection
export class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  public getSeed(): number {
    return this.seed;
  }

  public next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x7fffffff;
  }

  public nextRange(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Integer in [min, max] */
  public nextInt(min: number, max: number): number {
    return Math.min(max, Math.floor(this.nextRange(min, max + 1)));
  }
}
