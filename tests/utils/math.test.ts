import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import {
  SeededRandom,
  UP,
  clamp,
  follow,
  fromVec3Data,
  normalizeOr,
  toVec3Data,
  yawFromDirection,
} from '@/utils/math';

describe('math utilities', () => {
  it('clamps', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });

  it('normalizes vectors and falls back for zero length', () => {
    expect(normalizeOr(new THREE.Vector3(0, 3, 4), UP)).toEqual(new THREE.Vector3(0, 0.6, 0.8));
    expect(normalizeOr(new THREE.Vector3(), UP)).toEqual(new THREE.Vector3(0, 1, 0));
  });

  it('writes into the provided output vector', () => {
    const out = new THREE.Vector3();
    const result = normalizeOr(new THREE.Vector3(2, 0, 0), UP, out);
    expect(result).toBe(out);
    expect(out.x).toBe(1);
  });

  it('eases toward a target by a fixed factor', () => {
    const current = new THREE.Vector3(0, 0, -0.05);
    follow(current, new THREE.Vector3(), 0.2);
    expect(current.z).toBeCloseTo(-0.04, 10);
    follow(current, new THREE.Vector3(), 0.2);
    expect(current.z).toBeCloseTo(-0.032, 10);
  });

  it('computes yaw about +Y', () => {
    expect(yawFromDirection(new THREE.Vector3(0, 0, 1))).toBe(0);
    expect(yawFromDirection(new THREE.Vector3(1, 0, 0))).toBeCloseTo(Math.PI / 2, 10);
  });

  it('converts vectors to plain data and back', () => {
    const data = toVec3Data(new THREE.Vector3(1, 2, 3));
    expect(data).toEqual({ x: 1, y: 2, z: 3 });
    expect(fromVec3Data(data)).toEqual(new THREE.Vector3(1, 2, 3));
  });
});

describe('SeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
  });

  it('stays within the requested ranges', () => {
    const random = new SeededRandom(9);
    for (let i = 0; i < 100; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);

      const ranged = random.nextRange(0.1, 0.2);
      expect(ranged).toBeGreaterThanOrEqual(0.1);
      expect(ranged).toBeLessThanOrEqual(0.2);

      const index = random.nextInt(0, 3);
      expect(Number.isInteger(index)).toBe(true);
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeLessThanOrEqual(3);
    }
  });

  it('continues the same sequence from its saved state', () => {
    const random = new SeededRandom(5);
    random.next();
    const resumed = new SeededRandom(random.getSeed());

    expect(resumed.next()).toBe(random.next());
  });
});
