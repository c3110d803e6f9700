import type * as THREE from 'three';

export const EFFECT_KINDS = ['BULLET_IMPACT', 'ITEM_APPEAR', 'SMOKE', 'STEAM'] as const;

export type EffectKind = (typeof EFFECT_KINDS)[number];

/**
 * Port interface for one-shot visual effects (particles).
 */
export interface EffectsPort {
  createEffect(kind: EffectKind, position: Readonly<THREE.Vector3>): void;
}
