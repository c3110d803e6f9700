import type * as THREE from 'three';

export interface SoundOptions {
  gain?: number;
  radius?: number;
  rolloffFactor?: number;
}

/**
 * Port interface for the audio engine. Sounds are fire-and-forget.
 */
export interface SoundPort {
  playSound(path: string, position: Readonly<THREE.Vector3>, options?: SoundOptions): void;
  setMusicVolume(volume: number): void;
  setSoundVolume(volume: number): void;
}
