import type * as THREE from 'three';
import type { Handle } from '@/engine/ecs/Handle';

/** Type tag for scene graph node handles */
export interface SceneNode {
  readonly __sceneNode: true;
}

/** Type tag for animation clips retargeted onto a model */
export interface AnimationClip {
  readonly __animationClip: true;
}

export interface NamedNode {
  handle: Handle<SceneNode>;
  name: string;
}

export interface AnimationWeight {
  clip: Handle<AnimationClip>;
  weight: number;
}

/**
 * Port interface for the rendering engine's scene graph.
 * Decouples simulation logic from the renderer; tests use an in-process fake.
 *
 * Missing nodes are reported as NONE_HANDLE, missing assets as null.
 */
export interface SceneGraphPort {
  // === ASSETS ===
  /** Instantiate a model resource; null when the resource cannot be loaded */
  instantiateModel(path: string): Handle<SceneNode> | null;
  /** Retarget an animation resource onto a model; null when it cannot be loaded */
  loadAnimation(path: string, model: Handle<SceneNode>): Handle<AnimationClip> | null;

  // === NODE CREATION ===
  createPivot(name?: string): Handle<SceneNode>;
  createLight(color: number, radius: number): Handle<SceneNode>;
  createSprite(texture: string, size: number, color: number): Handle<SceneNode>;

  // === HIERARCHY ===
  contains(node: Handle<SceneNode>): boolean;
  /** Depth-first search below `root`, `root` included */
  findByName(root: Handle<SceneNode>, name: string): Handle<SceneNode>;
  findByNameFromRoot(name: string): Handle<SceneNode>;
  linkNodes(child: Handle<SceneNode>, parent: Handle<SceneNode>): void;
  /** Remove a node together with its descendants */
  removeNode(node: Handle<SceneNode>): void;
  /** Every node currently in the scene, in graph order */
  nodes(): Iterable<NamedNode>;

  // === TRANSFORMS ===
  setLocalPosition(node: Handle<SceneNode>, position: Readonly<THREE.Vector3>): void;
  setLocalRotation(node: Handle<SceneNode>, rotation: Readonly<THREE.Quaternion>): void;
  setLocalScale(node: Handle<SceneNode>, scale: Readonly<THREE.Vector3>): void;
  setVisibility(node: Handle<SceneNode>, visible: boolean): void;
  getGlobalPosition(node: Handle<SceneNode>): THREE.Vector3;
  /** Unit forward (+Z) vector of the node in world space */
  getLookVector(node: Handle<SceneNode>): THREE.Vector3;
  /** World-space bounds of a mesh node; null for nodes without geometry */
  getWorldBoundingBox(node: Handle<SceneNode>): THREE.Box3 | null;

  // === ANIMATION ===
  /** Pose a model from weighted clips; evaluation happens inside the engine */
  setAnimationWeights(model: Handle<SceneNode>, weights: readonly AnimationWeight[]): void;
}

/**
 * Thrown when an asset an entity cannot exist without is missing. Aborts the
 * construction of that one entity.
 */
export class AssetNotFoundError extends Error {
  public readonly path: string;

  constructor(path: string) {
    super(`Asset not found: ${path}`);
    this.name = 'AssetNotFoundError';
    this.path = path;
  }
}

export function requireModel(scene: SceneGraphPort, path: string): Handle<SceneNode> {
  const model = scene.instantiateModel(path);
  if (model === null) {
    throw new AssetNotFoundError(path);
  }
  return model;
}

export function requireAnimation(
  scene: SceneGraphPort,
  path: string,
  model: Handle<SceneNode>
): Handle<AnimationClip> {
  const clip = scene.loadAnimation(path, model);
  if (clip === null) {
    throw new AssetNotFoundError(path);
  }
  return clip;
}
