import type * as THREE from 'three';
import type { Handle } from '@/engine/ecs/Handle';
import type { SceneNode } from './SceneGraphPort';

/** Type tag for rigid body handles */
export interface RigidBody {
  readonly __rigidBody: true;
}

/** Type tag for collider handles */
export interface Collider {
  readonly __collider: true;
}

export interface BodyColliderPair {
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
}

export interface ContactInfo {
  /** The other collider of the contact */
  collider: Handle<Collider>;
  /** Contact normal, pointing away from the other collider */
  normal: THREE.Vector3;
}

export interface RayHit {
  position: THREE.Vector3;
  normal: THREE.Vector3;
  collider: Handle<Collider>;
  /** Body owning the collider; NONE_HANDLE for static geometry */
  body: Handle<RigidBody>;
  /** Distance from the ray origin */
  distance: number;
}

/**
 * Port interface for the physics engine.
 */
export interface PhysicsPort {
  // === BODIES ===
  createCapsuleBody(position: Readonly<THREE.Vector3>, radius: number, height: number): BodyColliderPair;
  /** Kinematic sphere, moved only through setBodyPosition/moveBody */
  createKinematicBall(position: Readonly<THREE.Vector3>, radius: number): BodyColliderPair;
  /** Static triangle-mesh collider built from a mesh node */
  createTrimeshCollider(node: Handle<SceneNode>): Handle<Collider>;
  /** Make a scene node follow a body */
  attachNode(body: Handle<RigidBody>, node: Handle<SceneNode>): void;
  removeBody(body: Handle<RigidBody>): void;
  removeCollider(collider: Handle<Collider>): void;

  // === STATE ===
  getBodyPosition(body: Handle<RigidBody>): THREE.Vector3;
  setBodyPosition(body: Handle<RigidBody>, position: Readonly<THREE.Vector3>): void;
  moveBody(body: Handle<RigidBody>, offset: Readonly<THREE.Vector3>): void;
  getLinearVelocity(body: Handle<RigidBody>): THREE.Vector3;
  setLinearVelocity(body: Handle<RigidBody>, velocity: Readonly<THREE.Vector3>): void;

  // === QUERIES ===
  /** Contacts of `collider` from the last physics step */
  contacts(collider: Handle<Collider>): readonly ContactInfo[];
  /** Hits along the ray, sorted by distance */
  castRay(origin: Readonly<THREE.Vector3>, direction: Readonly<THREE.Vector3>, maxLength: number): RayHit[];
}
