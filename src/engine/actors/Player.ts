import * as THREE from 'three';
import { type Handle, isSome } from '../ecs/Handle';
import type { MessageSender } from '../core/MessageChannel';
import type { EnginePorts, SceneNode } from '../ports';
import type { UpdateContext } from '../level/UpdateContext';
import { Character, type CharacterSnapshot } from './Character';
import type { Actor } from './Actor';
import {
  BODY_HEIGHT,
  BODY_RADIUS,
  FOOTSTEP_DISTANCE,
  FOOTSTEP_SOUNDS,
  GROUND_DAMPING,
  JUMP_VELOCITY,
  PLAYER_MOVE_SPEED,
  PLAYER_RUN_MULTIPLIER,
} from '@/data';
import { DIRECTION_EPSILON, UP, clamp } from '@/utils/math';

const PLAYER_HEALTH = 100;
const CAMERA_HEIGHT = BODY_HEIGHT - 0.2;
const WEAPON_PIVOT_OFFSET: Readonly<THREE.Vector3> = new THREE.Vector3(-0.065, -0.052, 0.02);
const PITCH_LIMIT = 90;
const X_AXIS: Readonly<THREE.Vector3> = new THREE.Vector3(1, 0, 0);

/**
 * Captured controls for one player. Movement flags are held states; jump,
 * weapon switching and look deltas are consumed by the next update.
 */
export interface InputState {
  moveForward: boolean;
  moveBackward: boolean;
  moveLeft: boolean;
  moveRight: boolean;
  run: boolean;
  jump: boolean;
  shoot: boolean;
  nextWeapon: boolean;
  prevWeapon: boolean;
  /** Slot to switch to, or null */
  selectWeapon: number | null;
  /** Mouse movement since the last update, in pixels */
  lookDeltaX: number;
  lookDeltaY: number;
}

export function createInputState(): InputState {
  return {
    moveForward: false,
    moveBackward: false,
    moveLeft: false,
    moveRight: false,
    run: false,
    jump: false,
    shoot: false,
    nextWeapon: false,
    prevWeapon: false,
    selectWeapon: null,
    lookDeltaX: 0,
    lookDeltaY: 0,
  };
}

export interface PlayerSnapshot extends CharacterSnapshot {
  kind: 'player';
  camera: Handle<SceneNode>;
  cameraPivot: Handle<SceneNode>;
  yaw: number;
  pitch: number;
  walkedDistance: number;
}

interface PlayerInit {
  name: string;
  body: PlayerSnapshot['body'];
  collider: PlayerSnapshot['collider'];
  pivot: Handle<SceneNode>;
  cameraPivot: Handle<SceneNode>;
  camera: Handle<SceneNode>;
  weaponPivot: Handle<SceneNode>;
  sender: MessageSender | null;
}

/**
 * Human-controlled actor. Input is captured by the presentation layer and
 * applied once per update.
 */
export class Player extends Character {
  public readonly kind = 'player';
  public readonly camera: Handle<SceneNode>;
  public readonly cameraPivot: Handle<SceneNode>;

  private input: InputState = createInputState();
  /** Degrees */
  private yaw = 0;
  private pitch = 0;
  private walkedDistance = 0;

  constructor(init: PlayerInit) {
    super({
      name: init.name,
      health: PLAYER_HEALTH,
      body: init.body,
      collider: init.collider,
      pivot: init.pivot,
      weaponPivot: init.weaponPivot,
      sender: init.sender,
    });
    this.camera = init.camera;
    this.cameraPivot = init.cameraPivot;
  }

  public static create(
    position: Readonly<THREE.Vector3>,
    ports: Pick<EnginePorts, 'scene' | 'physics'>,
    sender: MessageSender | null,
    name: string = 'Player'
  ): Player {
    const { scene, physics } = ports;

    const { body, collider } = physics.createCapsuleBody(position, BODY_RADIUS, BODY_HEIGHT);
    const pivot = scene.createPivot(name);
    physics.attachNode(body, pivot);

    const cameraPivot = scene.createPivot('CameraPivot');
    scene.linkNodes(cameraPivot, pivot);
    scene.setLocalPosition(cameraPivot, new THREE.Vector3(0, CAMERA_HEIGHT, 0));

    const camera = scene.createPivot('Camera');
    scene.linkNodes(camera, cameraPivot);

    const weaponPivot = scene.createPivot('WeaponPivot');
    scene.linkNodes(weaponPivot, camera);
    scene.setLocalPosition(weaponPivot, WEAPON_PIVOT_OFFSET);

    return new Player({ name, body, collider, pivot, cameraPivot, camera, weaponPivot, sender });
  }

  // ==================== INPUT ====================

  /**
   * Merge captured input. Look deltas accumulate until the next update.
   */
  public setInput(input: Partial<InputState>): void {
    const lookDeltaX = this.input.lookDeltaX + (input.lookDeltaX ?? 0);
    const lookDeltaY = this.input.lookDeltaY + (input.lookDeltaY ?? 0);
    this.input = { ...this.input, ...input, lookDeltaX, lookDeltaY };
  }

  public getInput(): Readonly<InputState> {
    return this.input;
  }

  public getYaw(): number {
    return this.yaw;
  }

  public getPitch(): number {
    return this.pitch;
  }

  // ==================== UPDATE ====================

  public update(self: Handle<Actor>, context: UpdateContext): void {
    this.updateLook(context);
    this.updateWeaponSelection();
    this.updateMovement(context);

    const weapon = this.currentWeapon();
    if (this.input.shoot && isSome(weapon)) {
      this.send({ type: 'SHOOT_WEAPON', weapon });
    }

    if (this.walkedDistance > FOOTSTEP_DISTANCE) {
      this.walkedDistance = 0;
      const index = Math.min(FOOTSTEP_SOUNDS.length - 1, Math.floor(context.random.next() * FOOTSTEP_SOUNDS.length));
      this.send({
        type: 'PLAY_SOUND',
        path: FOOTSTEP_SOUNDS[index],
        position: this.position(context.ports),
        gain: 1,
        rolloffFactor: 2,
        radius: 3,
      });
    }

    this.updateCommon(self, context);
  }

  private updateLook(context: UpdateContext): void {
    const { mouseSensitivity, invertMouseY } = context.controls;
    const pitchSensitivity = invertMouseY ? -mouseSensitivity : mouseSensitivity;

    this.yaw -= this.input.lookDeltaX * mouseSensitivity;
    this.pitch = clamp(this.pitch + this.input.lookDeltaY * pitchSensitivity, -PITCH_LIMIT, PITCH_LIMIT);
    this.input.lookDeltaX = 0;
    this.input.lookDeltaY = 0;

    const { scene } = context.ports;
    scene.setLocalRotation(this.pivot, new THREE.Quaternion().setFromAxisAngle(UP, THREE.MathUtils.degToRad(this.yaw)));
    scene.setLocalRotation(
      this.cameraPivot,
      new THREE.Quaternion().setFromAxisAngle(X_AXIS, THREE.MathUtils.degToRad(this.pitch))
    );
  }

  private updateWeaponSelection(): void {
    if (this.input.nextWeapon) {
      this.nextWeapon();
    }
    if (this.input.prevWeapon) {
      this.prevWeapon();
    }
    if (this.input.selectWeapon !== null) {
      this.setCurrentWeapon(this.input.selectWeapon);
    }
    this.input.nextWeapon = false;
    this.input.prevWeapon = false;
    this.input.selectWeapon = null;
  }

  private updateMovement(context: UpdateContext): void {
    const { physics } = context.ports;
    const grounded = this.hasGroundContact(context.ports);

    const yaw = THREE.MathUtils.degToRad(this.yaw);
    const look = new THREE.Vector3(Math.sin(yaw), 0, Math.cos(yaw));
    const side = new THREE.Vector3(Math.cos(yaw), 0, -Math.sin(yaw));

    const wish = new THREE.Vector3();
    if (this.input.moveForward) wish.add(look);
    if (this.input.moveBackward) wish.sub(look);
    if (this.input.moveLeft) wish.add(side);
    if (this.input.moveRight) wish.sub(side);

    const velocity = physics.getLinearVelocity(this.body);
    const speed = PLAYER_MOVE_SPEED * (this.input.run ? PLAYER_RUN_MULTIPLIER : 1);
    const wishLength = wish.length();
    if (wishLength > DIRECTION_EPSILON) {
      wish.divideScalar(wishLength);
      velocity.x = wish.x * speed;
      velocity.z = wish.z * speed;
      if (grounded) {
        this.walkedDistance += speed * context.time.delta;
      }
    }

    if (this.input.jump) {
      if (grounded) {
        velocity.y = JUMP_VELOCITY;
      }
      this.input.jump = false;
    }

    // No sliding on the ground
    if (grounded) {
      velocity.x *= GROUND_DAMPING;
      velocity.z *= GROUND_DAMPING;
    }

    physics.setLinearVelocity(this.body, velocity);
  }

  // ==================== PERSISTENCE ====================

  public toSnapshot(): PlayerSnapshot {
    return {
      ...this.characterSnapshot(),
      kind: 'player',
      camera: this.camera,
      cameraPivot: this.cameraPivot,
      yaw: this.yaw,
      pitch: this.pitch,
      walkedDistance: this.walkedDistance,
    };
  }

  public static fromSnapshot(snapshot: PlayerSnapshot): Player {
    const player = new Player({
      name: snapshot.name,
      body: snapshot.body,
      collider: snapshot.collider,
      pivot: snapshot.pivot,
      cameraPivot: snapshot.cameraPivot,
      camera: snapshot.camera,
      weaponPivot: snapshot.weaponPivot,
      sender: null,
    });
    player.restoreCharacter(snapshot);
    player.yaw = snapshot.yaw;
    player.pitch = snapshot.pitch;
    player.walkedDistance = snapshot.walkedDistance;
    return player;
  }
}
