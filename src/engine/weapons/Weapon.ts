import * as THREE from 'three';
import { type Handle, NONE_HANDLE, handleEquals, isNone } from '../ecs/Handle';
import type { MessageSender } from '../core/MessageChannel';
import {
  type EnginePorts,
  type RigidBody,
  type SceneGraphPort,
  type SceneNode,
  requireModel,
} from '../ports';
import type { Actor } from '../actors/Actor';
import {
  type WeaponDefinition,
  type WeaponKind,
  LASER_DOT_COLOR,
  LASER_DOT_RADIUS,
  LASER_DOT_SURFACE_OFFSET,
  LASER_SIGHT_RANGE,
  RECOIL_OFFSET,
  RECOIL_RECOVERY,
  SHOT_POINT_NODE,
  getWeaponDefinition,
} from '@/data';
import { type Vec3Data, follow, fromVec3Data, toVec3Data } from '@/utils/math';
import { debugCombat } from '@/utils/debugLogger';

export interface WeaponSnapshot {
  kind: WeaponKind;
  model: Handle<SceneNode>;
  laserDot: Handle<SceneNode>;
  owner: Handle<Actor>;
  lastShotTime: number;
  ammo: number;
  offset: Vec3Data;
  visible: boolean;
}

interface WeaponInit {
  kind: WeaponKind;
  model: Handle<SceneNode>;
  laserDot: Handle<SceneNode>;
  sender: MessageSender | null;
}

const REST_OFFSET: Readonly<THREE.Vector3> = new THREE.Vector3();

export class Weapon {
  public readonly kind: WeaponKind;
  public readonly definition: WeaponDefinition;
  public readonly model: Handle<SceneNode>;
  public readonly laserDot: Handle<SceneNode>;

  public owner: Handle<Actor> = NONE_HANDLE;
  public ammo: number;

  private lastShotTime: number;
  private offset = new THREE.Vector3();
  private visible = true;
  private sender: MessageSender | null;

  constructor(init: WeaponInit) {
    this.kind = init.kind;
    this.definition = getWeaponDefinition(init.kind);
    this.model = init.model;
    this.laserDot = init.laserDot;
    this.sender = init.sender;
    this.ammo = this.definition.initialAmmo;
    // A new weapon can fire straight away
    this.lastShotTime = -this.definition.shootInterval;
  }

  /**
   * @throws AssetNotFoundError when the weapon model is missing
   */
  public static create(kind: WeaponKind, scene: SceneGraphPort, sender: MessageSender | null): Weapon {
    const model = requireModel(scene, getWeaponDefinition(kind).model);
    const laserDot = scene.createLight(LASER_DOT_COLOR, LASER_DOT_RADIUS);
    return new Weapon({ kind, model, laserDot, sender });
  }

  /**
   * Cooldown and ammo gate. On success applies recoil, spends one round and
   * records the shot time.
   */
  public tryShoot(time: number): boolean {
    if (time - this.lastShotTime < this.definition.shootInterval) return false;
    if (this.ammo <= 0) return false;

    this.offset.set(0, 0, RECOIL_OFFSET);
    this.ammo--;
    this.lastShotTime = time;
    return true;
  }

  /**
   * Fire if allowed: requests the projectile and the shot sound.
   * @param direction Overrides the muzzle direction
   */
  public shoot(
    self: Handle<Weapon>,
    time: number,
    scene: SceneGraphPort,
    direction?: Readonly<THREE.Vector3>
  ): boolean {
    if (!this.tryShoot(time)) return false;

    const position = this.getShotPosition(scene);
    const shotDirection = direction ? direction.clone() : this.getShotDirection(scene);

    if (!this.sender) {
      debugCombat.warn(`[Weapon] ${this.kind} fired without a message sender`);
      return true;
    }
    this.sender.send({
      type: 'CREATE_PROJECTILE',
      kind: this.definition.projectile,
      position,
      direction: shotDirection,
      owner: self,
    });
    this.sender.send({ type: 'PLAY_SOUND', path: this.definition.shotSound, position: position.clone() });
    return true;
  }

  /**
   * Recoil recovery and laser sight. The ray ignores the owner's own body.
   */
  public update(ports: Pick<EnginePorts, 'scene' | 'physics'>, ownerBody: Handle<RigidBody>): void {
    const { scene, physics } = ports;

    follow(this.offset, REST_OFFSET, RECOIL_RECOVERY);
    scene.setLocalPosition(this.model, this.offset);

    const origin = scene.getGlobalPosition(this.model);
    const look = scene.getLookVector(this.model);
    const hit = physics
      .castRay(origin, look, LASER_SIGHT_RANGE)
      .find((candidate) => isNone(ownerBody) || !handleEquals(candidate.body, ownerBody));

    if (hit) {
      const normal = hit.normal.clone().normalize();
      scene.setLocalPosition(this.laserDot, hit.position.clone().addScaledVector(normal, LASER_DOT_SURFACE_OFFSET));
      scene.setVisibility(this.laserDot, this.visible);
    } else {
      scene.setVisibility(this.laserDot, false);
    }
  }

  public getShotPosition(scene: SceneGraphPort): THREE.Vector3 {
    return scene.getGlobalPosition(this.shotNode(scene));
  }

  public getShotDirection(scene: SceneGraphPort): THREE.Vector3 {
    return scene.getLookVector(this.shotNode(scene)).normalize();
  }

  private shotNode(scene: SceneGraphPort): Handle<SceneNode> {
    const shotPoint = scene.findByName(this.model, SHOT_POINT_NODE);
    return isNone(shotPoint) ? this.model : shotPoint;
  }

  public addAmmo(amount: number): void {
    this.ammo += amount;
  }

  public getLastShotTime(): number {
    return this.lastShotTime;
  }

  public isVisible(): boolean {
    return this.visible;
  }

  public setVisibility(visible: boolean, scene: SceneGraphPort): void {
    this.visible = visible;
    scene.setVisibility(this.model, visible);
    scene.setVisibility(this.laserDot, visible);
  }

  public setOwner(owner: Handle<Actor>): void {
    this.owner = owner;
  }

  public cleanUp(scene: SceneGraphPort): void {
    scene.removeNode(this.model);
    scene.removeNode(this.laserDot);
  }

  public setMessageSender(sender: MessageSender | null): void {
    this.sender = sender;
  }

  public hasMessageSender(): boolean {
    return this.sender !== null;
  }

  public toSnapshot(): WeaponSnapshot {
    return {
      kind: this.kind,
      model: this.model,
      laserDot: this.laserDot,
      owner: this.owner,
      lastShotTime: this.lastShotTime,
      ammo: this.ammo,
      offset: toVec3Data(this.offset),
      visible: this.visible,
    };
  }

  public static fromSnapshot(snapshot: WeaponSnapshot): Weapon {
    const weapon = new Weapon({
      kind: snapshot.kind,
      model: snapshot.model,
      laserDot: snapshot.laserDot,
      sender: null,
    });
    weapon.owner = snapshot.owner;
    weapon.lastShotTime = snapshot.lastShotTime;
    weapon.ammo = snapshot.ammo;
    weapon.offset = fromVec3Data(snapshot.offset);
    weapon.visible = snapshot.visible;
    return weapon;
  }
}
