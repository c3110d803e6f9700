import * as THREE from 'three';
import type { Handle } from '../ecs/Handle';
import type { GameTime } from '../core/GameTime';
import type { MessageSender } from '../core/MessageChannel';
import { type SceneGraphPort, type SceneNode, requireModel } from '../ports';
import {
  type ItemDefinition,
  type ItemKind,
  ITEM_BOB_AMPLITUDE,
  ITEM_BOB_FOLLOW,
  ITEM_BOB_SPEED,
  getItemDefinition,
} from '@/data';
import { type Vec3Data, follow, fromVec3Data, toVec3Data } from '@/utils/math';

export interface ItemSnapshot {
  kind: ItemKind;
  pivot: Handle<SceneNode>;
  model: Handle<SceneNode>;
  offset: Vec3Data;
  offsetFactor: number;
  active: boolean;
  reactivationTimer: number;
  lifetime: number | null;
}

interface ItemInit {
  kind: ItemKind;
  pivot: Handle<SceneNode>;
  model: Handle<SceneNode>;
  lifetime: number | null;
  sender: MessageSender | null;
}

/**
 * Pickup placed on the map or dropped by a removed actor.
 *
 * Map items are never freed: picking one up deactivates it until its
 * reactivation interval has passed. Dropped items carry a lifetime and are
 * freed by the level on pickup or expiry.
 */
export class Item {
  public readonly kind: ItemKind;
  public readonly definition: ItemDefinition;
  public readonly pivot: Handle<SceneNode>;
  public readonly model: Handle<SceneNode>;

  private offset = new THREE.Vector3();
  private destOffset = new THREE.Vector3();
  private offsetFactor = 0;
  private active = true;
  private reactivationTimer = 0;
  private lifetime: number | null;
  private sender: MessageSender | null;

  constructor(init: ItemInit) {
    this.kind = init.kind;
    this.definition = getItemDefinition(init.kind);
    this.pivot = init.pivot;
    this.model = init.model;
    this.lifetime = init.lifetime;
    this.sender = init.sender;
  }

  /**
   * Instantiate the item's model under a fresh pivot at `position`.
   * @throws AssetNotFoundError when the model is missing
   */
  public static create(
    kind: ItemKind,
    position: Readonly<THREE.Vector3>,
    scene: SceneGraphPort,
    sender: MessageSender | null,
    lifetime: number | null = null
  ): Item {
    const definition = getItemDefinition(kind);
    const model = requireModel(scene, definition.model);
    scene.setLocalScale(model, new THREE.Vector3().setScalar(definition.scale));

    const pivot = scene.createPivot(definition.name);
    scene.linkNodes(model, pivot);
    scene.setLocalPosition(pivot, position);

    return new Item({ kind, pivot, model, lifetime, sender });
  }

  public update(time: Readonly<GameTime>, scene: SceneGraphPort): void {
    // Cosmetic bob
    this.offsetFactor += ITEM_BOB_SPEED * time.delta;
    this.destOffset.set(0, ITEM_BOB_AMPLITUDE * Math.sin(this.offsetFactor), 0);
    follow(this.offset, this.destOffset, ITEM_BOB_FOLLOW);
    scene.setLocalPosition(this.model, this.offset);

    if (!this.active) {
      this.reactivationTimer -= time.delta;
      if (this.reactivationTimer <= 0) {
        this.active = true;
        this.sender?.send({
          type: 'CREATE_EFFECT',
          kind: 'ITEM_APPEAR',
          position: this.getPosition(scene),
        });
      }
    }

    scene.setVisibility(this.pivot, this.active);

    if (this.lifetime !== null) {
      this.lifetime -= time.delta;
    }
  }

  public isActive(): boolean {
    return this.active;
  }

  public isTemporary(): boolean {
    return this.lifetime !== null;
  }

  public isExpired(): boolean {
    return this.lifetime !== null && this.lifetime <= 0;
  }

  public getLifetime(): number | null {
    return this.lifetime;
  }

  /**
   * Deactivate until the reactivation interval has passed
   */
  public pickUp(): void {
    this.active = false;
    this.reactivationTimer = this.definition.reactivationInterval;
  }

  public getPosition(scene: SceneGraphPort): THREE.Vector3 {
    return scene.getGlobalPosition(this.pivot);
  }

  public cleanUp(scene: SceneGraphPort): void {
    scene.removeNode(this.pivot);
  }

  public setMessageSender(sender: MessageSender | null): void {
    this.sender = sender;
  }

  public hasMessageSender(): boolean {
    return this.sender !== null;
  }

  public toSnapshot(): ItemSnapshot {
    return {
      kind: this.kind,
      pivot: this.pivot,
      model: this.model,
      offset: toVec3Data(this.offset),
      offsetFactor: this.offsetFactor,
      active: this.active,
      reactivationTimer: this.reactivationTimer,
      lifetime: this.lifetime,
    };
  }

  public static fromSnapshot(snapshot: ItemSnapshot): Item {
    const item = new Item({
      kind: snapshot.kind,
      pivot: snapshot.pivot,
      model: snapshot.model,
      lifetime: snapshot.lifetime,
      sender: null,
    });
    item.offset = fromVec3Data(snapshot.offset);
    item.offsetFactor = snapshot.offsetFactor;
    item.active = snapshot.active;
    item.reactivationTimer = snapshot.reactivationTimer;
    return item;
  }
}
