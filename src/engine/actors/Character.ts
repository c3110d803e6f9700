import type * as THREE from 'three';
import { type Handle, NONE_HANDLE, handleEquals, isSome } from '../ecs/Handle';
import type { MessageSender } from '../core/MessageChannel';
import type { GameMessage } from '../core/GameMessage';
import type { EnginePorts, SceneNode, RigidBody, Collider } from '../ports';
import type { Weapon } from '../weapons/Weapon';
import type { Actor } from './Actor';
import type { UpdateContext } from '../level/UpdateContext';
import { GROUND_NORMAL_MIN_Y, ITEM_PICKUP_RADIUS } from '@/data';
import { debugActors } from '@/utils/debugLogger';

export type Team = 'NONE' | 'RED' | 'BLUE';

export interface CharacterInit {
  name: string;
  team?: Team;
  health: number;
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
  pivot: Handle<SceneNode>;
  weaponPivot: Handle<SceneNode>;
  sender: MessageSender | null;
}

export interface CharacterSnapshot {
  name: string;
  team: Team;
  health: number;
  maxHealth: number;
  armor: number;
  weapons: Handle<Weapon>[];
  currentWeaponIndex: number;
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
  pivot: Handle<SceneNode>;
  weaponPivot: Handle<SceneNode>;
  removalRequested: boolean;
}

/**
 * State and behaviour shared by every actor variant: health, owned weapons and
 * the physical body. Cross-entity effects are only ever requested through the
 * message sender.
 */
export abstract class Character {
  public name: string;
  public team: Team;
  public health: number;
  /** Starting health; heals never go above it */
  public readonly maxHealth: number;
  public armor = 0;

  public weapons: Handle<Weapon>[] = [];
  public currentWeaponIndex = 0;

  public readonly body: Handle<RigidBody>;
  public readonly collider: Handle<Collider>;
  public readonly pivot: Handle<SceneNode>;
  public readonly weaponPivot: Handle<SceneNode>;

  protected sender: MessageSender | null;
  private removalRequested = false;

  constructor(init: CharacterInit) {
    this.name = init.name;
    this.team = init.team ?? 'NONE';
    this.health = init.health;
    this.maxHealth = init.health;
    this.body = init.body;
    this.collider = init.collider;
    this.pivot = init.pivot;
    this.weaponPivot = init.weaponPivot;
    this.sender = init.sender;
  }

  // ==================== HEALTH ====================

  /**
   * Armor absorbs first; the rest comes off health with no floor.
   */
  public damage(amount: number): void {
    let remaining = Math.abs(amount);
    const absorbed = Math.min(this.armor, remaining);
    this.armor -= absorbed;
    remaining -= absorbed;
    this.health -= remaining;
  }

  public heal(amount: number): void {
    this.health = Math.min(this.maxHealth, this.health + Math.abs(amount));
  }

  public isDead(): boolean {
    return this.health <= 0;
  }

  // ==================== WEAPONS ====================

  /**
   * Take ownership of a weapon and make it the current one
   */
  public addWeapon(weapon: Handle<Weapon>): void {
    for (const other of this.weapons) {
      this.send({ type: 'SHOW_WEAPON', weapon: other, visible: false });
    }

    this.currentWeaponIndex = this.weapons.length;
    this.weapons.push(weapon);

    this.requestCurrentWeaponVisible(true);
  }

  public currentWeapon(): Handle<Weapon> {
    return this.weapons[this.currentWeaponIndex] ?? NONE_HANDLE;
  }

  public nextWeapon(): void {
    if (this.currentWeaponIndex < this.weapons.length - 1) {
      this.setCurrentWeapon(this.currentWeaponIndex + 1);
    }
  }

  public prevWeapon(): void {
    if (this.currentWeaponIndex > 0) {
      this.setCurrentWeapon(this.currentWeaponIndex - 1);
    }
  }

  public setCurrentWeapon(index: number): void {
    if (index < 0 || index >= this.weapons.length || index === this.currentWeaponIndex) return;

    this.requestCurrentWeaponVisible(false);
    this.currentWeaponIndex = index;
    this.requestCurrentWeaponVisible(true);
  }

  /**
   * Forget a weapon. The current index stays on the same weapon where possible.
   */
  public removeWeapon(weapon: Handle<Weapon>): boolean {
    const index = this.weapons.findIndex((owned) => handleEquals(owned, weapon));
    if (index < 0) return false;

    this.weapons.splice(index, 1);
    if (this.currentWeaponIndex > index || this.currentWeaponIndex >= this.weapons.length) {
      this.currentWeaponIndex = Math.max(0, this.currentWeaponIndex - 1);
    }
    return true;
  }

  private requestCurrentWeaponVisible(visible: boolean): void {
    const current = this.currentWeapon();
    if (isSome(current)) {
      this.send({ type: 'SHOW_WEAPON', weapon: current, visible });
    }
  }

  // ==================== BODY ====================

  public hasGroundContact(ports: Pick<EnginePorts, 'physics'>): boolean {
    return ports.physics
      .contacts(this.collider)
      .some((contact) => contact.normal.y > GROUND_NORMAL_MIN_Y);
  }

  public position(ports: Pick<EnginePorts, 'physics'>): THREE.Vector3 {
    return ports.physics.getBodyPosition(this.body);
  }

  public setPosition(ports: Pick<EnginePorts, 'physics'>, position: Readonly<THREE.Vector3>): void {
    ports.physics.setBodyPosition(this.body, position);
  }

  /**
   * Release the physical and visual resources. Weapons are released by the level.
   */
  public cleanUp(ports: Pick<EnginePorts, 'scene' | 'physics'>): void {
    ports.physics.removeBody(this.body);
    ports.scene.removeNode(this.pivot);
  }

  // ==================== MESSAGING ====================

  public setMessageSender(sender: MessageSender | null): void {
    this.sender = sender;
  }

  public hasMessageSender(): boolean {
    return this.sender !== null;
  }

  protected send(message: GameMessage): void {
    if (this.sender) {
      this.sender.send(message);
    } else {
      debugActors.warn(`[${this.name}] Dropped ${message.type}: no message sender`);
    }
  }

  /**
   * Per-frame work common to every variant, run after the variant's own update:
   * jump pad response, item pickup requests and the one-time removal request.
   */
  protected updateCommon(self: Handle<Actor>, context: UpdateContext): void {
    const { physics } = context.ports;

    for (const contact of physics.contacts(this.collider)) {
      for (const pad of context.jumpPads.iter()) {
        if (handleEquals(pad.collider, contact.collider)) {
          physics.setLinearVelocity(this.body, pad.velocity);
        }
      }
    }

    if (this.isDead()) {
      if (!this.removalRequested) {
        this.removalRequested = true;
        this.send({ type: 'REMOVE_ACTOR', actor: self });
      }
      return;
    }

    const position = this.position(context.ports);
    for (const [handle, item] of context.items.pairIter()) {
      if (!item.isActive()) continue;
      if (item.getPosition(context.ports.scene).distanceTo(position) < ITEM_PICKUP_RADIUS) {
        this.send({ type: 'PICK_UP_ITEM', actor: self, item: handle });
      }
    }
  }

  protected characterSnapshot(): CharacterSnapshot {
    return {
      name: this.name,
      team: this.team,
      health: this.health,
      maxHealth: this.maxHealth,
      armor: this.armor,
      weapons: [...this.weapons],
      currentWeaponIndex: this.currentWeaponIndex,
      body: this.body,
      collider: this.collider,
      pivot: this.pivot,
      weaponPivot: this.weaponPivot,
      removalRequested: this.removalRequested,
    };
  }

  /**
   * Copy mutable state captured by {@link characterSnapshot} into a freshly
   * constructed character. The sender is wired separately.
   */
  protected restoreCharacter(snapshot: CharacterSnapshot): void {
    this.team = snapshot.team;
    this.health = snapshot.health;
    this.armor = snapshot.armor;
    this.weapons = [...snapshot.weapons];
    this.currentWeaponIndex = snapshot.currentWeaponIndex;
    this.removalRequested = snapshot.removalRequested;
  }
}
