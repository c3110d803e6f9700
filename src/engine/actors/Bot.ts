import * as THREE from 'three';
import { type Handle, handleEquals, isNone, isSome } from '../ecs/Handle';
import type { MessageSender } from '../core/MessageChannel';
import {
  type AnimationClip,
  type AnimationWeight,
  type EnginePorts,
  type SceneGraphPort,
  type SceneNode,
  requireAnimation,
  requireModel,
} from '../ports';
import {
  AnimationStateMachine,
  type StateMachineEventCallback,
  type StateMachineSnapshot,
  createParameterMap,
  setParameter,
} from '../animation';
import type { UpdateContext } from '../level/UpdateContext';
import { Character, type CharacterSnapshot } from './Character';
import type { Actor } from './Actor';
import { type BotClip, COMBAT_MACHINE, LOCOMOTION_MACHINE, isBotClip } from './botStateMachines';
import {
  type BotAnimationSet,
  type BotDefinition,
  type BotKind,
  AGGRESSION_DURATION,
  BODY_HEIGHT,
  BODY_RADIUS,
  BOT_FIRING_ENABLED,
  CHASE_THRESHOLD,
  JUMP_DIRECTION_THRESHOLD,
  JUMP_VELOCITY,
  getBotDefinition,
} from '@/data';
import { DIRECTION_EPSILON, UP, type Vec3Data, fromVec3Data, toVec3Data, yawFromDirection } from '@/utils/math';
import { debugAI } from '@/utils/debugLogger';

export type BotClips = Record<BotClip, Handle<AnimationClip>>;

export interface BotSnapshot extends CharacterSnapshot {
  kind: 'bot';
  botKind: BotKind;
  model: Handle<SceneNode>;
  clips: BotClips;
  pointOfInterest: Vec3Data;
  lastAttack: { actor: Handle<Actor>; time: number } | null;
  locomotion: StateMachineSnapshot;
  combat: StateMachineSnapshot;
}

interface BotInit {
  botKind: BotKind;
  name: string;
  model: Handle<SceneNode>;
  clips: BotClips;
  body: BotSnapshot['body'];
  collider: BotSnapshot['collider'];
  pivot: Handle<SceneNode>;
  weaponPivot: Handle<SceneNode>;
  sender: MessageSender | null;
}

/**
 * Computer-controlled actor. Chases its target, switches to the melee pose in
 * close range and jumps when the target is above it.
 */
export class Bot extends Character {
  public readonly kind = 'bot';
  public readonly botKind: BotKind;
  public readonly definition: BotDefinition;
  public readonly model: Handle<SceneNode>;

  private readonly clips: BotClips;
  private readonly locomotion = new AnimationStateMachine('Locomotion', LOCOMOTION_MACHINE);
  private readonly combat = new AnimationStateMachine('Combat', COMBAT_MACHINE);
  private readonly parameters = createParameterMap(LOCOMOTION_MACHINE);

  private pointOfInterest = new THREE.Vector3();
  private lastAttack: { actor: Handle<Actor>; time: number } | null = null;

  constructor(init: BotInit) {
    const definition = getBotDefinition(init.botKind);
    super({
      name: init.name,
      health: definition.health,
      body: init.body,
      collider: init.collider,
      pivot: init.pivot,
      weaponPivot: init.weaponPivot,
      sender: init.sender,
    });
    this.botKind = init.botKind;
    this.definition = definition;
    this.model = init.model;
    this.clips = init.clips;

    const logTransition: StateMachineEventCallback = (event, data) =>
      debugAI.log(`[Bot] ${this.name} ${event}`, data);
    this.locomotion.setEventCallback(logTransition);
    this.combat.setEventCallback(logTransition);
  }

  /**
   * Load the bot's model and every animation, then build its body.
   * @throws AssetNotFoundError when any asset is missing; nothing is left in the scene
   */
  public static create(
    botKind: BotKind,
    position: Readonly<THREE.Vector3>,
    ports: Pick<EnginePorts, 'scene' | 'physics'>,
    sender: MessageSender | null,
    name?: string
  ): Bot {
    const { scene, physics } = ports;
    const definition = getBotDefinition(botKind);

    const model = requireModel(scene, definition.model);
    let clips: BotClips;
    try {
      clips = loadClips(scene, model, definition.animations);
    } catch (error) {
      scene.removeNode(model);
      throw error;
    }
    scene.setLocalScale(model, new THREE.Vector3().setScalar(definition.scale));

    const pivot = scene.createPivot(definition.name);
    scene.linkNodes(model, pivot);
    scene.setLocalPosition(model, new THREE.Vector3(0, -BODY_HEIGHT * 0.5, 0));

    const { body, collider } = physics.createCapsuleBody(position, BODY_RADIUS, BODY_HEIGHT);
    physics.attachNode(body, pivot);

    const weaponPivot = scene.createPivot('WeaponPivot');
    scene.setLocalScale(weaponPivot, new THREE.Vector3().setScalar(definition.weaponScale));
    const hand = scene.findByName(model, definition.weaponHandName);
    if (isNone(hand)) {
      debugAI.warn(`[Bot] ${definition.name} has no "${definition.weaponHandName}" node, weapon attached to pivot`);
      scene.linkNodes(weaponPivot, pivot);
    } else {
      scene.linkNodes(weaponPivot, hand);
    }

    return new Bot({
      botKind,
      name: name ?? definition.name,
      model,
      clips,
      body,
      collider,
      pivot,
      weaponPivot,
      sender,
    });
  }

  // ==================== TARGETING ====================

  /**
   * Position to chase when no recent attacker takes precedence
   */
  public setPointOfInterest(point: Readonly<THREE.Vector3>): void {
    this.pointOfInterest.copy(point);
  }

  public getPointOfInterest(): THREE.Vector3 {
    return this.pointOfInterest.clone();
  }

  public onDamaged(who: Handle<Actor>, time: number): void {
    if (isSome(who)) {
      this.lastAttack = { actor: who, time };
    }
  }

  /**
   * Drop every reference to a removed actor
   */
  public forgetActor(actor: Handle<Actor>): void {
    if (this.lastAttack && handleEquals(this.lastAttack.actor, actor)) {
      this.lastAttack = null;
    }
  }

  public getLastAttacker(): Handle<Actor> | null {
    return this.lastAttack?.actor ?? null;
  }

  private selectTarget(context: UpdateContext): THREE.Vector3 {
    const attack = this.lastAttack;
    if (attack && context.time.elapsed - attack.time < AGGRESSION_DURATION) {
      const attacker = context.targets.find((target) => handleEquals(target.handle, attack.actor));
      if (attacker && attacker.health > 0) {
        return attacker.position;
      }
    }
    return this.pointOfInterest;
  }

  // ==================== UPDATE ====================

  public update(self: Handle<Actor>, context: UpdateContext): void {
    const { scene, physics } = context.ports;

    const toTarget = new THREE.Vector3().subVectors(this.selectTarget(context), this.position(context.ports));
    const distance = toTarget.length();
    const grounded = this.hasGroundContact(context.ports);

    let verticalDirection = 0;
    if (distance > DIRECTION_EPSILON) {
      const direction = toTarget.divideScalar(distance);
      verticalDirection = direction.y;

      if (distance > CHASE_THRESHOLD) {
        physics.moveBody(this.body, direction.clone().multiplyScalar(this.definition.walkSpeed * context.time.delta));
      }

      const rotation = new THREE.Quaternion().setFromAxisAngle(UP, yawFromDirection(direction));
      scene.setLocalRotation(this.pivot, rotation);

      if (BOT_FIRING_ENABLED && distance > CHASE_THRESHOLD) {
        this.fireAt(direction);
      }
    }

    if (verticalDirection >= JUMP_DIRECTION_THRESHOLD && grounded) {
      const velocity = physics.getLinearVelocity(this.body);
      velocity.y = JUMP_VELOCITY;
      physics.setLinearVelocity(this.body, velocity);
    }

    setParameter(this.parameters, 'distance', distance);
    setParameter(this.parameters, 'verticalDirection', verticalDirection);
    setParameter(this.parameters, 'grounded', grounded);
    this.locomotion.update(context.time.delta, this.parameters);
    this.combat.update(context.time.delta, this.parameters);
    scene.setAnimationWeights(this.model, this.animationWeights());

    this.updateCommon(self, context);
  }

  private fireAt(direction: Readonly<THREE.Vector3>): void {
    const weapon = this.currentWeapon();
    if (isSome(weapon)) {
      this.send({ type: 'SHOOT_WEAPON', weapon, direction: direction.clone() });
    }
  }

  public getLocomotionState(): string {
    return this.locomotion.getCurrentStateName();
  }

  public getCombatState(): string {
    return this.combat.getCurrentStateName();
  }

  /**
   * Clip weights of both machines; a blending machine contributes its outgoing
   * clip with the complementary weight.
   */
  public animationWeights(): AnimationWeight[] {
    const weights: AnimationWeight[] = [];
    for (const machine of [this.locomotion, this.combat]) {
      const weight = machine.getBlendWeight();
      this.pushWeight(weights, machine.getCurrentClip(), weight);
      const previous = machine.getPreviousClip();
      if (previous !== null) {
        this.pushWeight(weights, previous, 1 - weight);
      }
    }
    return weights;
  }

  private pushWeight(weights: AnimationWeight[], clip: string, weight: number): void {
    if (isBotClip(clip)) {
      weights.push({ clip: this.clips[clip], weight });
    }
  }

  public override cleanUp(ports: Pick<EnginePorts, 'scene' | 'physics'>): void {
    super.cleanUp(ports);
    ports.scene.removeNode(this.model);
  }

  // ==================== PERSISTENCE ====================

  public toSnapshot(): BotSnapshot {
    return {
      ...this.characterSnapshot(),
      kind: 'bot',
      botKind: this.botKind,
      model: this.model,
      clips: { ...this.clips },
      pointOfInterest: toVec3Data(this.pointOfInterest),
      lastAttack: this.lastAttack ? { ...this.lastAttack } : null,
      locomotion: this.locomotion.toSnapshot(),
      combat: this.combat.toSnapshot(),
    };
  }

  public static fromSnapshot(snapshot: BotSnapshot): Bot {
    const bot = new Bot({
      botKind: snapshot.botKind,
      name: snapshot.name,
      model: snapshot.model,
      clips: { ...snapshot.clips },
      body: snapshot.body,
      collider: snapshot.collider,
      pivot: snapshot.pivot,
      weaponPivot: snapshot.weaponPivot,
      sender: null,
    });
    bot.restoreCharacter(snapshot);
    bot.pointOfInterest = fromVec3Data(snapshot.pointOfInterest);
    bot.lastAttack = snapshot.lastAttack ? { ...snapshot.lastAttack } : null;
    bot.locomotion.restore(snapshot.locomotion);
    bot.combat.restore(snapshot.combat);
    return bot;
  }
}

function loadClips(scene: SceneGraphPort, model: Handle<SceneNode>, set: BotAnimationSet): BotClips {
  return {
    idle: requireAnimation(scene, set.idle, model),
    walk: requireAnimation(scene, set.walk, model),
    aim: requireAnimation(scene, set.aim, model),
    whip: requireAnimation(scene, set.whip, model),
    jump: requireAnimation(scene, set.jump, model),
    falling: requireAnimation(scene, set.falling, model),
  };
}
