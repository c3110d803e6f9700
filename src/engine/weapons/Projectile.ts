import * as THREE from 'three';
import { type Handle, NONE_HANDLE, handleEquals, isNone, isSome } from '../ecs/Handle';
import type { ReadonlyPool } from '../ecs/Pool';
import type { GameTime } from '../core/GameTime';
import type { MessageSender } from '../core/MessageChannel';
import {
  type Collider,
  type EnginePorts,
  type RigidBody,
  type SceneNode,
  requireModel,
} from '../ports';
import type { Actor } from '../actors/Actor';
import type { Weapon } from './Weapon';
import {
  type ProjectileDefinition,
  type ProjectileKind,
  IMPACT_SOUND_RADIUS,
  IMPACT_SOUND_ROLLOFF,
  PROJECTILE_LIGHT_RADIUS,
  getProjectileDefinition,
} from '@/data';
import {
  DIRECTION_EPSILON,
  UP,
  type SeededRandom,
  type Vec3Data,
  fromVec3Data,
  normalizeOr,
  toVec3Data,
} from '@/utils/math';

export interface ProjectileSnapshot {
  kind: ProjectileKind;
  direction: Vec3Data;
  lifetime: number;
  model: Handle<SceneNode>;
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
  owner: Handle<Weapon>;
  lastPosition: Vec3Data;
}

interface ProjectileInit {
  kind: ProjectileKind;
  direction: Readonly<THREE.Vector3>;
  position: Readonly<THREE.Vector3>;
  model: Handle<SceneNode>;
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
  owner: Handle<Weapon>;
  sender: MessageSender | null;
}

export interface ProjectileSpawnOptions {
  kind: ProjectileKind;
  position: Readonly<THREE.Vector3>;
  direction: Readonly<THREE.Vector3>;
  owner: Handle<Weapon>;
  ports: Pick<EnginePorts, 'scene' | 'physics'>;
  random: SeededRandom;
  sender: MessageSender | null;
}

/** World access a projectile needs to resolve hits */
export interface ProjectileWorld {
  ports: Pick<EnginePorts, 'scene' | 'physics'>;
  actors: ReadonlyPool<Actor>;
  weapons: ReadonlyPool<Weapon>;
}

const FORWARD: Readonly<THREE.Vector3> = new THREE.Vector3(0, 0, 1);

export class Projectile {
  public readonly kind: ProjectileKind;
  public readonly definition: ProjectileDefinition;
  public readonly direction: THREE.Vector3;
  public readonly model: Handle<SceneNode>;
  /** NONE_HANDLE for projectiles that are moved as plain scene nodes */
  public readonly body: Handle<RigidBody>;
  public readonly collider: Handle<Collider>;
  public owner: Handle<Weapon>;

  private lifetime: number;
  private lastPosition: THREE.Vector3;
  private sender: MessageSender | null;

  constructor(init: ProjectileInit) {
    this.kind = init.kind;
    this.definition = getProjectileDefinition(init.kind);
    this.direction = normalizeOr(init.direction, UP);
    this.model = init.model;
    this.body = init.body;
    this.collider = init.collider;
    this.owner = init.owner;
    this.lifetime = this.definition.lifetime;
    this.lastPosition = init.position.clone();
    this.sender = init.sender;
  }

  /**
   * Build the projectile's visual (and body, for kinds that have one) at `position`.
   * @throws AssetNotFoundError when a model-based projectile's model is missing
   */
  public static create(options: ProjectileSpawnOptions): Projectile {
    const { kind, position, direction, owner, sender } = options;
    const { model, body, collider } = buildVisual(options);
    return new Projectile({ kind, direction, position, model, body, collider, owner, sender });
  }

  /**
   * Hit test along the path travelled since the last update, then age and move.
   * A dead projectile reports its impact and waits to be freed by the level.
   */
  public update(time: Readonly<GameTime>, world: ProjectileWorld): void {
    const position = this.getPosition(world.ports);
    let impactPosition: THREE.Vector3 | null = null;
    let hit: { actor: Handle<Actor>; who: Handle<Actor> } | null = null;

    const travelled = new THREE.Vector3().subVectors(position, this.lastPosition);
    const distance = travelled.length();
    if (distance > DIRECTION_EPSILON) {
      const rayDirection = travelled.divideScalar(distance);
      for (const rayHit of world.ports.physics.castRay(this.lastPosition, rayDirection, distance)) {
        if (isSome(this.body) && handleEquals(rayHit.body, this.body)) continue;

        if (isNone(rayHit.body)) {
          this.kill();
          impactPosition = rayHit.position;
          break;
        }

        const victim = findActorByBody(world.actors, rayHit.body);
        if (!victim) continue;

        // Ownerless projectiles fly through actors
        const weapon = world.weapons.tryGet(this.owner);
        if (!weapon || handleEquals(victim, weapon.owner)) continue;
        const shooter = weapon.owner;

        hit = { actor: victim, who: shooter };
        this.kill();
        impactPosition = rayHit.position;
        break;
      }
    }

    this.lifetime -= time.delta;

    if (!this.isDead()) {
      const step = this.direction.clone().multiplyScalar(this.definition.speed * time.delta);
      if (isSome(this.body)) {
        world.ports.physics.moveBody(this.body, step);
      } else {
        world.ports.scene.setLocalPosition(this.model, position.clone().add(step));
      }
    } else if (this.sender) {
      const at = impactPosition ?? position;
      this.sender.send({ type: 'CREATE_EFFECT', kind: 'BULLET_IMPACT', position: at.clone() });
      this.sender.send({
        type: 'PLAY_SOUND',
        path: this.definition.impactSound,
        position: at.clone(),
        gain: 1,
        radius: IMPACT_SOUND_RADIUS,
        rolloffFactor: IMPACT_SOUND_ROLLOFF,
      });
    }

    if (hit) {
      this.sender?.send({
        type: 'DAMAGE_ACTOR',
        actor: hit.actor,
        who: hit.who,
        amount: this.definition.damage,
      });
    }

    this.lastPosition = position;
  }

  public isDead(): boolean {
    return this.lifetime <= 0;
  }

  public kill(): void {
    this.lifetime = 0;
  }

  public getLifetime(): number {
    return this.lifetime;
  }

  public getPosition(ports: Pick<EnginePorts, 'scene' | 'physics'>): THREE.Vector3 {
    return isSome(this.body)
      ? ports.physics.getBodyPosition(this.body)
      : ports.scene.getGlobalPosition(this.model);
  }

  public cleanUp(ports: Pick<EnginePorts, 'scene' | 'physics'>): void {
    if (isSome(this.body)) {
      ports.physics.removeBody(this.body);
    }
    ports.scene.removeNode(this.model);
  }

  public setMessageSender(sender: MessageSender | null): void {
    this.sender = sender;
  }

  public hasMessageSender(): boolean {
    return this.sender !== null;
  }

  public toSnapshot(): ProjectileSnapshot {
    return {
      kind: this.kind,
      direction: toVec3Data(this.direction),
      lifetime: this.lifetime,
      model: this.model,
      body: this.body,
      collider: this.collider,
      owner: this.owner,
      lastPosition: toVec3Data(this.lastPosition),
    };
  }

  public static fromSnapshot(snapshot: ProjectileSnapshot): Projectile {
    const projectile = new Projectile({
      kind: snapshot.kind,
      direction: fromVec3Data(snapshot.direction),
      position: fromVec3Data(snapshot.lastPosition),
      model: snapshot.model,
      body: snapshot.body,
      collider: snapshot.collider,
      owner: snapshot.owner,
      sender: null,
    });
    projectile.lifetime = snapshot.lifetime;
    return projectile;
  }
}

interface ProjectileParts {
  model: Handle<SceneNode>;
  body: Handle<RigidBody>;
  collider: Handle<Collider>;
}

function buildVisual(options: ProjectileSpawnOptions): ProjectileParts {
  const { kind, position, direction, ports, random } = options;
  const { scene, physics } = ports;
  const visual = getProjectileDefinition(kind).visual;

  switch (visual.type) {
    case 'sprite': {
      const size = random.nextRange(visual.minSize, visual.maxSize);
      const model = scene.createSprite(visual.texture, size, visual.color);
      if (!visual.hasBody) {
        scene.setLocalPosition(model, position);
        return { model, body: NONE_HANDLE, collider: NONE_HANDLE };
      }
      scene.linkNodes(scene.createLight(visual.color, PROJECTILE_LIGHT_RADIUS), model);
      const { body, collider } = physics.createKinematicBall(position, size);
      physics.attachNode(body, model);
      return { model, body, collider };
    }
    case 'model': {
      const model = requireModel(scene, visual.model);
      const facing = normalizeOr(direction, UP);
      scene.setLocalRotation(model, new THREE.Quaternion().setFromUnitVectors(FORWARD, facing));
      scene.setLocalPosition(model, position);
      scene.linkNodes(scene.createLight(visual.lightColor, PROJECTILE_LIGHT_RADIUS), model);
      return { model, body: NONE_HANDLE, collider: NONE_HANDLE };
    }
  }
}

function findActorByBody(actors: ReadonlyPool<Actor>, body: Handle<RigidBody>): Handle<Actor> | null {
  for (const [handle, actor] of actors.pairIter()) {
    if (handleEquals(actor.body, body)) {
      return handle;
    }
  }
  return null;
}
