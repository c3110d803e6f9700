import { describe, it, expect, beforeEach } from 'vitest';
import * as THREE from 'three';
import { Projectile, type ProjectileWorld } from '@/engine/weapons/Projectile';
import { Weapon } from '@/engine/weapons/Weapon';
import { Bot } from '@/engine/actors/Bot';
import type { Actor } from '@/engine/actors/Actor';
import { Pool } from '@/engine/ecs/Pool';
import { NONE_HANDLE, type Handle } from '@/engine/ecs/Handle';
import { createMessageChannel, type MessageReceiver, type MessageSender } from '@/engine/core/MessageChannel';
import type { GameTime } from '@/engine/core/GameTime';
import { AssetNotFoundError } from '@/engine/ports';
import type { ProjectileKind } from '@/data';
import { SeededRandom } from '@/utils/math';
import { FakeEngine } from '@tests/utils/FakeEngine';
import { drainMessages, messageTypes } from '@tests/utils/testContext';

const TICK: GameTime = { elapsed: 1, delta: 0.1 };

describe('Projectile', () => {
  let engine: FakeEngine;
  let sender: MessageSender;
  let receiver: MessageReceiver;
  let world: ProjectileWorld & { actors: Pool<Actor>; weapons: Pool<Weapon> };

  beforeEach(() => {
    engine = new FakeEngine();
    ({ sender, receiver } = createMessageChannel());
    world = { ports: engine, actors: new Pool<Actor>('Actors'), weapons: new Pool<Weapon>('Weapons') };
  });

  function fire(
    kind: ProjectileKind,
    position: THREE.Vector3,
    direction: THREE.Vector3,
    owner: Handle<Weapon> = NONE_HANDLE
  ): Projectile {
    return Projectile.create({
      kind,
      position,
      direction,
      owner,
      ports: engine,
      random: new SeededRandom(3),
      sender,
    });
  }

  function spawnBot(position: THREE.Vector3): Handle<Actor> {
    return world.actors.spawn(Bot.create('MAW', position, engine, null));
  }

  function weaponOwnedBy(owner: Handle<Actor>): Handle<Weapon> {
    const weapon = Weapon.create('M4', engine.scene, null);
    weapon.setOwner(owner);
    return world.weapons.spawn(weapon);
  }

  it('flies in a straight line at its speed', () => {
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3(0, 0, 2));

    bullet.update(TICK, world);
    expect(bullet.getPosition(engine).z).toBeCloseTo(4.5, 10);

    bullet.update(TICK, world);
    expect(bullet.getPosition(engine).z).toBeCloseTo(9, 10);
    expect(bullet.getLifetime()).toBeCloseTo(9.8, 10);
    expect(receiver.pending).toBe(0);
  });

  it('dies when its lifetime runs out and reports the impact where it stands', () => {
    const bullet = fire('BULLET', new THREE.Vector3(1, 2, 3), new THREE.Vector3(0, 0, 1));

    bullet.update({ elapsed: 10, delta: 10 }, world);

    expect(bullet.isDead()).toBe(true);
    expect(bullet.getPosition(engine)).toEqual(new THREE.Vector3(1, 2, 3));
    expect(drainMessages(receiver)).toEqual([
      { type: 'CREATE_EFFECT', kind: 'BULLET_IMPACT', position: new THREE.Vector3(1, 2, 3) },
      {
        type: 'PLAY_SOUND',
        path: 'data/sounds/bullet_impact_concrete.ogg',
        position: new THREE.Vector3(1, 2, 3),
        gain: 1,
        radius: 3,
        rolloffFactor: 4,
      },
    ]);
  });

  it('damages the actor it passes through, on behalf of the shooter', () => {
    const shooter = spawnBot(new THREE.Vector3(0, 0, -10));
    const victim = spawnBot(new THREE.Vector3(0, 0, 3));
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3(0, 0, 1), weaponOwnedBy(shooter));

    bullet.update(TICK, world);
    expect(receiver.pending).toBe(0);

    bullet.update(TICK, world);

    expect(bullet.isDead()).toBe(true);
    const messages = drainMessages(receiver);
    expect(messageTypes(messages)).toEqual(['CREATE_EFFECT', 'PLAY_SOUND', 'DAMAGE_ACTOR']);
    expect(messages[2]).toEqual({ type: 'DAMAGE_ACTOR', actor: victim, who: shooter, amount: 15 });

    const [effect] = messages;
    if (effect.type !== 'CREATE_EFFECT') throw new Error('expected an effect');
    expect(effect.position.z).toBeCloseTo(2.65, 10);
  });

  it('passes through the actor holding the weapon that fired it', () => {
    const shooter = spawnBot(new THREE.Vector3(0, 0, 3));
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3(0, 0, 1), weaponOwnedBy(shooter));

    bullet.update(TICK, world);
    bullet.update(TICK, world);

    expect(bullet.isDead()).toBe(false);
    expect(receiver.pending).toBe(0);
  });

  it('flies through actors once its weapon is gone', () => {
    spawnBot(new THREE.Vector3(0, 0, 3));
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3(0, 0, 1));

    bullet.update(TICK, world);
    bullet.update(TICK, world);

    expect(bullet.isDead()).toBe(false);
    expect(receiver.pending).toBe(0);
  });

  it('stops at static geometry without damaging anyone', () => {
    engine.physics.groundHeight = 0;
    const bullet = fire('BULLET', new THREE.Vector3(0, 1, 0), new THREE.Vector3(0, -1, 0));

    bullet.update(TICK, world);
    bullet.update(TICK, world);

    const messages = drainMessages(receiver);
    expect(messageTypes(messages)).toEqual(['CREATE_EFFECT', 'PLAY_SOUND']);
    expect(messages[0]).toEqual({ type: 'CREATE_EFFECT', kind: 'BULLET_IMPACT', position: new THREE.Vector3(0, 0, 0) });
  });

  it('moves its own body and ignores it in hit tests', () => {
    const plasma = fire('PLASMA', new THREE.Vector3(), new THREE.Vector3(0, 0, 1));
    expect(engine.physics.hasBody(plasma.body)).toBe(true);

    plasma.update(TICK, world);
    plasma.update(TICK, world);

    expect(plasma.isDead()).toBe(false);
    expect(engine.physics.getBodyPosition(plasma.body).z).toBeCloseTo(1.8, 10);

    plasma.cleanUp(engine);
    expect(engine.physics.hasBody(plasma.body)).toBe(false);
    expect(engine.scene.nodeCount()).toBe(0);
  });

  it('orients model projectiles along their flight', () => {
    const rocket = fire('ROCKET', new THREE.Vector3(), new THREE.Vector3(1, 0, 0));

    const look = engine.scene.getLookVector(rocket.model);
    expect(look.x).toBeCloseTo(1, 10);
    expect(look.z).toBeCloseTo(0, 10);
  });

  it('fails to build a model projectile without its model', () => {
    engine.scene.missingAssets.add('data/models/rocket.FBX');

    expect(() => fire('ROCKET', new THREE.Vector3(), new THREE.Vector3(1, 0, 0))).toThrow(AssetNotFoundError);
  });

  it('falls back to straight up for a zero direction', () => {
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3());

    expect(bullet.direction).toEqual(new THREE.Vector3(0, 1, 0));
  });

  it('restores its flight from a snapshot', () => {
    const bullet = fire('BULLET', new THREE.Vector3(), new THREE.Vector3(0, 0, 1));
    bullet.update(TICK, world);

    const restored = Projectile.fromSnapshot(structuredClone(bullet.toSnapshot()));

    expect(restored.getLifetime()).toBeCloseTo(9.9, 10);
    expect(restored.direction).toEqual(new THREE.Vector3(0, 0, 1));
    expect(restored.hasMessageSender()).toBe(false);
  });
});
