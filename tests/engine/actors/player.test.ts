import { describe, it, expect, beforeEach } from 'vitest';
import * as THREE from 'three';
import { Player } from '@/engine/actors/Player';
import type { Actor } from '@/engine/actors/Actor';
import type { Weapon } from '@/engine/weapons/Weapon';
import { createMessageChannel, type MessageReceiver } from '@/engine/core/MessageChannel';
import { makeHandle } from '@/engine/ecs/Handle';
import { FOOTSTEP_SOUNDS } from '@/data';
import { FakeEngine } from '@tests/utils/FakeEngine';
import { createTestContext, drainMessages, messageTypes } from '@tests/utils/testContext';

describe('Player', () => {
  let engine: FakeEngine;
  let receiver: MessageReceiver;
  let player: Player;
  const self = makeHandle<Actor>(1, 0);

  beforeEach(() => {
    engine = new FakeEngine();
    const channel = createMessageChannel();
    receiver = channel.receiver;
    player = Player.create(new THREE.Vector3(), engine, channel.sender);
  });

  function velocity(): THREE.Vector3 {
    return engine.physics.getLinearVelocity(player.body);
  }

  it('builds a camera rig under its body pivot', () => {
    expect(player.name).toBe('Player');
    expect(player.health).toBe(100);
    expect(engine.scene.parentOf(player.cameraPivot)).toEqual(player.pivot);
    expect(engine.scene.parentOf(player.camera)).toEqual(player.cameraPivot);
    expect(engine.scene.parentOf(player.weaponPivot)).toEqual(player.camera);
    expect(engine.scene.localPositionOf(player.cameraPivot).y).toBeCloseTo(1.05, 10);
  });

  describe('movement', () => {
    it('moves along the look direction at walking speed', () => {
      player.setInput({ moveForward: true });
      player.update(self, createTestContext(engine));

      expect(velocity().x).toBeCloseTo(0, 10);
      expect(velocity().z).toBeCloseTo(3.48, 10);
    });

    it('runs faster', () => {
      player.setInput({ moveForward: true, run: true });
      player.update(self, createTestContext(engine));

      expect(velocity().z).toBeCloseTo(6.09, 10);
    });

    it('does not move faster diagonally', () => {
      player.setInput({ moveForward: true, moveLeft: true });
      player.update(self, createTestContext(engine));

      expect(velocity().length()).toBeCloseTo(3.48, 10);
      expect(velocity().x).toBeCloseTo(velocity().z, 10);
    });

    it('damps horizontal velocity on the ground', () => {
      engine.physics.setGrounded(player.collider, true);
      player.setInput({ moveForward: true });
      player.update(self, createTestContext(engine));

      expect(velocity().z).toBeCloseTo(3.132, 10);
    });

    it('jumps only from the ground and consumes the request', () => {
      player.setInput({ jump: true });
      player.update(self, createTestContext(engine));
      expect(velocity().y).toBe(0);
      expect(player.getInput().jump).toBe(false);

      engine.physics.setGrounded(player.collider, true);
      player.setInput({ jump: true });
      player.update(self, createTestContext(engine));
      expect(velocity().y).toBe(4.2);
    });
  });

  describe('look', () => {
    it('accumulates mouse deltas until the next update', () => {
      player.setInput({ lookDeltaX: 5 });
      player.setInput({ lookDeltaX: 5, lookDeltaY: 100 });
      player.update(self, createTestContext(engine));

      expect(player.getYaw()).toBeCloseTo(-3, 10);
      expect(player.getPitch()).toBeCloseTo(30, 10);
      expect(player.getInput().lookDeltaX).toBe(0);
      expect(player.getInput().lookDeltaY).toBe(0);
    });

    it('limits the pitch', () => {
      player.setInput({ lookDeltaY: 1000 });
      player.update(self, createTestContext(engine));

      expect(player.getPitch()).toBe(90);
    });

    it('honours inverted mouse Y', () => {
      player.setInput({ lookDeltaY: 10 });
      player.update(
        self,
        createTestContext(engine, undefined, { controls: { mouseSensitivity: 0.5, invertMouseY: true } })
      );

      expect(player.getPitch()).toBeCloseTo(-5, 10);
    });

    it('walks along the turned look direction', () => {
      player.setInput({ lookDeltaX: -300, moveForward: true });
      player.update(self, createTestContext(engine));

      expect(player.getYaw()).toBeCloseTo(90, 10);
      expect(velocity().x).toBeCloseTo(3.48, 10);
      expect(velocity().z).toBeCloseTo(0, 10);
    });
  });

  describe('weapons', () => {
    const weapons = [1, 2, 3].map((index) => makeHandle<Weapon>(index, 0));

    beforeEach(() => {
      for (const weapon of weapons) player.addWeapon(weapon);
      drainMessages(receiver);
    });

    it('asks its current weapon to shoot while the trigger is held', () => {
      player.setInput({ shoot: true });
      const context = createTestContext(engine);
      player.update(self, context);
      player.update(self, context);

      expect(drainMessages(receiver)).toEqual([
        { type: 'SHOOT_WEAPON', weapon: weapons[2] },
        { type: 'SHOOT_WEAPON', weapon: weapons[2] },
      ]);
    });

    it('switches weapons once per request', () => {
      player.setInput({ selectWeapon: 0 });
      player.update(self, createTestContext(engine));
      expect(player.currentWeapon()).toEqual(weapons[0]);

      player.setInput({ nextWeapon: true });
      player.update(self, createTestContext(engine));
      player.update(self, createTestContext(engine));
      expect(player.currentWeapon()).toEqual(weapons[1]);
    });
  });

  it('plays a footstep after walking far enough on the ground', () => {
    engine.physics.setGrounded(player.collider, true);
    player.setInput({ moveForward: true });
    const context = createTestContext(engine);

    for (let i = 0; i < 5; i++) {
      player.update(self, context);
    }
    expect(drainMessages(receiver)).toEqual([]);

    player.update(self, context);
    const messages = drainMessages(receiver);
    expect(messageTypes(messages)).toEqual(['PLAY_SOUND']);

    const [sound] = messages;
    if (sound.type !== 'PLAY_SOUND') throw new Error('expected a sound');
    expect(FOOTSTEP_SOUNDS).toContain(sound.path);
    expect(sound).toMatchObject({ gain: 1, radius: 3, rolloffFactor: 2 });
  });

  it('restores orientation from a snapshot', () => {
    player.setInput({ lookDeltaX: 10, lookDeltaY: -20 });
    player.update(self, createTestContext(engine));

    const restored = Player.fromSnapshot(structuredClone(player.toSnapshot()));

    expect(restored.getYaw()).toBeCloseTo(-3, 10);
    expect(restored.getPitch()).toBeCloseTo(-6, 10);
    expect(restored.camera).toEqual(player.camera);
    expect(restored.hasMessageSender()).toBe(false);
  });
});
