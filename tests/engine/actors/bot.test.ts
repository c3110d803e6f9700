import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as THREE from 'three';
import { Bot } from '@/engine/actors/Bot';
import type { Actor } from '@/engine/actors/Actor';
import { createMessageChannel, type MessageSender } from '@/engine/core/MessageChannel';
import { NONE_HANDLE, makeHandle } from '@/engine/ecs/Handle';
import { AssetNotFoundError } from '@/engine/ports';
import { settingsStore } from '@/store/settingsStore';
import type { TargetDescriptor } from '@/engine/level/UpdateContext';
import { FakeEngine } from '@tests/utils/FakeEngine';
import { createTestContext } from '@tests/utils/testContext';

describe('Bot', () => {
  let engine: FakeEngine;
  let sender: MessageSender;
  const self = makeHandle<Actor>(1, 0);
  const attacker = makeHandle<Actor>(2, 0);

  beforeEach(() => {
    engine = new FakeEngine();
    sender = createMessageChannel().sender;
  });

  function spawn(position: THREE.Vector3): Bot {
    return Bot.create('MAW', position, engine, sender);
  }

  function attackerAt(position: THREE.Vector3, health: number = 100): TargetDescriptor {
    return { handle: attacker, health, position, body: NONE_HANDLE };
  }

  describe('create', () => {
    it('uses the definition name unless one is given', () => {
      expect(spawn(new THREE.Vector3()).name).toBe('Maw');
      expect(Bot.create('MUTANT', new THREE.Vector3(), engine, sender, 'Bot MUTANT 1').name).toBe('Bot MUTANT 1');
    });

    it('attaches the weapon pivot to the hand node when the model has one', () => {
      engine.scene.templates.set('data/models/maw.fbx', [{ name: 'RightHand' }]);
      const bot = spawn(new THREE.Vector3());

      const hand = engine.scene.findByName(bot.model, 'RightHand');
      expect(engine.scene.parentOf(bot.weaponPivot)).toEqual(hand);
    });

    it('falls back to the body pivot without a hand node', () => {
      const bot = spawn(new THREE.Vector3());

      expect(engine.scene.parentOf(bot.weaponPivot)).toEqual(bot.pivot);
    });

    it('leaves nothing behind when an animation is missing', () => {
      engine.scene.missingAssets.add('data/animations/maw/jump.fbx');

      expect(() => spawn(new THREE.Vector3())).toThrow(AssetNotFoundError);
      expect(engine.scene.nodeCount()).toBe(0);
      expect(engine.physics.bodyCount()).toBe(0);
    });
  });

  describe('update', () => {
    it('stands in the melee pose next to its target', () => {
      const bot = spawn(new THREE.Vector3(0, 0, 1));

      bot.update(self, createTestContext(engine));

      expect(bot.getLocomotionState()).toBe('Idle');
      expect(bot.getCombatState()).toBe('Whip');
      expect(bot.position(engine)).toEqual(new THREE.Vector3(0, 0, 1));
    });

    it('faces its target', () => {
      const bot = spawn(new THREE.Vector3(0, 0, 1));

      bot.update(self, createTestContext(engine));

      const look = engine.scene.getLookVector(bot.pivot);
      expect(look.z).toBeCloseTo(-1, 6);
      expect(look.x).toBeCloseTo(0, 6);
    });

    it('publishes the weights of both machines', () => {
      const bot = spawn(new THREE.Vector3(0, 0, 1));

      bot.update(self, createTestContext(engine));

      // Clips load in the order idle, walk, aim, whip, jump, falling
      expect(engine.scene.animationWeights.get(bot.model.index)).toEqual([
        { clip: makeHandle(1, 0), weight: 1 },
        { clip: makeHandle(4, 0), weight: 0 },
        { clip: makeHandle(3, 0), weight: 1 },
      ]);
    });

    describe('with AI logging on', () => {
      afterEach(() => {
        settingsStore.getState().reset();
        vi.restoreAllMocks();
      });

      it('logs its state changes', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        settingsStore.getState().setDebugSettings({ debugEnabled: true, debugAI: true });
        const bot = spawn(new THREE.Vector3(0, 0, 1));

        bot.update(self, createTestContext(engine));

        expect(log).toHaveBeenCalledWith('[Bot] Maw transition', { machine: 'Combat', from: 'Aim', to: 'Whip' });
      });
    });

    it('walks toward a distant target', () => {
      const bot = spawn(new THREE.Vector3(0, 0, 10));

      bot.update(self, createTestContext(engine));

      expect(bot.getLocomotionState()).toBe('Walk');
      expect(bot.getCombatState()).toBe('Aim');
      expect(bot.position(engine).z).toBeCloseTo(9.6, 10);
    });

    it('jumps toward a target above it while grounded', () => {
      const bot = spawn(new THREE.Vector3());
      bot.setPointOfInterest(new THREE.Vector3(0, 5, 1));
      engine.physics.setGrounded(bot.collider, true);

      bot.update(self, createTestContext(engine));

      expect(engine.physics.getLinearVelocity(bot.body).y).toBe(4.2);
      expect(bot.getLocomotionState()).toBe('Jump');
    });

    it('cannot jump in the air', () => {
      const bot = spawn(new THREE.Vector3());
      bot.setPointOfInterest(new THREE.Vector3(0, 5, 1));

      bot.update(self, createTestContext(engine));

      expect(engine.physics.getLinearVelocity(bot.body).y).toBe(0);
      expect(bot.getLocomotionState()).toBe('Walk');
    });
  });

  describe('aggression', () => {
    it('chases a recent attacker instead of the point of interest', () => {
      const bot = spawn(new THREE.Vector3());
      bot.setPointOfInterest(new THREE.Vector3(0, 0, -20));
      bot.onDamaged(attacker, 1);

      bot.update(
        self,
        createTestContext(engine, undefined, {
          time: { elapsed: 2, delta: 0.1 },
          targets: [attackerAt(new THREE.Vector3(0, 0, 20))],
        })
      );

      expect(bot.position(engine).z).toBeCloseTo(0.4, 10);
    });

    it('returns to the point of interest once aggression expires', () => {
      const bot = spawn(new THREE.Vector3());
      bot.setPointOfInterest(new THREE.Vector3(0, 0, -20));
      bot.onDamaged(attacker, 1);

      bot.update(
        self,
        createTestContext(engine, undefined, {
          time: { elapsed: 6, delta: 0.1 },
          targets: [attackerAt(new THREE.Vector3(0, 0, 20))],
        })
      );

      expect(bot.position(engine).z).toBeCloseTo(-0.4, 10);
    });

    it('ignores a dead attacker', () => {
      const bot = spawn(new THREE.Vector3());
      bot.setPointOfInterest(new THREE.Vector3(0, 0, -20));
      bot.onDamaged(attacker, 1);

      bot.update(
        self,
        createTestContext(engine, undefined, {
          time: { elapsed: 2, delta: 0.1 },
          targets: [attackerAt(new THREE.Vector3(0, 0, 20), 0)],
        })
      );

      expect(bot.position(engine).z).toBeCloseTo(-0.4, 10);
    });

    it('does not record anonymous damage', () => {
      const bot = spawn(new THREE.Vector3());
      bot.onDamaged(NONE_HANDLE, 1);

      expect(bot.getLastAttacker()).toBeNull();
    });

    it('forgets a removed attacker', () => {
      const bot = spawn(new THREE.Vector3());
      bot.onDamaged(attacker, 1);

      bot.forgetActor(makeHandle<Actor>(2, 1));
      expect(bot.getLastAttacker()).toEqual(attacker);

      bot.forgetActor(attacker);
      expect(bot.getLastAttacker()).toBeNull();
    });
  });

  it('restores from a snapshot without a sender', () => {
    const bot = spawn(new THREE.Vector3(0, 0, 1));
    bot.update(self, createTestContext(engine));
    bot.setPointOfInterest(new THREE.Vector3(3, 0, 0));
    bot.damage(30);
    bot.onDamaged(attacker, 1);

    const restored = Bot.fromSnapshot(structuredClone(bot.toSnapshot()));

    expect(restored.health).toBe(70);
    expect(restored.name).toBe('Maw');
    expect(restored.getCombatState()).toBe('Whip');
    expect(restored.getLastAttacker()).toEqual(attacker);
    expect(restored.getPointOfInterest()).toEqual(new THREE.Vector3(3, 0, 0));
    expect(restored.hasMessageSender()).toBe(false);
    expect(restored.body).toEqual(bot.body);
  });
});
