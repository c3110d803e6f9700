import { describe, it, expect, beforeEach } from 'vitest';
import * as THREE from 'three';
import { Bot } from '@/engine/actors/Bot';
import type { Actor } from '@/engine/actors/Actor';
import type { Weapon } from '@/engine/weapons/Weapon';
import { createMessageChannel, type MessageReceiver } from '@/engine/core/MessageChannel';
import { NONE_HANDLE, makeHandle } from '@/engine/ecs/Handle';
import { FakeEngine } from '@tests/utils/FakeEngine';
import { createTestContext, drainMessages, messageTypes } from '@tests/utils/testContext';

describe('Character', () => {
  let engine: FakeEngine;
  let receiver: MessageReceiver;
  let bot: Bot;
  const self = makeHandle<Actor>(1, 0);

  beforeEach(() => {
    engine = new FakeEngine();
    const channel = createMessageChannel();
    receiver = channel.receiver;
    bot = Bot.create('MAW', new THREE.Vector3(0, 0, 1), engine, channel.sender);
  });

  describe('health', () => {
    it('has no floor on damage', () => {
      bot.damage(40);
      expect(bot.health).toBe(60);
      expect(bot.isDead()).toBe(false);

      bot.damage(65);
      expect(bot.health).toBe(-5);
      expect(bot.isDead()).toBe(true);
    });

    it('lets armor absorb damage first', () => {
      bot.armor = 10;
      bot.damage(25);

      expect(bot.armor).toBe(0);
      expect(bot.health).toBe(85);
    });

    it('treats negative amounts by magnitude', () => {
      bot.damage(-10);
      expect(bot.health).toBe(90);

      bot.heal(-5);
      expect(bot.health).toBe(95);
    });

    it('never heals above the starting health', () => {
      bot.damage(30);
      bot.heal(50);

      expect(bot.health).toBe(100);
    });
  });

  describe('removal request', () => {
    it('asks to be removed exactly once after dying', () => {
      const context = createTestContext(engine);
      bot.damage(150);

      bot.update(self, context);
      bot.update(self, context);

      expect(drainMessages(receiver)).toEqual([{ type: 'REMOVE_ACTOR', actor: self }]);
    });

    it('sends nothing while alive', () => {
      bot.update(self, createTestContext(engine));

      expect(drainMessages(receiver)).toEqual([]);
    });
  });

  describe('weapons', () => {
    const first = makeHandle<Weapon>(1, 0);
    const second = makeHandle<Weapon>(2, 0);

    it('makes a new weapon current and hides the others', () => {
      bot.addWeapon(first);
      bot.addWeapon(second);

      expect(bot.currentWeapon()).toEqual(second);
      expect(drainMessages(receiver)).toEqual([
        { type: 'SHOW_WEAPON', weapon: first, visible: true },
        { type: 'SHOW_WEAPON', weapon: first, visible: false },
        { type: 'SHOW_WEAPON', weapon: second, visible: true },
      ]);
    });

    it('switches between weapons within bounds', () => {
      bot.addWeapon(first);
      bot.addWeapon(second);
      drainMessages(receiver);

      bot.nextWeapon();
      expect(drainMessages(receiver)).toEqual([]);

      bot.prevWeapon();
      expect(bot.currentWeapon()).toEqual(first);
      expect(drainMessages(receiver)).toEqual([
        { type: 'SHOW_WEAPON', weapon: second, visible: false },
        { type: 'SHOW_WEAPON', weapon: first, visible: true },
      ]);

      bot.prevWeapon();
      bot.setCurrentWeapon(0);
      bot.setCurrentWeapon(7);
      expect(drainMessages(receiver)).toEqual([]);
    });

    it('keeps a valid current index when a weapon is removed', () => {
      bot.addWeapon(first);
      bot.addWeapon(second);
      bot.setCurrentWeapon(0);

      expect(bot.removeWeapon(first)).toBe(true);
      expect(bot.weapons).toEqual([second]);
      expect(bot.currentWeapon()).toEqual(second);

      expect(bot.removeWeapon(makeHandle<Weapon>(9, 0))).toBe(false);
      expect(bot.removeWeapon(second)).toBe(true);
      expect(bot.currentWeapon()).toBe(NONE_HANDLE);
    });
  });

  describe('body', () => {
    it('counts only upward facing contacts as ground', () => {
      engine.physics.setContacts(bot.collider, [{ collider: NONE_HANDLE, normal: new THREE.Vector3(1, 0, 0) }]);
      expect(bot.hasGroundContact(engine)).toBe(false);

      engine.physics.setGrounded(bot.collider, true);
      expect(bot.hasGroundContact(engine)).toBe(true);
    });

    it('releases its body and nodes on clean up', () => {
      bot.cleanUp(engine);

      expect(engine.physics.hasBody(bot.body)).toBe(false);
      expect(engine.scene.contains(bot.pivot)).toBe(false);
      expect(engine.scene.contains(bot.model)).toBe(false);
    });
  });

  it('drops messages when it has no sender', () => {
    bot.setMessageSender(null);
    expect(bot.hasMessageSender()).toBe(false);

    bot.addWeapon(makeHandle<Weapon>(1, 0));

    expect(receiver.pending).toBe(0);
  });
});
