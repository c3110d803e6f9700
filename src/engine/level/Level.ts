import * as THREE from 'three';
import {
  type Handle,
  NONE_HANDLE,
  handleEquals,
  isNone,
  isSome,
} from '../ecs/Handle';
import { Pool, type PoolSnapshot, type ReadonlyPool } from '../ecs/Pool';
import type { GameMessage } from '../core/GameMessage';
import type { GameTime } from '../core/GameTime';
import type { MessageSender } from '../core/MessageChannel';
import {
  type Collider,
  type EnginePorts,
  type SceneNode,
  AssetNotFoundError,
  requireModel,
} from '../ports';
import { type Actor, type ActorSnapshot, actorFromSnapshot, actorToSnapshot, updateActor } from '../actors/Actor';
import type { Team } from '../actors/Character';
import { Bot } from '../actors/Bot';
import { type InputState, Player } from '../actors/Player';
import { Weapon, type WeaponSnapshot } from '../weapons/Weapon';
import { Projectile, type ProjectileSnapshot } from '../weapons/Projectile';
import { Item, type ItemSnapshot } from '../items/Item';
import { JumpPad, type JumpPadSnapshot } from '../items/JumpPad';
import { LeaderBoard, type LeaderBoardSnapshot } from '../match/LeaderBoard';
import type { MatchOptions } from '../match/MatchOptions';
import type { TargetDescriptor, UpdateContext } from './UpdateContext';
import { DeathZone, type DeathZoneSnapshot, type RespawnEntry, SpawnPoint } from './LevelMarkers';
import {
  type BotKind,
  type ItemKind,
  type WeaponKind,
  DEFAULT_MAP_MODEL,
  DROPPED_ITEM_LIFETIME,
  INITIAL_BOTS,
  ITEM_DROP_PICK_DEPTH,
  ITEM_PICKUP_SOUND,
  MAP_COLLISION_NODE,
  PLAYER_SPAWN_HEIGHT,
  PLAYER_STARTING_WEAPONS,
  PLAYER_TEAM,
  RESPAWN_TIME,
  WEAPON_DROP_ITEMS,
  getItemDefinition,
} from '@/data';
import { settingsStore } from '@/store/settingsStore';
import { SeededRandom, type Vec3Data } from '@/utils/math';
import { debugActors, debugAudio, debugInitialization, debugItems, debugMessages, debugSpawning } from '@/utils/debugLogger';

export interface LevelConfig {
  mapModel: string;
  initialBots: ReadonlyArray<{ kind: BotKind; name?: string }>;
  seed: number;
}

export const DEFAULT_LEVEL_CONFIG: LevelConfig = {
  mapModel: DEFAULT_MAP_MODEL,
  initialBots: INITIAL_BOTS,
  seed: 1,
};

/** What the HUD shows for the local player */
export interface HudState {
  health: number;
  armor: number;
  ammo: number | null;
  weaponKind: WeaponKind | null;
  kills: number;
  deaths: number;
}

export interface LevelSnapshot {
  options: MatchOptions;
  time: number;
  seed: number;
  mapRoot: Handle<SceneNode>;
  mapCollider: Handle<Collider>;
  player: Handle<Actor>;
  actors: PoolSnapshot<ActorSnapshot>;
  weapons: PoolSnapshot<WeaponSnapshot>;
  projectiles: PoolSnapshot<ProjectileSnapshot>;
  items: PoolSnapshot<ItemSnapshot>;
  jumpPads: PoolSnapshot<JumpPadSnapshot>;
  spawnPoints: Vec3Data[];
  deathZones: DeathZoneSnapshot[];
  respawnList: RespawnEntry[];
  leaderBoard: LeaderBoardSnapshot;
  matchEndRequested: boolean;
}

interface LevelInit {
  ports: EnginePorts;
  sender: MessageSender | null;
  options: MatchOptions;
  mapRoot: Handle<SceneNode>;
  mapCollider: Handle<Collider>;
  random: SeededRandom;
  actors?: Pool<Actor>;
  weapons?: Pool<Weapon>;
  projectiles?: Pool<Projectile>;
  items?: Pool<Item>;
  jumpPads?: Pool<JumpPad>;
  leaderBoard?: LeaderBoard;
}

/**
 * Level - one running match
 *
 * Owns every entity pool. Entities read the world through an {@link UpdateContext}
 * during {@link update}; every structural change (spawn, removal, damage, pickup)
 * arrives later through {@link handleMessage}, in the order it was sent.
 */
export class Level {
  private readonly ports: EnginePorts;
  private sender: MessageSender | null;
  private readonly options: MatchOptions;
  private readonly mapRoot: Handle<SceneNode>;
  private readonly mapCollider: Handle<Collider>;
  private readonly random: SeededRandom;

  private readonly actors: Pool<Actor>;
  private readonly weapons: Pool<Weapon>;
  private readonly projectiles: Pool<Projectile>;
  private readonly items: Pool<Item>;
  private readonly jumpPads: Pool<JumpPad>;
  private readonly leaderBoard: LeaderBoard;

  private spawnPoints: SpawnPoint[] = [];
  private deathZones: DeathZone[] = [];
  private respawnList: RespawnEntry[] = [];
  private player: Handle<Actor> = NONE_HANDLE;
  private targets: TargetDescriptor[] = [];
  /** Match time in seconds */
  private time = 0;
  private matchEndRequested = false;

  private constructor(init: LevelInit) {
    this.ports = init.ports;
    this.sender = init.sender;
    this.options = init.options;
    this.mapRoot = init.mapRoot;
    this.mapCollider = init.mapCollider;
    this.random = init.random;
    this.actors = init.actors ?? new Pool<Actor>('Actors');
    this.weapons = init.weapons ?? new Pool<Weapon>('Weapons');
    this.projectiles = init.projectiles ?? new Pool<Projectile>('Projectiles');
    this.items = init.items ?? new Pool<Item>('Items');
    this.jumpPads = init.jumpPads ?? new Pool<JumpPad>('JumpPads');
    this.leaderBoard = init.leaderBoard ?? new LeaderBoard();

    // Bots must not chase or blame an actor that no longer exists
    this.actors.onFree((removed) => {
      for (const actor of this.actors.iter()) {
        if (actor.kind === 'bot') {
          actor.forgetActor(removed);
        }
      }
    });
  }

  /**
   * Load the map, scan it for markers, then spawn the player and the initial bots.
   * @throws AssetNotFoundError when the map model is missing
   */
  public static create(
    ports: EnginePorts,
    sender: MessageSender | null,
    options: MatchOptions,
    config: Partial<LevelConfig> = {}
  ): Level {
    const { mapModel, initialBots, seed } = { ...DEFAULT_LEVEL_CONFIG, ...config };
    const { scene, physics } = ports;

    const mapRoot = requireModel(scene, mapModel);
    const collisionNode = scene.findByName(mapRoot, MAP_COLLISION_NODE);
    let mapCollider: Handle<Collider> = NONE_HANDLE;
    if (isNone(collisionNode)) {
      debugInitialization.warn(`[Level] ${mapModel} has no "${MAP_COLLISION_NODE}" node, map has no collision`);
    } else {
      mapCollider = physics.createTrimeshCollider(collisionNode);
    }

    const level = new Level({
      ports,
      sender,
      options,
      mapRoot,
      mapCollider,
      random: new SeededRandom(seed),
    });
    level.analyze();
    level.spawnPlayer();
    for (const bot of initialBots) {
      level.spawnBot(bot.kind, bot.name);
    }

    debugInitialization.log(
      `[Level] Created: ${level.spawnPoints.length} spawn points, ${level.items.count} items, ` +
        `${level.jumpPads.count} jump pads, ${level.deathZones.length} death zones`
    );
    return level;
  }

  /**
   * Turn named map nodes into gameplay markers
   */
  private analyze(): void {
    const { scene, physics } = this.ports;
    const pendingItems: Array<{ kind: ItemKind; position: THREE.Vector3 }> = [];

    // Snapshot the node list: creating items adds nodes to the scene
    for (const { handle, name } of Array.from(scene.nodes())) {
      if (name.startsWith('JumpPad')) {
        const begin = scene.findByNameFromRoot(`${name}_Begin`);
        const end = scene.findByNameFromRoot(`${name}_End`);
        if (isSome(begin) && isSome(end)) {
          const collider = physics.createTrimeshCollider(handle);
          this.jumpPads.spawn(
            JumpPad.fromMarkers(collider, scene.getGlobalPosition(begin), scene.getGlobalPosition(end))
          );
        }
      } else if (name.startsWith('Medkit')) {
        pendingItems.push({ kind: 'MEDKIT', position: scene.getGlobalPosition(handle) });
      } else if (name.startsWith('Ammo_Ak47')) {
        pendingItems.push({ kind: 'AK47_AMMO', position: scene.getGlobalPosition(handle) });
      } else if (name.startsWith('Ammo_M4')) {
        pendingItems.push({ kind: 'M4_AMMO', position: scene.getGlobalPosition(handle) });
      } else if (name.startsWith('Ammo_Plasma')) {
        pendingItems.push({ kind: 'PLASMA_AMMO', position: scene.getGlobalPosition(handle) });
      } else if (name.startsWith('SpawnPoint')) {
        this.spawnPoints.push(new SpawnPoint(scene.getGlobalPosition(handle)));
      } else if (name.startsWith('DeathZone')) {
        const bounds = scene.getWorldBoundingBox(handle);
        if (bounds) {
          this.deathZones.push(new DeathZone(bounds));
          scene.setVisibility(handle, false);
        }
      }
    }

    for (const { kind, position } of pendingItems) {
      this.spawnItem(kind, position, false);
    }
  }

  // ==================== UPDATE ====================

  public update(time: Readonly<GameTime>): void {
    this.time += time.delta;

    this.updateRespawn(time);
    this.updateDeathZones();
    this.updateWeapons();
    this.updateProjectiles(time);
    this.updateItems(time);

    this.targets = this.buildTargets();
    this.updateBotTargets();

    const context = this.createUpdateContext(time);
    for (const [handle, actor] of this.actors.pairIter()) {
      updateActor(actor, handle, context);
    }

    this.updateGameEnding();
  }

  private updateRespawn(time: Readonly<GameTime>): void {
    for (const entry of this.respawnList) {
      entry.timeLeft -= time.delta;
      if (entry.timeLeft <= 0) {
        this.send(
          entry.kind === 'bot'
            ? { type: 'SPAWN_BOT', kind: entry.botKind, name: entry.name }
            : { type: 'SPAWN_PLAYER' }
        );
      }
    }
    this.respawnList = this.respawnList.filter((entry) => entry.timeLeft > 0);
  }

  private updateDeathZones(): void {
    if (this.deathZones.length === 0) return;

    for (const [handle, actor] of this.actors.pairIter()) {
      const position = actor.position(this.ports);
      if (this.deathZones.some((zone) => zone.contains(position))) {
        this.send({ type: 'RESPAWN_ACTOR', actor: handle });
      }
    }
  }

  private updateWeapons(): void {
    for (const weapon of this.weapons.iter()) {
      const ownerBody = this.actors.tryGet(weapon.owner)?.body ?? NONE_HANDLE;
      weapon.update(this.ports, ownerBody);
    }
  }

  private updateProjectiles(time: Readonly<GameTime>): void {
    const world = { ports: this.ports, actors: this.actors, weapons: this.weapons };
    for (const projectile of this.projectiles.iter()) {
      projectile.update(time, world);
    }

    this.projectiles.retain((projectile) => {
      if (!projectile.isDead()) return true;
      projectile.cleanUp(this.ports);
      return false;
    });
  }

  private updateItems(time: Readonly<GameTime>): void {
    for (const item of this.items.iter()) {
      item.update(time, this.ports.scene);
    }

    this.items.retain((item) => {
      if (!item.isExpired()) return true;
      item.cleanUp(this.ports.scene);
      return false;
    });
  }

  private buildTargets(): TargetDescriptor[] {
    const targets: TargetDescriptor[] = [];
    for (const [handle, actor] of this.actors.pairIter()) {
      targets.push({
        handle,
        health: actor.health,
        position: actor.position(this.ports),
        body: actor.body,
      });
    }
    return targets;
  }

  private updateBotTargets(): void {
    const player = this.targets.find((target) => handleEquals(target.handle, this.player));
    if (!player) return;

    for (const actor of this.actors.iter()) {
      if (actor.kind === 'bot') {
        actor.setPointOfInterest(player.position);
      }
    }
  }

  private createUpdateContext(time: Readonly<GameTime>): UpdateContext {
    const { mouseSensitivity, invertMouseY } = settingsStore.getState();
    return {
      time,
      ports: this.ports,
      weapons: this.weapons,
      items: this.items,
      jumpPads: this.jumpPads,
      targets: this.targets,
      controls: { mouseSensitivity, invertMouseY },
      random: this.random,
    };
  }

  private updateGameEnding(): void {
    if (this.matchEndRequested) return;
    if (this.leaderBoard.isMatchOver(this.options, this.time)) {
      this.matchEndRequested = true;
      this.send({ type: 'END_MATCH' });
    }
  }

  // ==================== MESSAGES ====================

  /**
   * Apply one deferred request. Requests naming entities that no longer exist
   * are ignored.
   */
  public handleMessage(message: GameMessage, time: Readonly<GameTime>): void {
    switch (message.type) {
      case 'ADD_BOT':
        this.addBot(message.kind, message.position, message.name);
        return;
      case 'SPAWN_BOT':
        this.spawnBot(message.kind, message.name);
        return;
      case 'SPAWN_PLAYER':
        this.spawnPlayer();
        return;
      case 'REMOVE_ACTOR':
        this.handleRemoveActor(message.actor);
        return;
      case 'RESPAWN_ACTOR':
        this.respawnActor(message.actor);
        return;
      case 'DAMAGE_ACTOR':
        this.damageActor(message.actor, message.who, message.amount, time);
        return;
      case 'GIVE_NEW_WEAPON':
        this.giveNewWeapon(message.actor, message.kind);
        return;
      case 'DROP_WEAPON':
        this.dropWeapon(message.actor, message.weapon);
        return;
      case 'SHOOT_WEAPON':
        this.weapons.tryGet(message.weapon)?.shoot(message.weapon, time.elapsed, this.ports.scene, message.direction);
        return;
      case 'SHOW_WEAPON':
        this.weapons.tryGet(message.weapon)?.setVisibility(message.visible, this.ports.scene);
        return;
      case 'CREATE_PROJECTILE':
        this.createProjectile(message.kind, message.position, message.direction, message.owner);
        return;
      case 'GIVE_ITEM':
        this.giveItem(message.actor, message.kind);
        return;
      case 'PICK_UP_ITEM':
        this.pickUpItem(message.actor, message.item);
        return;
      case 'SPAWN_ITEM':
        this.spawnItem(message.kind, message.position, message.adjustHeight, message.lifetime);
        return;
      case 'PLAY_SOUND':
        debugAudio.log(`[Level] Playing ${message.path}`);
        this.ports.sound.playSound(message.path, message.position, {
          gain: message.gain,
          radius: message.radius,
          rolloffFactor: message.rolloffFactor,
        });
        return;
      case 'CREATE_EFFECT':
        this.ports.effects.createEffect(message.kind, message.position);
        return;
      // Handled by the game shell
      case 'ADD_NOTIFICATION':
      case 'SAVE_GAME':
      case 'LOAD_GAME':
      case 'START_NEW_GAME':
      case 'QUIT_GAME':
      case 'SET_MUSIC_VOLUME':
      case 'END_MATCH':
        return;
      default:
        assertNever(message);
    }
  }

  private send(message: GameMessage): void {
    if (this.sender) {
      this.sender.send(message);
    } else {
      debugMessages.warn(`[Level] Dropped ${message.type}: no message sender`);
    }
  }

  private entitySender(): MessageSender | null {
    return this.sender ? this.sender.clone() : null;
  }

  /**
   * Run an entity constructor, logging and skipping the entity when an asset is missing
   */
  private tryBuild<T>(what: string, build: () => T): T | null {
    try {
      return build();
    } catch (error) {
      if (error instanceof AssetNotFoundError) {
        debugSpawning.error(`[Level] Unable to create ${what}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  // ==================== ACTORS ====================

  public addBot(kind: BotKind, position: Readonly<THREE.Vector3>, name?: string): Handle<Actor> {
    const botName = name ?? `Bot ${kind} ${this.actors.count}`;
    const bot = this.tryBuild(`bot ${botName}`, () =>
      Bot.create(kind, position, this.ports, this.entitySender(), botName)
    );
    if (!bot) return NONE_HANDLE;

    bot.team = this.teamForBot();
    this.leaderBoard.getOrAddActor(bot.name);
    const handle = this.actors.spawn(bot);
    this.giveNewWeapon(handle, bot.definition.startingWeapon);
    return handle;
  }

  public spawnBot(kind: BotKind, name?: string): Handle<Actor> {
    const handle = this.addBot(kind, this.spawnPosition(), name);
    const bot = this.actors.tryGet(handle);
    if (bot) {
      this.send({ type: 'ADD_NOTIFICATION', text: `Bot ${bot.name} spawned!` });
    }
    return handle;
  }

  /**
   * Spawn the local player with the full arsenal. A level holds at most one player.
   */
  public spawnPlayer(): Handle<Actor> {
    if (this.actors.contains(this.player)) {
      debugSpawning.warn('[Level] Player already spawned');
      return this.player;
    }

    const position = this.spawnPosition().add(new THREE.Vector3(0, PLAYER_SPAWN_HEIGHT, 0));
    const player = Player.create(position, this.ports, this.entitySender());
    player.team = this.options.mode === 'TEAM_DEATH_MATCH' ? PLAYER_TEAM : 'NONE';
    this.player = this.actors.spawn(player);
    this.leaderBoard.getOrAddActor(player.name);

    for (const kind of PLAYER_STARTING_WEAPONS) {
      this.giveNewWeapon(this.player, kind);
    }
    return this.player;
  }

  /**
   * Team deathmatch puts each bot on the smaller team, RED on a tie.
   */
  private teamForBot(): Team {
    if (this.options.mode !== 'TEAM_DEATH_MATCH') return 'NONE';

    let red = 0;
    let blue = 0;
    for (const actor of this.actors.iter()) {
      if (actor.team === 'RED') red++;
      else if (actor.team === 'BLUE') blue++;
    }
    // The player joins BLUE when it respawns
    if (isNone(this.player) && this.respawnList.some((entry) => entry.kind === 'player')) {
      blue++;
    }
    return blue < red ? 'BLUE' : 'RED';
  }

  private handleRemoveActor(handle: Handle<Actor>): void {
    const actor = this.actors.tryGet(handle);
    if (!actor) return;

    if (actor.isDead()) {
      this.respawnActor(handle);
    } else {
      this.removeActor(handle);
    }
  }

  /**
   * Count a death, remove the actor and schedule its replacement
   */
  public respawnActor(handle: Handle<Actor>): void {
    const actor = this.actors.tryGet(handle);
    if (!actor) return;

    this.leaderBoard.addDeath(actor.name);
    const entry: RespawnEntry =
      actor.kind === 'bot'
        ? { kind: 'bot', botKind: actor.botKind, name: actor.name, timeLeft: RESPAWN_TIME }
        : { kind: 'player', timeLeft: RESPAWN_TIME };
    this.removeActor(handle);
    this.respawnList.push(entry);
  }

  /**
   * Remove an actor; its weapons are left behind as temporary items
   */
  public removeActor(handle: Handle<Actor>): void {
    const actor = this.actors.tryGet(handle);
    if (!actor) return;

    const position = actor.position(this.ports);
    for (const weaponHandle of [...actor.weapons]) {
      const weapon = this.weapons.tryGet(weaponHandle);
      if (weapon) {
        this.spawnItem(WEAPON_DROP_ITEMS[weapon.kind], position, true, DROPPED_ITEM_LIFETIME);
      }
      this.removeWeapon(weaponHandle);
    }

    actor.cleanUp(this.ports);
    this.actors.free(handle);
    if (handleEquals(handle, this.player)) {
      this.player = NONE_HANDLE;
    }
    debugActors.log(`[Level] Removed ${actor.name}`);
  }

  private damageActor(
    handle: Handle<Actor>,
    who: Handle<Actor>,
    amount: number,
    time: Readonly<GameTime>
  ): void {
    const target = this.actors.tryGet(handle);
    if (!target) return;

    let attacker: Actor | undefined;
    if (isSome(who)) {
      attacker = this.actors.tryGet(who);
      if (!attacker) return;
    }

    this.send({
      type: 'ADD_NOTIFICATION',
      text: attacker
        ? `${attacker.name} dealt ${amount} damage to ${target.name}!`
        : `${target.name} took ${amount} damage!`,
    });

    if (target.kind === 'bot') {
      target.onDamaged(who, time.elapsed);
    }

    const wasDead = target.isDead();
    target.damage(amount);
    if (!wasDead && target.isDead() && attacker) {
      this.leaderBoard.addFrag(attacker.name, attacker.team);
    }
  }

  /**
   * Spawn position farthest (in summed distance) from every live actor; the
   * origin when the map has no spawn points.
   */
  public findSuitableSpawnPoint(): number | null {
    if (this.spawnPoints.length === 0) return null;

    const positions = Array.from(this.actors.iter(), (actor) => actor.position(this.ports));
    const start = this.random.nextInt(0, this.spawnPoints.length - 1);
    let best = start;
    let maxDistance = -Infinity;
    for (let offset = 0; offset < this.spawnPoints.length; offset++) {
      const index = (start + offset) % this.spawnPoints.length;
      const point = this.spawnPoints[index].position;
      const distance = positions.reduce((sum, position) => sum + position.distanceTo(point), 0);
      if (distance > maxDistance) {
        maxDistance = distance;
        best = index;
      }
    }
    return best;
  }

  private spawnPosition(): THREE.Vector3 {
    const index = this.findSuitableSpawnPoint();
    return index === null ? new THREE.Vector3() : this.spawnPoints[index].position.clone();
  }

  // ==================== WEAPONS ====================

  public giveNewWeapon(actorHandle: Handle<Actor>, kind: WeaponKind): Handle<Weapon> {
    const actor = this.actors.tryGet(actorHandle);
    if (!actor) return NONE_HANDLE;

    const weapon = this.tryBuild(`weapon ${kind}`, () =>
      Weapon.create(kind, this.ports.scene, this.entitySender())
    );
    if (!weapon) return NONE_HANDLE;

    this.ports.scene.linkNodes(weapon.model, actor.weaponPivot);
    weapon.setOwner(actorHandle);
    const handle = this.weapons.spawn(weapon);
    actor.addWeapon(handle);

    this.send({ type: 'ADD_NOTIFICATION', text: `${actor.name} picked up weapon ${weapon.definition.name}` });
    return handle;
  }

  private dropWeapon(actorHandle: Handle<Actor>, weaponHandle: Handle<Weapon>): void {
    const actor = this.actors.tryGet(actorHandle);
    const weapon = this.weapons.tryGet(weaponHandle);
    if (!actor || !weapon || !actor.removeWeapon(weaponHandle)) return;

    this.spawnItem(WEAPON_DROP_ITEMS[weapon.kind], actor.position(this.ports), true, DROPPED_ITEM_LIFETIME);
    this.removeWeapon(weaponHandle);
    this.weapons.tryGet(actor.currentWeapon())?.setVisibility(true, this.ports.scene);
  }

  /**
   * Free a weapon. Projectiles it fired stay in flight without an owner.
   */
  private removeWeapon(handle: Handle<Weapon>): void {
    const weapon = this.weapons.tryGet(handle);
    if (!weapon) return;

    for (const projectile of this.projectiles.iter()) {
      if (handleEquals(projectile.owner, handle)) {
        projectile.owner = NONE_HANDLE;
      }
    }
    weapon.cleanUp(this.ports.scene);
    this.weapons.free(handle);
  }

  private createProjectile(
    kind: Projectile['kind'],
    position: Readonly<THREE.Vector3>,
    direction: Readonly<THREE.Vector3>,
    owner: Handle<Weapon>
  ): Handle<Projectile> {
    const projectile = this.tryBuild(`projectile ${kind}`, () =>
      Projectile.create({
        kind,
        position,
        direction,
        owner,
        ports: this.ports,
        random: this.random,
        sender: this.entitySender(),
      })
    );
    return projectile ? this.projectiles.spawn(projectile) : NONE_HANDLE;
  }

  // ==================== ITEMS ====================

  /**
   * @param adjustHeight Drop the item onto the first surface below `position`
   * @param lifetime Seconds until a temporary item expires; omitted for map items
   */
  public spawnItem(
    kind: ItemKind,
    position: Readonly<THREE.Vector3>,
    adjustHeight: boolean,
    lifetime?: number
  ): Handle<Item> {
    const at = adjustHeight ? this.groundBelow(position) : position.clone();
    const item = this.tryBuild(`item ${kind}`, () =>
      Item.create(kind, at, this.ports.scene, this.entitySender(), lifetime ?? null)
    );
    return item ? this.items.spawn(item) : NONE_HANDLE;
  }

  private groundBelow(position: Readonly<THREE.Vector3>): THREE.Vector3 {
    const [hit] = this.ports.physics.castRay(position, new THREE.Vector3(0, -1, 0), ITEM_DROP_PICK_DEPTH);
    return hit ? hit.position.clone() : position.clone();
  }

  private pickUpItem(actorHandle: Handle<Actor>, itemHandle: Handle<Item>): void {
    const actor = this.actors.tryGet(actorHandle);
    const item = this.items.tryGet(itemHandle);
    // Several actors may ask for the same item in one frame; the dead take nothing
    if (!actor || actor.isDead() || !item || !item.isActive()) return;

    const position = item.getPosition(this.ports.scene);
    this.send({ type: 'ADD_NOTIFICATION', text: `${actor.name} picked up item ${item.definition.name}` });

    if (item.isTemporary()) {
      item.cleanUp(this.ports.scene);
      this.items.free(itemHandle);
    } else {
      item.pickUp();
    }

    this.send({
      type: 'PLAY_SOUND',
      path: ITEM_PICKUP_SOUND,
      position,
      gain: 1,
      rolloffFactor: 3,
      radius: 2,
    });
    this.giveItem(actorHandle, item.kind);
  }

  public giveItem(actorHandle: Handle<Actor>, kind: ItemKind): void {
    const actor = this.actors.tryGet(actorHandle);
    if (!actor) return;

    const effect = getItemDefinition(kind).effect;
    switch (effect.type) {
      case 'heal':
        actor.heal(effect.amount);
        return;
      case 'ammo': {
        const weapon = this.findActorWeapon(actor, effect.weapon);
        if (weapon) {
          weapon.addAmmo(effect.amount);
        } else {
          debugItems.log(`[Level] ${actor.name} has no ${effect.weapon} for ${kind}`);
        }
        return;
      }
      case 'weapon': {
        const weapon = this.findActorWeapon(actor, effect.weapon);
        if (weapon) {
          weapon.addAmmo(effect.ammo);
        } else {
          this.send({ type: 'GIVE_NEW_WEAPON', actor: actorHandle, kind: effect.weapon });
        }
        return;
      }
    }
  }

  private findActorWeapon(actor: Actor, kind: WeaponKind): Weapon | undefined {
    for (const handle of actor.weapons) {
      const weapon = this.weapons.tryGet(handle);
      if (weapon?.kind === kind) {
        return weapon;
      }
    }
    return undefined;
  }

  // ==================== QUERIES ====================

  public setPlayerInput(input: Partial<InputState>): void {
    const player = this.actors.tryGet(this.player);
    if (player?.kind === 'player') {
      player.setInput(input);
    }
  }

  public getPlayer(): Handle<Actor> {
    return this.player;
  }

  public getHudState(): HudState | null {
    const player = this.actors.tryGet(this.player);
    if (!player) return null;

    const weapon = this.weapons.tryGet(player.currentWeapon());
    const score = this.leaderBoard.values().get(player.name);
    return {
      health: player.health,
      armor: player.armor,
      ammo: weapon ? weapon.ammo : null,
      weaponKind: weapon ? weapon.kind : null,
      kills: score?.kills ?? 0,
      deaths: score?.deaths ?? 0,
    };
  }

  public getActors(): ReadonlyPool<Actor> {
    return this.actors;
  }

  public getWeapons(): ReadonlyPool<Weapon> {
    return this.weapons;
  }

  public getProjectiles(): ReadonlyPool<Projectile> {
    return this.projectiles;
  }

  public getItems(): ReadonlyPool<Item> {
    return this.items;
  }

  public getJumpPads(): ReadonlyPool<JumpPad> {
    return this.jumpPads;
  }

  public getLeaderBoard(): LeaderBoard {
    return this.leaderBoard;
  }

  public getOptions(): MatchOptions {
    return this.options;
  }

  /** Seconds since the match started */
  public getTime(): number {
    return this.time;
  }

  public getSpawnPoints(): readonly SpawnPoint[] {
    return this.spawnPoints;
  }

  public getDeathZones(): readonly DeathZone[] {
    return this.deathZones;
  }

  public getRespawnList(): readonly Readonly<RespawnEntry>[] {
    return this.respawnList;
  }

  // ==================== LIFECYCLE ====================

  /**
   * Point the level and every entity at a (new) message queue
   */
  public setMessageSender(sender: MessageSender | null): void {
    this.sender = sender;
    const each = (entity: { setMessageSender(sender: MessageSender | null): void }): void => {
      entity.setMessageSender(sender ? sender.clone() : null);
    };
    for (const actor of this.actors.iter()) each(actor);
    for (const weapon of this.weapons.iter()) each(weapon);
    for (const projectile of this.projectiles.iter()) each(projectile);
    for (const item of this.items.iter()) each(item);
  }

  /**
   * Remove everything the level put into the scene and the physics world
   */
  public destroy(): void {
    const { scene, physics } = this.ports;

    for (const projectile of this.projectiles.iter()) projectile.cleanUp(this.ports);
    for (const weapon of this.weapons.iter()) weapon.cleanUp(scene);
    for (const item of this.items.iter()) item.cleanUp(scene);
    for (const actor of this.actors.iter()) actor.cleanUp(this.ports);
    for (const pad of this.jumpPads.iter()) physics.removeCollider(pad.collider);
    if (isSome(this.mapCollider)) {
      physics.removeCollider(this.mapCollider);
    }
    scene.removeNode(this.mapRoot);

    this.projectiles.clear();
    this.weapons.clear();
    this.items.clear();
    this.actors.clear();
    this.jumpPads.clear();
    this.respawnList = [];
    this.player = NONE_HANDLE;
  }

  public toSnapshot(): LevelSnapshot {
    return {
      options: this.options,
      time: this.time,
      seed: this.random.getSeed(),
      mapRoot: this.mapRoot,
      mapCollider: this.mapCollider,
      player: this.player,
      actors: this.actors.toSnapshot(actorToSnapshot),
      weapons: this.weapons.toSnapshot((weapon) => weapon.toSnapshot()),
      projectiles: this.projectiles.toSnapshot((projectile) => projectile.toSnapshot()),
      items: this.items.toSnapshot((item) => item.toSnapshot()),
      jumpPads: this.jumpPads.toSnapshot((pad) => pad.toSnapshot()),
      spawnPoints: this.spawnPoints.map((point) => point.toSnapshot()),
      deathZones: this.deathZones.map((zone) => zone.toSnapshot()),
      respawnList: this.respawnList.map((entry) => ({ ...entry })),
      leaderBoard: this.leaderBoard.toSnapshot(),
      matchEndRequested: this.matchEndRequested,
    };
  }

  /**
   * Rebuild a level over the host engine's restored scene. The result has no
   * message sender until {@link setMessageSender} is called.
   */
  public static fromSnapshot(ports: EnginePorts, snapshot: LevelSnapshot): Level {
    const level = new Level({
      ports,
      sender: null,
      options: snapshot.options,
      mapRoot: snapshot.mapRoot,
      mapCollider: snapshot.mapCollider,
      random: new SeededRandom(snapshot.seed),
      actors: Pool.fromSnapshot('Actors', snapshot.actors, actorFromSnapshot),
      weapons: Pool.fromSnapshot('Weapons', snapshot.weapons, Weapon.fromSnapshot),
      projectiles: Pool.fromSnapshot('Projectiles', snapshot.projectiles, Projectile.fromSnapshot),
      items: Pool.fromSnapshot('Items', snapshot.items, Item.fromSnapshot),
      jumpPads: Pool.fromSnapshot('JumpPads', snapshot.jumpPads, JumpPad.fromSnapshot),
      leaderBoard: LeaderBoard.fromSnapshot(snapshot.leaderBoard),
    });
    level.time = snapshot.time;
    level.player = snapshot.player;
    level.spawnPoints = snapshot.spawnPoints.map(SpawnPoint.fromSnapshot);
    level.deathZones = snapshot.deathZones.map(DeathZone.fromSnapshot);
    level.respawnList = snapshot.respawnList.map((entry) => ({ ...entry }));
    level.matchEndRequested = snapshot.matchEndRequested;
    return level;
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}
