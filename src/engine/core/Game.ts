import { EventBus } from './EventBus';
import { GameLoop } from './GameLoop';
import type { GameMessage } from './GameMessage';
import { type GameTime, advanceGameTime, createGameTime } from './GameTime';
import { type Channel, type MessageSender, createMessageChannel } from './MessageChannel';
import { AssetNotFoundError, type EnginePorts } from '../ports';
import { type HudState, Level, type LevelConfig } from '../level/Level';
import type { InputState } from '../actors/Player';
import { DEFAULT_MATCH_OPTIONS, type MatchOptions } from '../match/MatchOptions';
import { type SaveStorage, MemorySaveStorage } from '../persistence/SaveStorage';
import { SaveGameError, createSaveFile, decodeSave, encodeSave } from '../persistence/SaveCodec';
import { settingsStore } from '@/store/settingsStore';
import { debugInitialization, debugMessages, debugPersistence } from '@/utils/debugLogger';

export interface GameConfig {
  /** Fixed simulation steps per second when driven by {@link Game.start} */
  tickRate: number;
  /** Slot used by SAVE_GAME / LOAD_GAME messages that name none */
  saveSlot: string;
  level: Partial<LevelConfig>;
}

export const DEFAULT_CONFIG: GameConfig = {
  tickRate: 60,
  saveSlot: 'quicksave',
  level: {},
};

/**
 * Game - the simulation shell
 *
 * Owns the message queue, the optional running level and the game clock. One
 * {@link update} is one frame: advance time, update the level, then drain the
 * queue until it is empty. Shell requests (new game, save, load, quit, music
 * volume, match end, notifications) are handled here; everything else goes to
 * the level.
 */
export class Game {
  public readonly config: GameConfig;
  public readonly eventBus: EventBus;

  private readonly ports: EnginePorts;
  private readonly storage: SaveStorage;
  private readonly channel: Channel<GameMessage>;
  private level: Level | null = null;
  private time: GameTime = createGameTime();
  private exitRequested = false;
  private matchOver = false;
  private gameLoop: GameLoop | null = null;

  constructor(
    ports: EnginePorts,
    storage: SaveStorage = new MemorySaveStorage(),
    config: Partial<GameConfig> = {},
    eventBus: EventBus = new EventBus()
  ) {
    this.ports = ports;
    this.storage = storage;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.eventBus = eventBus;
    this.channel = createMessageChannel();

    const { soundVolume, musicVolume } = settingsStore.getState();
    ports.sound.setSoundVolume(soundVolume);
    ports.sound.setMusicVolume(musicVolume);
  }

  // ==================== FRAME ====================

  public update(delta: number): void {
    advanceGameTime(this.time, delta);
    this.level?.update(this.time);
    this.processMessages();
  }

  /**
   * Drain the queue. Messages sent while draining are processed in the same pass.
   */
  public processMessages(): void {
    let message = this.channel.receiver.tryReceive();
    while (message !== undefined) {
      this.handleMessage(message);
      message = this.channel.receiver.tryReceive();
    }
  }

  private handleMessage(message: GameMessage): void {
    switch (message.type) {
      case 'START_NEW_GAME':
        this.startNewGame(message.options);
        return;
      case 'QUIT_GAME':
        this.quit();
        return;
      case 'SAVE_GAME':
        this.saveGame(message.slot ?? this.config.saveSlot);
        return;
      case 'LOAD_GAME':
        this.loadGame(message.slot ?? this.config.saveSlot);
        return;
      case 'SET_MUSIC_VOLUME':
        settingsStore.getState().setMusicVolume(message.volume);
        this.ports.sound.setMusicVolume(settingsStore.getState().musicVolume);
        return;
      case 'END_MATCH':
        this.endMatch();
        return;
      case 'ADD_NOTIFICATION':
        this.eventBus.emit('notification', { text: message.text, time: this.time.elapsed });
        return;
      default:
        if (this.level) {
          this.level.handleMessage(message, this.time);
        } else {
          debugMessages.log(`[Game] Ignored ${message.type}: no level`);
        }
    }
  }

  /**
   * Run the simulation on a fixed-timestep loop until quit
   */
  public start(): void {
    if (this.gameLoop) return;
    this.gameLoop = new GameLoop(this.config.tickRate, (delta) => {
      this.update(delta);
      if (this.exitRequested) {
        this.stop();
      }
    });
    this.gameLoop.start();
  }

  public stop(): void {
    this.gameLoop?.dispose();
    this.gameLoop = null;
  }

  // ==================== SHELL REQUESTS ====================

  /**
   * Replace the running level. Queued messages addressed the old world and are dropped.
   */
  public startNewGame(options: MatchOptions = DEFAULT_MATCH_OPTIONS): void {
    this.destroyLevel();
    this.discardPendingMessages();
    this.matchOver = false;

    try {
      this.level = Level.create(this.ports, this.channel.sender.clone(), options, this.config.level);
    } catch (error) {
      if (error instanceof AssetNotFoundError) {
        debugInitialization.error(`[Game] Unable to start a new game: ${error.message}`);
        return;
      }
      throw error;
    }
    this.eventBus.emit('match:started', { options });
  }

  private quit(): void {
    this.destroyLevel();
    this.exitRequested = true;
    this.eventBus.emit('game:quit', {});
  }

  private endMatch(): void {
    if (!this.level) return;
    this.matchOver = true;
    this.eventBus.emit('match:over', {
      options: this.level.getOptions(),
      elapsed: this.level.getTime(),
      standings: this.level.getLeaderBoard().standings(),
    });
  }

  private saveGame(slot: string): void {
    if (!this.level) {
      this.reportFailure('save:failed', slot, new SaveGameError('No game in progress'));
      return;
    }

    try {
      this.storage.write(slot, encodeSave(createSaveFile(this.time, this.level.toSnapshot())));
    } catch (error) {
      this.reportFailure('save:failed', slot, error);
      return;
    }

    debugPersistence.log(`[Game] Saved to "${slot}"`);
    this.eventBus.emit('save:complete', { slot });
  }

  /**
   * Restore a saved level over the host's restored scene, then bind every entity
   * to this game's queue. A failed load leaves the running game as it was.
   */
  private loadGame(slot: string): void {
    let level: Level;
    let time: GameTime;
    try {
      const data = this.storage.read(slot);
      if (data === null) {
        throw new SaveGameError(`Save slot "${slot}" is empty`);
      }
      const save = decodeSave(data);
      level = Level.fromSnapshot(this.ports, save.level);
      time = { ...save.time };
    } catch (error) {
      this.reportFailure('load:failed', slot, error);
      return;
    }

    this.discardPendingMessages();
    level.setMessageSender(this.channel.sender.clone());
    this.level = level;
    this.time = time;
    this.matchOver = false;

    debugPersistence.log(`[Game] Loaded "${slot}"`);
    this.eventBus.emit('load:complete', { slot });
  }

  private reportFailure(event: 'save:failed' | 'load:failed', slot: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    debugPersistence.error(`[Game] ${event === 'save:failed' ? 'Save' : 'Load'} of "${slot}" failed:`, error);
    this.eventBus.emit(event, { slot, message });
  }

  private destroyLevel(): void {
    this.level?.destroy();
    this.level = null;
  }

  private discardPendingMessages(): void {
    let discarded = 0;
    while (this.channel.receiver.tryReceive() !== undefined) {
      discarded++;
    }
    if (discarded > 0) {
      debugMessages.log(`[Game] Discarded ${discarded} pending messages`);
    }
  }

  // ==================== PRESENTATION ====================

  /**
   * Sender for intents from the presentation layer (menus, input bindings)
   */
  public getSender(): MessageSender {
    return this.channel.sender.clone();
  }

  public send(message: GameMessage): void {
    this.channel.sender.send(message);
  }

  public setPlayerInput(input: Partial<InputState>): void {
    this.level?.setPlayerInput(input);
  }

  public getHudState(): HudState | null {
    return this.level?.getHudState() ?? null;
  }

  public getLevel(): Level | null {
    return this.level;
  }

  public getTime(): Readonly<GameTime> {
    return this.time;
  }

  public shouldExit(): boolean {
    return this.exitRequested;
  }

  public isMatchOver(): boolean {
    return this.matchOver;
  }

  public dispose(): void {
    this.stop();
    this.destroyLevel();
    this.channel.receiver.close();
    this.eventBus.clear();
  }
}
