/**
 * Arena shooter simulation core.
 *
 * @example
 * import { Game, DEFAULT_MATCH_OPTIONS } from 'arena-sim-core';
 *
 * const game = new Game(enginePorts);
 * game.send({ type: 'START_NEW_GAME', options: DEFAULT_MATCH_OPTIONS });
 * game.start();
 */

// ==================== SHELL ====================
export { Game, DEFAULT_CONFIG } from './engine/core/Game';
export type { GameConfig } from './engine/core/Game';
export { GameLoop } from './engine/core/GameLoop';
export type { UpdateCallback } from './engine/core/GameLoop';
export { EventBus } from './engine/core/EventBus';
export type { EventCallback } from './engine/core/EventBus';
export type * from './engine/core/GameEvents';
export type { GameMessage, GameMessageType, MessageOf } from './engine/core/GameMessage';
export { createChannel, createMessageChannel } from './engine/core/MessageChannel';
export type { Channel, Sender, Receiver, MessageSender, MessageReceiver } from './engine/core/MessageChannel';
export { createGameTime, advanceGameTime } from './engine/core/GameTime';
export type { GameTime } from './engine/core/GameTime';

// ==================== STORAGE ====================
export {
  NONE_HANDLE,
  makeHandle,
  isNone,
  isSome,
  handleEquals,
  handleKey,
  formatHandle,
  isHandleData,
} from './engine/ecs/Handle';
export type { Handle } from './engine/ecs/Handle';
export { Pool, InvalidHandleError, PoolMutationError } from './engine/ecs/Pool';
export type { ReadonlyPool, PoolSnapshot, FreeListener } from './engine/ecs/Pool';

// ==================== WORLD ====================
export * from './engine/level';
export * from './engine/actors';
export * from './engine/weapons';
export * from './engine/items';
export * from './engine/match';
export * from './engine/animation';
export * from './engine/ports';
export * from './engine/persistence';

// ==================== SETTINGS ====================
export { settingsStore, DEFAULT_DEBUG_SETTINGS } from './store/settingsStore';
export type { SettingsState, DebugSettings } from './store/settingsStore';
