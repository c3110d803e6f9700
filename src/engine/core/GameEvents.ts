/**
 * GameEvents - typed payloads for the EventBus
 *
 * The event bus carries presentation-facing notifications only; world mutations
 * go through the message queue. Event naming convention: "category:action".
 */

import type { MatchOptions } from '../match/MatchOptions';
import type { LeaderBoardEntry } from '../match/LeaderBoard';

/** Data for notification event (HUD message line) */
export interface NotificationEventData {
  text: string;
  time: number;
}

/** Data for match:started event */
export interface MatchStartedEventData {
  options: MatchOptions;
}

/** Data for match:over event */
export interface MatchOverEventData {
  options: MatchOptions;
  elapsed: number;
  /** Entries sorted by frags, highest first */
  standings: LeaderBoardEntry[];
}

/** Data for save:complete and load:complete events */
export interface SaveSlotEventData {
  slot: string;
}

/** Data for save:failed and load:failed events */
export interface SaveFailedEventData {
  slot: string;
  message: string;
}

/** Data for eventbus:errors, published when listeners throw */
export interface EventBusErrorsEventData {
  event: string;
  errorCount: number;
  errors: Array<{ handlerId: number; message: string }>;
}

export interface GameEventMap {
  notification: NotificationEventData;
  'match:started': MatchStartedEventData;
  'match:over': MatchOverEventData;
  'save:complete': SaveSlotEventData;
  'save:failed': SaveFailedEventData;
  'load:complete': SaveSlotEventData;
  'load:failed': SaveFailedEventData;
  'game:quit': Record<string, never>;
  'eventbus:errors': EventBusErrorsEventData;
}

export type GameEventName = keyof GameEventMap;
