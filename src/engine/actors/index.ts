export { Character } from './Character';
export type { CharacterInit, CharacterSnapshot, Team } from './Character';
export { Bot } from './Bot';
export type { BotClips, BotSnapshot } from './Bot';
export { Player, createInputState } from './Player';
export type { InputState, PlayerSnapshot } from './Player';
export { updateActor, actorToSnapshot, actorFromSnapshot } from './Actor';
export type { Actor, ActorKind, ActorSnapshot } from './Actor';
export { COMBAT_MACHINE, LOCOMOTION_MACHINE, BOT_PARAMETERS } from './botStateMachines';
export type { BotClip, BotParameter } from './botStateMachines';
