export { Level, DEFAULT_LEVEL_CONFIG } from './Level';
export type { LevelConfig, LevelSnapshot, HudState } from './Level';
export { SpawnPoint, DeathZone } from './LevelMarkers';
export type { DeathZoneSnapshot, RespawnEntry } from './LevelMarkers';
export type { UpdateContext, TargetDescriptor, ControlSettings } from './UpdateContext';
