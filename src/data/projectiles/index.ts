export {
  PROJECTILE_KINDS,
  PROJECTILE_DEFINITIONS,
  getProjectileDefinition,
  isProjectileKind,
} from './projectileDefinitions';

export type {
  ProjectileKind,
  ProjectileDefinition,
  ProjectileVisual,
} from './projectileDefinitions';
