export { Weapon } from './Weapon';
export type { WeaponSnapshot } from './Weapon';
export { Projectile } from './Projectile';
export type { ProjectileSnapshot, ProjectileSpawnOptions, ProjectileWorld } from './Projectile';
