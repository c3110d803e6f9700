/**
 * Projectile Definitions
 *
 * Every projectile flies in a straight line at constant speed until it hits
 * something or its lifetime runs out.
 *
 * Speed reference (units per second):
 * - Bullet: 45
 * - Rocket: 30
 * - Plasma: 9 (slow, visible ball)
 */

export const PROJECTILE_KINDS = ['PLASMA', 'BULLET', 'ROCKET'] as const;

export type ProjectileKind = (typeof PROJECTILE_KINDS)[number];

export type ProjectileVisual =
  /** Camera-facing sprite with a point light */
  | {
      type: 'sprite';
      texture: string;
      color: number;
      minSize: number;
      maxSize: number;
      /** Kinematic ball body sized like the sprite */
      hasBody: boolean;
    }
  /** Instantiated model with a point light */
  | { type: 'model'; model: string; lightColor: number };

export interface ProjectileDefinition {
  kind: ProjectileKind;
  damage: number;
  speed: number;
  lifetime: number;
  impactSound: string;
  visual: ProjectileVisual;
}

export const PROJECTILE_DEFINITIONS: Record<ProjectileKind, ProjectileDefinition> = {
  PLASMA: {
    kind: 'PLASMA',
    damage: 30,
    speed: 9,
    lifetime: 10,
    impactSound: 'data/sounds/bullet_impact_concrete.ogg',
    visual: {
      type: 'sprite',
      texture: 'data/particles/light_01.png',
      color: 0x00a2e8,
      minSize: 0.09,
      maxSize: 0.12,
      hasBody: true,
    },
  },
  BULLET: {
    kind: 'BULLET',
    damage: 15,
    speed: 45,
    lifetime: 10,
    impactSound: 'data/sounds/bullet_impact_concrete.ogg',
    visual: {
      type: 'sprite',
      texture: 'data/particles/light_01.png',
      color: 0xffffff,
      minSize: 0.05,
      maxSize: 0.05,
      hasBody: false,
    },
  },
  ROCKET: {
    kind: 'ROCKET',
    damage: 30,
    speed: 30,
    lifetime: 10,
    impactSound: 'data/sounds/explosion.ogg',
    visual: { type: 'model', model: 'data/models/rocket.FBX', lightColor: 0xff7f00 },
  },
};

export function getProjectileDefinition(kind: ProjectileKind): ProjectileDefinition {
  return PROJECTILE_DEFINITIONS[kind];
}

export function isProjectileKind(value: unknown): value is ProjectileKind {
  return PROJECTILE_KINDS.some((kind) => kind === value);
}
