/**
 * GameplayConfig - Centralized simulation tuning
 *
 * SINGLE SOURCE OF TRUTH for distances, timers and forces used by actors,
 * weapons, items and the level loop.
 *
 * Units: world units, seconds, world units per second.
 */

// =============================================================================
// BOT DECISIONS
// =============================================================================

/**
 * Distance separating "close enough to melee / stand still" from "needs to close
 * the distance". Drives both the locomotion and the combat machine.
 */
export const CHASE_THRESHOLD = 2.0;

/**
 * Minimum vertical component of the normalized direction to the target for a bot
 * to decide it must jump.
 */
export const JUMP_DIRECTION_THRESHOLD = 0.3;

/**
 * How long the last attacker overrides the externally set point of interest.
 */
export const AGGRESSION_DURATION = 5.0;

/**
 * Blend time for locomotion/combat pose transitions. Cosmetic only.
 */
export const POSE_BLEND_TIME = 0.3;

/**
 * Bots carry a weapon but the ranged attack path is switched off; combat is the
 * melee pose only.
 */
export const BOT_FIRING_ENABLED: boolean = false;

// =============================================================================
// CHARACTER BODY
// =============================================================================

export const BODY_HEIGHT = 1.25;
export const BODY_RADIUS = 0.35;

/**
 * A contact counts as ground when its normal's Y component exceeds this.
 */
export const GROUND_NORMAL_MIN_Y = 0.7;

/**
 * Vertical velocity set by a jump.
 */
export const JUMP_VELOCITY = 4.2;

export const PLAYER_MOVE_SPEED = 3.48;
export const PLAYER_RUN_MULTIPLIER = 1.75;

/**
 * Horizontal velocity multiplier applied each update while grounded, to stop sliding.
 */
export const GROUND_DAMPING = 0.9;

/**
 * Walked distance between two footstep sounds.
 */
export const FOOTSTEP_DISTANCE = 2.0;

export const FOOTSTEP_SOUNDS: readonly string[] = [
  'data/sounds/footsteps/FootStep_shoe_stone_step1.wav',
  'data/sounds/footsteps/FootStep_shoe_stone_step2.wav',
  'data/sounds/footsteps/FootStep_shoe_stone_step3.wav',
  'data/sounds/footsteps/FootStep_shoe_stone_step4.wav',
];

/**
 * Players spawn this far above the spawn point marker.
 */
export const PLAYER_SPAWN_HEIGHT = 1.5;

/**
 * Team the player plays for in team deathmatch; bots fill both teams evenly.
 */
export const PLAYER_TEAM = 'BLUE' as const;

// =============================================================================
// WEAPONS
// =============================================================================

export const DEFAULT_SHOOT_INTERVAL = 0.1;

/**
 * Local Z offset applied to the weapon model by a shot.
 */
export const RECOIL_OFFSET = -0.05;

/**
 * Fraction of the remaining recoil removed per update.
 */
export const RECOIL_RECOVERY = 0.2;

export const LASER_SIGHT_RANGE = 100.0;

/**
 * The laser dot sits this far off the hit surface, along its normal.
 */
export const LASER_DOT_SURFACE_OFFSET = 0.2;

/**
 * Name of the muzzle node inside weapon models.
 */
export const SHOT_POINT_NODE = 'Weapon:ShotPoint';

export const LASER_DOT_COLOR = 0xff0000;
export const LASER_DOT_RADIUS = 0.5;

export const PROJECTILE_LIGHT_RADIUS = 1.5;

/** Spatial parameters of impact sounds */
export const IMPACT_SOUND_RADIUS = 3.0;
export const IMPACT_SOUND_ROLLOFF = 4.0;

// =============================================================================
// ITEMS
// =============================================================================

export const ITEM_PICKUP_RADIUS = 1.25;

/**
 * Lifetime of items dropped by removed actors.
 */
export const DROPPED_ITEM_LIFETIME = 20.0;

/**
 * Items dropped with height adjustment are placed on the first surface found
 * within this distance below the drop point.
 */
export const ITEM_DROP_PICK_DEPTH = 1000.0;

export const ITEM_BOB_SPEED = 1.2;
export const ITEM_BOB_AMPLITUDE = 0.085;
export const ITEM_BOB_FOLLOW = 0.2;

// =============================================================================
// LEVEL
// =============================================================================

/**
 * Delay between an actor's removal and its respawn.
 */
export const RESPAWN_TIME = 4.0;

/**
 * Jump pad launch speed per unit of marker distance.
 */
export const JUMP_PAD_FORCE_SCALE = 3.0;

/**
 * Name of the map node whose mesh becomes the static trimesh collider.
 */
export const MAP_COLLISION_NODE = 'Polygon';

/**
 * Map model instantiated by a new level.
 */
export const DEFAULT_MAP_MODEL = 'data/models/dm6.fbx';

/**
 * Weapons handed to a freshly spawned player, in slot order.
 */
export const PLAYER_STARTING_WEAPONS = ['M4', 'AK47', 'PLASMA_RIFLE', 'ROCKET_LAUNCHER'] as const;

/**
 * Bots a new level spawns, by kind and display name.
 */
export const INITIAL_BOTS = [
  { kind: 'MAW', name: 'Maw' },
  { kind: 'MUTANT', name: 'Mutant' },
  { kind: 'PARASITE', name: 'Parasite' },
] as const;
