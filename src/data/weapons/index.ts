export {
  WEAPON_KINDS,
  WEAPON_DEFINITIONS,
  getWeaponDefinition,
  isWeaponKind,
} from './weaponDefinitions';

export type { WeaponKind, WeaponDefinition } from './weaponDefinitions';
