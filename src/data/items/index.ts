export {
  ITEM_KINDS,
  ITEM_DEFINITIONS,
  ITEM_PICKUP_SOUND,
  WEAPON_DROP_ITEMS,
  getItemDefinition,
  isItemKind,
} from './itemDefinitions';

export type { ItemKind, ItemEffect, ItemDefinition } from './itemDefinitions';
