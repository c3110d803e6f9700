export {
  BOT_KINDS,
  BOT_DEFINITIONS,
  getBotDefinition,
  isBotKind,
} from './botDefinitions';

export type { BotKind, BotDefinition, BotAnimationSet } from './botDefinitions';
