import { settingsStore, type DebugSettings } from '@/store/settingsStore';

export type DebugCategory =
  | 'actors'
  | 'ai'
  | 'combat'
  | 'items'
  | 'spawning'
  | 'messages'
  | 'initialization'
  | 'persistence'
  | 'audio'
  | 'performance';

// Map category names to debug settings keys
const categoryToSettingKey: Record<DebugCategory, keyof DebugSettings> = {
  actors: 'debugActors',
  ai: 'debugAI',
  combat: 'debugCombat',
  items: 'debugItems',
  spawning: 'debugSpawning',
  messages: 'debugMessages',
  initialization: 'debugInitialization',
  persistence: 'debugPersistence',
  audio: 'debugAudio',
  performance: 'debugPerformance',
};

/**
 * Check if debugging is enabled for a specific category
 */
function isEnabled(category: DebugCategory): boolean {
  const debugSettings = settingsStore.getState().debugSettings;

  // Check master toggle first
  if (!debugSettings.debugEnabled) {
    return false;
  }

  return debugSettings[categoryToSettingKey[category]];
}

/**
 * Debug logger that respects the debug settings from the settings store.
 * Only logs when both the master debug toggle and the specific category are enabled.
 */
export const debugLog = {
  log(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      // eslint-disable-next-line no-console -- Debug logger intentionally uses console.log
      console.log(...args);
    }
  },

  warn(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.warn(...args);
    }
  },

  /**
   * Errors are always reported; the category only adds a prefix when enabled.
   */
  error(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.error(`[${category}]`, ...args);
    } else {
      console.error(...args);
    }
  },

  /**
   * Check if a category is enabled (useful for expensive debug operations)
   */
  isEnabled,
};

// Category-specific logger interface
export interface CategoryLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  isEnabled: () => boolean;
}

function createCategoryLogger(category: DebugCategory): CategoryLogger {
  return {
    log: (...args: unknown[]) => debugLog.log(category, ...args),
    warn: (...args: unknown[]) => debugLog.warn(category, ...args),
    error: (...args: unknown[]) => debugLog.error(category, ...args),
    isEnabled: () => isEnabled(category),
  };
}

export const debugActors = createCategoryLogger('actors');
export const debugAI = createCategoryLogger('ai');
export const debugCombat = createCategoryLogger('combat');
export const debugItems = createCategoryLogger('items');
export const debugSpawning = createCategoryLogger('spawning');
export const debugMessages = createCategoryLogger('messages');
export const debugInitialization = createCategoryLogger('initialization');
export const debugPersistence = createCategoryLogger('persistence');
export const debugAudio = createCategoryLogger('audio');
export const debugPerformance = createCategoryLogger('performance');
