import { createStore } from 'zustand/vanilla';

/**
 * Debug toggles for the category loggers in `@/utils/debugLogger`.
 * Nothing is logged unless `debugEnabled` and the category flag are both set.
 */
export interface DebugSettings {
  debugEnabled: boolean;
  debugActors: boolean;
  debugAI: boolean;
  debugCombat: boolean;
  debugItems: boolean;
  debugSpawning: boolean;
  debugMessages: boolean;
  debugInitialization: boolean;
  debugPersistence: boolean;
  debugAudio: boolean;
  debugPerformance: boolean;
}

export const DEFAULT_DEBUG_SETTINGS: DebugSettings = {
  debugEnabled: false,
  debugActors: false,
  debugAI: false,
  debugCombat: false,
  debugItems: false,
  debugSpawning: false,
  debugMessages: false,
  debugInitialization: false,
  debugPersistence: false,
  debugAudio: false,
  debugPerformance: false,
};

export interface SettingsState {
  // Sound
  soundVolume: number;
  musicVolume: number;

  // Controls
  mouseSensitivity: number;
  invertMouseY: boolean;

  // Debug
  debugSettings: DebugSettings;

  // Actions
  setSoundVolume: (volume: number) => void;
  setMusicVolume: (volume: number) => void;
  setMouseSensitivity: (sensitivity: number) => void;
  setInvertMouseY: (invert: boolean) => void;
  setDebugSettings: (settings: Partial<DebugSettings>) => void;
  reset: () => void;
}

const clampVolume = (volume: number): number => Math.max(0, Math.min(1, volume));

export const settingsStore = createStore<SettingsState>()((set) => ({
  soundVolume: 1,
  musicVolume: 1,
  mouseSensitivity: 0.3,
  invertMouseY: false,
  debugSettings: { ...DEFAULT_DEBUG_SETTINGS },

  setSoundVolume: (volume) => set({ soundVolume: clampVolume(volume) }),
  setMusicVolume: (volume) => set({ musicVolume: clampVolume(volume) }),
  setMouseSensitivity: (sensitivity) => set({ mouseSensitivity: Math.max(0, sensitivity) }),
  setInvertMouseY: (invert) => set({ invertMouseY: invert }),
  setDebugSettings: (settings) =>
    set((state) => ({ debugSettings: { ...state.debugSettings, ...settings } })),
  reset: () =>
    set({
      soundVolume: 1,
      musicVolume: 1,
      mouseSensitivity: 0.3,
      invertMouseY: false,
      debugSettings: { ...DEFAULT_DEBUG_SETTINGS },
    }),
}));
