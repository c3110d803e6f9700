import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_DEBUG_SETTINGS, settingsStore } from '@/store/settingsStore';

describe('settingsStore', () => {
  afterEach(() => {
    settingsStore.getState().reset();
  });

  it('starts at full volume with default controls', () => {
    const state = settingsStore.getState();

    expect(state.soundVolume).toBe(1);
    expect(state.musicVolume).toBe(1);
    expect(state.mouseSensitivity).toBe(0.3);
    expect(state.invertMouseY).toBe(false);
    expect(state.debugSettings).toEqual(DEFAULT_DEBUG_SETTINGS);
  });

  it('clamps volumes to [0, 1]', () => {
    const { setSoundVolume, setMusicVolume } = settingsStore.getState();

    setSoundVolume(-0.5);
    setMusicVolume(3);
    expect(settingsStore.getState().soundVolume).toBe(0);
    expect(settingsStore.getState().musicVolume).toBe(1);

    setMusicVolume(0.6);
    expect(settingsStore.getState().musicVolume).toBe(0.6);
  });

  it('keeps mouse sensitivity non-negative', () => {
    settingsStore.getState().setMouseSensitivity(-2);
    expect(settingsStore.getState().mouseSensitivity).toBe(0);

    settingsStore.getState().setMouseSensitivity(1.5);
    expect(settingsStore.getState().mouseSensitivity).toBe(1.5);
  });

  it('merges debug toggles', () => {
    settingsStore.getState().setDebugSettings({ debugEnabled: true });
    settingsStore.getState().setDebugSettings({ debugItems: true });

    expect(settingsStore.getState().debugSettings).toEqual({
      ...DEFAULT_DEBUG_SETTINGS,
      debugEnabled: true,
      debugItems: true,
    });
  });

  it('notifies subscribers', () => {
    const seen: boolean[] = [];
    const unsubscribe = settingsStore.subscribe((state) => seen.push(state.invertMouseY));

    settingsStore.getState().setInvertMouseY(true);
    unsubscribe();
    settingsStore.getState().setInvertMouseY(false);

    expect(seen).toEqual([true]);
  });

  it('resets everything', () => {
    const state = settingsStore.getState();
    state.setSoundVolume(0.2);
    state.setInvertMouseY(true);
    state.setDebugSettings({ debugEnabled: true });

    settingsStore.getState().reset();

    expect(settingsStore.getState().soundVolume).toBe(1);
    expect(settingsStore.getState().invertMouseY).toBe(false);
    expect(settingsStore.getState().debugSettings.debugEnabled).toBe(false);
  });
});
