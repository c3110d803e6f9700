/**
 * Simulation clock, in seconds. Advanced once per frame by the game shell.
 */
export interface GameTime {
  /** Seconds since the game started */
  elapsed: number;
  /** Length of the current frame */
  delta: number;
}

export function createGameTime(): GameTime {
  return { elapsed: 0, delta: 0 };
}

export function advanceGameTime(time: GameTime, delta: number): void {
  time.delta = delta;
  time.elapsed += delta;
}
