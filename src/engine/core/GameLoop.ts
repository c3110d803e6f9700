import { debugPerformance } from '@/utils/debugLogger';

/** Receives the fixed step, in seconds */
export type UpdateCallback = (deltaTime: number) => void;

// Cap on real time consumed per tick, so a stalled host does not trigger a catch-up spiral
const MAX_FRAME_MS = 250;

/**
 * Fixed-timestep driver. Real time accumulates between interval ticks and is
 * consumed in whole steps of 1 / tickRate seconds.
 */
export class GameLoop {
  private tickRate: number;
  private tickMs: number;
  private isRunning = false;
  private lastTime = 0;
  private accumulator = 0;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  private updateCallback: UpdateCallback;

  constructor(tickRate: number, updateCallback: UpdateCallback) {
    this.tickRate = tickRate;
    this.tickMs = 1000 / tickRate;
    this.updateCallback = updateCallback;
  }

  public start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.lastTime = performance.now();
    this.accumulator = 0;
    this.intervalId = setInterval(() => this.tick(), this.tickMs);
  }

  public stop(): void {
    this.isRunning = false;

    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  public isActive(): boolean {
    return this.isRunning;
  }

  private tick(): void {
    if (!this.isRunning) return;

    const currentTime = performance.now();
    const deltaTime = currentTime - this.lastTime;
    this.lastTime = currentTime;

    this.accumulator += Math.min(deltaTime, MAX_FRAME_MS);

    let iterations = 0;
    const maxIterations = 10;
    const timeBudgetMs = 50;
    const tickStart = performance.now();

    while (this.accumulator >= this.tickMs && iterations < maxIterations) {
      if (iterations > 0 && performance.now() - tickStart > timeBudgetMs) {
        debugPerformance.warn(`[GameLoop] Yielding after ${iterations} iterations (time budget exceeded)`);
        break;
      }

      this.updateCallback(this.tickMs / 1000);
      this.accumulator -= this.tickMs;
      iterations++;

      // The callback may stop the loop
      if (!this.isRunning) return;
    }

    const tickElapsed = performance.now() - tickStart;
    if (iterations > 1 || tickElapsed > 20) {
      debugPerformance.warn(
        `[GameLoop] tick: ${iterations} iterations in ${tickElapsed.toFixed(1)}ms, accumulator=${this.accumulator.toFixed(1)}ms`
      );
    }
  }

  /** Fraction of a step left in the accumulator, for render interpolation */
  public getInterpolation(): number {
    return this.accumulator / this.tickMs;
  }

  public setTickRate(tickRate: number): void {
    this.tickRate = tickRate;
    this.tickMs = 1000 / tickRate;

    if (this.isRunning && this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = setInterval(() => this.tick(), this.tickMs);
    }
  }

  public getTickRate(): number {
    return this.tickRate;
  }

  public dispose(): void {
    this.stop();
  }
}
