/**
 * AnimationState
 *
 * A single state of a rule-driven machine: the clip it plays and its outgoing
 * transitions, pre-sorted by priority.
 */

import type { StateConfig } from './AnimationTypes';
import { AnimationTransition, sortByPriority } from './AnimationTransition';

export class AnimationState {
  public readonly name: string;
  public readonly config: StateConfig;
  public readonly transitions: readonly AnimationTransition[];

  private timeInState = 0;

  constructor(name: string, config: StateConfig) {
    this.name = name;
    this.config = config;
    this.transitions = sortByPriority(
      (config.transitions ?? []).map((t) => new AnimationTransition(t))
    );
  }

  public get clip(): string {
    return this.config.clip;
  }

  public get loop(): boolean {
    return this.config.loop ?? true;
  }

  public enter(): void {
    this.timeInState = 0;
  }

  public update(deltaTime: number): void {
    this.timeInState += deltaTime;
  }

  public getTimeInState(): number {
    return this.timeInState;
  }

  public setTimeInState(time: number): void {
    this.timeInState = time;
  }
}
