/**
 * AnimationStateMachine
 *
 * Rule-driven state machine. Guards are evaluated on every update, including
 * while a previous transition is still blending, and the logical state switches
 * on the same tick its guard holds. At most one transition fires per update.
 */

import type {
  StateMachineConfig,
  ParameterMap,
  StateMachineEventCallback,
  StateMachineSnapshot,
} from './AnimationTypes';
import { AnimationState } from './AnimationState';
import { AnimationTransition, evaluateTransitions } from './AnimationTransition';

export class AnimationStateMachine {
  public readonly name: string;

  // States
  private states: Map<string, AnimationState> = new Map();
  private currentState: AnimationState;
  private previousState: AnimationState | null = null;

  // Blend state
  private blendElapsed = 0;
  private blendDuration = 0;

  // Event callback
  private eventCallback: StateMachineEventCallback | null = null;

  constructor(name: string, config: StateMachineConfig) {
    this.name = name;

    for (const [stateName, stateConfig] of Object.entries(config.states)) {
      this.states.set(stateName, new AnimationState(stateName, stateConfig));
    }

    const defaultState = this.states.get(config.defaultState);
    if (!defaultState) {
      throw new Error(`[${name}] Unknown default state "${config.defaultState}"`);
    }
    for (const state of this.states.values()) {
      for (const transition of state.transitions) {
        if (!this.states.has(transition.targetState)) {
          throw new Error(
            `[${name}] Transition ${state.name}->${transition.targetState} targets an unknown state`
          );
        }
      }
    }

    this.currentState = defaultState;
    defaultState.enter();
  }

  public setEventCallback(callback: StateMachineEventCallback | null): void {
    this.eventCallback = callback;
  }

  /**
   * Advance blending, then evaluate the current state's transitions
   */
  public update(deltaTime: number, parameters: ParameterMap): void {
    if (this.previousState) {
      this.blendElapsed += deltaTime;
      if (this.blendElapsed >= this.blendDuration) {
        this.completeBlend();
      }
    }

    this.currentState.update(deltaTime);

    const transition = evaluateTransitions(this.currentState.transitions, parameters);
    if (transition) {
      this.startTransition(transition);
    }
  }

  private startTransition(transition: AnimationTransition): void {
    const targetState = this.states.get(transition.targetState);
    if (!targetState || targetState === this.currentState) return;

    const from = this.currentState;
    this.previousState = transition.blend > 0 ? from : null;
    this.blendElapsed = 0;
    this.blendDuration = transition.blend;
    this.currentState = targetState;
    targetState.enter();

    this.eventCallback?.('transition', { machine: this.name, from: from.name, to: targetState.name });
  }

  private completeBlend(): void {
    this.previousState = null;
    this.blendElapsed = 0;
    this.blendDuration = 0;
  }

  public getCurrentStateName(): string {
    return this.currentState.name;
  }

  public getCurrentClip(): string {
    return this.currentState.clip;
  }

  /** Clip of the state being blended out, if any */
  public getPreviousClip(): string | null {
    return this.previousState?.clip ?? null;
  }

  /**
   * Weight of the current state's pose; 1 once blending has finished
   */
  public getBlendWeight(): number {
    if (!this.previousState || this.blendDuration <= 0) return 1;
    return Math.min(1, this.blendElapsed / this.blendDuration);
  }

  public toSnapshot(): StateMachineSnapshot {
    return {
      current: this.currentState.name,
      previous: this.previousState?.name ?? null,
      timeInState: this.currentState.getTimeInState(),
      blendElapsed: this.blendElapsed,
      blendDuration: this.blendDuration,
    };
  }

  /**
   * Restore a position captured by {@link toSnapshot}. Unknown state names leave
   * the machine where it is.
   */
  public restore(snapshot: StateMachineSnapshot): void {
    const current = this.states.get(snapshot.current);
    if (!current) return;

    this.currentState = current;
    current.setTimeInState(snapshot.timeInState);
    this.previousState = snapshot.previous === null ? null : this.states.get(snapshot.previous) ?? null;
    this.blendElapsed = this.previousState ? snapshot.blendElapsed : 0;
    this.blendDuration = this.previousState ? snapshot.blendDuration : 0;
  }
}

/**
 * Build a parameter map holding every declared parameter at its default value
 */
export function createParameterMap(config: StateMachineConfig): ParameterMap {
  const parameters: ParameterMap = new Map();
  for (const [name, definition] of Object.entries(config.parameters)) {
    parameters.set(name, { type: definition.type, value: definition.default });
  }
  return parameters;
}

/**
 * Overwrite a parameter value, keeping its declared type
 */
export function setParameter(parameters: ParameterMap, name: string, value: number | boolean): void {
  const parameter = parameters.get(name);
  if (parameter) {
    parameter.value = value;
  } else {
    parameters.set(name, { type: typeof value === 'boolean' ? 'bool' : 'float', value });
  }
}
