/**
 * Animation State Machine Types
 *
 * Rule-driven state machines: every transition guard is a set of conditions over
 * named parameters, recomputed by the owner each tick. Blend times only shape the
 * reported blend weight; they never delay a logical state change.
 */

// =============================================================================
// PARAMETER TYPES
// =============================================================================

export type ParameterType = 'float' | 'bool';

export interface ParameterDefinition {
  type: ParameterType;
  default: number | boolean;
}

export interface ParameterValue {
  type: ParameterType;
  value: number | boolean;
}

export type ParameterMap = Map<string, ParameterValue>;

// =============================================================================
// CONDITION TYPES
// =============================================================================

export type ComparisonOperator = '==' | '!=' | '>' | '<' | '>=' | '<=';

export interface TransitionCondition {
  param: string;
  op: ComparisonOperator;
  value: number | boolean;
}

// =============================================================================
// STATE TYPES
// =============================================================================

export interface TransitionConfig {
  /** Target state name */
  to: string;
  /** Conditions that must all be true for transition */
  conditions: TransitionCondition[];
  /** Seconds over which the target state's blend weight rises to 1 */
  blend?: number;
  /** Priority when multiple transitions are valid (higher = checked first) */
  priority?: number;
}

export interface StateConfig {
  /** Animation resource played while in this state */
  clip: string;
  /** Whether the clip loops */
  loop?: boolean;
  /** Outgoing transitions */
  transitions?: TransitionConfig[];
}

// =============================================================================
// STATE MACHINE CONFIG
// =============================================================================

export interface StateMachineConfig {
  /** State to start in */
  defaultState: string;
  /** Parameters read by transition conditions */
  parameters: Record<string, ParameterDefinition>;
  /** State definitions */
  states: Record<string, StateConfig>;
}

/** Serializable machine position; parameters are rebuilt by the owner every tick */
export interface StateMachineSnapshot {
  current: string;
  previous: string | null;
  timeInState: number;
  blendElapsed: number;
  blendDuration: number;
}

// =============================================================================
// EVENT CALLBACK
// =============================================================================

export type StateMachineEventCallback = (
  event: string,
  data?: Record<string, unknown>
) => void;
