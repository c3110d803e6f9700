/**
 * Rule-driven state machines for actor locomotion and combat poses.
 *
 * Usage:
 * ```typescript
 * import { AnimationStateMachine, createParameterMap, setParameter } from '@/engine/animation';
 *
 * const machine = new AnimationStateMachine('Locomotion', config);
 * const parameters = createParameterMap(config);
 *
 * // Each tick:
 * setParameter(parameters, 'distance', distanceToTarget);
 * machine.update(deltaTime, parameters);
 * ```
 */

export {
  AnimationStateMachine,
  createParameterMap,
  setParameter,
} from './AnimationStateMachine';
export { AnimationState } from './AnimationState';
export {
  AnimationTransition,
  evaluateTransitions,
  sortByPriority,
} from './AnimationTransition';

export type {
  ParameterType,
  ParameterDefinition,
  ParameterValue,
  ParameterMap,
  ComparisonOperator,
  TransitionCondition,
  TransitionConfig,
  StateConfig,
  StateMachineConfig,
  StateMachineSnapshot,
  StateMachineEventCallback,
} from './AnimationTypes';
