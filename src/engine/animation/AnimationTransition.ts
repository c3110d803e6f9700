/**
 * AnimationTransition
 *
 * Evaluates transition conditions against the current parameter values.
 */

import type {
  TransitionConfig,
  TransitionCondition,
  ParameterMap,
  ComparisonOperator,
} from './AnimationTypes';

export class AnimationTransition {
  public readonly config: TransitionConfig;
  public readonly targetState: string;

  constructor(config: TransitionConfig) {
    this.config = config;
    this.targetState = config.to;
  }

  /**
   * Blend time for the target state
   */
  public get blend(): number {
    return this.config.blend ?? 0.2;
  }

  /**
   * Get priority (higher = checked first)
   */
  public get priority(): number {
    return this.config.priority ?? 0;
  }

  /**
   * Evaluate if this transition should fire
   */
  public evaluate(parameters: ParameterMap): boolean {
    // Check all conditions (AND logic)
    for (const condition of this.config.conditions) {
      if (!this.evaluateCondition(condition, parameters)) {
        return false;
      }
    }

    return true;
  }

  private evaluateCondition(
    condition: TransitionCondition,
    parameters: ParameterMap
  ): boolean {
    const param = parameters.get(condition.param);
    if (!param) {
      // Parameter doesn't exist - condition fails
      return false;
    }

    return compare(param.value, condition.op, condition.value);
  }
}

function compare(
  left: number | boolean,
  op: ComparisonOperator,
  right: number | boolean
): boolean {
  // Convert booleans to numbers for comparison
  const l = typeof left === 'boolean' ? (left ? 1 : 0) : left;
  const r = typeof right === 'boolean' ? (right ? 1 : 0) : right;

  switch (op) {
    case '==':
      return l === r;
    case '!=':
      return l !== r;
    case '>':
      return l > r;
    case '<':
      return l < r;
    case '>=':
      return l >= r;
    case '<=':
      return l <= r;
  }
}

/**
 * Sort transitions so that higher priorities are checked first. Ties keep
 * declaration order.
 */
export function sortByPriority(transitions: AnimationTransition[]): AnimationTransition[] {
  return [...transitions].sort((a, b) => b.priority - a.priority);
}

/**
 * Return the first valid transition of a priority-sorted list
 */
export function evaluateTransitions(
  sortedTransitions: readonly AnimationTransition[],
  parameters: ParameterMap
): AnimationTransition | null {
  for (const transition of sortedTransitions) {
    if (transition.evaluate(parameters)) {
      return transition;
    }
  }

  return null;
}
