import { describe, it, expect, vi } from 'vitest';
import {
  AnimationStateMachine,
  type StateMachineConfig,
  createParameterMap,
  setParameter,
} from '@/engine/animation';
import { COMBAT_MACHINE, LOCOMOTION_MACHINE } from '@/engine/actors/botStateMachines';

function locomotion() {
  const machine = new AnimationStateMachine('Locomotion', LOCOMOTION_MACHINE);
  const parameters = createParameterMap(LOCOMOTION_MACHINE);
  return { machine, parameters };
}

describe('AnimationStateMachine', () => {
  it('starts in the default state with full weight', () => {
    const { machine } = locomotion();

    expect(machine.getCurrentStateName()).toBe('Idle');
    expect(machine.getCurrentClip()).toBe('idle');
    expect(machine.getBlendWeight()).toBe(1);
    expect(machine.getPreviousClip()).toBeNull();
  });

  it('switches state on the tick the guard holds and blends the pose', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'distance', 5);

    machine.update(0.1, parameters);

    expect(machine.getCurrentStateName()).toBe('Walk');
    expect(machine.getPreviousClip()).toBe('idle');
    expect(machine.getBlendWeight()).toBe(0);

    machine.update(0.15, parameters);
    expect(machine.getBlendWeight()).toBeCloseTo(0.5, 10);

    machine.update(0.15, parameters);
    expect(machine.getPreviousClip()).toBeNull();
    expect(machine.getBlendWeight()).toBe(1);
  });

  it('evaluates guards while still blending', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'distance', 5);
    machine.update(0.01, parameters);
    expect(machine.getCurrentStateName()).toBe('Walk');

    setParameter(parameters, 'distance', 1);
    machine.update(0.01, parameters);

    expect(machine.getCurrentStateName()).toBe('Idle');
    expect(machine.getPreviousClip()).toBe('walk');
  });

  it('prefers the jump over walking when both guards hold', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'distance', 5);
    setParameter(parameters, 'verticalDirection', 0.8);
    setParameter(parameters, 'grounded', true);

    machine.update(0.1, parameters);

    expect(machine.getCurrentStateName()).toBe('Jump');
  });

  it('does not jump while airborne', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'verticalDirection', 0.8);
    setParameter(parameters, 'grounded', false);

    machine.update(0.1, parameters);

    expect(machine.getCurrentStateName()).toBe('Idle');
  });

  it('goes jump, falling, idle as contact is lost and regained', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'verticalDirection', 0.5);
    machine.update(0.1, parameters);
    expect(machine.getCurrentStateName()).toBe('Jump');

    setParameter(parameters, 'grounded', false);
    machine.update(0.1, parameters);
    expect(machine.getCurrentStateName()).toBe('Falling');

    setParameter(parameters, 'grounded', true);
    setParameter(parameters, 'verticalDirection', 0);
    machine.update(0.1, parameters);
    expect(machine.getCurrentStateName()).toBe('Idle');
  });

  it('drives the combat pose from distance alone', () => {
    const machine = new AnimationStateMachine('Combat', COMBAT_MACHINE);
    const parameters = createParameterMap(COMBAT_MACHINE);

    setParameter(parameters, 'distance', 1);
    machine.update(0.1, parameters);
    expect(machine.getCurrentStateName()).toBe('Whip');

    setParameter(parameters, 'distance', 2.5);
    machine.update(0.1, parameters);
    expect(machine.getCurrentStateName()).toBe('Aim');
  });

  it('reports transitions to the event callback', () => {
    const { machine, parameters } = locomotion();
    const callback = vi.fn();
    machine.setEventCallback(callback);
    setParameter(parameters, 'distance', 3);

    machine.update(0.1, parameters);

    expect(callback).toHaveBeenCalledWith('transition', { machine: 'Locomotion', from: 'Idle', to: 'Walk' });
  });

  it('restores a captured position', () => {
    const { machine, parameters } = locomotion();
    setParameter(parameters, 'distance', 3);
    machine.update(0.1, parameters);
    machine.update(0.06, parameters);

    const restored = new AnimationStateMachine('Locomotion', LOCOMOTION_MACHINE);
    restored.restore(structuredClone(machine.toSnapshot()));

    expect(restored.getCurrentStateName()).toBe('Walk');
    expect(restored.getPreviousClip()).toBe('idle');
    expect(restored.getBlendWeight()).toBeCloseTo(0.2, 10);
  });

  it('rejects transitions to unknown states', () => {
    const config: StateMachineConfig = {
      defaultState: 'A',
      parameters: {},
      states: { A: { clip: 'a', transitions: [{ to: 'B', conditions: [] }] } },
    };

    expect(() => new AnimationStateMachine('Broken', config)).toThrow(
      '[Broken] Transition A->B targets an unknown state'
    );
  });
});
