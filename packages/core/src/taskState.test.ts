/**
 * Task State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import { StateTransitionError } from './errors/index.js';
import { TaskStateMachine, isValidTransition } from './taskState.js';

describe('TaskStateMachine', () => {
  it('should record the happy path', () => {
    const machine = new TaskStateMachine('/in/a.mp4');
    machine.transitionTo('RUNNING');
    machine.transitionTo('COMPLETED', 'exit 0');

    expect(machine.getState()).toBe('COMPLETED');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map((t) => [t.from, t.to, t.reason])).toEqual([
      ['IDLE', 'RUNNING', undefined],
      ['RUNNING', 'COMPLETED', 'exit 0'],
    ]);
  });

  it('should allow failing or cancelling a task that never started', () => {
    expect(isValidTransition('IDLE', 'FAILED')).toBe(true);
    expect(isValidTransition('IDLE', 'CANCELLED')).toBe(true);
    expect(isValidTransition('IDLE', 'COMPLETED')).toBe(false);
  });

  it('should reject leaving a terminal state', () => {
    const machine = new TaskStateMachine('/in/a.mp4');
    machine.transitionTo('CANCELLED');

    expect(machine.canTransitionTo('RUNNING')).toBe(false);
    expect(() => machine.transitionTo('RUNNING')).toThrow(StateTransitionError);
  });
});
