/**
 * Task State Machine
 * 
 * Lifecycle of one queued file (or one merge group).
 * 
 * State Flow:
 * IDLE → RUNNING → COMPLETED
 *              ↘ FAILED | CANCELLED
 * IDLE → FAILED     (input vanished before launch)
 * IDLE → CANCELLED  (run stopped before the task started)
 */

import { StateTransitionError } from './errors/index.js';

export const TASK_STATES = ['IDLE', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export type TaskState = (typeof TASK_STATES)[number];

export interface TaskStateTransition {
  from: TaskState;
  to: TaskState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<TaskState, ReadonlySet<TaskState>> = {
  IDLE: new Set<TaskState>(['RUNNING', 'FAILED', 'CANCELLED']),
  RUNNING: new Set<TaskState>(['COMPLETED', 'FAILED', 'CANCELLED']),
  COMPLETED: new Set<TaskState>(),
  FAILED: new Set<TaskState>(),
  CANCELLED: new Set<TaskState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return validTransitions[from].has(to);
}

export class TaskStateMachine {
  private currentState: TaskState;
  private readonly history: TaskStateTransition[] = [];
  private readonly taskId: string;

  constructor(taskId: string, initialState: TaskState = 'IDLE') {
    this.taskId = taskId;
    this.currentState = initialState;
  }

  getState(): TaskState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<TaskStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: TaskState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: TaskState, reason?: string): TaskStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.taskId, this.currentState, targetState);
    }

    const transition: TaskStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return validTransitions[this.currentState].size === 0;
  }
}
