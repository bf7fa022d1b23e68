/**
 * Custom Error Classes
 */

import type { TaskState } from '../taskState.js';

/**
 * Base error class for all transcode-kit errors
 */
export class TranscodeKitError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TranscodeKitError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends TranscodeKitError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * A run cannot start: missing binary, empty queue, unusable output directory
 */
export class PreconditionError extends TranscodeKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_FAILED', details);
    this.name = 'PreconditionError';
  }
}

/**
 * The external tool could not be launched because the executable is gone
 */
export class BinaryNotFoundError extends TranscodeKitError {
  constructor(binary: string) {
    super(
      `Executable not found: ${binary}`,
      'BINARY_NOT_FOUND',
      { binary }
    );
    this.name = 'BinaryNotFoundError';
  }
}

/**
 * External command could not be started
 */
export class CommandExecutionError extends TranscodeKitError {
  constructor(command: string, cause: string) {
    super(
      `Failed to launch ${command}: ${cause}`,
      'COMMAND_EXECUTION_ERROR',
      { command, cause }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TranscodeKitError {
  constructor(
    taskId: string,
    fromState: TaskState,
    toState: TaskState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { taskId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}
