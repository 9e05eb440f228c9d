// packages/core/src/utils/errors.ts

import type { RunState } from '../types/workflow.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly componentName?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/** Raised when a task is dispatched without an executor. */
export class MissingExecutionLogicError extends WorkflowError {
  constructor(taskName: string) {
    super(`No execution logic provided for task: ${taskName}`, taskName);
    this.name = 'MissingExecutionLogicError';
  }
}

/** The run loop saw a state it cannot act on. Internal invariant violation. */
export class UnexpectedRunStateError extends WorkflowError {
  constructor(public readonly state: RunState) {
    super(`Workflow in unexpected state: ${state}`);
    this.name = 'UnexpectedRunStateError';
  }
}

/** Human-readable message of anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
