// packages/core/src/types/workflow.ts

import type { CancellationToken } from '../engine/cancellation.js';

/**
 * Run-level state machine value shared by workflows and the components they execute.
 *
 * not_started → in_progress → completed | failed | canceled, with
 * in_progress ⇄ paused. canceled is terminal.
 */
export type RunState =
  | 'not_started'
  | 'in_progress'
  | 'paused'
  | 'canceled'
  | 'completed'
  | 'failed';

/** Opaque key/value map routed between components. */
export type Outputs = Record<string, unknown>;

/** Declared task inputs. String values of the form "{Name.Key}" are references. */
export type TaskInputs = Record<string, unknown>;

export type TaskGroupMode = 'sequential' | 'parallel';

export type ComponentKind = 'task' | 'task_group' | 'logic' | 'trigger' | 'subflow';

export interface ExecutionDetails {
  state: RunState;
  startedAt: string | null;
  endedAt: string | null;
  durationMs: number;
  outputs: Outputs;
  error?: unknown;
}

/**
 * Handed to task executors and trigger waiters. `signal` is cancelled when the
 * workflow is canceled or, inside a parallel group, when a sibling task fails.
 */
export interface ExecutionContext {
  signal: CancellationToken;
  workflow: string;
}
