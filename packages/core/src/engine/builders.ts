// packages/core/src/engine/builders.ts — Shorthand constructors for declaring workflows

import type { TaskGroupMode } from '../types/workflow.js';
import { Logic, Subflow, Task, TaskGroup, Trigger } from './components.js';
import type { LogicEvaluator, TaskExecutor, TaskOptions, TriggerWaiter } from './components.js';
import { Workflow } from './workflow.js';
import type { WorkflowOptions } from './workflow.js';

export function task(
  name: string,
  execute: TaskExecutor,
  options: Omit<TaskOptions, 'name' | 'execute'> = {},
): Task {
  return new Task({ ...options, name, execute });
}

export function sequential(name: string, tasks: Task[], description?: string): TaskGroup {
  return group(name, 'sequential', tasks, description);
}

export function parallel(name: string, tasks: Task[], description?: string): TaskGroup {
  return group(name, 'parallel', tasks, description);
}

function group(name: string, mode: TaskGroupMode, tasks: Task[], description?: string): TaskGroup {
  return new TaskGroup({ name, mode, tasks, description });
}

export function logic(name: string, evaluate: LogicEvaluator, description?: string): Logic {
  return new Logic({ name, evaluate, description });
}

/** See {@link Trigger} on waiters that re-queue themselves. */
export function trigger(name: string, wait: TriggerWaiter, description?: string): Trigger {
  return new Trigger({ name, wait, description });
}

/** Wrap a new nested workflow built from `options`. */
export function subflow(options: WorkflowOptions): Subflow {
  return new Subflow(new Workflow(options));
}
