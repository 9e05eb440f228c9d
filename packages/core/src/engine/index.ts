// packages/core/src/engine -- Components, run queue, execution loop and reporting

export { Workflow } from './workflow.js';
export type { WorkflowOptions } from './workflow.js';
export { Task, TaskGroup, Logic, Trigger, Subflow, buildComponents } from './components.js';
export type {
  Component,
  ComponentEntry,
  TaskOptions,
  TaskGroupOptions,
  LogicOptions,
  TriggerOptions,
  TaskExecutor,
  LogicEvaluator,
  TriggerWaiter,
  SubflowTarget,
} from './components.js';
export { task, sequential, parallel, logic, trigger, subflow } from './builders.js';
export { ComponentsManager } from './components-manager.js';
export { ExecutionTimer } from './execution-timer.js';
export { RunStateCell } from './run-state.js';
export { AsyncSemaphore, Mutex } from './async-lock.js';
export { parseReference, resolveInputs, namespaceOutputs } from './inputs.js';
export { EventBus } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
export { reportComponent, formatComponentReport, formatReport } from './reporting.js';
export type { ComponentReport, WorkflowReport, FormatOptions } from './reporting.js';
