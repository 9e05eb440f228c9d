// packages/core/src/engine/components.ts — The five schedulable component kinds

import type {
  ExecutionContext,
  ExecutionDetails,
  Outputs,
  RunState,
  TaskGroupMode,
  TaskInputs,
} from '../types/workflow.js';
import { MissingExecutionLogicError } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import { CancellationToken } from './cancellation.js';
import { ExecutionTimer } from './execution-timer.js';
import type { WorkflowReport } from './reporting.js';

export type TaskExecutor = (inputs: TaskInputs, context: ExecutionContext) => Promise<Outputs>;
export type LogicEvaluator = () => Promise<Component[]>;
export type TriggerWaiter = (context: ExecutionContext) => Promise<Component[]>;

export interface TaskOptions {
  name: string;
  description?: string;
  inputs?: TaskInputs;
  execute?: TaskExecutor;
}

export class Task {
  readonly kind = 'task' as const;
  readonly id = generateId('task');
  readonly name: string;
  readonly description: string;
  readonly inputs: TaskInputs;
  readonly executor: TaskExecutor | undefined;
  details: ExecutionDetails | undefined;

  constructor(options: TaskOptions) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.inputs = withoutUndefined(options.inputs ?? {});
    this.executor = options.execute;
  }

  /**
   * Run the executor. Runtime `inputs` take precedence over the declared ones;
   * undefined values are dropped before the executor sees them.
   */
  async execute(inputs: TaskInputs = {}, context?: ExecutionContext): Promise<Outputs> {
    if (!this.executor) {
      throw new MissingExecutionLogicError(this.name);
    }
    const merged = withoutUndefined({ ...this.inputs, ...inputs });
    return this.executor(merged, context ?? detachedContext(this.name));
  }
}

export interface TaskGroupOptions {
  name: string;
  description?: string;
  mode?: TaskGroupMode;
  tasks: Task[];
}

export class TaskGroup {
  readonly kind = 'task_group' as const;
  readonly id = generateId('group');
  readonly name: string;
  readonly description: string;
  readonly mode: TaskGroupMode;
  readonly tasks: readonly Task[];
  details: ExecutionDetails | undefined;

  constructor(options: TaskGroupOptions) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.mode = options.mode ?? 'sequential';
    this.tasks = [...options.tasks];
  }
}

export interface LogicOptions {
  name: string;
  description?: string;
  evaluate: LogicEvaluator;
}

/** Computes which components run next. Its result is spliced in at the head of the queue. */
export class Logic {
  readonly kind = 'logic' as const;
  readonly id = generateId('logic');
  readonly name: string;
  readonly description: string;
  private readonly evaluator: LogicEvaluator;
  details: ExecutionDetails | undefined;

  constructor(options: LogicOptions) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.evaluator = options.evaluate;
  }

  async evaluate(): Promise<Component[]> {
    const timer = new ExecutionTimer().start();
    try {
      const components = await this.evaluator();
      timer.stop();
      this.details = timer.toDetails('completed', {});
      return components;
    } catch (error) {
      timer.stop();
      this.details = timer.toDetails('failed', {}, error);
      throw error;
    }
  }
}

export interface TriggerOptions {
  name: string;
  description?: string;
  wait: TriggerWaiter;
}

/**
 * Suspends the run until its waiter returns, then splices the returned components
 * in at the head of the queue.
 *
 * A waiter that returns a new trigger polls again after the injected components
 * run. Nothing in the engine bounds this: the waiter must eventually return an
 * empty list (for example by counting firings in its closure), or the workflow
 * never drains. Long waits should watch `context.signal` so that a workflow
 * cancel releases them.
 */
export class Trigger {
  readonly kind = 'trigger' as const;
  readonly id = generateId('trigger');
  readonly name: string;
  readonly description: string;
  private readonly waiter: TriggerWaiter;
  details: ExecutionDetails | undefined;

  constructor(options: TriggerOptions) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.waiter = options.wait;
  }

  async waitForTrigger(context?: ExecutionContext): Promise<Component[]> {
    const timer = new ExecutionTimer().start();
    try {
      const components = await this.waiter(context ?? detachedContext(this.name));
      timer.stop();
      this.details = timer.toDetails('completed', {});
      return components;
    } catch (error) {
      timer.stop();
      this.details = timer.toDetails('failed', {}, error);
      throw error;
    }
  }
}

/** What a parent workflow needs from a nested one. */
export interface SubflowTarget {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly state: RunState;
  readonly outputs: Outputs;
  readonly error: unknown;
  readonly details: ExecutionDetails | undefined;
  start(): Promise<void>;
  generateReport(): WorkflowReport;
}

export class Subflow {
  readonly kind = 'subflow' as const;

  constructor(readonly workflow: SubflowTarget) {}

  get id(): string {
    return this.workflow.id;
  }

  get name(): string {
    return this.workflow.name;
  }

  get description(): string {
    return this.workflow.description;
  }

  get details(): ExecutionDetails | undefined {
    return this.workflow.details;
  }
}

export type Component = Task | TaskGroup | Logic | Trigger | Subflow;

/** Anything accepted where a list of components is declared. */
export type ComponentEntry = Component | false | null | undefined | readonly ComponentEntry[];

/**
 * Flatten a declarative component list. Nested arrays are spliced in place and
 * `false`/`null`/`undefined` entries are skipped, so conditionals and loops can
 * be written inline:
 *
 * ```ts
 * buildComponents(fetch, needsReview && review, sources.map(toTask));
 * ```
 */
export function buildComponents(...entries: ComponentEntry[]): Component[] {
  const out: Component[] = [];
  const visit = (entry: ComponentEntry): void => {
    if (entry === false || entry === null || entry === undefined) return;
    if (isEntryList(entry)) {
      for (const nested of entry) visit(nested);
      return;
    }
    out.push(entry);
  };
  for (const entry of entries) visit(entry);
  return out;
}

function isEntryList(entry: Component | readonly ComponentEntry[]): entry is readonly ComponentEntry[] {
  return Array.isArray(entry);
}

function withoutUndefined(inputs: TaskInputs): TaskInputs {
  const out: TaskInputs = {};
  for (const [key, value] of Object.entries(inputs)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Context for components run outside any workflow. Never cancelled. */
function detachedContext(name: string): ExecutionContext {
  return { signal: new CancellationToken(), workflow: name };
}
