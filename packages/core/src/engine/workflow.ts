// packages/core/src/engine/workflow.ts

import type { EngineEvent } from '../types/events.js';
import type { ExecutionDetails, Outputs, RunState } from '../types/workflow.js';
import { UNBOUNDED_CONCURRENCY } from '../utils/constants.js';
import { UnexpectedRunStateError, WorkflowError, errorMessage } from '../utils/errors.js';
import { generateWorkflowId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { AsyncSemaphore, Mutex } from './async-lock.js';
import { CancellationError, CancellationToken } from './cancellation.js';
import { buildComponents } from './components.js';
import type {
  Component,
  ComponentEntry,
  Logic,
  Subflow,
  SubflowTarget,
  Task,
  TaskGroup,
  Trigger,
} from './components.js';
import { ComponentsManager } from './components-manager.js';
import type { EventBus } from './event-bus.js';
import { ExecutionTimer } from './execution-timer.js';
import { namespaceOutputs, resolveInputs } from './inputs.js';
import { reportComponent } from './reporting.js';
import type { WorkflowReport } from './reporting.js';
import { RunStateCell } from './run-state.js';

export interface WorkflowOptions {
  name: string;
  description?: string;
  /** Initial queue. Nested arrays and false/null/undefined entries are flattened away. */
  components?: readonly ComponentEntry[];
  /** Defaults to an info-level console logger owned by this workflow. */
  logger?: Logger;
  eventBus?: EventBus;
  /** Max tasks of one parallel group in flight at once. 0 or absent means unbounded. */
  maxParallelTasks?: number;
}

const CANCELABLE_STATES: readonly RunState[] = ['not_started', 'in_progress', 'paused'];

/**
 * Runs a queue of components one at a time.
 *
 * Task and task group outputs are merged into `outputs` as
 * "<ComponentName>.<OutputKey>"; task inputs written as "{Name.Key}" read from it.
 * Logic and trigger components splice the components they return in at the
 * head of the queue. `pause`, `resume` and `cancel` may be called while `start`
 * is running; they take effect at the loop's next state check.
 */
export class Workflow implements SubflowTarget {
  readonly id = generateWorkflowId();
  readonly name: string;
  readonly description: string;
  readonly componentsManager: ComponentsManager;

  private readonly stateCell = new RunStateCell();
  private readonly timer = new ExecutionTimer();
  private readonly cancellation = new CancellationToken();
  private readonly logger: Logger;
  private readonly eventBus: EventBus | undefined;
  private readonly maxParallelTasks: number;

  private outputMap: Outputs = {};
  private runError: unknown = undefined;
  private runDetails: ExecutionDetails | undefined;
  private currentComponent: Component | undefined;

  constructor(options: WorkflowOptions) {
    this.name = options.name;
    this.description = options.description ?? '';
    this.componentsManager = new ComponentsManager(buildComponents(options.components ?? []));
    this.logger = (options.logger ?? createLogger()).child(this.name);
    this.eventBus = options.eventBus;
    this.maxParallelTasks = options.maxParallelTasks ?? UNBOUNDED_CONCURRENCY;
    if (!Number.isInteger(this.maxParallelTasks) || this.maxParallelTasks < UNBOUNDED_CONCURRENCY) {
      throw new RangeError(`maxParallelTasks must be a non-negative integer, got ${this.maxParallelTasks}`);
    }
  }

  get state(): RunState {
    return this.stateCell.get();
  }

  /** Copy of the outputs merged so far. */
  get outputs(): Outputs {
    return { ...this.outputMap };
  }

  /** The error that failed the run, if it failed. */
  get error(): unknown {
    return this.runError;
  }

  get details(): ExecutionDetails | undefined {
    return this.runDetails;
  }

  // -- Lifecycle --

  /**
   * Drain the queue. Resolves when the run completes, fails or is canceled;
   * failures are recorded on the workflow rather than thrown.
   * Only the first call on a not-started workflow runs anything.
   */
  async start(): Promise<void> {
    if (!this.stateCell.transition(['not_started'], 'in_progress')) {
      this.logger.debug(`Workflow ${this.name} already started or finished (${this.state})`);
      return;
    }

    this.timer.start();
    this.emit({
      type: 'workflow.started',
      workflowId: this.id,
      workflow: this.name,
      pending: this.componentsManager.size,
      timestamp: '',
    });

    try {
      await this.executeComponents();
      this.timer.stop();
      this.finish();
    } catch (error) {
      this.timer.stop();
      this.fail(error);
    }
  }

  pause(): boolean {
    if (!this.stateCell.transition(['in_progress'], 'paused')) {
      this.logger.debug(`Cannot pause workflow ${this.name}: it is ${this.state}`);
      return false;
    }
    this.logger.debug(`Workflow ${this.name} paused`);
    this.emit({ type: 'workflow.paused', workflowId: this.id, workflow: this.name, timestamp: '' });
    return true;
  }

  resume(): boolean {
    if (!this.stateCell.transition(['paused'], 'in_progress')) {
      this.logger.debug(`Cannot resume workflow ${this.name}: it is ${this.state}`);
      return false;
    }
    this.logger.debug(`Workflow ${this.name} resumed`);
    this.emit({ type: 'workflow.resumed', workflowId: this.id, workflow: this.name, timestamp: '' });
    return true;
  }

  /**
   * Request cancellation. The loop stops at its next state check; a component
   * already dispatched runs on, but sees `context.signal` cancelled.
   */
  cancel(): boolean {
    const previous = this.state;
    if (!this.stateCell.transition(CANCELABLE_STATES, 'canceled')) {
      this.logger.debug(`Cannot cancel workflow ${this.name}: it is ${previous}`);
      return false;
    }
    this.cancellation.cancel(`Workflow ${this.name} was canceled`);
    this.logger.debug(`Workflow ${this.name} canceled`);
    if (previous === 'not_started') {
      this.finish();
    }
    return true;
  }

  generateReport(): WorkflowReport {
    const report: WorkflowReport = {
      id: this.id,
      name: this.name,
      description: this.description,
      state: this.state,
      outputs: this.outputs,
      components: this.componentsManager.completed.map((component) => reportComponent(component)),
    };
    if (this.runDetails) report.durationMs = this.runDetails.durationMs;
    if (this.runError !== undefined) report.error = this.runError;
    return report;
  }

  // -- Run loop --

  private async executeComponents(): Promise<void> {
    let step = 0;
    try {
      while (!this.componentsManager.isEmpty) {
        await this.checkRunState();
        const component = this.componentsManager.removeFirst();
        if (!component) break;
        step++;
        this.logger.debug(`${this.name} step ${step}: ${component.name}`);
        await this.executeComponent(component, step);
        this.componentsManager.complete(component);
      }
    } catch (error) {
      if (this.state !== 'canceled') throw error;
      if (!(error instanceof CancellationError)) {
        this.logger.warn(`Ignoring error raised after cancellation: ${errorMessage(error)}`);
      }
      return;
    }

    if (this.state !== 'canceled') {
      this.stateCell.set('completed');
    }
  }

  private async checkRunState(): Promise<void> {
    for (;;) {
      const state = this.state;
      switch (state) {
        case 'in_progress':
          return;
        case 'canceled':
          this.logger.debug(`Workflow ${this.name} execution canceled`);
          throw new CancellationError(`Workflow ${this.name} was canceled`);
        case 'paused':
          this.logger.debug(`Workflow ${this.name} execution paused`);
          await this.stateCell.waitWhile('paused');
          break;
        default:
          throw new UnexpectedRunStateError(state);
      }
    }
  }

  private async executeComponent(component: Component, step: number): Promise<void> {
    this.currentComponent = component;
    this.emit({
      type: 'component.started',
      workflowId: this.id,
      componentId: component.id,
      component: component.name,
      kind: component.kind,
      step,
      timestamp: '',
    });

    const timer = new ExecutionTimer().start();
    try {
      switch (component.kind) {
        case 'task':
          await this.executeTaskComponent(component);
          break;
        case 'task_group':
          await this.executeTaskGroupComponent(component);
          break;
        case 'logic':
          await this.executeLogicComponent(component);
          break;
        case 'trigger':
          await this.executeTriggerComponent(component);
          break;
        case 'subflow':
          await this.executeSubflowComponent(component);
          break;
      }
    } catch (error) {
      if (this.state !== 'canceled') {
        this.emit({
          type: 'component.failed',
          workflowId: this.id,
          componentId: component.id,
          component: component.name,
          kind: component.kind,
          error: errorMessage(error),
          recovered: false,
          timestamp: '',
        });
      }
      throw error;
    }
    timer.stop();

    // A failed trigger was already reported as a recovered failure
    if (component.kind === 'trigger' && component.details?.state === 'failed') return;

    this.emit({
      type: 'component.completed',
      workflowId: this.id,
      componentId: component.id,
      component: component.name,
      kind: component.kind,
      state: component.details?.state ?? 'completed',
      durationMs: timer.durationMs ?? 0,
      timestamp: '',
    });
  }

  private async executeTaskComponent(task: Task): Promise<void> {
    const outputs = await this.runTask(task, this.outputMap, this.cancellation);
    this.mergeOutputs(namespaceOutputs(task.name, outputs));
  }

  private async executeTaskGroupComponent(group: TaskGroup): Promise<void> {
    this.logger.debug(`Executing task group: ${group.name} (${group.mode})`);
    const timer = new ExecutionTimer().start();
    try {
      const groupOutputs =
        group.mode === 'parallel' ? await this.runParallel(group) : await this.runSequential(group);
      timer.stop();
      group.details = timer.toDetails('completed', groupOutputs);
      this.mergeOutputs(namespaceOutputs(group.name, groupOutputs));
      this.logger.debug(`Task group ${group.name} completed in ${formatMs(timer.durationMs)}`);
    } catch (error) {
      timer.stop();
      group.details = isCancellation(error, this.cancellation)
        ? timer.toDetails('canceled', {})
        : timer.toDetails('failed', {}, error);
      throw error;
    }
  }

  /** Members run in list order; each sees the outputs of the ones before it. */
  private async runSequential(group: TaskGroup): Promise<Outputs> {
    const groupOutputs: Outputs = {};
    for (const task of group.tasks) {
      const outputs = await this.runTask(task, this.outputMap, this.cancellation);
      const namespaced = namespaceOutputs(task.name, outputs);
      Object.assign(groupOutputs, namespaced);
      this.mergeOutputs(namespaced);
    }
    return groupOutputs;
  }

  /**
   * Members run concurrently against the outputs as they were before the group.
   * The first failure cancels the group's token and members still waiting for a
   * slot are skipped; the group waits for in-flight members to settle and then
   * rethrows that first failure. A workflow cancel does not skip members: it only
   * reaches them through their signal.
   */
  private async runParallel(group: TaskGroup): Promise<Outputs> {
    const snapshot = { ...this.outputMap };
    const groupOutputs: Outputs = {};
    const failures: unknown[] = [];
    const lock = new Mutex();
    const limiter =
      this.maxParallelTasks > UNBOUNDED_CONCURRENCY ? new AsyncSemaphore(this.maxParallelTasks) : undefined;
    const { token, release } = this.cancellation.child();

    const runs = group.tasks.map(async (task) => {
      await limiter?.acquire();
      try {
        if (failures.length > 0) {
          this.logger.debug(`Skipping task ${task.name}: group ${group.name} already failed`);
          return;
        }
        const outputs = await this.runTask(task, snapshot, token);
        await lock.runExclusive(() => {
          Object.assign(groupOutputs, namespaceOutputs(task.name, outputs));
        });
      } catch (error) {
        failures.push(error);
        if (failures.length === 1) {
          this.logger.debug(`Task ${task.name} failed; canceling the rest of group ${group.name}`);
          token.cancel(`Task ${task.name} failed in group ${group.name}`);
        }
      } finally {
        limiter?.release();
      }
    });

    try {
      await Promise.all(runs);
    } finally {
      release();
    }

    if (failures.length > 0) {
      throw failures[0];
    }
    this.mergeOutputs(groupOutputs);
    return groupOutputs;
  }

  private async runTask(task: Task, source: Outputs, signal: CancellationToken): Promise<Outputs> {
    const inputs = resolveInputs(task.inputs, source);

    this.logger.debug(`Executing task: ${task.name}`);
    const timer = new ExecutionTimer().start();
    try {
      const outputs = await task.execute(inputs, { signal, workflow: this.name });
      timer.stop();
      task.details = timer.toDetails('completed', outputs);
      this.logger.debug(`Task ${task.name} completed in ${formatMs(timer.durationMs)}`);
      return outputs;
    } catch (error) {
      timer.stop();
      task.details = isCancellation(error, signal)
        ? timer.toDetails('canceled', {})
        : timer.toDetails('failed', {}, error);
      throw error;
    }
  }

  private async executeLogicComponent(logic: Logic): Promise<void> {
    const components = await logic.evaluate();
    this.insertComponents(logic.name, components);
  }

  /** Trigger failures are logged and the run continues without the trigger's components. */
  private async executeTriggerComponent(trigger: Trigger): Promise<void> {
    try {
      const components = await trigger.waitForTrigger({ signal: this.cancellation, workflow: this.name });
      this.insertComponents(trigger.name, components);
    } catch (error) {
      if (this.state === 'canceled') {
        this.logger.debug(`Trigger ${trigger.name} stopped after cancellation: ${errorMessage(error)}`);
        return;
      }
      this.logger.error(`Trigger ${trigger.name} failed: ${errorMessage(error)}`);
      this.emit({
        type: 'component.failed',
        workflowId: this.id,
        componentId: trigger.id,
        component: trigger.name,
        kind: 'trigger',
        error: errorMessage(error),
        recovered: true,
        timestamp: '',
      });
    }
  }

  /** Nested outputs keep their own prefixes and are merged whatever the nested result. */
  private async executeSubflowComponent(subflow: Subflow): Promise<void> {
    const nested = subflow.workflow;
    await nested.start();
    this.mergeOutputs(nested.outputs);
    if (nested.state === 'failed') {
      throw nested.error ?? new WorkflowError(`Subflow ${nested.name} failed`, nested.name);
    }
  }

  private insertComponents(source: string, components: readonly Component[]): void {
    if (components.length === 0) return;
    this.componentsManager.insert(components);
    this.logger.debug(`${source} inserted ${components.length} component(s)`);
    this.emit({
      type: 'components.inserted',
      workflowId: this.id,
      source,
      components: components.map((component) => component.name),
      timestamp: '',
    });
  }

  /** Last write wins. */
  private mergeOutputs(outputs: Outputs): void {
    Object.assign(this.outputMap, outputs);
  }

  // -- Completion --

  private finish(): void {
    const state = this.state;
    const durationMs = this.timer.durationMs ?? 0;
    this.runDetails = this.timer.toDetails(state, this.outputs);

    if (state === 'canceled') {
      this.logger.debug(`Workflow ${this.name} canceled after ${formatMs(durationMs)}`);
      this.emit({
        type: 'workflow.canceled',
        workflowId: this.id,
        workflow: this.name,
        durationMs,
        timestamp: '',
      });
      return;
    }

    this.logger.debug(`Workflow ${this.name} ended with state ${state} in ${formatMs(durationMs)}`);
    this.emit({
      type: 'workflow.completed',
      workflowId: this.id,
      workflow: this.name,
      outputKeys: Object.keys(this.outputMap),
      durationMs,
      timestamp: '',
    });
  }

  private fail(error: unknown): void {
    const durationMs = this.timer.durationMs ?? 0;
    this.stateCell.set('failed');
    this.runError = error;
    this.runDetails = this.timer.toDetails('failed', this.outputs, error);
    this.logger.error(`Workflow ${this.name} failed: ${errorMessage(error)}`);
    this.emit({
      type: 'workflow.failed',
      workflowId: this.id,
      workflow: this.name,
      error: errorMessage(error),
      lastComponent: this.currentComponent?.name ?? null,
      durationMs,
      timestamp: '',
    });
  }

  private emit(event: EngineEvent): void {
    this.eventBus?.emitEvent(event);
  }
}

function isCancellation(error: unknown, signal: CancellationToken): boolean {
  return error instanceof CancellationError && signal.isCancelled;
}

function formatMs(ms: number | undefined): string {
  return `${(ms ?? 0).toFixed(1)}ms`;
}
