// packages/cli/src/commands/run.ts

import { EventBus, WorkflowError, createLogger, errorMessage, loadConfig } from '@taskloom/core';
import type { EngineConfig, EngineEvent, RunState, WorkflowReport } from '@taskloom/core';
import chalk from 'chalk';

import { EXAMPLES, findExample } from '../examples/index.js';
import { printReport, renderEvent } from '../render.js';

export interface RunOptions {
  compact?: boolean;
  hideOutputs?: boolean;
  cancelAfter?: number;
  verbose?: boolean;
}

export interface RunResult {
  state: RunState;
  report: WorkflowReport;
  /** True when --cancel-after fired before the run ended. */
  canceledByTimer: boolean;
}

/** Run a bundled workflow to the end and return its report. */
export async function runWorkflow(
  name: string,
  options: RunOptions,
  config: EngineConfig,
  onEvent: (event: EngineEvent) => void = renderEvent,
): Promise<RunResult> {
  const example = findExample(name);
  if (!example) {
    const known = EXAMPLES.map((e) => e.name).join(', ');
    throw new WorkflowError(`Unknown workflow "${name}". Available: ${known}`);
  }

  const logger = createLogger(options.verbose ? 'debug' : config.logLevel, 'taskloom');
  const eventBus = new EventBus();
  eventBus.on('event', onEvent);

  const workflow = example.create({
    logger,
    eventBus,
    maxParallelTasks: config.parallel.maxConcurrency,
  });

  let canceledByTimer = false;
  const timer =
    options.cancelAfter === undefined
      ? undefined
      : setTimeout(() => {
          canceledByTimer = workflow.cancel();
        }, options.cancelAfter);

  try {
    await workflow.start();
  } finally {
    clearTimeout(timer);
    eventBus.removeAllListeners();
  }

  return { state: workflow.state, report: workflow.generateReport(), canceledByTimer };
}

export async function runCommand(name: string, options: RunOptions): Promise<void> {
  try {
    const config = loadConfig();
    const result = await runWorkflow(name, options, config);

    if (result.canceledByTimer) {
      console.error(chalk.yellow(`Canceled after ${options.cancelAfter}ms (--cancel-after)`));
    }
    printReport(result.report, {
      compact: options.compact || config.report.compact,
      showOutputs: options.hideOutputs ? false : config.report.showOutputs,
    });

    process.exit(result.state === 'failed' ? 2 : 0);
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
