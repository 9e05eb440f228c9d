// packages/cli/src/render.ts — Terminal rendering for engine events and reports

import { formatReport } from '@taskloom/core';
import type { EngineEvent, FormatOptions, RunState, WorkflowReport } from '@taskloom/core';
import chalk from 'chalk';

const stateColors: Record<RunState, (text: string) => string> = {
  not_started: chalk.gray,
  in_progress: chalk.cyan,
  paused: chalk.yellow,
  canceled: chalk.yellow,
  completed: chalk.green,
  failed: chalk.red,
};

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** One line (or block) per engine event. */
export function formatEvent(event: EngineEvent): string {
  switch (event.type) {
    case 'workflow.started':
      return chalk.gray(`━━━ ${event.workflow} started (${event.pending} queued) ━━━`);
    case 'workflow.paused':
      return chalk.yellow(`⏸ ${event.workflow} paused`);
    case 'workflow.resumed':
      return chalk.yellow(`▶ ${event.workflow} resumed`);
    case 'workflow.completed':
      return chalk.green(`━━━ ${event.workflow} completed in ${seconds(event.durationMs)} ━━━`);
    case 'workflow.canceled':
      return chalk.yellow(`━━━ ${event.workflow} canceled after ${seconds(event.durationMs)} ━━━`);
    case 'workflow.failed':
      return chalk.red(
        `━━━ ${event.workflow} failed ━━━\n  Error: ${event.error}\n  Last component: ${event.lastComponent ?? 'none'}`,
      );
    case 'component.started':
      return chalk.cyan(`▶ ${event.step}. [${event.kind}] ${event.component}`);
    case 'component.completed':
      return stateColors[event.state](`  ✓ ${event.component} ${event.state} (${seconds(event.durationMs)})`);
    case 'component.failed':
      return event.recovered
        ? chalk.yellow(`  ! ${event.component}: ${event.error} (continuing)`)
        : chalk.red(`  ✗ ${event.component}: ${event.error}`);
    case 'components.inserted':
      return chalk.gray(`  + ${event.source} queued ${event.components.join(', ')}`);
  }
}

export function renderEvent(event: EngineEvent): void {
  console.log(formatEvent(event));
}

/**
 * Print the final report followed by a colored status line.
 */
export function printReport(report: WorkflowReport, options: FormatOptions): void {
  console.log('');
  console.log(formatReport(report, options));
  console.log('');
  console.log(stateColors[report.state](`Result: ${report.state}`));
}
