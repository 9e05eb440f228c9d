// packages/core/src/engine/reporting.ts — Execution reports for workflows and their components

import type { ComponentKind, ExecutionDetails, Outputs, RunState } from '../types/workflow.js';
import { errorMessage } from '../utils/errors.js';
import type { Component } from './components.js';

export interface ComponentReport {
  id: string;
  name: string;
  description: string;
  type: ComponentKind;
  state: RunState;
  /** Absent until the component has run. */
  durationMs?: number;
  outputs?: Outputs;
  children?: ComponentReport[];
  error?: unknown;
}

export interface WorkflowReport {
  id: string;
  name: string;
  description: string;
  state: RunState;
  durationMs?: number;
  outputs: Outputs;
  /** Reports of completed components, in completion order. */
  components: ComponentReport[];
  error?: unknown;
}

export interface FormatOptions {
  /** Print child components as one summary line each. */
  compact?: boolean;
  showOutputs?: boolean;
}

const TYPE_LABELS: Record<ComponentKind, string> = {
  task: 'Task',
  task_group: 'TaskGroup',
  logic: 'Logic',
  trigger: 'Trigger',
  subflow: 'Subflow',
};

export function reportComponent(component: Component): ComponentReport {
  switch (component.kind) {
    case 'task_group':
      return {
        ...baseReport(component, component.details),
        children: component.tasks.map((task) => reportComponent(task)),
      };
    case 'subflow': {
      const nested = component.workflow.generateReport();
      const report: ComponentReport = {
        id: nested.id,
        name: nested.name,
        description: nested.description,
        type: 'subflow',
        state: nested.state,
        outputs: nested.outputs,
        children: nested.components,
      };
      if (nested.durationMs !== undefined) report.durationMs = nested.durationMs;
      if (nested.error !== undefined) report.error = nested.error;
      return report;
    }
    default:
      return baseReport(component, component.details);
  }
}

function baseReport(
  component: { id: string; name: string; description: string; kind: ComponentKind },
  details: ExecutionDetails | undefined,
): ComponentReport {
  const report: ComponentReport = {
    id: component.id,
    name: component.name,
    description: component.description,
    type: component.kind,
    state: details?.state ?? 'not_started',
  };
  if (details) {
    report.durationMs = details.durationMs;
    report.outputs = details.outputs;
    if (details.error !== undefined) report.error = details.error;
  }
  return report;
}

export function formatComponentReport(
  report: ComponentReport,
  options: FormatOptions = {},
  indent = '',
): string {
  const showOutputs = options.showOutputs ?? true;
  const lines = [
    `${indent}Type: ${TYPE_LABELS[report.type]}`,
    `${indent}ID: ${report.id}`,
    `${indent}Name: ${report.name}`,
    `${indent}Description: ${report.description}`,
    `${indent}State: ${report.state}`,
  ];
  if (report.durationMs !== undefined) {
    lines.push(`${indent}Duration: ${formatSeconds(report.durationMs)}`);
  }
  if (showOutputs && report.outputs && Object.keys(report.outputs).length > 0) {
    lines.push(`${indent}Outputs: ${formatOutputs(report.outputs)}`);
  }
  if (report.error !== undefined) {
    lines.push(`${indent}Error: ${errorMessage(report.error)}`);
  }
  if (report.children && report.children.length > 0) {
    lines.push(`${indent}Children:`);
    for (const child of report.children) {
      if (options.compact) {
        lines.push(`${indent}  - ${child.name} (${child.state})`);
      } else {
        lines.push(formatComponentReport(child, options, `${indent}   `));
      }
    }
  }
  return lines.join('\n');
}

export function formatReport(report: WorkflowReport, options: FormatOptions = {}): string {
  const showOutputs = options.showOutputs ?? true;
  const lines = [
    'Workflow Report:',
    `ID: ${report.id}`,
    `Name: ${report.name}`,
    `Description: ${report.description}`,
    `State: ${report.state}`,
  ];
  if (report.durationMs !== undefined) {
    lines.push(`Total Duration: ${formatSeconds(report.durationMs)}`);
  }
  if (showOutputs && Object.keys(report.outputs).length > 0) {
    lines.push(`Workflow Outputs: ${formatOutputs(report.outputs)}`);
  }
  if (report.error !== undefined) {
    lines.push(`Workflow Error: ${errorMessage(report.error)}`);
  }
  if (report.components.length > 0) {
    lines.push('Component Reports:');
    for (const component of report.components) {
      lines.push(formatComponentReport(component, options, '   '));
    }
  }
  return lines.join('\n');
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatOutputs(outputs: Outputs): string {
  try {
    return JSON.stringify(outputs);
  } catch {
    // Circular or BigInt values
    return Object.keys(outputs).join(', ');
  }
}
