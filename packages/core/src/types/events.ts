// packages/core/src/types/events.ts

import type { ComponentKind, RunState } from './workflow.js';

// -- Workflow lifecycle events --
export interface WorkflowStartedEvent {
  type: 'workflow.started';
  workflowId: string;
  workflow: string;
  pending: number;
  timestamp: string;
}

export interface WorkflowPausedEvent {
  type: 'workflow.paused';
  workflowId: string;
  workflow: string;
  timestamp: string;
}

export interface WorkflowResumedEvent {
  type: 'workflow.resumed';
  workflowId: string;
  workflow: string;
  timestamp: string;
}

export interface WorkflowCompletedEvent {
  type: 'workflow.completed';
  workflowId: string;
  workflow: string;
  outputKeys: string[];
  durationMs: number;
  timestamp: string;
}

export interface WorkflowCanceledEvent {
  type: 'workflow.canceled';
  workflowId: string;
  workflow: string;
  durationMs: number;
  timestamp: string;
}

export interface WorkflowFailedEvent {
  type: 'workflow.failed';
  workflowId: string;
  workflow: string;
  error: string;
  lastComponent: string | null;
  durationMs: number;
  timestamp: string;
}

// -- Component events --
export interface ComponentStartedEvent {
  type: 'component.started';
  workflowId: string;
  componentId: string;
  component: string;
  kind: ComponentKind;
  step: number;
  timestamp: string;
}

export interface ComponentCompletedEvent {
  type: 'component.completed';
  workflowId: string;
  componentId: string;
  component: string;
  kind: ComponentKind;
  state: RunState;
  durationMs: number;
  timestamp: string;
}

export interface ComponentFailedEvent {
  type: 'component.failed';
  workflowId: string;
  componentId: string;
  component: string;
  kind: ComponentKind;
  error: string;
  /** True when the run continues anyway (trigger failures). */
  recovered: boolean;
  timestamp: string;
}

export interface ComponentsInsertedEvent {
  type: 'components.inserted';
  workflowId: string;
  source: string;
  components: string[];
  timestamp: string;
}

// -- Union type --
export type EngineEvent =
  | WorkflowStartedEvent
  | WorkflowPausedEvent
  | WorkflowResumedEvent
  | WorkflowCompletedEvent
  | WorkflowCanceledEvent
  | WorkflowFailedEvent
  | ComponentStartedEvent
  | ComponentCompletedEvent
  | ComponentFailedEvent
  | ComponentsInsertedEvent;
