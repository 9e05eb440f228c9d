// packages/core/src/types/index.ts -- barrel re-export

export type { EngineConfig, ParallelConfig, ReportConfig } from './config.js';

export type {
  RunState,
  Outputs,
  TaskInputs,
  TaskGroupMode,
  ComponentKind,
  ExecutionDetails,
  ExecutionContext,
} from './workflow.js';

export type {
  WorkflowStartedEvent,
  WorkflowPausedEvent,
  WorkflowResumedEvent,
  WorkflowCompletedEvent,
  WorkflowCanceledEvent,
  WorkflowFailedEvent,
  ComponentStartedEvent,
  ComponentCompletedEvent,
  ComponentFailedEvent,
  ComponentsInsertedEvent,
  EngineEvent,
} from './events.js';
