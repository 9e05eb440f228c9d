// @taskloom/core - Workflow orchestration engine

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  EngineConfig,
  ParallelConfig,
  ReportConfig,
  // Workflow
  RunState,
  Outputs,
  TaskInputs,
  TaskGroupMode,
  ComponentKind,
  ExecutionDetails,
  ExecutionContext,
  // Events
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
} from './types/index.js';

// Utilities
export {
  generateWorkflowId,
  generateId,
  ConfigError,
  WorkflowError,
  MissingExecutionLogicError,
  UnexpectedRunStateError,
  errorMessage,
  createLogger,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export { CONFIG_FILENAME } from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  engineConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
} from './config/index.js';
export type { EngineConfigInput, LoadConfigOptions } from './config/index.js';

// Engine
export {
  Workflow,
  Task,
  TaskGroup,
  Logic,
  Trigger,
  Subflow,
  buildComponents,
  task,
  sequential,
  parallel,
  logic,
  trigger,
  subflow,
  ComponentsManager,
  ExecutionTimer,
  RunStateCell,
  AsyncSemaphore,
  Mutex,
  parseReference,
  resolveInputs,
  namespaceOutputs,
  EventBus,
  CancellationToken,
  CancellationError,
  reportComponent,
  formatComponentReport,
  formatReport,
} from './engine/index.js';
export type {
  WorkflowOptions,
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
  ComponentReport,
  WorkflowReport,
  FormatOptions,
} from './engine/index.js';
