// packages/core/src/utils/index.ts -- barrel re-export

export { generateWorkflowId, generateId } from './id.js';
export {
  ConfigError,
  WorkflowError,
  MissingExecutionLogicError,
  UnexpectedRunStateError,
  errorMessage,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
