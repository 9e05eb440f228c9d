// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface ParallelConfig {
  /** Max tasks of one parallel group in flight at once. 0 means unbounded. */
  maxConcurrency: number;
}

export interface ReportConfig {
  compact: boolean;
  showOutputs: boolean;
}

export interface EngineConfig {
  logLevel: LogLevel;
  parallel: ParallelConfig;
  report: ReportConfig;
}
