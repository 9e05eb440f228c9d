// packages/core/src/config/defaults.ts

import type { EngineConfig } from '../types/config.js';
import { UNBOUNDED_CONCURRENCY } from '../utils/constants.js';

export const DEFAULT_CONFIG: EngineConfig = {
  logLevel: 'info',
  parallel: {
    maxConcurrency: UNBOUNDED_CONCURRENCY,
  },
  report: {
    compact: false,
    showOutputs: true,
  },
};
