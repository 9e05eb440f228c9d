// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { EngineConfig } from '../types/config.js';
import { UNBOUNDED_CONCURRENCY } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const parallelConfigSchema = z.object({
  maxConcurrency: z.number().int().nonnegative().default(UNBOUNDED_CONCURRENCY),
});

const reportConfigSchema = z.object({
  compact: z.boolean().default(false),
  showOutputs: z.boolean().default(true),
});

export const engineConfigSchema = z
  .object({
    logLevel: logLevelSchema.default('info'),
    parallel: parallelConfigSchema.default({}),
    report: reportConfigSchema.default({}),
  })
  .strict();

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input,
 * naming the first offending field.
 */
export function validateConfig(config: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field || undefined);
  }
  return result.data;
}
