import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { engineConfigSchema, validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('engineConfigSchema', () => {
  it('validates the default config', () => {
    expect(engineConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('applies defaults for missing fields', () => {
    const result = engineConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual(DEFAULT_CONFIG);
    }
  });

  it('rejects an unknown log level', () => {
    expect(engineConfigSchema.safeParse({ logLevel: 'loud' }).success).toBe(false);
  });

  it('rejects fractional concurrency', () => {
    expect(engineConfigSchema.safeParse({ parallel: { maxConcurrency: 1.5 } }).success).toBe(false);
  });

  it('rejects unknown top-level keys', () => {
    expect(engineConfigSchema.safeParse({ mode: 'fast' }).success).toBe(false);
  });
});

describe('validateConfig', () => {
  it('returns the parsed config', () => {
    expect(validateConfig({ report: { compact: true } }).report).toEqual({ compact: true, showOutputs: true });
  });

  it('names the first offending field', () => {
    try {
      validateConfig({ parallel: { maxConcurrency: -2 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.field).toBe('parallel.maxConcurrency');
      expect(err instanceof ConfigError && err.message.startsWith('Invalid configuration: parallel.maxConcurrency:')).toBe(
        true,
      );
    }
  });
});
