import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { deepMerge, loadConfig, writeConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

let testDir = '';

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'taskloom-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ projectDir: testDir });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges .taskloom.yml over defaults', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), 'logLevel: debug\nreport:\n  compact: true\n', 'utf-8');
    const config = loadConfig({ projectDir: testDir });
    expect(config.logLevel).toBe('debug');
    expect(config.report.compact).toBe(true);
    // Defaults still present for unspecified fields
    expect(config.report.showOutputs).toBe(true);
    expect(config.parallel.maxConcurrency).toBe(0);
  });

  it('respects precedence: overrides > file > defaults', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), 'logLevel: debug\nparallel:\n  maxConcurrency: 4\n', 'utf-8');
    const config = loadConfig({
      projectDir: testDir,
      overrides: { logLevel: 'warn' },
    });
    expect(config.logLevel).toBe('warn');
    expect(config.parallel.maxConcurrency).toBe(4);
  });

  it('ignores the file when skipFile is set', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), 'logLevel: error\n', 'utf-8');
    expect(loadConfig({ projectDir: testDir, skipFile: true }).logLevel).toBe('info');
  });

  it('treats an empty file as no settings', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), '', 'utf-8');
    expect(loadConfig({ projectDir: testDir })).toEqual(DEFAULT_CONFIG);
  });

  it('throws ConfigError for invalid YAML', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), '{{invalid yaml', 'utf-8');
    expect(() => loadConfig({ projectDir: testDir })).toThrow(ConfigError);
    expect(() => loadConfig({ projectDir: testDir })).toThrow('Failed to parse .taskloom.yml');
  });

  it('rejects a top level that is not a mapping', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), '- one\n- two\n', 'utf-8');
    expect(() => loadConfig({ projectDir: testDir })).toThrow(
      '.taskloom.yml must contain a mapping at the top level',
    );
  });

  it('validates the merged config', () => {
    writeFileSync(join(testDir, '.taskloom.yml'), 'parallel:\n  maxConcurrency: -1\n', 'utf-8');
    expect(() => loadConfig({ projectDir: testDir })).toThrow(ConfigError);
  });

  it('does not mutate DEFAULT_CONFIG', () => {
    loadConfig({ projectDir: testDir, overrides: { report: { compact: true } } });
    expect(DEFAULT_CONFIG.report.compact).toBe(false);
  });
});

describe('writeConfig', () => {
  it('writes a file that loads back to the same config', () => {
    const config = { ...DEFAULT_CONFIG, logLevel: 'warn' as const };
    const path = writeConfig(config, testDir);
    expect(path).toBe(join(testDir, '.taskloom.yml'));
    expect(readFileSync(path, 'utf-8')).toContain('logLevel: warn');
    expect(loadConfig({ projectDir: testDir })).toEqual(config);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    const merged = deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] });
    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9] });
  });
});
