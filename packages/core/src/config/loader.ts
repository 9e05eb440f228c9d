// packages/core/src/config/loader.ts

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { EngineConfig } from '../types/config.js';
import { CONFIG_FILENAME } from '../utils/constants.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

export interface LoadConfigOptions {
  projectDir?: string;
  overrides?: PlainObject;
  skipFile?: boolean;
}

/**
 * Load config with precedence: overrides > .taskloom.yml > defaults.
 * The merged result is validated before it is returned.
 */
export function loadConfig(options?: LoadConfigOptions): EngineConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = { ...structuredClone(DEFAULT_CONFIG) };

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (fileConfig !== null && fileConfig !== undefined && !isPlainObject(fileConfig)) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/** Write a config to .taskloom.yml in the given directory. Returns the file path. */
export function writeConfig(config: EngineConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
  return configPath;
}

export { deepMerge };
