// packages/core/src/engine/inputs.ts — Output references and key namespacing

import type { Outputs, TaskInputs } from '../types/workflow.js';
import { OUTPUT_KEY_SEPARATOR } from '../utils/constants.js';

/**
 * Extract the output key from a reference string such as "{Fetch.body}".
 * Returns undefined for anything that is not a reference.
 */
export function parseReference(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  if (value.length < 3 || !value.startsWith('{') || !value.endsWith('}')) return undefined;
  return value.slice(1, -1);
}

/**
 * Replace reference inputs with the current value of the referenced output.
 * A reference to a missing output resolves to undefined; the key is kept so it
 * overrides the declared reference when the task merges its inputs.
 */
export function resolveInputs(declared: TaskInputs, outputs: Outputs): TaskInputs {
  const resolved: TaskInputs = {};
  for (const [key, value] of Object.entries(declared)) {
    const ref = parseReference(value);
    resolved[key] = ref === undefined ? value : outputs[ref];
  }
  return resolved;
}

/** Prefix every key with "<prefix>.". */
export function namespaceOutputs(prefix: string, outputs: Outputs): Outputs {
  const namespaced: Outputs = {};
  for (const [key, value] of Object.entries(outputs)) {
    namespaced[`${prefix}${OUTPUT_KEY_SEPARATOR}${key}`] = value;
  }
  return namespaced;
}
