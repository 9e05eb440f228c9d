// packages/cli/src/examples/values.ts — Narrowing helpers for task inputs

import { WorkflowError } from '@taskloom/core';

export function asString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new WorkflowError(`Expected "${field}" to be a string, got ${typeof value}`, field);
  }
  return value;
}

export function asNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new WorkflowError(`Expected "${field}" to be a number, got ${typeof value}`, field);
  }
  return value;
}

export function asStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new WorkflowError(`Expected "${field}" to be a list of strings`, field);
  }
  return value;
}
