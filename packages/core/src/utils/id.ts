// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a workflow ID with "wf_" prefix. */
export function generateWorkflowId(): string {
  return `wf_${nanoid(21)}`;
}

/** Generate a generic unique ID. */
export function generateId(prefix?: string): string {
  const id = nanoid(16);
  return prefix ? `${prefix}_${id}` : id;
}
