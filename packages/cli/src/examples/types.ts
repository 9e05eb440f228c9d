// packages/cli/src/examples/types.ts

import type { Workflow, WorkflowOptions } from '@taskloom/core';

/** Host wiring handed to every example: logger, event bus and parallel limit. */
export type ExampleOptions = Omit<WorkflowOptions, 'name' | 'description' | 'components'>;

export interface ExampleWorkflow {
  name: string;
  description: string;
  create(options: ExampleOptions): Workflow;
}
