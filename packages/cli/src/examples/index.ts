// packages/cli/src/examples/index.ts — Bundled workflows runnable from the CLI

import { documentPipeline } from './document-pipeline.js';
import { temperatureMonitor } from './temperature-monitor.js';
import type { ExampleWorkflow } from './types.js';

export const EXAMPLES: readonly ExampleWorkflow[] = [documentPipeline, temperatureMonitor];

export function findExample(name: string): ExampleWorkflow | undefined {
  return EXAMPLES.find((example) => example.name === name);
}

export type { ExampleOptions, ExampleWorkflow } from './types.js';
export { createDocumentPipeline } from './document-pipeline.js';
export { createTemperatureMonitor } from './temperature-monitor.js';
