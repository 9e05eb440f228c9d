// packages/cli/src/examples/temperature-monitor.ts — Periodic sensor check with conditional subflows

import { Workflow, logic, subflow, task, trigger } from '@taskloom/core';
import type { Component, Subflow } from '@taskloom/core';
import type { ExampleOptions, ExampleWorkflow } from './types.js';

export interface TemperatureMonitorOptions extends ExampleOptions {
  /** Sensor readings, consumed in order. The monitor stops when they run out. */
  readings?: number[];
  /** Delay between rechecks. */
  intervalMs?: number;
  safeThreshold?: number;
}

export const DEFAULT_READINGS = [71.2, 77.9, 74.5, 80.3, 69.8, 76.1];
const DEFAULT_INTERVAL_MS = 250;
const DEFAULT_SAFE_THRESHOLD = 75;

export function createTemperatureMonitor(options: TemperatureMonitorOptions = {}): Workflow {
  const { readings = DEFAULT_READINGS, intervalMs = DEFAULT_INTERVAL_MS, safeThreshold = DEFAULT_SAFE_THRESHOLD, ...wiring } =
    options;
  const pending = [...readings];
  const history: number[] = [];
  let highCount = 0;
  let normalCount = 0;
  let rechecks = 0;

  const read = (): number | undefined => {
    const reading = pending.shift();
    if (reading !== undefined) history.push(reading);
    return reading;
  };

  const highTempSubflow = (reading: number): Subflow => {
    const n = ++highCount;
    return subflow({
      ...wiring,
      name: 'HighTempAlert',
      description: 'Alert subflow for high temperature',
      components: [
        task('SendAlert', async () => ({ [String(n)]: `Temperature ${reading} is too high!` }), {
          description: 'Send an alert for high temperature',
        }),
      ],
    });
  };

  const normalLogSubflow = (reading: number): Subflow => {
    const n = ++normalCount;
    return subflow({
      ...wiring,
      name: 'NormalLog',
      description: 'Logging subflow for normal temperature',
      components: [
        task('LogTemperature', async () => ({ [String(n)]: `Temperature ${reading} is normal.` }), {
          description: 'Log normal temperature',
        }),
      ],
    });
  };

  const route = (reading: number): Component[] =>
    reading > safeThreshold ? [highTempSubflow(reading)] : [normalLogSubflow(reading)];

  const recheck = (): Component =>
    trigger(
      `PeriodicRecheck-${rechecks}`,
      async ({ signal }) => {
        if (!(await signal.sleep(intervalMs))) return [];
        rechecks++;
        const reading = read();
        if (reading === undefined) return [];
        return [
          logic('CheckTemperature', async () => route(reading), 'Re-evaluate temperature'),
          recheck(),
        ];
      },
      `Recheck temperature every ${intervalMs}ms until the sensor runs dry`,
    );

  return new Workflow({
    ...wiring,
    name: 'TemperatureMonitor',
    description: 'Monitors temperature and raises alerts above a safe threshold',
    components: [
      task(
        'ReadTemperature',
        async () => {
          const reading = read();
          return reading === undefined ? {} : { initial_temperature: reading };
        },
        { description: 'Read the first temperature' },
      ),
      logic(
        'CheckTemperature',
        async () => {
          const reading = read();
          return reading === undefined ? [] : route(reading);
        },
        'Decide which subflow to run based on temperature',
      ),
      recheck(),
      task('AnalyzeTempHistory', async () => analyze(history, safeThreshold), {
        description: 'Summarize the readings taken',
      }),
    ],
  });
}

export function analyze(readings: readonly number[], safeThreshold: number): Record<string, unknown> {
  if (readings.length === 0) {
    return { analysis: 'No temperature data available.' };
  }
  const sorted = [...readings].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 1 ? sorted[mid] : ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
  return {
    average: readings.reduce((sum, r) => sum + r, 0) / readings.length,
    median,
    normalCount: readings.filter((r) => r <= safeThreshold).length,
    highCount: readings.filter((r) => r > safeThreshold).length,
  };
}

export const temperatureMonitor: ExampleWorkflow = {
  name: 'temperature-monitor',
  description: 'Re-queuing trigger that routes each reading to an alert or log subflow',
  create: (options) => createTemperatureMonitor(options),
};
