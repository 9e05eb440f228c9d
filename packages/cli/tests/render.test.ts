import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { formatEvent, printReport } from '../src/render.js';

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatEvent', () => {
  it('formats component lifecycle events', () => {
    expect(
      formatEvent({
        type: 'component.started',
        workflowId: 'wf_1',
        componentId: 'task_1',
        component: 'Fetch',
        kind: 'task',
        step: 3,
        timestamp: '',
      }),
    ).toBe('▶ 3. [task] Fetch');

    expect(
      formatEvent({
        type: 'component.completed',
        workflowId: 'wf_1',
        componentId: 'task_1',
        component: 'Fetch',
        kind: 'task',
        state: 'completed',
        durationMs: 1500,
        timestamp: '',
      }),
    ).toBe('  ✓ Fetch completed (1.50s)');
  });

  it('marks recovered failures as continuing', () => {
    const base = {
      type: 'component.failed' as const,
      workflowId: 'wf_1',
      componentId: 'trigger_1',
      component: 'Sensor',
      kind: 'trigger' as const,
      error: 'offline',
      timestamp: '',
    };
    expect(formatEvent({ ...base, recovered: true })).toBe('  ! Sensor: offline (continuing)');
    expect(formatEvent({ ...base, recovered: false })).toBe('  ✗ Sensor: offline');
  });

  it('names the last component of a failed workflow', () => {
    expect(
      formatEvent({
        type: 'workflow.failed',
        workflowId: 'wf_1',
        workflow: 'Demo',
        error: 'boom',
        lastComponent: null,
        durationMs: 0,
        timestamp: '',
      }),
    ).toBe('━━━ Demo failed ━━━\n  Error: boom\n  Last component: none');
  });

  it('lists inserted components', () => {
    expect(
      formatEvent({
        type: 'components.inserted',
        workflowId: 'wf_1',
        source: 'Route',
        components: ['X', 'Y'],
        timestamp: '',
      }),
    ).toBe('  + Route queued X, Y');
  });
});

describe('printReport', () => {
  it('prints the report and the result line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printReport(
      { id: 'wf_1', name: 'Demo', description: '', state: 'canceled', outputs: {}, components: [] },
      { compact: true },
    );
    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '',
      ['Workflow Report:', 'ID: wf_1', 'Name: Demo', 'Description: ', 'State: canceled'].join('\n'),
      '',
      'Result: canceled',
    ]);
  });
});
