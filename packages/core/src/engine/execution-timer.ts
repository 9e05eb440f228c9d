// packages/core/src/engine/execution-timer.ts

import type { ExecutionDetails, Outputs, RunState } from '../types/workflow.js';

/** Measures wall-clock time of one execution. */
export class ExecutionTimer {
  private startMark: number | undefined;
  private endMark: number | undefined;
  private startDate: Date | undefined;
  private endDate: Date | undefined;

  /** Start (or restart) the timer. Returns this for chaining. */
  start(): this {
    this.startMark = performance.now();
    this.startDate = new Date();
    this.endMark = undefined;
    this.endDate = undefined;
    return this;
  }

  stop(): void {
    this.endMark = performance.now();
    this.endDate = new Date();
  }

  reset(): void {
    this.startMark = undefined;
    this.endMark = undefined;
    this.startDate = undefined;
    this.endDate = undefined;
  }

  /** Elapsed milliseconds, or undefined until the timer was both started and stopped. */
  get durationMs(): number | undefined {
    if (this.startMark === undefined || this.endMark === undefined) return undefined;
    return this.endMark - this.startMark;
  }

  get startedAt(): string | null {
    return this.startDate?.toISOString() ?? null;
  }

  get endedAt(): string | null {
    return this.endDate?.toISOString() ?? null;
  }

  /** Snapshot this timer into execution details. */
  toDetails(state: RunState, outputs: Outputs, error?: unknown): ExecutionDetails {
    const details: ExecutionDetails = {
      state,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      durationMs: this.durationMs ?? 0,
      outputs,
    };
    if (error !== undefined) details.error = error;
    return details;
  }
}
