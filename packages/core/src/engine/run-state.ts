// packages/core/src/engine/run-state.ts — Single-owner holder of a workflow's run state

import { EventEmitter } from 'eventemitter3';
import type { RunState } from '../types/workflow.js';

interface RunStateEvents {
  change: (next: RunState, previous: RunState) => void;
}

/**
 * All reads and writes of a workflow's state go through this cell.
 * Writers announce every change, so waiters wake on the transition itself
 * instead of re-checking on a timer.
 */
export class RunStateCell extends EventEmitter<RunStateEvents> {
  private current: RunState;

  constructor(initial: RunState = 'not_started') {
    super();
    this.current = initial;
  }

  get(): RunState {
    return this.current;
  }

  set(next: RunState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.emit('change', next, previous);
  }

  /** Compare-and-set. Applies `next` only when the current state is one of `from`. */
  transition(from: readonly RunState[], next: RunState): boolean {
    if (!from.includes(this.current)) return false;
    this.set(next);
    return true;
  }

  /** Resolve with the new state once the cell no longer holds `state`. */
  waitWhile(state: RunState): Promise<RunState> {
    if (this.current !== state) return Promise.resolve(this.current);
    return new Promise((resolve) => {
      const onChange = (next: RunState) => {
        if (next === state) return;
        this.off('change', onChange);
        resolve(next);
      };
      this.on('change', onChange);
    });
  }
}
