// packages/core/src/engine/components-manager.ts

import type { Component } from './components.js';

/**
 * Pending queue and completed log of one workflow run.
 *
 * Components are taken from the front. Components produced while the run is in
 * progress are inserted at the front as well, so they execute before anything
 * that was already queued (depth-first expansion).
 *
 * Only the workflow's own run loop touches an instance; it is not guarded.
 */
export class ComponentsManager {
  private queue: Component[];
  private done: Component[] = [];

  constructor(initialComponents: readonly Component[] = []) {
    this.queue = [...initialComponents];
  }

  /** Components not yet executed, head first. */
  get pending(): readonly Component[] {
    return this.queue;
  }

  /** Components executed so far, in completion order. */
  get completed(): readonly Component[] {
    return this.done;
  }

  get size(): number {
    return this.queue.length;
  }

  get isEmpty(): boolean {
    return this.queue.length === 0;
  }

  removeFirst(): Component | undefined {
    return this.queue.shift();
  }

  /** Prepend components, keeping their relative order. */
  insert(components: readonly Component[]): void {
    this.queue.unshift(...components);
  }

  complete(component: Component): void {
    this.done.push(component);
  }
}
