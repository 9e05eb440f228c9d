// packages/core/src/engine/cancellation.ts — Cooperative cancellation for runs and task groups

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;
  private callbacks = new Set<() => void>();

  /** Signal cancellation. Idempotent; the first reason wins. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    const pending = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of pending) {
      try {
        cb();
      } catch {
        // Callback failures must not stop the remaining listeners
      }
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Throw if already cancelled. Call before starting a unit of work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.cancelReason ?? 'Operation was cancelled');
    }
  }

  /**
   * Register a callback to run on cancellation.
   * Deduplicated by reference. If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Token cancelled together with this one, but cancellable on its own.
   * `release` unlinks it from the parent once the child's work is done.
   */
  child(): { token: CancellationToken; release: () => void } {
    const token = new CancellationToken();
    const forward = () => token.cancel(this.cancelReason);
    this.onCancel(forward);
    return { token, release: () => this.offCancel(forward) };
  }

  /**
   * Resolve after `ms`, or early when cancelled.
   * Returns true if the full delay elapsed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      const onCancelHandler = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, ms);

      this.onCancel(onCancelHandler);
    });
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
