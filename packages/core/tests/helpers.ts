// packages/core/tests/helpers.ts — Shared fixtures for engine tests

import type { Logger } from '../src/utils/logger.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending microtasks and timers up to `ms` run. */
export function flush(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SpyLogger {
  logger: Logger;
  debug: string[];
  info: string[];
  warn: string[];
  error: string[];
}

/** Logger that records messages instead of printing them. Children share the same buffers. */
export function createSpyLogger(): SpyLogger {
  const spy: Omit<SpyLogger, 'logger'> = { debug: [], info: [], warn: [], error: [] };
  const logger: Logger = {
    debug: (message) => spy.debug.push(message),
    info: (message) => spy.info.push(message),
    warn: (message) => spy.warn.push(message),
    error: (message) => spy.error.push(message),
    child: () => logger,
  };
  return { ...spy, logger };
}
