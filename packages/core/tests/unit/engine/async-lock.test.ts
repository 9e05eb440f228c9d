import { describe, expect, it } from 'vitest';
import { AsyncSemaphore, Mutex } from '../../../src/engine/async-lock.js';
import { deferred, flush } from '../../helpers.js';

describe('AsyncSemaphore', () => {
  it('rejects sizes below one', () => {
    expect(() => new AsyncSemaphore(0)).toThrow(RangeError);
    expect(() => new AsyncSemaphore(1.5)).toThrow('Semaphore size must be a positive integer, got 1.5');
  });

  it('holds waiters until a slot is released, first come first served', async () => {
    const semaphore = new AsyncSemaphore(1);
    const order: string[] = [];
    await semaphore.acquire();

    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    await flush();
    expect(order).toEqual([]);
    expect(semaphore.inFlight).toBe(1);

    semaphore.release();
    await first;
    expect(order).toEqual(['first']);
    semaphore.release();
    await second;
    expect(order).toEqual(['first', 'second']);
  });
});

describe('Mutex', () => {
  it('runs critical sections one at a time', async () => {
    const mutex = new Mutex();
    const gate = deferred();
    const order: string[] = [];

    const a = mutex.runExclusive(async () => {
      order.push('a:start');
      await gate.promise;
      order.push('a:end');
    });
    const b = mutex.runExclusive(() => {
      order.push('b');
      return 'done';
    });

    await flush();
    expect(order).toEqual(['a:start']);
    gate.resolve();
    await a;
    await expect(b).resolves.toBe('done');
    expect(order).toEqual(['a:start', 'a:end', 'b']);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 1)).resolves.toBe(1);
  });
});
