import { describe, expect, it, vi } from 'vitest';
import { RunStateCell } from '../../../src/engine/run-state.js';

describe('RunStateCell', () => {
  it('starts not_started', () => {
    expect(new RunStateCell().get()).toBe('not_started');
  });

  it('announces changes with the previous state', () => {
    const cell = new RunStateCell();
    const listener = vi.fn();
    cell.on('change', listener);
    cell.set('in_progress');
    expect(listener).toHaveBeenCalledWith('in_progress', 'not_started');
  });

  it('does not announce a write of the current state', () => {
    const cell = new RunStateCell('paused');
    const listener = vi.fn();
    cell.on('change', listener);
    cell.set('paused');
    expect(listener).not.toHaveBeenCalled();
  });

  it('transition applies only from an allowed state', () => {
    const cell = new RunStateCell('completed');
    expect(cell.transition(['in_progress', 'paused'], 'canceled')).toBe(false);
    expect(cell.get()).toBe('completed');

    const running = new RunStateCell('paused');
    expect(running.transition(['in_progress', 'paused'], 'canceled')).toBe(true);
    expect(running.get()).toBe('canceled');
  });

  it('waitWhile resolves immediately when the state already differs', async () => {
    await expect(new RunStateCell('in_progress').waitWhile('paused')).resolves.toBe('in_progress');
  });

  it('waitWhile resolves on the transition out of the state', async () => {
    const cell = new RunStateCell('paused');
    const waiting = cell.waitWhile('paused');
    cell.set('canceled');
    await expect(waiting).resolves.toBe('canceled');
    expect(cell.listenerCount('change')).toBe(0);
  });
});
