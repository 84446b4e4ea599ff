/**
 * SerialExecutor and CancellationToken Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SerialExecutor } from '../../src/main/transcription/SerialExecutor.js';
import { CancellationToken } from '../../src/main/transcription/CancellationToken.js';

describe('SerialExecutor', () => {
  it('never runs two tasks at once', async () => {
    const executor = new SerialExecutor('test');
    let running = 0;
    let maxRunning = 0;
    const order: number[] = [];

    const task = (id: number) => async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(id);
      running--;
      return id;
    };

    const results = await Promise.all([executor.run(task(1)), executor.run(task(2)), executor.run(task(3))]);

    expect(results).toEqual([1, 2, 3]);
    expect(order).toEqual([1, 2, 3]);
    expect(maxRunning).toBe(1);
  });

  it('keeps running after a task fails', async () => {
    const executor = new SerialExecutor('test');

    const failing = executor.run(async () => {
      throw new Error('model crashed');
    });
    const next = executor.run(async () => 'still works');

    await expect(failing).rejects.toThrow('model crashed');
    await expect(next).resolves.toBe('still works');
  });

  it('counts queued and running tasks', async () => {
    const executor = new SerialExecutor('test');
    let release: () => void = () => {};
    const blocker = executor.run(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const queued = executor.run(async () => undefined);

    expect(executor.pendingCount).toBe(2);

    release();
    await blocker;
    await queued;
    expect(executor.pendingCount).toBe(0);
  });
});

describe('CancellationToken', () => {
  it('starts uncancelled', () => {
    expect(new CancellationToken().isCancelled).toBe(false);
  });

  it('notifies listeners once', () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    token.onCancel(listener);

    token.cancel();
    token.cancel();

    expect(token.isCancelled).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('runs a listener registered after cancellation immediately', () => {
    const token = new CancellationToken();
    token.cancel();
    const listener = vi.fn();

    token.onCancel(listener);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('does not notify an unsubscribed listener', () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    const unsubscribe = token.onCancel(listener);

    unsubscribe();
    token.cancel();

    expect(listener).not.toHaveBeenCalled();
  });
});
