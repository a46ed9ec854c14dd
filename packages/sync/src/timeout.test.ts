import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runWithTimeout } from './timeout.js';

describe('runWithTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the task result', async () => {
    const result = runWithTimeout(async () => 42, 1000, () => new Error('late'));
    await expect(result).resolves.toBe(42);
  });

  it('should pass task errors through', async () => {
    const failure = new Error('refused');
    const result = runWithTimeout(() => Promise.reject(failure), 1000, () => new Error('late'));
    await expect(result).rejects.toBe(failure);
  });

  it('should reject with the timeout error and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const result = runWithTimeout(
      (signal) => {
        taskSignal = signal;
        return new Promise<never>(() => {});
      },
      1000,
      () => new Error('late')
    );
    const settled = result.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(1000);

    expect(await settled).toEqual(new Error('late'));
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should clear its timer when the task throws synchronously', async () => {
    const lifetime = new AbortController();
    const failure = new Error('bad request');
    const removeListener = vi.spyOn(lifetime.signal, 'removeEventListener');

    const result = runWithTimeout(
      () => {
        throw failure;
      },
      1000,
      () => new Error('late'),
      lifetime.signal
    );

    await expect(result).rejects.toBe(failure);
    expect(vi.getTimerCount()).toBe(0);
    expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('should reject when the lifetime aborts', async () => {
    const lifetime = new AbortController();
    const result = runWithTimeout(() => new Promise<never>(() => {}), 1000, () => new Error('late'), lifetime.signal);
    const settled = result.catch((e: unknown) => e);

    lifetime.abort();

    expect(await settled).toEqual(new Error('Aborted'));
  });

  it('should reject at once for an aborted lifetime', async () => {
    const lifetime = new AbortController();
    lifetime.abort();
    const task = vi.fn(async () => 1);

    await expect(runWithTimeout(task, 1000, () => new Error('late'), lifetime.signal)).rejects.toThrow('Aborted');
    expect(task).not.toHaveBeenCalled();
  });
});
