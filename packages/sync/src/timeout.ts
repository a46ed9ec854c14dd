/**
 * Run an abortable task with an upper time bound.
 *
 * The task gets a signal that aborts on timeout or when `lifetime` aborts.
 * On timeout the promise rejects with `onTimeout()` whether or not the task
 * honours the signal.
 */
export function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  lifetime?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const abortFromLifetime = (): void => {
      clearTimeout(timer);
      controller.abort();
      reject(new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      lifetime?.removeEventListener('abort', abortFromLifetime);
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);

    if (lifetime?.aborted) {
      abortFromLifetime();
      return;
    }
    lifetime?.addEventListener('abort', abortFromLifetime, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        lifetime?.removeEventListener('abort', abortFromLifetime);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        lifetime?.removeEventListener('abort', abortFromLifetime);
        reject(error);
      }
    );
  });
}
