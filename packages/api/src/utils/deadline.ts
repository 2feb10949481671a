import { CancelledError, TimeoutError } from '../errors';

/**
 * Run a network task under a deadline.
 *
 * The task receives a signal that fires when the deadline passes or the
 * caller's own signal aborts; whichever happens first settles the returned
 * promise with TimeoutError or CancelledError. The task's own late result
 * is discarded.
 */
export function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new CancelledError(operation));
  }

  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();

    const cleanup = (): void => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    };

    const timer = setTimeout(() => {
      cleanup();
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    const onAbort = (): void => {
      cleanup();
      const error = new CancelledError(operation);
      controller.abort(error);
      reject(error);
    };
    parent?.addEventListener('abort', onAbort, { once: true });

    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    running.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * Exponential backoff: base * 2^attempt, capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}
