/**
 * @module clock
 *
 * Time source used by pacing strategies, the proxy pool and the retry loop.
 *
 * Every wait in the pipeline goes through a {@link Clock} so that tests can
 * substitute a virtual clock and assert exact sleep durations.
 */

/**
 * Millisecond time source with a cancellable sleep.
 */
export interface Clock {
  /** Current time in milliseconds. */
  now(): number;
  /**
   * Resolve after `ms` milliseconds.
   *
   * Rejects with an `AbortError` if `signal` aborts first. Non-positive
   * durations resolve immediately.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Wall-clock implementation backed by `Date.now` and `setTimeout`.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Create the error a sleep rejects with when its signal aborts.
 */
export function createAbortError(message = 'Operation aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * Whether `err` is the error produced by an aborted signal.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(createAbortError());
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
