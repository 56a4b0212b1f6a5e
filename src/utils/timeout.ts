/**
 * Promise timeout helper
 *
 * Races a promise against a timer and always clears the timer once the race
 * settles, so a finished operation never leaves a pending timeout behind.
 */

/**
 * Raised when the wrapped operation did not settle in time
 */
export class TimeoutExceededError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutExceededError';
  }
}

/**
 * Execute promise with timeout
 *
 * A `timeoutMs` of 0 (or less) disables the timer. The wrapped promise is not
 * cancelled on timeout; callers decide what to do with a late result.
 *
 * @example
 * ```typescript
 * const loaded = await withTimeout(registry.load('m', '1'), 30_000, "Loading version '1'");
 * ```
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutExceededError(operation, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
