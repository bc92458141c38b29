/**
 * Bounded-time execution linked to a caller's cancellation signal.
 */

export interface RunWithTimeoutOptions {
  /** Deadline in milliseconds */
  timeout: number;

  /** Caller's signal; aborting it cancels the operation */
  signal?: AbortSignal;

  /** Builds the error raised when the deadline fires first */
  onTimeout: () => Error;
}

/**
 * Runs `operation` with a signal that aborts when either the caller's signal
 * aborts or `timeout` elapses.
 *
 * - Deadline first (caller not cancelled): rejects with `onTimeout()`.
 * - Caller cancelled: rejects with the caller's abort reason.
 *
 * Cancellation only flows downward: the derived signal never aborts the
 * caller's signal. The operation is not awaited after settling; clients that
 * ignore the signal keep running in the background and their result is dropped.
 */
export function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RunWithTimeoutOptions
): Promise<T> {
  const { timeout, signal: callerSignal, onTimeout } = options;

  if (callerSignal?.aborted) {
    return Promise.reject(callerSignal.reason);
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const settle = (finish: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
      finish();
    };

    const onCallerAbort = (): void => {
      const reason: unknown = callerSignal?.reason;
      controller.abort(reason);
      settle(() => reject(reason));
    };

    const timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      settle(() => reject(error));
    }, timeout);

    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }

    pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}
