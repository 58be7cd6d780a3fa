/**
 * Deadline and cancellation guards.
 *
 * The guarded operation receives an `AbortSignal`. When the deadline passes (or
 * the caller's signal aborts) the signal is aborted and the returned promise
 * rejects right away; the operation itself is only asked to stop, it is not
 * forcibly terminated.
 *
 * @example
 * ```ts
 * const body = await withTimeout(
 *   (signal) => fetch(url, { signal }).then((res) => res.text()),
 *   2000,
 *   { resource: 'catalog' },
 * );
 * ```
 */

import { systemClock, type Clock, type TimerHandle } from './clock';
import { createTimeoutError, type TimeoutError, type TimeoutScope } from './errors';

export type GuardedOperation<T> = (signal: AbortSignal) => Promise<T>;

export type TimeoutOptions = {
  /** Resource named in the TimeoutError (default: 'anonymous') */
  resource?: string;
  scope?: TimeoutScope;
  clock?: Clock;
  /** Caller's signal; aborting it releases the caller with `signal.reason` */
  signal?: AbortSignal;
  onTimeout?: (error: TimeoutError) => void;
};

function guard<T>(
  operation: GuardedOperation<T>,
  durationMs: number | undefined,
  options: TimeoutOptions,
): Promise<T> {
  const { resource = 'anonymous', scope = 'attempt', clock = systemClock, signal, onTimeout } =
    options;

  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timeoutId: TimerHandle | undefined;

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      if (timeoutId !== undefined) {
        clock.clearTimeout(timeoutId);
      }
      signal?.removeEventListener('abort', onParentAbort);
      finish();
    };

    const onParentAbort = (): void => {
      controller.abort(signal?.reason);
      settle(() => reject(signal?.reason));
    };

    if (durationMs !== undefined) {
      timeoutId = clock.setTimeout(() => {
        const error = createTimeoutError(resource, durationMs, scope);
        controller.abort(error);
        settle(() => {
          onTimeout?.(error);
          reject(error);
        });
      }, durationMs);
    }

    signal?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }

    pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}

/**
 * Races `operation` against a `durationMs` timer, rejecting with a TimeoutError
 * when the timer fires first.
 */
export function withTimeout<T>(
  operation: GuardedOperation<T>,
  durationMs: number,
  options: TimeoutOptions = {},
): Promise<T> {
  return guard(operation, durationMs, options);
}

/**
 * Releases the caller as soon as `signal` aborts, without a deadline of its own.
 */
export function raceSignal<T>(
  operation: GuardedOperation<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  return guard(operation, undefined, { signal });
}
