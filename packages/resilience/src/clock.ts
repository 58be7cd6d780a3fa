/**
 * Time source shared by every resilience component.
 *
 * Components never touch the global timers directly; they go through a
 * `Clock` so tests (and embedders with their own scheduler) can substitute one.
 */

export type TimerHandle = ReturnType<typeof setTimeout>;

export type Clock = {
  /** Milliseconds since an arbitrary origin; only differences are meaningful */
  now(): number;
  setTimeout(callback: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
};

// Globals are resolved on every call so fake timers installed after import apply.
export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

export type SleepOptions = {
  clock?: Clock;
  signal?: AbortSignal;
};

/**
 * Resolves after `ms`, or rejects with `signal.reason` as soon as the signal aborts.
 */
export function sleep(ms: number, options: SleepOptions = {}): Promise<void> {
  const { clock = systemClock, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clock.clearTimeout(handle);
      reject(signal?.reason);
    };

    const handle = clock.setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
