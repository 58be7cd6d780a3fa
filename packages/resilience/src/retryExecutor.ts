/**
 * Retry executor: re-invokes a call on retryable failures, waiting out a
 * backoff between attempts.
 *
 * Retries only what the classifier accepts; by default everything except
 * permanent failures, pipeline rejections and execution-level timeouts.
 * Attempt counting starts fresh on every `execute`.
 *
 * @example
 * ```ts
 * const executor = createRetryExecutor({
 *   maxAttempts: 3,
 *   backoff: withJitter(exponentialBackoff({ baseMs: 100 })),
 *   isRetryable: (error) => isTransientFailure(error),
 * });
 *
 * const result = await executor.execute(() => ledger.append(entry));
 * ```
 */

import { toBackoff, type BackoffInput } from './backoff';
import type { CircuitBreaker } from './circuitBreaker';
import { sleep, systemClock, type Clock } from './clock';
import { isPermanentFailure, isRejection, isTimeoutError } from './errors';

export type RetryableErrorPredicate = (error: unknown) => boolean;

export type RetryExecutorConfig = {
  /** Upper bound on attempts, first one included (>= 1) */
  maxAttempts: number;
  /** Delay schedule between attempts */
  backoff: BackoffInput;
  /** Predicate to determine if an error is retryable */
  isRetryable?: RetryableErrorPredicate;
  /** Optional circuit breaker - skips retry if circuit is OPEN */
  circuitBreaker?: Pick<CircuitBreaker, 'getState'>;
  clock?: Clock;
  /** Called before each backoff wait */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
};

export type RetryCall<T> = (attempt: number) => Promise<T>;

export type RetryExecutor = {
  /**
   * Execute a call with retry logic. Once `signal` aborts no further attempt
   * starts and the pending backoff wait rejects with the abort reason.
   */
  execute<T>(call: RetryCall<T>, signal?: AbortSignal): Promise<T>;
};

export const isRetryableByDefault: RetryableErrorPredicate = (error) => {
  if (isPermanentFailure(error) || isRejection(error)) {
    return false;
  }
  if (isTimeoutError(error)) {
    return error.scope === 'attempt';
  }
  return true;
};

/**
 * Creates a retry executor with the specified configuration.
 */
export function createRetryExecutor(config: RetryExecutorConfig): RetryExecutor {
  const {
    maxAttempts,
    isRetryable = isRetryableByDefault,
    circuitBreaker,
    clock = systemClock,
    onRetry,
  } = config;
  const backoff = toBackoff(config.backoff);

  const execute = async <T>(call: RetryCall<T>, signal?: AbortSignal): Promise<T> => {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await call(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }

        if (!isRetryable(error) || attempt >= maxAttempts) {
          throw error;
        }

        // Don't retry into a circuit that is now open
        if (circuitBreaker && circuitBreaker.getState() === 'OPEN') {
          throw error;
        }

        const delayMs = backoff.getDelayMs(attempt);
        onRetry?.(attempt, error, delayMs);
        await sleep(delayMs, { clock, signal });
      }
    }
  };

  return { execute };
}
