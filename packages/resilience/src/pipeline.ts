/**
 * Resilience pipeline: composes every primitive around one operation.
 *
 * Execution order: Bulkhead → Circuit Breaker → Execution timeout → Retry →
 * (per attempt) Circuit Breaker → Attempt timeout → Operation
 *
 * 1. The bulkhead admits or rejects the execution and holds its slot until the
 *    primary path settles.
 * 2. The circuit breaker fast-fails when the resource is known to be down.
 * 3. The optional execution timeout bounds all attempts and backoff combined.
 * 4. Retry re-runs retryable failures; rejections are never retried.
 * 5. Each attempt is admitted and recorded by the breaker (unless outcomes are
 *    recorded per execution) and bounded by the optional attempt timeout.
 *
 * Whatever remains unrecovered goes to the fallback. Caller cancellation skips
 * the fallback and resolves to `Failure(ExecutionCancelledError)`.
 *
 * @example
 * ```ts
 * const pipeline = createResiliencePipeline('search', resolveResilienceConfig({
 *   retry: { maxAttempts: 3, backoff: [50, 100] },
 *   timeout: { attemptMs: 500 },
 * }));
 *
 * const result = await pipeline.execute(
 *   ({ signal }) => searchClient.query(terms, { signal }),
 *   () => [],
 * );
 * ```
 */

import { createBulkhead, type Bulkhead } from './bulkhead';
import { createCircuitBreaker, type CircuitAdmission, type CircuitBreaker } from './circuitBreaker';
import { systemClock, type Clock } from './clock';
import type { ResilienceConfig } from './config/resilienceConfig';
import {
  createCircuitOpenError,
  createExecutionCancelledError,
  createFallbackFailure,
  isExecutionCancelledError,
  isRejection,
  isTimeoutError,
  toError,
  type TimeoutError,
} from './errors';
import { createHookDispatcher, type HookDispatcher } from './observability/hooks';
import { createSilentLogger } from './observability/logger';
import {
  failureResult,
  fallbackResult,
  successResult,
  type ExecutionState,
  type ExecutionSummary,
  type PipelineResult,
} from './result';
import { createRetryExecutor } from './retryExecutor';
import { raceSignal, withTimeout, type GuardedOperation } from './timeout';
import type { Fallback, Operation } from './types';

export type ExecuteOptions = {
  /** Aborting cancels the execution: the bulkhead slot is released and no further attempt starts */
  signal?: AbortSignal;
};

export type PipelineOptions = {
  clock?: Clock;
  hooks?: HookDispatcher;
};

export type ResiliencePipeline = {
  readonly resource: string;
  readonly config: ResilienceConfig;
  /** `undefined` when disabled in the config */
  readonly circuitBreaker: CircuitBreaker | undefined;
  /** `undefined` when disabled in the config */
  readonly bulkhead: Bulkhead | undefined;
  execute<T>(
    operation: Operation<T>,
    fallback?: undefined,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, unknown>>;
  execute<T, F>(
    operation: Operation<T>,
    fallback: Fallback<F>,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, F>>;
};

export function createResiliencePipeline(
  resource: string,
  config: ResilienceConfig,
  options: PipelineOptions = {},
): ResiliencePipeline {
  const clock = options.clock ?? systemClock;
  const hooks = options.hooks ?? createHookDispatcher([], createSilentLogger());
  const { retry, timeout, circuitBreaker: breakerConfig } = config;
  const recordPerAttempt = breakerConfig.recordPer === 'attempt';

  const circuitBreaker = breakerConfig.enabled
    ? createCircuitBreaker(
        resource,
        breakerConfig,
        {
          onStateChange: (from, to) => hooks.emit('onCircuitStateChange', resource, from, to),
          onRejected: () => hooks.emit('onCircuitReject', resource),
        },
        { clock, isFailure: breakerConfig.isFailure },
      )
    : undefined;

  if (circuitBreaker) {
    hooks.emit('onCircuitCreated', resource, circuitBreaker.getState());
  }

  const bulkhead = config.bulkhead.enabled
    ? createBulkhead(
        resource,
        config.bulkhead,
        { onRejected: (_resource, reason) => hooks.emit('onBulkheadReject', resource, reason) },
        clock,
      )
    : undefined;

  const isRetryable = (error: unknown): boolean => !isRejection(error) && retry.isRetryable(error);

  const onTimeout = (error: TimeoutError): void => {
    hooks.emit('onTimeout', resource, error.scope, error.timeoutMs);
  };

  const recordOutcome = (breaker: CircuitBreaker, admission: CircuitAdmission, error: unknown): void => {
    if (breakerConfig.isFailure(error)) {
      breaker.recordFailure(admission);
    } else {
      breaker.recordIgnored(admission);
    }
  };

  const circuitOpenRejection = (breaker: CircuitBreaker, trace: ExecutionState[]): Error => {
    trace.push('CIRCUIT_OPEN');
    return createCircuitOpenError(resource, breaker.getRetryAfterMs());
  };

  function execute<T>(
    operation: Operation<T>,
    fallback?: undefined,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, unknown>>;
  function execute<T, F>(
    operation: Operation<T>,
    fallback: Fallback<F>,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, F>>;
  async function execute<T, F>(
    operation: Operation<T>,
    fallback?: Fallback<F>,
    executeOptions: ExecuteOptions = {},
  ): Promise<PipelineResult<T, unknown>> {
    const startedAt = clock.now();
    const trace: ExecutionState[] = [];
    let attempts = 0;
    let primaryAdmission: CircuitAdmission | undefined;

    const summarize = (): ExecutionSummary => ({
      attempts,
      durationMs: clock.now() - startedAt,
      trace: [...trace],
    });

    const complete = (result: PipelineResult<T, unknown>): PipelineResult<T, unknown> => {
      hooks.emit('onExecution', resource, {
        status: result.status,
        attempts: result.attempts,
        durationMs: result.durationMs,
        error: result.status === 'success' ? undefined : result.error,
      });
      return result;
    };

    // Every layer below sees a typed abort reason rather than the caller's raw one.
    const execution = new AbortController();
    const callerSignal = executeOptions.signal;
    const onCallerAbort = (): void => {
      execution.abort(createExecutionCancelledError(resource, callerSignal?.reason));
    };
    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const runAttempt = async (attempt: number, signal: AbortSignal): Promise<T> => {
      let admission = primaryAdmission;
      if (attempt > 1 && recordPerAttempt && circuitBreaker) {
        admission = circuitBreaker.admit();
        if (!admission) {
          throw circuitOpenRejection(circuitBreaker, trace);
        }
      }

      attempts = attempt;
      trace.push('RUNNING');
      const invoke: GuardedOperation<T> = (attemptSignal) =>
        operation({ resource, attempt, signal: attemptSignal });

      try {
        const value =
          timeout.attemptMs !== undefined
            ? await withTimeout(invoke, timeout.attemptMs, {
                resource,
                scope: 'attempt',
                clock,
                signal,
                onTimeout,
              })
            : await raceSignal(invoke, signal);
        if (recordPerAttempt && admission) {
          circuitBreaker?.recordSuccess(admission);
        }
        return value;
      } catch (error) {
        if (isTimeoutError(error) && error.scope === 'attempt') {
          trace.push('TIMED_OUT');
        }
        if (recordPerAttempt && circuitBreaker && admission) {
          recordOutcome(circuitBreaker, admission, error);
        }
        throw error;
      }
    };

    const runPrimary = async (): Promise<T> => {
      const permit = bulkhead ? await bulkhead.acquire(execution.signal) : undefined;
      try {
        if (circuitBreaker) {
          primaryAdmission = circuitBreaker.admit();
          if (!primaryAdmission) {
            throw circuitOpenRejection(circuitBreaker, trace);
          }
        }
        trace.push('ADMITTED');

        const retryExecutor = createRetryExecutor({
          maxAttempts: retry.maxAttempts,
          backoff: retry.backoff,
          isRetryable,
          circuitBreaker,
          clock,
          onRetry: (attempt, error, delayMs) => {
            trace.push('RETRYING');
            hooks.emit('onRetry', resource, attempt, error, delayMs);
          },
        });
        const runRetries: GuardedOperation<T> = (signal) =>
          retryExecutor.execute((attempt) => runAttempt(attempt, signal), signal);

        const value =
          timeout.executionMs !== undefined
            ? await withTimeout(runRetries, timeout.executionMs, {
                resource,
                scope: 'execution',
                clock,
                signal: execution.signal,
                onTimeout,
              })
            : await runRetries(execution.signal);

        if (primaryAdmission && !recordPerAttempt) {
          circuitBreaker?.recordSuccess(primaryAdmission);
        }
        return value;
      } catch (error) {
        if (isTimeoutError(error) && error.scope === 'execution') {
          trace.push('TIMED_OUT');
        }
        // Per-attempt recording has already settled every attempt that started.
        if (circuitBreaker && primaryAdmission && (!recordPerAttempt || attempts === 0)) {
          recordOutcome(circuitBreaker, primaryAdmission, error);
        }
        throw error;
      } finally {
        permit?.release();
      }
    };

    const runFallback = async (error: Error): Promise<PipelineResult<T, unknown>> => {
      const chosen: Fallback<unknown> | undefined = fallback ?? config.fallback;
      if (!chosen) {
        trace.push('FAILED');
        return failureResult(error, summarize());
      }

      try {
        const value = await chosen(error, { resource, attempts });
        trace.push('FALLBACK');
        hooks.emit('onFallback', resource, error);
        return fallbackResult(value, error, summarize());
      } catch (fallbackError) {
        trace.push('FAILED');
        return failureResult(createFallbackFailure(resource, fallbackError, error), summarize());
      }
    };

    try {
      const value = await runPrimary();
      trace.push('SUCCEEDED');
      return complete(successResult(value, summarize()));
    } catch (caught) {
      const error = toError(caught);
      if (isExecutionCancelledError(error)) {
        trace.push('FAILED');
        return complete(failureResult(error, summarize()));
      }
      return complete(await runFallback(error));
    } finally {
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  return {
    resource,
    config,
    circuitBreaker,
    bulkhead,
    execute,
  };
}
