/**
 * Tagged outcome of one pipeline execution.
 *
 * Pipelines never throw for operation failures: every execution resolves to
 * `Success(value)`, `Fallback(value)` or `Failure(error)`.
 *
 * @example
 * ```ts
 * const result = await registry.execute('pricing', () => pricing.quote(cart), () => cachedQuote);
 *
 * switch (result.status) {
 *   case 'success':
 *     return result.value;
 *   case 'fallback':
 *     logger.warn({ err: result.error }, 'serving cached quote');
 *     return result.value;
 *   case 'failure':
 *     throw result.error;
 * }
 * ```
 */

export type ExecutionState =
  | 'ADMITTED'
  | 'RUNNING'
  | 'RETRYING'
  | 'TIMED_OUT'
  | 'CIRCUIT_OPEN'
  | 'SUCCEEDED'
  | 'FALLBACK'
  | 'FAILED';

export type ExecutionSummary = {
  /** Attempts that reached the operation's admission check */
  readonly attempts: number;
  readonly durationMs: number;
  /** States visited, in order */
  readonly trace: readonly ExecutionState[];
};

export type SuccessResult<T> = ExecutionSummary & {
  readonly status: 'success';
  readonly value: T;
};

export type FallbackResult<F> = ExecutionSummary & {
  readonly status: 'fallback';
  readonly value: F;
  /** The failure the fallback stood in for */
  readonly error: Error;
};

export type FailureResult = ExecutionSummary & {
  readonly status: 'failure';
  readonly error: Error;
};

export type PipelineResult<T, F = T> = SuccessResult<T> | FallbackResult<F> | FailureResult;

export function successResult<T>(value: T, summary: ExecutionSummary): SuccessResult<T> {
  return { status: 'success', value, ...summary };
}

export function fallbackResult<F>(value: F, error: Error, summary: ExecutionSummary): FallbackResult<F> {
  return { status: 'fallback', value, error, ...summary };
}

export function failureResult(error: Error, summary: ExecutionSummary): FailureResult {
  return { status: 'failure', error, ...summary };
}

export function isSuccess<T, F>(result: PipelineResult<T, F>): result is SuccessResult<T> {
  return result.status === 'success';
}

export function isFallback<T, F>(result: PipelineResult<T, F>): result is FallbackResult<F> {
  return result.status === 'fallback';
}

export function isFailure<T, F>(result: PipelineResult<T, F>): result is FailureResult {
  return result.status === 'failure';
}

/**
 * Returns the success or fallback value, throwing the error of a failure.
 */
export function unwrapResult<T, F>(result: PipelineResult<T, F>): T | F {
  if (result.status === 'failure') {
    throw result.error;
  }
  return result.value;
}

/**
 * Returns the success or fallback value, or `defaultValue` for a failure.
 */
export function unwrapResultOr<T, F, D>(result: PipelineResult<T, F>, defaultValue: D): T | F | D {
  return result.status === 'failure' ? defaultValue : result.value;
}
