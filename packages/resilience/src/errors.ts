/**
 * Error taxonomy for resilience pipelines.
 *
 * Every error is a plain `Error` tagged with a literal `name` and a few
 * fields, built by a `create…` factory and recognized by an `is…` guard.
 *
 * @example
 * ```ts
 * const result = await registry.execute('billing', () => billing.charge(order));
 *
 * if (result.status === 'failure') {
 *   if (isCircuitOpenError(result.error)) {
 *     // Billing is known to be down, retry after result.error.retryAfterMs
 *   } else if (isBulkheadFullError(result.error)) {
 *     // Too many concurrent charges
 *   }
 * }
 * ```
 */

export type TransientFailure = Error & { name: 'TransientFailure' };

export type PermanentFailure = Error & { name: 'PermanentFailure' };

export type CircuitOpenError = Error & {
  name: 'CircuitOpenError';
  resource: string;
  /** Milliseconds until the breaker lets a trial call through */
  retryAfterMs: number;
};

export type BulkheadRejectionReason = 'full' | 'queue_full' | 'queue_timeout';

export type BulkheadFullError = Error & {
  name: 'BulkheadFullError';
  resource: string;
  reason: BulkheadRejectionReason;
};

export type TimeoutScope = 'attempt' | 'execution';

export type TimeoutError = Error & {
  name: 'TimeoutError';
  resource: string;
  timeoutMs: number;
  scope: TimeoutScope;
};

export type FallbackFailure = Error & {
  name: 'FallbackFailure';
  resource: string;
  /** The failure that made the pipeline reach for the fallback */
  primaryError: Error;
};

export type ExecutionCancelledError = Error & {
  name: 'ExecutionCancelledError';
  resource: string;
};

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(value: unknown, fallbackMessage = 'Unknown error'): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  return new Error(fallbackMessage, { cause: value });
}

export function createTransientFailure(message: string, cause?: unknown): TransientFailure {
  return Object.assign(new Error(message, { cause }), { name: 'TransientFailure' as const });
}

export function isTransientFailure(error: unknown): error is TransientFailure {
  return error instanceof Error && error.name === 'TransientFailure';
}

export function createPermanentFailure(message: string, cause?: unknown): PermanentFailure {
  return Object.assign(new Error(message, { cause }), { name: 'PermanentFailure' as const });
}

export function isPermanentFailure(error: unknown): error is PermanentFailure {
  return error instanceof Error && error.name === 'PermanentFailure';
}

export function createCircuitOpenError(resource: string, retryAfterMs: number): CircuitOpenError {
  return Object.assign(new Error(`Circuit breaker is OPEN for resource '${resource}'`), {
    name: 'CircuitOpenError' as const,
    resource,
    retryAfterMs,
  });
}

export function isCircuitOpenError(error: unknown): error is CircuitOpenError {
  return error instanceof Error && error.name === 'CircuitOpenError' && 'resource' in error;
}

export function createBulkheadFullError(
  resource: string,
  reason: BulkheadRejectionReason,
): BulkheadFullError {
  const message =
    reason === 'queue_timeout'
      ? `Bulkhead queue timeout for resource '${resource}'`
      : reason === 'queue_full'
        ? `Bulkhead queue is full for resource '${resource}'`
        : `Bulkhead is full for resource '${resource}'`;

  return Object.assign(new Error(message), {
    name: 'BulkheadFullError' as const,
    resource,
    reason,
  });
}

export function isBulkheadFullError(error: unknown): error is BulkheadFullError {
  return (
    error instanceof Error &&
    error.name === 'BulkheadFullError' &&
    'resource' in error &&
    'reason' in error
  );
}

export function createTimeoutError(
  resource: string,
  timeoutMs: number,
  scope: TimeoutScope = 'attempt',
): TimeoutError {
  const subject = scope === 'execution' ? 'Execution' : 'Call';
  return Object.assign(new Error(`${subject} to '${resource}' timed out after ${timeoutMs}ms`), {
    name: 'TimeoutError' as const,
    resource,
    timeoutMs,
    scope,
  });
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof Error && error.name === 'TimeoutError' && 'timeoutMs' in error;
}

export function createFallbackFailure(
  resource: string,
  cause: unknown,
  primaryError: Error,
): FallbackFailure {
  return Object.assign(new Error(`Fallback failed for resource '${resource}'`, { cause }), {
    name: 'FallbackFailure' as const,
    resource,
    primaryError,
  });
}

export function isFallbackFailure(error: unknown): error is FallbackFailure {
  return error instanceof Error && error.name === 'FallbackFailure' && 'primaryError' in error;
}

export function createExecutionCancelledError(
  resource: string,
  cause?: unknown,
): ExecutionCancelledError {
  return Object.assign(new Error(`Execution for resource '${resource}' was cancelled`, { cause }), {
    name: 'ExecutionCancelledError' as const,
    resource,
  });
}

export function isExecutionCancelledError(error: unknown): error is ExecutionCancelledError {
  return error instanceof Error && error.name === 'ExecutionCancelledError' && 'resource' in error;
}

/**
 * Rejections produced by the pipeline itself rather than by the operation.
 * They are never retried and never count as failure samples.
 */
export function isRejection(error: unknown): boolean {
  return (
    isCircuitOpenError(error) || isBulkheadFullError(error) || isExecutionCancelledError(error)
  );
}
