/**
 * Resilience middleware for calls to unreliable dependencies.
 *
 * - Circuit Breaker: fast-fail while a resource is failing
 * - Bulkhead: bounded concurrency per resource
 * - Retry: re-run transient failures with pluggable backoff
 * - Timeout: per-attempt and per-execution deadlines
 * - Fallback: substitute value once the primary path is exhausted
 *
 * Pipelines compose all of them in a fixed order; a registry keeps one
 * pipeline per named resource.
 *
 * @example
 * ```ts
 * import { createResilienceRegistry, isCircuitOpenError } from '@bulwark/resilience';
 *
 * const resilience = createResilienceRegistry();
 * resilience.configure('ledger', { retry: { maxAttempts: 2 }, timeout: { attemptMs: 1000 } });
 *
 * const result = await resilience.execute('ledger', () => ledger.balance(accountId));
 * if (result.status === 'failure' && isCircuitOpenError(result.error)) {
 *   // Ledger is down
 * }
 * ```
 */

export { systemClock, sleep, type Clock, type SleepOptions, type TimerHandle } from './clock';

export {
  toError,
  createTransientFailure,
  isTransientFailure,
  createPermanentFailure,
  isPermanentFailure,
  createCircuitOpenError,
  isCircuitOpenError,
  createBulkheadFullError,
  isBulkheadFullError,
  createTimeoutError,
  isTimeoutError,
  createFallbackFailure,
  isFallbackFailure,
  createExecutionCancelledError,
  isExecutionCancelledError,
  isRejection,
  type TransientFailure,
  type PermanentFailure,
  type CircuitOpenError,
  type BulkheadRejectionReason,
  type BulkheadFullError,
  type TimeoutScope,
  type TimeoutError,
  type FallbackFailure,
  type ExecutionCancelledError,
} from './errors';

export {
  exponentialBackoff,
  constantBackoff,
  linearBackoff,
  scheduleBackoff,
  withJitter,
  toBackoff,
  type Backoff,
  type BackoffFunction,
  type BackoffInput,
  type ExponentialBackoffOptions,
  type LinearBackoffOptions,
} from './backoff';

export {
  createRetryExecutor,
  isRetryableByDefault,
  type RetryExecutor,
  type RetryExecutorConfig,
  type RetryableErrorPredicate,
  type RetryCall,
} from './retryExecutor';

export {
  createCircuitBreaker,
  isCircuitFailure,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitAdmission,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerEvents,
  type CircuitBreakerOptions,
  type CircuitState,
  type CircuitSnapshot,
  type CallRecord,
  type FailureClassifier,
} from './circuitBreaker';

export {
  createBulkhead,
  DEFAULT_BULKHEAD_CONFIG,
  type Bulkhead,
  type BulkheadConfig,
  type BulkheadEvents,
  type Permit,
} from './bulkhead';

export { withTimeout, raceSignal, type GuardedOperation, type TimeoutOptions } from './timeout';

export {
  successResult,
  fallbackResult,
  failureResult,
  isSuccess,
  isFallback,
  isFailure,
  unwrapResult,
  unwrapResultOr,
  type ExecutionState,
  type ExecutionSummary,
  type SuccessResult,
  type FallbackResult,
  type FailureResult,
  type PipelineResult,
} from './result';

export {
  createResiliencePipeline,
  type ExecuteOptions,
  type PipelineOptions,
  type ResiliencePipeline,
} from './pipeline';

export {
  createResilienceRegistry,
  type ResilienceRegistry,
  type ResilienceRegistryOptions,
  type ResourceStats,
} from './registry';

export {
  resolveResilienceConfig,
  mergeConfigInput,
  createResilienceConfigError,
  isResilienceConfigError,
  DEFAULT_MAX_ATTEMPTS,
  type ResilienceConfig,
  type ResilienceConfigError,
  type RecordGranularity,
  type ResolvedRetryConfig,
  type ResolvedCircuitBreakerConfig,
  type ResolvedBulkheadConfig,
  type ResolvedTimeoutConfig,
} from './config/resilienceConfig';

export {
  resilienceConfigSchema,
  backoffSpecSchema,
  type BackoffSpec,
  type ResilienceConfigInput,
} from './config/schema';

export { readIntEnv, readNumberEnv, readBoolEnv, readStringEnv, type Env } from './config/env';
export { loadResourceConfigFromEnv, loadLoggerSettings, toEnvPrefix, type LoggerSettings } from './config/envConfig';

export {
  createHookDispatcher,
  createLoggingHooks,
  combineHooks,
  type ExecutionOutcome,
  type ExecutionStatus,
  type HookDispatcher,
  type ResilienceHookArgs,
  type ResilienceHookName,
  type ResilienceHooks,
} from './observability/hooks';

export {
  createResilienceLogger,
  createSilentLogger,
  type CreateResilienceLoggerOptions,
} from './observability/logger';

export {
  createResilienceMetrics,
  type ResilienceMetrics,
  type ResilienceMetricsOptions,
} from './observability/metrics';

export type { AttemptContext, Fallback, FallbackContext, Operation } from './types';
export { assertNever } from './types/exhaustive';
