/**
 * Per-resource configuration: validation, defaults and merging.
 *
 * Callers hand in a partial `ResilienceConfigInput`; `resolveResilienceConfig`
 * validates it with zod, fills in defaults and returns a frozen
 * `ResilienceConfig` that the pipeline reads without further checks.
 *
 * @example
 * ```ts
 * const config = resolveResilienceConfig({
 *   retry: { maxAttempts: 2, backoff: { type: 'fixed', delayMs: 50 } },
 *   circuitBreaker: { failureRateThreshold: 0.25, minimumSamples: 8 },
 *   bulkhead: { maxConcurrent: 30 },
 *   timeout: { attemptMs: 3000 },
 * });
 * ```
 */

import type { ZodIssue } from 'zod';

import { exponentialBackoff, toBackoff, withJitter, type Backoff } from '../backoff';
import { DEFAULT_BULKHEAD_CONFIG, type BulkheadConfig } from '../bulkhead';
import {
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  isCircuitFailure,
  type CircuitBreakerConfig,
  type FailureClassifier,
} from '../circuitBreaker';
import { isRetryableByDefault, type RetryableErrorPredicate } from '../retryExecutor';
import type { Fallback } from '../types';
import { resilienceConfigSchema, type ResilienceConfigInput } from './schema';

export type RecordGranularity = 'attempt' | 'execution';

export type ResolvedRetryConfig = {
  readonly maxAttempts: number;
  readonly backoff: Backoff;
  readonly isRetryable: RetryableErrorPredicate;
};

export type ResolvedCircuitBreakerConfig = Readonly<CircuitBreakerConfig> & {
  readonly enabled: boolean;
  /** Sample every attempt, or one outcome per execution */
  readonly recordPer: RecordGranularity;
  readonly isFailure: FailureClassifier;
};

export type ResolvedBulkheadConfig = Readonly<BulkheadConfig> & {
  readonly enabled: boolean;
};

export type ResolvedTimeoutConfig = {
  readonly attemptMs?: number;
  readonly executionMs?: number;
};

export type ResilienceConfig = {
  readonly retry: ResolvedRetryConfig;
  readonly circuitBreaker: ResolvedCircuitBreakerConfig;
  readonly bulkhead: ResolvedBulkheadConfig;
  readonly timeout: ResolvedTimeoutConfig;
  readonly fallback?: Fallback<unknown>;
};

export type ResilienceConfigError = Error & {
  name: 'ResilienceConfigError';
  issues: string[];
};

export const DEFAULT_MAX_ATTEMPTS = 3;

export function createResilienceConfigError(issues: string[]): ResilienceConfigError {
  return Object.assign(new Error(`Invalid resilience config: ${issues.join('; ')}`), {
    name: 'ResilienceConfigError' as const,
    issues,
  });
}

export function isResilienceConfigError(error: unknown): error is ResilienceConfigError {
  return error instanceof Error && error.name === 'ResilienceConfigError' && 'issues' in error;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Layers `override` on top of `base`, section by section.
 */
export function mergeConfigInput(
  base: ResilienceConfigInput,
  override: ResilienceConfigInput,
): ResilienceConfigInput {
  return {
    retry: { ...base.retry, ...withoutUndefined(override.retry) },
    circuitBreaker: { ...base.circuitBreaker, ...withoutUndefined(override.circuitBreaker) },
    bulkhead: { ...base.bulkhead, ...withoutUndefined(override.bulkhead) },
    timeout: { ...base.timeout, ...withoutUndefined(override.timeout) },
    fallback: override.fallback ?? base.fallback,
  };
}

// A key set to undefined leaves the base value in place.
function withoutUndefined<T extends object>(section: T | undefined): Partial<T> {
  const kept: Partial<T> = {};
  if (!section) return kept;
  for (const key in section) {
    if (Object.hasOwn(section, key) && section[key] !== undefined) {
      kept[key] = section[key];
    }
  }
  return kept;
}

/**
 * Validates `input` and fills in defaults.
 *
 * @throws ResilienceConfigError listing every invalid field
 */
export function resolveResilienceConfig(input: ResilienceConfigInput = {}): ResilienceConfig {
  const parsed = resilienceConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw createResilienceConfigError(parsed.error.issues.map(formatIssue));
  }

  const { retry = {}, circuitBreaker = {}, bulkhead = {}, timeout = {}, fallback } = parsed.data;

  const resolvedCircuitBreaker: ResolvedCircuitBreakerConfig = Object.freeze({
    failureRateThreshold:
      circuitBreaker.failureRateThreshold ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.failureRateThreshold,
    minimumSamples: circuitBreaker.minimumSamples ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.minimumSamples,
    windowSize: circuitBreaker.windowSize ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.windowSize,
    windowDurationMs:
      circuitBreaker.windowDurationMs ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.windowDurationMs,
    openDurationMs: circuitBreaker.openDurationMs ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.openDurationMs,
    halfOpenMaxTrials:
      circuitBreaker.halfOpenMaxTrials ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.halfOpenMaxTrials,
    halfOpenSuccessThreshold: circuitBreaker.halfOpenSuccessThreshold,
    enabled: circuitBreaker.enabled ?? true,
    recordPer: circuitBreaker.recordPer ?? 'attempt',
    isFailure: circuitBreaker.isFailure ?? isCircuitFailure,
  });

  const issues: string[] = [];
  if (resolvedCircuitBreaker.minimumSamples > resolvedCircuitBreaker.windowSize) {
    issues.push('circuitBreaker.minimumSamples: must not exceed windowSize');
  }
  if (
    resolvedCircuitBreaker.halfOpenSuccessThreshold !== undefined &&
    resolvedCircuitBreaker.halfOpenSuccessThreshold > resolvedCircuitBreaker.halfOpenMaxTrials
  ) {
    issues.push('circuitBreaker.halfOpenSuccessThreshold: must not exceed halfOpenMaxTrials');
  }
  if (issues.length > 0) {
    throw createResilienceConfigError(issues);
  }

  return Object.freeze({
    retry: Object.freeze({
      maxAttempts: retry.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      backoff: retry.backoff
        ? toBackoff(retry.backoff)
        : withJitter(exponentialBackoff({ baseMs: 100, maxMs: 5000 }), 0.1),
      isRetryable: retry.isRetryable ?? isRetryableByDefault,
    }),
    circuitBreaker: resolvedCircuitBreaker,
    bulkhead: Object.freeze({
      maxConcurrent: bulkhead.maxConcurrent ?? DEFAULT_BULKHEAD_CONFIG.maxConcurrent,
      maxQueueSize: bulkhead.maxQueueSize ?? DEFAULT_BULKHEAD_CONFIG.maxQueueSize,
      queueTimeoutMs: bulkhead.queueTimeoutMs ?? DEFAULT_BULKHEAD_CONFIG.queueTimeoutMs,
      enabled: bulkhead.enabled ?? true,
    }),
    timeout: Object.freeze({ attemptMs: timeout.attemptMs, executionMs: timeout.executionMs }),
    fallback,
  });
}
