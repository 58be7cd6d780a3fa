import { describe, expect, it } from 'vitest';

import {
  DEFAULT_MAX_ATTEMPTS,
  isResilienceConfigError,
  mergeConfigInput,
  resolveResilienceConfig,
} from '../src/config/resilienceConfig';
import { isRetryableByDefault } from '../src/retryExecutor';
import { isCircuitFailure } from '../src/circuitBreaker';
import { resilienceConfigSchema } from '../src/config/schema';

const issuesOf = (run: () => unknown): string[] => {
  try {
    run();
  } catch (error) {
    if (isResilienceConfigError(error)) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe('resolveResilienceConfig', () => {
  it('fills in defaults for an empty input', () => {
    const config = resolveResilienceConfig();

    expect(config.retry.maxAttempts).toBe(DEFAULT_MAX_ATTEMPTS);
    expect(config.retry.isRetryable).toBe(isRetryableByDefault);
    expect(config.circuitBreaker).toMatchObject({
      enabled: true,
      recordPer: 'attempt',
      failureRateThreshold: 0.5,
      minimumSamples: 10,
      windowSize: 20,
      windowDurationMs: 60_000,
      openDurationMs: 30_000,
      halfOpenMaxTrials: 2,
    });
    expect(config.circuitBreaker.isFailure).toBe(isCircuitFailure);
    expect(config.bulkhead).toEqual({
      enabled: true,
      maxConcurrent: 10,
      maxQueueSize: 0,
      queueTimeoutMs: 1000,
    });
    expect(config.timeout).toEqual({ attemptMs: undefined, executionMs: undefined });
    expect(config.fallback).toBeUndefined();
  });

  it('uses jittered exponential backoff by default', () => {
    const { backoff } = resolveResilienceConfig().retry;

    for (let i = 0; i < 20; i++) {
      const first = backoff.getDelayMs(1);
      expect(first).toBeGreaterThanOrEqual(90);
      expect(first).toBeLessThanOrEqual(110);
      expect(backoff.getDelayMs(10)).toBeGreaterThanOrEqual(4500);
      expect(backoff.getDelayMs(10)).toBeLessThanOrEqual(5500);
    }
  });

  it('turns a backoff spec into a Backoff', () => {
    const config = resolveResilienceConfig({ retry: { backoff: { type: 'fixed', delayMs: 25 } } });

    expect(config.retry.backoff.getDelayMs(3)).toBe(25);
  });

  it('returns a frozen config', () => {
    const config = resolveResilienceConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.circuitBreaker)).toBe(true);
  });

  it('lists every invalid field', () => {
    const issues = issuesOf(() =>
      resolveResilienceConfig({
        retry: { maxAttempts: 0 },
        circuitBreaker: { failureRateThreshold: 1.5 },
        bulkhead: { maxConcurrent: 2.5 },
      }),
    );

    expect(issues).toEqual([
      'retry.maxAttempts: Number must be greater than or equal to 1',
      'circuitBreaker.failureRateThreshold: Number must be less than or equal to 1',
      'bulkhead.maxConcurrent: Expected integer, received float',
    ]);
  });

  it('rejects unknown keys', () => {
    const parsed = resilienceConfigSchema.safeParse({ retry: { attempts: 3 } });

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((issue) => issue.message)).toEqual([
      "Unrecognized key(s) in object: 'attempts'",
    ]);
  });

  it('checks settings that depend on each other', () => {
    const issues = issuesOf(() =>
      resolveResilienceConfig({
        circuitBreaker: {
          minimumSamples: 8,
          windowSize: 4,
          halfOpenMaxTrials: 1,
          halfOpenSuccessThreshold: 2,
        },
      }),
    );

    expect(issues).toEqual([
      'circuitBreaker.minimumSamples: must not exceed windowSize',
      'circuitBreaker.halfOpenSuccessThreshold: must not exceed halfOpenMaxTrials',
    ]);
  });
});

describe('mergeConfigInput', () => {
  it('merges section by section with the override winning', () => {
    const merged = mergeConfigInput(
      { retry: { maxAttempts: 5 }, bulkhead: { maxConcurrent: 3, maxQueueSize: 1 } },
      { bulkhead: { maxConcurrent: 8 }, timeout: { attemptMs: 200 } },
    );

    expect(merged).toEqual({
      retry: { maxAttempts: 5 },
      circuitBreaker: {},
      bulkhead: { maxConcurrent: 8, maxQueueSize: 1 },
      timeout: { attemptMs: 200 },
      fallback: undefined,
    });
  });

  it('keeps the base value for keys the override leaves undefined', () => {
    const merged = mergeConfigInput(
      { retry: { maxAttempts: 5 }, timeout: { attemptMs: 200 } },
      { retry: { maxAttempts: undefined }, timeout: { attemptMs: undefined, executionMs: 900 } },
    );

    expect(merged.retry).toEqual({ maxAttempts: 5 });
    expect(merged.timeout).toEqual({ attemptMs: 200, executionMs: 900 });
  });
});
