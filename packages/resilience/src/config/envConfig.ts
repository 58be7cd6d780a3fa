/**
 * Resilience configuration from environment variables.
 *
 * Each setting is looked up under the resource's own prefix first and then
 * under the shared `RESILIENCE_` prefix, e.g. for resource `billing-api`:
 * `BILLING_API_RETRY_MAX_ATTEMPTS`, then `RESILIENCE_RETRY_MAX_ATTEMPTS`.
 */

import { DEFAULT_BULKHEAD_CONFIG } from '../bulkhead';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG } from '../circuitBreaker';
import { readBoolEnv, readIntEnv, readNumberEnv, readStringEnv, type Env } from './env';
import { DEFAULT_MAX_ATTEMPTS } from './resilienceConfig';
import type { ResilienceConfigInput } from './schema';

const SHARED_PREFIX = 'RESILIENCE';

export type LoggerSettings = {
  level: string;
};

export function toEnvPrefix(resource: string): string {
  return resource
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}

export function loadResourceConfigFromEnv(env: Env, resource: string): ResilienceConfigInput {
  const prefix = toEnvPrefix(resource);
  const keys = (suffix: string): string[] =>
    prefix ? [`${prefix}_${suffix}`, `${SHARED_PREFIX}_${suffix}`] : [`${SHARED_PREFIX}_${suffix}`];

  const attemptTimeoutMs = readIntEnv(env, keys('TIMEOUT_MS'), 0, { min: 0 });
  const executionTimeoutMs = readIntEnv(env, keys('EXECUTION_TIMEOUT_MS'), 0, { min: 0 });

  return {
    retry: {
      maxAttempts: readIntEnv(env, keys('RETRY_MAX_ATTEMPTS'), DEFAULT_MAX_ATTEMPTS, { min: 1 }),
      backoff: {
        type: 'exponential',
        baseMs: readIntEnv(env, keys('RETRY_BASE_DELAY_MS'), 100, { min: 0 }),
        maxMs: readIntEnv(env, keys('RETRY_MAX_DELAY_MS'), 5000, { min: 0 }),
        jitter: readNumberEnv(env, keys('RETRY_JITTER'), 0.1, { min: 0, max: 1 }),
      },
    },
    circuitBreaker: {
      enabled: readBoolEnv(env, keys('CB_ENABLED'), true),
      failureRateThreshold: readNumberEnv(
        env,
        keys('CB_FAILURE_RATE'),
        DEFAULT_CIRCUIT_BREAKER_CONFIG.failureRateThreshold,
        { min: 0.01, max: 1 },
      ),
      minimumSamples: readIntEnv(
        env,
        keys('CB_MIN_SAMPLES'),
        DEFAULT_CIRCUIT_BREAKER_CONFIG.minimumSamples,
        { min: 1 },
      ),
      windowSize: readIntEnv(env, keys('CB_WINDOW_SIZE'), DEFAULT_CIRCUIT_BREAKER_CONFIG.windowSize, {
        min: 1,
      }),
      openDurationMs: readIntEnv(
        env,
        keys('CB_OPEN_DURATION_MS'),
        DEFAULT_CIRCUIT_BREAKER_CONFIG.openDurationMs,
        { min: 0 },
      ),
      halfOpenMaxTrials: readIntEnv(
        env,
        keys('CB_HALF_OPEN_TRIALS'),
        DEFAULT_CIRCUIT_BREAKER_CONFIG.halfOpenMaxTrials,
        { min: 1 },
      ),
    },
    bulkhead: {
      enabled: readBoolEnv(env, keys('BULKHEAD_ENABLED'), true),
      maxConcurrent: readIntEnv(
        env,
        keys('BULKHEAD_MAX_CONCURRENT'),
        DEFAULT_BULKHEAD_CONFIG.maxConcurrent,
        { min: 1 },
      ),
      maxQueueSize: readIntEnv(env, keys('BULKHEAD_MAX_QUEUE'), DEFAULT_BULKHEAD_CONFIG.maxQueueSize, {
        min: 0,
      }),
      queueTimeoutMs: readIntEnv(
        env,
        keys('BULKHEAD_QUEUE_TIMEOUT_MS'),
        DEFAULT_BULKHEAD_CONFIG.queueTimeoutMs,
        { min: 0 },
      ),
    },
    timeout: {
      attemptMs: attemptTimeoutMs > 0 ? attemptTimeoutMs : undefined,
      executionMs: executionTimeoutMs > 0 ? executionTimeoutMs : undefined,
    },
  };
}

export function loadLoggerSettings(env: Env): LoggerSettings {
  return {
    level: readStringEnv(env, ['RESILIENCE_LOG_LEVEL', 'LOG_LEVEL'], 'info'),
  };
}
