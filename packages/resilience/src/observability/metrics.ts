/**
 * Prometheus metrics for resilience pipelines, exposed as a hook set.
 *
 * @example
 * ```ts
 * const metrics = createResilienceMetrics({ registry: appRegistry });
 * const resilience = createResilienceRegistry({ hooks: [metrics.hooks] });
 * ```
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import type { CircuitState } from '../circuitBreaker';
import type { ResilienceHooks } from './hooks';

export type ResilienceMetricsOptions = {
  /** Registry to register with (default: a new private registry) */
  registry?: Registry;
  /** Metric name prefix (default: 'resilience') */
  prefix?: string;
};

export type ResilienceMetrics = {
  registry: Registry;
  hooks: ResilienceHooks;
  executions: Counter<'resource' | 'status'>;
  executionDuration: Histogram<'resource' | 'status'>;
  retries: Counter<'resource'>;
  timeouts: Counter<'resource' | 'scope'>;
  rejections: Counter<'resource' | 'component' | 'reason'>;
  fallbacks: Counter<'resource'>;
  circuitState: Gauge<'resource'>;
};

const CIRCUIT_STATE_VALUES: Record<CircuitState, number> = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
};

export function createResilienceMetrics(options: ResilienceMetricsOptions = {}): ResilienceMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'resilience';

  const executions = new Counter({
    name: `${prefix}_executions_total`,
    help: 'Pipeline executions by final status.',
    labelNames: ['resource', 'status'],
    registers: [registry],
  });

  const executionDuration = new Histogram({
    name: `${prefix}_execution_duration_seconds`,
    help: 'Pipeline execution duration in seconds, retries and backoff included.',
    labelNames: ['resource', 'status'],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10],
    registers: [registry],
  });

  const retries = new Counter({
    name: `${prefix}_retries_total`,
    help: 'Retry attempts scheduled after a retryable failure.',
    labelNames: ['resource'],
    registers: [registry],
  });

  const timeouts = new Counter({
    name: `${prefix}_timeouts_total`,
    help: 'Attempts or executions that exceeded their deadline.',
    labelNames: ['resource', 'scope'],
    registers: [registry],
  });

  const rejections = new Counter({
    name: `${prefix}_rejections_total`,
    help: 'Calls rejected by a circuit breaker or bulkhead.',
    labelNames: ['resource', 'component', 'reason'],
    registers: [registry],
  });

  const fallbacks = new Counter({
    name: `${prefix}_fallbacks_total`,
    help: 'Executions answered by a fallback.',
    labelNames: ['resource'],
    registers: [registry],
  });

  const circuitState = new Gauge({
    name: `${prefix}_circuit_state`,
    help: 'Circuit breaker state (0 = closed, 1 = half-open, 2 = open).',
    labelNames: ['resource'],
    registers: [registry],
  });

  const hooks: ResilienceHooks = {
    onRetry: (resource) => {
      retries.inc({ resource });
    },
    onTimeout: (resource, scope) => {
      timeouts.inc({ resource, scope });
    },
    onCircuitReject: (resource) => {
      rejections.inc({ resource, component: 'circuit_breaker', reason: 'open' });
    },
    onBulkheadReject: (resource, reason) => {
      rejections.inc({ resource, component: 'bulkhead', reason });
    },
    onFallback: (resource) => {
      fallbacks.inc({ resource });
    },
    onCircuitCreated: (resource, state) => {
      circuitState.set({ resource }, CIRCUIT_STATE_VALUES[state]);
    },
    onCircuitStateChange: (resource, _from, to) => {
      circuitState.set({ resource }, CIRCUIT_STATE_VALUES[to]);
    },
    onExecution: (resource, outcome) => {
      executions.inc({ resource, status: outcome.status });
      executionDuration.observe({ resource, status: outcome.status }, outcome.durationMs / 1000);
    },
  };

  return {
    registry,
    hooks,
    executions,
    executionDuration,
    retries,
    timeouts,
    rejections,
    fallbacks,
    circuitState,
  };
}
