/**
 * Resilience registry: named resources, each with its own pipeline.
 *
 * A resource is created with the registry defaults the first time it is
 * referenced; `configure` replaces it with a freshly built pipeline, so the
 * previous breaker window and bulkhead permits are discarded. Executions
 * already in flight finish against the pipeline they started on.
 *
 * @example
 * ```ts
 * const resilience = createResilienceRegistry({
 *   logger: createResilienceLogger({ level: 'info' }),
 *   hooks: [metrics.hooks],
 * });
 *
 * resilience.configure('payments', {
 *   retry: { maxAttempts: 2 },
 *   timeout: { attemptMs: 2000 },
 * });
 *
 * const result = await resilience.execute('payments', ({ signal }) => gateway.charge(order, { signal }));
 * ```
 */

import type { Logger } from 'pino';

import type { CircuitSnapshot, CircuitState } from './circuitBreaker';
import { systemClock, type Clock } from './clock';
import { mergeConfigInput, resolveResilienceConfig } from './config/resilienceConfig';
import type { ResilienceConfigInput } from './config/schema';
import {
  createHookDispatcher,
  createLoggingHooks,
  type ResilienceHooks,
} from './observability/hooks';
import { createSilentLogger } from './observability/logger';
import {
  createResiliencePipeline,
  type ExecuteOptions,
  type ResiliencePipeline,
} from './pipeline';
import type { PipelineResult } from './result';
import type { Fallback, Operation } from './types';

export type ResilienceRegistryOptions = {
  clock?: Clock;
  /** Receives state changes, rejections, retries and hook errors (default: silent) */
  logger?: Logger;
  hooks?: ResilienceHooks | ResilienceHooks[];
  /** Base config every resource starts from; `configure` input is layered on top */
  defaults?: ResilienceConfigInput;
};

export type ResourceStats = {
  resource: string;
  /** `undefined` when the circuit breaker is disabled */
  circuit: CircuitSnapshot | undefined;
  activeCount: number;
  queueLength: number;
};

export type ResilienceRegistry = {
  /**
   * Registers or replaces the configuration of `resource`.
   *
   * @throws ResilienceConfigError when the merged config is invalid
   */
  configure(resource: string, config: ResilienceConfigInput): ResiliencePipeline;
  execute<T>(
    resource: string,
    operation: Operation<T>,
    fallback?: undefined,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, unknown>>;
  execute<T, F>(
    resource: string,
    operation: Operation<T>,
    fallback: Fallback<F>,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, F>>;
  getPipeline(resource: string): ResiliencePipeline;
  /** `undefined` for unknown resources or a disabled breaker */
  getCircuitState(resource: string): CircuitState | undefined;
  /** `undefined` for unknown resources */
  getStats(resource: string): ResourceStats | undefined;
  getResourceNames(): string[];
  /** Closes the circuit of `resource` and empties its window */
  reset(resource: string): void;
};

export function createResilienceRegistry(options: ResilienceRegistryOptions = {}): ResilienceRegistry {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createSilentLogger();
  const defaults = options.defaults ?? {};
  const userHooks = options.hooks === undefined ? [] : [options.hooks].flat();
  const hooks = createHookDispatcher([createLoggingHooks(logger), ...userHooks], logger);
  const pipelines = new Map<string, ResiliencePipeline>();

  // Validate the defaults up front rather than on first use of a resource.
  resolveResilienceConfig(defaults);

  const build = (resource: string, input: ResilienceConfigInput): ResiliencePipeline =>
    createResiliencePipeline(resource, resolveResilienceConfig(mergeConfigInput(defaults, input)), {
      clock,
      hooks,
    });

  const getPipeline = (resource: string): ResiliencePipeline => {
    const existing = pipelines.get(resource);
    if (existing) {
      return existing;
    }
    const pipeline = build(resource, {});
    pipelines.set(resource, pipeline);
    logger.debug({ resource }, 'resilience.resource.created');
    return pipeline;
  };

  const configure = (resource: string, config: ResilienceConfigInput): ResiliencePipeline => {
    const pipeline = build(resource, config);
    const replaced = pipelines.has(resource);
    pipelines.set(resource, pipeline);
    logger.info(
      {
        resource,
        replaced,
        maxAttempts: pipeline.config.retry.maxAttempts,
        circuitBreaker: pipeline.config.circuitBreaker.enabled,
        bulkhead: pipeline.config.bulkhead.enabled,
        attemptTimeoutMs: pipeline.config.timeout.attemptMs,
        executionTimeoutMs: pipeline.config.timeout.executionMs,
      },
      'resilience.configure',
    );
    return pipeline;
  };

  function execute<T>(
    resource: string,
    operation: Operation<T>,
    fallback?: undefined,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, unknown>>;
  function execute<T, F>(
    resource: string,
    operation: Operation<T>,
    fallback: Fallback<F>,
    options?: ExecuteOptions,
  ): Promise<PipelineResult<T, F>>;
  function execute<T, F>(
    resource: string,
    operation: Operation<T>,
    fallback?: Fallback<F>,
    executeOptions?: ExecuteOptions,
  ): Promise<PipelineResult<T, unknown>> {
    const pipeline = getPipeline(resource);
    return fallback
      ? pipeline.execute(operation, fallback, executeOptions)
      : pipeline.execute(operation, undefined, executeOptions);
  }

  const getStats = (resource: string): ResourceStats | undefined => {
    const pipeline = pipelines.get(resource);
    if (!pipeline) {
      return undefined;
    }
    return {
      resource,
      circuit: pipeline.circuitBreaker?.getSnapshot(),
      activeCount: pipeline.bulkhead?.getActiveCount() ?? 0,
      queueLength: pipeline.bulkhead?.getQueueLength() ?? 0,
    };
  };

  return {
    configure,
    execute,
    getPipeline,
    getCircuitState: (resource) => pipelines.get(resource)?.circuitBreaker?.getState(),
    getStats,
    getResourceNames: () => [...pipelines.keys()],
    reset: (resource) => {
      const breaker = pipelines.get(resource)?.circuitBreaker;
      if (breaker) {
        breaker.reset();
        logger.info({ resource }, 'resilience.circuit.reset');
      }
    },
  };
}
