/**
 * Observability hooks fired by resilience pipelines.
 *
 * Hooks are plain callbacks; a registry accepts any number of hook sets and
 * fans every event out to each of them. A hook that throws is logged and
 * never changes the outcome of the execution that fired it.
 */

import type { Logger } from 'pino';

import type { CircuitState } from '../circuitBreaker';
import type { BulkheadRejectionReason, TimeoutScope } from '../errors';

export type ExecutionStatus = 'success' | 'fallback' | 'failure';

export type ExecutionOutcome = {
  status: ExecutionStatus;
  attempts: number;
  durationMs: number;
  error?: Error;
};

export type ResilienceHookArgs = {
  onRetry: [resource: string, attempt: number, error: unknown, delayMs: number];
  /** A pipeline with a circuit breaker was built for the resource */
  onCircuitCreated: [resource: string, state: CircuitState];
  onCircuitStateChange: [resource: string, from: CircuitState, to: CircuitState];
  onCircuitReject: [resource: string];
  onBulkheadReject: [resource: string, reason: BulkheadRejectionReason];
  onTimeout: [resource: string, scope: TimeoutScope, timeoutMs: number];
  onFallback: [resource: string, error: Error];
  onExecution: [resource: string, outcome: ExecutionOutcome];
};

export type ResilienceHookName = keyof ResilienceHookArgs;

export type ResilienceHooks = {
  [K in ResilienceHookName]?: (...args: ResilienceHookArgs[K]) => void;
};

export type HookDispatcher = {
  emit<K extends ResilienceHookName>(name: K, ...args: ResilienceHookArgs[K]): void;
};

function invokeHook<K extends ResilienceHookName>(
  hooks: ResilienceHooks,
  name: K,
  args: ResilienceHookArgs[K],
): void {
  const hook: ((...hookArgs: ResilienceHookArgs[K]) => void) | undefined = hooks[name];
  hook?.(...args);
}

export function createHookDispatcher(
  hookSets: readonly ResilienceHooks[],
  logger: Logger,
): HookDispatcher {
  return {
    emit<K extends ResilienceHookName>(name: K, ...args: ResilienceHookArgs[K]): void {
      for (const hooks of hookSets) {
        try {
          invokeHook(hooks, name, args);
        } catch (error) {
          logger.error({ err: error, hook: name, resource: args[0] }, 'resilience.hook.failed');
        }
      }
    },
  };
}

/**
 * Merges hook sets into one that calls each set in order. Unlike the
 * dispatcher, a throwing hook propagates to the caller.
 */
export function combineHooks(...hookSets: ResilienceHooks[]): ResilienceHooks {
  const combined: ResilienceHooks = {};
  const names: ResilienceHookName[] = [
    'onRetry',
    'onCircuitCreated',
    'onCircuitStateChange',
    'onCircuitReject',
    'onBulkheadReject',
    'onTimeout',
    'onFallback',
    'onExecution',
  ];
  for (const name of names) {
    assignCombined(combined, name, hookSets);
  }
  return combined;
}

function assignCombined<K extends ResilienceHookName>(
  target: ResilienceHooks,
  name: K,
  hookSets: readonly ResilienceHooks[],
): void {
  if (!hookSets.some((hooks) => hooks[name] !== undefined)) {
    return;
  }
  const hook: (...args: ResilienceHookArgs[K]) => void = (...args) => {
    for (const hooks of hookSets) {
      invokeHook(hooks, name, args);
    }
  };
  target[name] = hook;
}

/**
 * Hooks that write every resilience event to `logger`.
 */
export function createLoggingHooks(logger: Logger): ResilienceHooks {
  return {
    onRetry: (resource, attempt, error, delayMs) => {
      logger.debug({ resource, attempt, delayMs, err: error }, 'resilience.retry');
    },
    onCircuitStateChange: (resource, from, to) => {
      logger.warn({ resource, from, to }, 'resilience.circuit.state_change');
    },
    onCircuitReject: (resource) => {
      logger.warn({ resource }, 'resilience.circuit.rejected');
    },
    onBulkheadReject: (resource, reason) => {
      logger.warn({ resource, reason }, 'resilience.bulkhead.rejected');
    },
    onTimeout: (resource, scope, timeoutMs) => {
      logger.warn({ resource, scope, timeoutMs }, 'resilience.timeout');
    },
    onFallback: (resource, error) => {
      logger.info({ resource, err: error }, 'resilience.fallback');
    },
    onExecution: (resource, outcome) => {
      if (outcome.status === 'failure') {
        logger.error(
          { resource, attempts: outcome.attempts, durationMs: outcome.durationMs, err: outcome.error },
          'resilience.execution.failed',
        );
      }
    },
  };
}
