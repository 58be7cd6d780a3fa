/**
 * Circuit Breaker pattern with a rolling failure-rate window.
 *
 * States:
 * - CLOSED: Normal operation, every call is allowed and its outcome sampled
 * - OPEN: Circuit is tripped, calls are rejected without running
 * - HALF_OPEN: A bounded number of trial calls test for recovery
 *
 * The only transitions are CLOSED → OPEN (failure rate breached),
 * OPEN → HALF_OPEN (open duration elapsed), HALF_OPEN → CLOSED (enough trial
 * successes) and HALF_OPEN → OPEN (any trial failure).
 *
 * @example
 * ```ts
 * const cb = createCircuitBreaker('inventory', {
 *   failureRateThreshold: 0.5,
 *   minimumSamples: 10,
 *   openDurationMs: 30000,
 * });
 *
 * try {
 *   const stock = await cb.execute(() => inventory.lookup(sku));
 * } catch (err) {
 *   if (isCircuitOpenError(err)) {
 *     // Fast-fail, inventory is unavailable
 *   }
 * }
 * ```
 */

import { systemClock, type Clock } from './clock';
import { createCircuitOpenError, isRejection } from './errors';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type CircuitBreakerConfig = {
  /** Failure rate (0-1) at or above which the circuit opens (default: 0.5) */
  failureRateThreshold: number;
  /** Samples required in the window before the rate is evaluated (default: 10) */
  minimumSamples: number;
  /** Maximum number of outcomes kept in the window (default: 20) */
  windowSize: number;
  /** Outcomes older than this are evicted; 0 keeps them until pushed out by count (default: 60000) */
  windowDurationMs: number;
  /** Time in ms to stay OPEN before admitting trial calls (default: 30000) */
  openDurationMs: number;
  /** Trial calls admitted while HALF_OPEN (default: 2) */
  halfOpenMaxTrials: number;
  /** Trial successes needed to close; defaults to `halfOpenMaxTrials` */
  halfOpenSuccessThreshold?: number;
};

export type CircuitBreakerEvents = {
  onStateChange?: (from: CircuitState, to: CircuitState, resource: string) => void;
  onRejected?: (resource: string) => void;
};

export type FailureClassifier = (error: unknown) => boolean;

export type CircuitBreakerOptions = {
  clock?: Clock;
  /** Which errors count as failure samples (default: anything but pipeline rejections) */
  isFailure?: FailureClassifier;
};

/** Timestamped outcome kept in the rolling window */
export type CallRecord = {
  at: number;
  failed: boolean;
};

/**
 * Handed out on admission. Outcomes recorded with an admission from an earlier
 * state (generation) never count toward HALF_OPEN trials.
 */
export type CircuitAdmission = {
  readonly generation: number;
};

export type CircuitSnapshot = {
  state: CircuitState;
  samples: number;
  failures: number;
  /** failures / samples, 0 when the window is empty */
  failureRate: number;
  openedAt: number | null;
  halfOpenAdmitted: number;
  halfOpenSuccesses: number;
};

export type CircuitBreaker = {
  getResource(): string;
  /** Current state, applying the OPEN → HALF_OPEN transition if it is due */
  getState(): CircuitState;
  getSnapshot(): CircuitSnapshot;
  /** Milliseconds until a call could be admitted; 0 when one would be now */
  getRetryAfterMs(): number;
  /**
   * Admission check. While HALF_OPEN each `true` consumes a trial slot, which the
   * caller gives back through exactly one of the `record…` methods.
   */
  allow(): boolean;
  /** Like `allow`, but returns the admission to pass back to `record…`; `undefined` when rejected */
  admit(): CircuitAdmission | undefined;
  recordSuccess(admission?: CircuitAdmission): void;
  recordFailure(admission?: CircuitAdmission): void;
  /** Report an outcome that is not a failure sample (hands a trial slot back) */
  recordIgnored(admission?: CircuitAdmission): void;
  /** Admission, call and outcome recording in one step */
  execute<T>(call: () => Promise<T>): Promise<T>;
  /** Force back to CLOSED with an empty window */
  reset(): void;
};

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: Readonly<CircuitBreakerConfig> = {
  failureRateThreshold: 0.5,
  minimumSamples: 10,
  windowSize: 20,
  windowDurationMs: 60_000,
  openDurationMs: 30_000,
  halfOpenMaxTrials: 2,
};

export const isCircuitFailure: FailureClassifier = (error) => !isRejection(error);

/**
 * Creates a circuit breaker for a resource.
 *
 * @param resource - Name of the guarded resource (for errors, logging and metrics)
 * @param config - Circuit breaker configuration
 * @param events - Optional event callbacks for state changes
 */
export function createCircuitBreaker(
  resource: string,
  config?: Partial<CircuitBreakerConfig>,
  events?: CircuitBreakerEvents,
  options: CircuitBreakerOptions = {},
): CircuitBreaker {
  const cfg: CircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
  const successThreshold = cfg.halfOpenSuccessThreshold ?? cfg.halfOpenMaxTrials;
  const clock = options.clock ?? systemClock;
  const isFailure = options.isFailure ?? isCircuitFailure;

  let state: CircuitState = 'CLOSED';
  let openedAt: number | null = null;
  let halfOpenAdmitted = 0;
  let halfOpenSuccesses = 0;
  let window: CallRecord[] = [];
  // Advances on every transition and reset
  let generation = 0;

  const evictExpired = (now: number): void => {
    if (cfg.windowDurationMs <= 0) return;
    const cutoff = now - cfg.windowDurationMs;
    while (window.length > 0 && window[0].at <= cutoff) {
      window.shift();
    }
  };

  const countFailures = (): number => window.filter((record) => record.failed).length;

  const transitionTo = (next: CircuitState): void => {
    if (state === next) return;

    const previous = state;
    state = next;
    generation++;
    halfOpenAdmitted = 0;
    halfOpenSuccesses = 0;

    if (next === 'OPEN') {
      openedAt = clock.now();
    } else if (next === 'CLOSED') {
      openedAt = null;
      window = [];
    }

    events?.onStateChange?.(previous, next, resource);
  };

  const getState = (): CircuitState => {
    if (state === 'OPEN' && openedAt !== null && clock.now() - openedAt >= cfg.openDurationMs) {
      transitionTo('HALF_OPEN');
    }
    return state;
  };

  const getRetryAfterMs = (): number => {
    const current = getState();
    if (current === 'OPEN' && openedAt !== null) {
      return Math.max(0, openedAt + cfg.openDurationMs - clock.now());
    }
    return 0;
  };

  const admit = (): CircuitAdmission | undefined => {
    const current = getState();

    if (current === 'CLOSED') {
      return { generation };
    }

    if (current === 'HALF_OPEN' && halfOpenAdmitted < cfg.halfOpenMaxTrials) {
      halfOpenAdmitted++;
      return { generation };
    }

    events?.onRejected?.(resource);
    return undefined;
  };

  const allow = (): boolean => admit() !== undefined;

  /** No admission means the caller does not track one: treat it as current. */
  const isCurrent = (admission: CircuitAdmission | undefined): boolean =>
    admission === undefined || admission.generation === generation;

  const appendOutcome = (failed: boolean): void => {
    const now = clock.now();
    window.push({ at: now, failed });
    while (window.length > cfg.windowSize) {
      window.shift();
    }
    evictExpired(now);
  };

  const recordSuccess = (admission?: CircuitAdmission): void => {
    const current = getState();
    if (current === 'HALF_OPEN') {
      if (!isCurrent(admission)) return;
      halfOpenSuccesses++;
      if (halfOpenSuccesses >= successThreshold) {
        transitionTo('CLOSED');
      }
    } else if (current === 'CLOSED') {
      appendOutcome(false);
    }
    // OPEN: late outcome of a call admitted before the circuit tripped
  };

  const recordFailure = (admission?: CircuitAdmission): void => {
    const current = getState();
    if (current === 'HALF_OPEN') {
      if (isCurrent(admission)) {
        transitionTo('OPEN');
      }
    } else if (current === 'CLOSED') {
      appendOutcome(true);
      if (
        window.length >= cfg.minimumSamples &&
        countFailures() / window.length >= cfg.failureRateThreshold
      ) {
        transitionTo('OPEN');
      }
    }
  };

  const recordIgnored = (admission?: CircuitAdmission): void => {
    if (getState() === 'HALF_OPEN' && isCurrent(admission) && halfOpenAdmitted > 0) {
      halfOpenAdmitted--;
    }
  };

  const getSnapshot = (): CircuitSnapshot => {
    const current = getState();
    evictExpired(clock.now());
    const failures = countFailures();
    return {
      state: current,
      samples: window.length,
      failures,
      failureRate: window.length === 0 ? 0 : failures / window.length,
      openedAt,
      halfOpenAdmitted,
      halfOpenSuccesses,
    };
  };

  const execute = async <T>(call: () => Promise<T>): Promise<T> => {
    const admission = admit();
    if (!admission) {
      throw createCircuitOpenError(resource, getRetryAfterMs());
    }

    try {
      const result = await call();
      recordSuccess(admission);
      return result;
    } catch (error) {
      if (isFailure(error)) {
        recordFailure(admission);
      } else {
        recordIgnored(admission);
      }
      throw error;
    }
  };

  const reset = (): void => {
    state = 'CLOSED';
    generation++;
    openedAt = null;
    halfOpenAdmitted = 0;
    halfOpenSuccesses = 0;
    window = [];
  };

  return {
    getResource: () => resource,
    getState,
    getSnapshot,
    getRetryAfterMs,
    allow,
    admit,
    recordSuccess,
    recordFailure,
    recordIgnored,
    execute,
    reset,
  };
}
