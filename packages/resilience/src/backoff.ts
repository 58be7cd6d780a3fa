/**
 * Backoff strategies: the delay between a failed attempt and the next one.
 *
 * @example
 * ```ts
 * const backoff = withJitter(exponentialBackoff({ baseMs: 100, maxMs: 5000 }), 0.2);
 *
 * backoff.getDelayMs(1); // ~100ms
 * backoff.getDelayMs(3); // ~400ms
 * ```
 */

import type { BackoffSpec } from './config/schema';
import { assertNever } from './types/exhaustive';

export type Backoff = {
  /** Delay in milliseconds after the given failed attempt (1-indexed) */
  getDelayMs(attempt: number): number;
};

export type BackoffFunction = (attempt: number) => number;

/** Anything `toBackoff` accepts */
export type BackoffInput = Backoff | BackoffFunction | readonly number[] | BackoffSpec;

export type ExponentialBackoffOptions = {
  /** Base delay in milliseconds (default: 100) */
  baseMs?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxMs?: number;
  /** Multiplier for each attempt (default: 2) */
  multiplier?: number;
};

/**
 * Delay formula: min(baseMs * multiplier^(attempt-1), maxMs)
 *
 * @example
 * ```ts
 * exponentialBackoff({ baseMs: 1000, maxMs: 30000 });
 * // Delays: 1s, 2s, 4s, 8s, 16s, 30s (capped)
 * ```
 */
export function exponentialBackoff(options: ExponentialBackoffOptions = {}): Backoff {
  const { baseMs = 100, maxMs = 5000, multiplier = 2 } = options;

  return {
    getDelayMs: (attempt) => Math.min(baseMs * multiplier ** (attempt - 1), maxMs),
  };
}

export function constantBackoff(options: { delayMs?: number } = {}): Backoff {
  const { delayMs = 1000 } = options;
  return { getDelayMs: () => delayMs };
}

export type LinearBackoffOptions = {
  /** Initial delay in milliseconds (default: 1000) */
  initialMs?: number;
  /** Increment per attempt in milliseconds (default: 1000) */
  incrementMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxMs?: number;
};

/**
 * Delay formula: min(initialMs + incrementMs * (attempt - 1), maxMs)
 */
export function linearBackoff(options: LinearBackoffOptions = {}): Backoff {
  const { initialMs = 1000, incrementMs = 1000, maxMs = 30_000 } = options;

  return {
    getDelayMs: (attempt) => Math.min(initialMs + incrementMs * (attempt - 1), maxMs),
  };
}

/**
 * Explicit delay schedule. Attempts past the end of the schedule reuse its last entry.
 *
 * @example
 * ```ts
 * scheduleBackoff([50, 200, 1000]).getDelayMs(5); // 1000
 * ```
 */
export function scheduleBackoff(delaysMs: readonly number[]): Backoff {
  if (delaysMs.length === 0) {
    return { getDelayMs: () => 0 };
  }

  const last = delaysMs[delaysMs.length - 1];
  return {
    getDelayMs: (attempt) => delaysMs[attempt - 1] ?? last,
  };
}

/**
 * Adds ±`jitterFactor` randomness to a backoff to keep callers from retrying in lockstep.
 *
 * @param jitterFactor - 0-1, default 0.1 (±10%)
 * @param random - Source of uniform numbers in [0, 1), default `Math.random`
 */
export function withJitter(
  backoff: Backoff,
  jitterFactor: number = 0.1,
  random: () => number = Math.random,
): Backoff {
  return {
    getDelayMs: (attempt) => {
      const baseDelay = backoff.getDelayMs(attempt);
      const jitter = baseDelay * jitterFactor * (random() * 2 - 1);
      return Math.max(0, Math.round(baseDelay + jitter));
    },
  };
}

function fromSpec(spec: BackoffSpec): Backoff {
  const base = ((): Backoff => {
    switch (spec.type) {
      case 'fixed':
        return constantBackoff({ delayMs: spec.delayMs });
      case 'linear':
        return linearBackoff(spec);
      case 'exponential':
        return exponentialBackoff(spec);
      case 'schedule':
        return scheduleBackoff(spec.delaysMs);
      default:
        return assertNever(spec);
    }
  })();

  return spec.jitter ? withJitter(base, spec.jitter) : base;
}

function isSchedule(input: BackoffInput): input is readonly number[] {
  return Array.isArray(input);
}

function isBackoff(input: BackoffInput): input is Backoff {
  return typeof input === 'object' && 'getDelayMs' in input;
}

/**
 * Normalizes every supported backoff shape into a `Backoff`.
 */
export function toBackoff(input: BackoffInput): Backoff {
  if (typeof input === 'function') {
    return { getDelayMs: input };
  }
  if (isSchedule(input)) {
    return scheduleBackoff(input);
  }
  if (isBackoff(input)) {
    return input;
  }
  return fromSpec(input);
}
