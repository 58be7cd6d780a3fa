/**
 * Bulkhead pattern implementation for concurrency limiting.
 *
 * A counting semaphore per resource. Excess callers are rejected, or wait in
 * a bounded FIFO queue (up to `queueTimeoutMs`) when `maxQueueSize > 0`.
 *
 * @example
 * ```ts
 * const bulkhead = createBulkhead('database', {
 *   maxConcurrent: 10,
 *   maxQueueSize: 50,
 *   queueTimeoutMs: 5000,
 * });
 *
 * try {
 *   const rows = await bulkhead.execute(() => db.query(sql));
 * } catch (err) {
 *   if (isBulkheadFullError(err)) {
 *     // Saturated, queue full or timed out
 *   }
 * }
 * ```
 */

import { systemClock, type Clock, type TimerHandle } from './clock';
import { createBulkheadFullError, type BulkheadRejectionReason } from './errors';

export type BulkheadConfig = {
  /** Maximum concurrent executions (default: 10) */
  maxConcurrent: number;
  /** Maximum queue size (default: 0 = reject immediately when full) */
  maxQueueSize: number;
  /** Queue timeout in ms (default: 1000) */
  queueTimeoutMs: number;
};

export type BulkheadEvents = {
  onAcquire?: (resource: string, active: number, queued: number) => void;
  onRelease?: (resource: string, active: number, queued: number) => void;
  onRejected?: (resource: string, reason: BulkheadRejectionReason) => void;
};

/** A held slot. Releasing more than once has no further effect. */
export type Permit = {
  readonly released: boolean;
  release(): void;
};

export type Bulkhead = {
  /** Take a slot now, or `null` when all are in use */
  tryAcquire(): Permit | null;
  /** Take a slot, waiting in the queue when one is configured */
  acquire(signal?: AbortSignal): Promise<Permit>;
  release(permit: Permit): void;
  /** Execute with concurrency control; the slot is released on every exit path */
  execute<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T>;
  getActiveCount(): number;
  getQueueLength(): number;
  getResource(): string;
};

type QueuedRequest = {
  grant: (permit: Permit) => void;
  timeoutId: TimerHandle;
  detach: () => void;
};

export const DEFAULT_BULKHEAD_CONFIG: Readonly<BulkheadConfig> = {
  maxConcurrent: 10,
  maxQueueSize: 0,
  queueTimeoutMs: 1000,
};

/**
 * Creates a bulkhead for concurrency limiting.
 *
 * @param resource - Name of the guarded resource (for errors, logging and metrics)
 * @param config - Bulkhead configuration
 * @param events - Optional event callbacks
 */
export function createBulkhead(
  resource: string,
  config?: Partial<BulkheadConfig>,
  events?: BulkheadEvents,
  clock: Clock = systemClock,
): Bulkhead {
  const cfg: BulkheadConfig = { ...DEFAULT_BULKHEAD_CONFIG, ...config };

  let activeCount = 0;
  const queue: QueuedRequest[] = [];

  const createPermit = (): Permit => {
    activeCount++;
    events?.onAcquire?.(resource, activeCount, queue.length);

    let released = false;
    return {
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        activeCount--;
        events?.onRelease?.(resource, activeCount, queue.length);
        tryDequeue();
      },
    };
  };

  const tryDequeue = (): void => {
    if (queue.length === 0 || activeCount >= cfg.maxConcurrent) {
      return;
    }

    const next = queue.shift();
    if (next) {
      clock.clearTimeout(next.timeoutId);
      next.detach();
      next.grant(createPermit());
    }
  };

  const reject = (reason: BulkheadRejectionReason): Promise<never> => {
    events?.onRejected?.(resource, reason);
    return Promise.reject(createBulkheadFullError(resource, reason));
  };

  const tryAcquire = (): Permit | null => {
    if (activeCount < cfg.maxConcurrent) {
      return createPermit();
    }
    return null;
  };

  const acquire = (signal?: AbortSignal): Promise<Permit> => {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const permit = tryAcquire();
    if (permit) {
      return Promise.resolve(permit);
    }

    if (cfg.maxQueueSize <= 0) {
      return reject('full');
    }

    if (queue.length >= cfg.maxQueueSize) {
      return reject('queue_full');
    }

    return new Promise<Permit>((resolve, rejectWaiter) => {
      const leaveQueue = (): void => {
        const index = queue.indexOf(request);
        if (index !== -1) {
          queue.splice(index, 1);
        }
      };

      const onAbort = (): void => {
        clock.clearTimeout(request.timeoutId);
        leaveQueue();
        rejectWaiter(signal?.reason);
      };

      const request: QueuedRequest = {
        grant: resolve,
        timeoutId: clock.setTimeout(() => {
          leaveQueue();
          request.detach();
          events?.onRejected?.(resource, 'queue_timeout');
          rejectWaiter(createBulkheadFullError(resource, 'queue_timeout'));
        }, cfg.queueTimeoutMs),
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(request);
    });
  };

  const execute = async <T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
    const permit = await acquire(signal);
    try {
      return await call();
    } finally {
      permit.release();
    }
  };

  return {
    tryAcquire,
    acquire,
    release: (permit) => permit.release(),
    execute,
    getActiveCount: () => activeCount,
    getQueueLength: () => queue.length,
    getResource: () => resource,
  };
}
