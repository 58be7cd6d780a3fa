import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveResilienceConfig } from '../src/config/resilienceConfig';
import type { ResilienceConfigInput } from '../src/config/schema';
import {
  createPermanentFailure,
  isBulkheadFullError,
  isCircuitOpenError,
  isExecutionCancelledError,
  isFallbackFailure,
  isTimeoutError,
} from '../src/errors';
import { createHookDispatcher, type ResilienceHooks } from '../src/observability/hooks';
import { createSilentLogger } from '../src/observability/logger';
import { createResiliencePipeline } from '../src/pipeline';
import type { Operation } from '../src/types';
import { deferred, hang } from './helpers';

const createPipeline = (input: ResilienceConfigInput, hooks: ResilienceHooks = {}) =>
  createResiliencePipeline(
    'svc',
    resolveResilienceConfig({
      ...input,
      retry: { backoff: { type: 'fixed', delayMs: 10 }, ...input.retry },
    }),
    { hooks: createHookDispatcher([hooks], createSilentLogger()) },
  );

const failing = (message = 'down'): Operation<string> => async () => {
  throw new Error(message);
};

describe('ResiliencePipeline', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('success path', () => {
    it('returns Success on the first attempt', async () => {
      const pipeline = createPipeline({});
      const operation = vi.fn<Operation<string>>().mockResolvedValue('ok');

      const result = await pipeline.execute(operation);

      expect(result).toEqual({
        status: 'success',
        value: 'ok',
        attempts: 1,
        durationMs: 0,
        trace: ['ADMITTED', 'RUNNING', 'SUCCEEDED'],
      });
      expect(operation).toHaveBeenCalledWith(
        expect.objectContaining({ resource: 'svc', attempt: 1 }),
      );
    });

    it('retries transient failures until one succeeds', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 3 } });
      const operation = vi
        .fn<Operation<string>>()
        .mockRejectedValueOnce(new Error('blip'))
        .mockRejectedValueOnce(new Error('blip'))
        .mockResolvedValue('ok');

      const pending = pipeline.execute(operation);
      await vi.advanceTimersByTimeAsync(20);
      const result = await pending;

      expect(result).toMatchObject({ status: 'success', value: 'ok', attempts: 3, durationMs: 20 });
      expect(result.trace).toEqual([
        'ADMITTED',
        'RUNNING',
        'RETRYING',
        'RUNNING',
        'RETRYING',
        'RUNNING',
        'SUCCEEDED',
      ]);
    });

    it('does not retry permanent failures', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 3 } });
      const operation = vi.fn<Operation<string>>().mockRejectedValue(createPermanentFailure('invalid'));

      const result = await pipeline.execute(operation);

      expect(result).toMatchObject({ status: 'failure', attempts: 1 });
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('fallback', () => {
    it('answers with the fallback once retries are exhausted', async () => {
      const onFallback = vi.fn();
      const pipeline = createPipeline({ retry: { maxAttempts: 2 } }, { onFallback });
      const fallback = vi.fn(() => 'cached');

      const pending = pipeline.execute(failing(), fallback);
      await vi.advanceTimersByTimeAsync(10);
      const result = await pending;

      expect(result.status).toBe('fallback');
      if (result.status !== 'fallback') return;
      expect(result.value).toBe('cached');
      expect(result.error.message).toBe('down');
      expect(result.attempts).toBe(2);
      expect(result.trace).toEqual(['ADMITTED', 'RUNNING', 'RETRYING', 'RUNNING', 'FALLBACK']);
      expect(fallback).toHaveBeenCalledWith(new Error('down'), { resource: 'svc', attempts: 2 });
      expect(onFallback).toHaveBeenCalledWith('svc', new Error('down'));
    });

    it('uses the configured fallback when none is passed', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 1 }, fallback: async () => 'configured' });

      const result = await pipeline.execute(failing());

      expect(result).toMatchObject({ status: 'fallback', value: 'configured' });
    });

    it('prefers the fallback passed to execute over the configured one', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 1 }, fallback: () => 'configured' });

      const result = await pipeline.execute(failing(), () => 'call-site');

      expect(result).toMatchObject({ status: 'fallback', value: 'call-site' });
    });

    it('returns Failure(FallbackFailure) when the fallback throws', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 1 } });
      const fallbackError = new Error('cache miss');

      const result = await pipeline.execute(failing(), () => {
        throw fallbackError;
      });

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(isFallbackFailure(result.error)).toBe(true);
      expect(result.error.message).toBe("Fallback failed for resource 'svc'");
      expect(result.error.cause).toBe(fallbackError);
      expect(result.error).toMatchObject({ primaryError: new Error('down') });
      expect(result.trace).toEqual(['ADMITTED', 'RUNNING', 'FAILED']);
    });

    it('returns Failure with the original error when there is no fallback', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 1 } });

      const result = await pipeline.execute(failing('boom'));

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.message).toBe('boom');
      expect(result.trace).toEqual(['ADMITTED', 'RUNNING', 'FAILED']);
    });
  });

  describe('timeouts', () => {
    it('times out each attempt and retries it', async () => {
      const onTimeout = vi.fn();
      const pipeline = createPipeline(
        { retry: { maxAttempts: 2 }, timeout: { attemptMs: 50 } },
        { onTimeout },
      );
      const seen: AbortSignal[] = [];

      const pending = pipeline.execute(({ signal }) => {
        seen.push(signal);
        return hang<string>(signal);
      });
      await vi.advanceTimersByTimeAsync(110);
      const result = await pending;

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(isTimeoutError(result.error)).toBe(true);
      expect(result.error.message).toBe("Call to 'svc' timed out after 50ms");
      expect(result.durationMs).toBe(110);
      expect(result.trace).toEqual([
        'ADMITTED',
        'RUNNING',
        'TIMED_OUT',
        'RETRYING',
        'RUNNING',
        'TIMED_OUT',
        'FAILED',
      ]);
      expect(seen.map((signal) => signal.aborted)).toEqual([true, true]);
      expect(onTimeout).toHaveBeenCalledTimes(2);
      expect(onTimeout).toHaveBeenCalledWith('svc', 'attempt', 50);
    });

    it('bounds all attempts and backoff with the execution timeout', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 5, backoff: { type: 'fixed', delayMs: 40 } },
        timeout: { executionMs: 100 },
      });
      const operation = vi.fn(failing());

      const pending = pipeline.execute(operation);
      await vi.advanceTimersByTimeAsync(100);
      const result = await pending;

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error).toMatchObject({
        name: 'TimeoutError',
        scope: 'execution',
        message: "Execution to 'svc' timed out after 100ms",
      });
      expect(operation).toHaveBeenCalledTimes(3);
      expect(result.attempts).toBe(3);
      expect(result.trace.slice(-2)).toEqual(['TIMED_OUT', 'FAILED']);
    });

    it('frees the bulkhead slot of an operation that ignores its signal', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 1 },
        bulkhead: { maxConcurrent: 1 },
        timeout: { attemptMs: 50 },
      });

      const pending = pipeline.execute(() => new Promise<string>(() => undefined));
      await vi.advanceTimersByTimeAsync(50);
      const result = await pending;

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(isTimeoutError(result.error)).toBe(true);
      expect(pipeline.bulkhead?.getActiveCount()).toBe(0);

      const next = await pipeline.execute(async () => 'next');
      expect(next).toMatchObject({ status: 'success', value: 'next' });
    });
  });

  describe('cancellation', () => {
    it('stops retrying and skips the fallback when the caller aborts', async () => {
      const pipeline = createPipeline({ retry: { maxAttempts: 3, backoff: [1000] } });
      const controller = new AbortController();
      const fallback = vi.fn(() => 'cached');
      const operation = vi.fn(failing());

      const pending = pipeline.execute(operation, fallback, { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(10);
      controller.abort('client disconnected');
      const result = await pending;

      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(isExecutionCancelledError(result.error)).toBe(true);
      expect(result.error.message).toBe("Execution for resource 'svc' was cancelled");
      expect(result.error.cause).toBe('client disconnected');
      expect(result.trace).toEqual(['ADMITTED', 'RUNNING', 'RETRYING', 'FAILED']);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(fallback).not.toHaveBeenCalled();
      expect(pipeline.bulkhead?.getActiveCount()).toBe(0);
    });

    it('never starts an execution whose signal is already aborted', async () => {
      const pipeline = createPipeline({});
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn<Operation<string>>().mockResolvedValue('ok');

      const result = await pipeline.execute(operation, undefined, { signal: controller.signal });

      expect(result).toMatchObject({ status: 'failure', attempts: 0, trace: ['FAILED'] });
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('circuit breaker', () => {
    const breakerInput: ResilienceConfigInput = {
      retry: { maxAttempts: 1 },
      circuitBreaker: { failureRateThreshold: 0.5, minimumSamples: 2, windowSize: 2, openDurationMs: 100 },
    };

    it('short-circuits without invoking the operation while OPEN', async () => {
      const onCircuitStateChange = vi.fn();
      const onCircuitReject = vi.fn();
      const pipeline = createPipeline(breakerInput, { onCircuitStateChange, onCircuitReject });

      await pipeline.execute(failing());
      await pipeline.execute(failing());
      expect(pipeline.circuitBreaker?.getState()).toBe('OPEN');

      const operation = vi.fn<Operation<string>>().mockResolvedValue('ok');
      const result = await pipeline.execute(operation, () => 'degraded');

      expect(operation).not.toHaveBeenCalled();
      expect(result.status).toBe('fallback');
      if (result.status !== 'fallback') return;
      expect(isCircuitOpenError(result.error)).toBe(true);
      expect(result.error).toMatchObject({ retryAfterMs: 100 });
      expect(result.attempts).toBe(0);
      expect(result.trace).toEqual(['CIRCUIT_OPEN', 'FALLBACK']);
      expect(onCircuitStateChange).toHaveBeenCalledWith('svc', 'CLOSED', 'OPEN');
      expect(onCircuitReject).toHaveBeenCalledWith('svc');
    });

    it('records every attempt and stops retrying once the circuit opens', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 5 },
        circuitBreaker: { failureRateThreshold: 0.5, minimumSamples: 2, windowSize: 2 },
      });
      const operation = vi.fn(failing());

      const pending = pipeline.execute(operation);
      await vi.advanceTimersByTimeAsync(50);
      const result = await pending;

      expect(operation).toHaveBeenCalledTimes(2);
      expect(pipeline.circuitBreaker?.getState()).toBe('OPEN');
      expect(result.status).toBe('failure');
      if (result.status !== 'failure') return;
      expect(result.error.message).toBe('down');
      expect(result.trace).toEqual(['ADMITTED', 'RUNNING', 'RETRYING', 'RUNNING', 'FAILED']);
    });

    it('records one outcome per execution when configured to', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 5 },
        circuitBreaker: { minimumSamples: 2, windowSize: 2, recordPer: 'execution' },
      });
      const operation = vi.fn(failing());

      const pending = pipeline.execute(operation);
      await vi.advanceTimersByTimeAsync(50);
      await pending;

      expect(operation).toHaveBeenCalledTimes(5);
      expect(pipeline.circuitBreaker?.getSnapshot()).toMatchObject({
        state: 'CLOSED',
        samples: 1,
        failures: 1,
      });
    });

    it('does not count rejections as failures', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 1 },
        circuitBreaker: { minimumSamples: 1, windowSize: 1 },
        bulkhead: { maxConcurrent: 1 },
      });
      const gate = deferred<string>();

      const first = pipeline.execute(() => gate.promise);
      const rejected = await pipeline.execute(async () => 'never');

      expect(rejected.status).toBe('failure');
      if (rejected.status !== 'failure') return;
      expect(isBulkheadFullError(rejected.error)).toBe(true);
      expect(pipeline.circuitBreaker?.getSnapshot().samples).toBe(0);

      gate.resolve('done');
      await expect(first).resolves.toMatchObject({ status: 'success', value: 'done' });
    });

    it('closes again after a successful half-open trial', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 1 },
        circuitBreaker: { minimumSamples: 1, windowSize: 1, openDurationMs: 100, halfOpenMaxTrials: 1 },
      });

      await pipeline.execute(failing());
      expect(pipeline.circuitBreaker?.getState()).toBe('OPEN');

      vi.advanceTimersByTime(100);
      const gate = deferred<string>();
      const trial = pipeline.execute(() => gate.promise);

      const extra = vi.fn<Operation<string>>().mockResolvedValue('ok');
      const rejected = await pipeline.execute(extra);
      expect(extra).not.toHaveBeenCalled();
      expect(rejected.status).toBe('failure');
      if (rejected.status === 'failure') {
        expect(isCircuitOpenError(rejected.error)).toBe(true);
      }

      gate.resolve('recovered');
      await expect(trial).resolves.toMatchObject({ status: 'success', value: 'recovered' });
      expect(pipeline.circuitBreaker?.getState()).toBe('CLOSED');
    });

    it('reopens when the half-open trial fails', async () => {
      const pipeline = createPipeline({
        retry: { maxAttempts: 1 },
        circuitBreaker: { minimumSamples: 1, windowSize: 1, openDurationMs: 100, halfOpenMaxTrials: 1 },
      });

      await pipeline.execute(failing());
      vi.advanceTimersByTime(100);
      await pipeline.execute(failing('still down'));

      expect(pipeline.circuitBreaker?.getState()).toBe('OPEN');
      expect(pipeline.circuitBreaker?.getRetryAfterMs()).toBe(100);
    });

    const singleTrialInput: ResilienceConfigInput = {
      retry: { maxAttempts: 1 },
      circuitBreaker: { minimumSamples: 1, windowSize: 1, openDurationMs: 100, halfOpenMaxTrials: 1 },
    };

    it('keeps a cancelled call admitted while CLOSED from freeing a trial slot', async () => {
      const pipeline = createPipeline(singleTrialInput);
      const controller = new AbortController();
      const early = pipeline.execute(({ signal }) => hang<string>(signal), undefined, {
        signal: controller.signal,
      });
      await vi.advanceTimersByTimeAsync(0);

      await pipeline.execute(failing());
      vi.advanceTimersByTime(100);

      const gate = deferred<string>();
      const trial = pipeline.execute(() => gate.promise);
      await vi.advanceTimersByTimeAsync(0);

      controller.abort('client gone');
      const cancelled = await early;
      expect(cancelled.status).toBe('failure');
      if (cancelled.status === 'failure') {
        expect(isExecutionCancelledError(cancelled.error)).toBe(true);
      }

      const extra = vi.fn<Operation<string>>().mockResolvedValue('ok');
      const rejected = await pipeline.execute(extra);
      expect(extra).not.toHaveBeenCalled();
      expect(rejected.status).toBe('failure');
      if (rejected.status === 'failure') {
        expect(isCircuitOpenError(rejected.error)).toBe(true);
      }
      expect(pipeline.circuitBreaker?.getSnapshot().halfOpenAdmitted).toBe(1);

      gate.resolve('recovered');
      await expect(trial).resolves.toMatchObject({ status: 'success', value: 'recovered' });
      expect(pipeline.circuitBreaker?.getState()).toBe('CLOSED');
    });

    it('does not close the circuit on a late success of a call admitted while CLOSED', async () => {
      const pipeline = createPipeline(singleTrialInput);
      const gate = deferred<string>();
      const early = pipeline.execute(() => gate.promise);
      await vi.advanceTimersByTimeAsync(0);

      await pipeline.execute(failing());
      vi.advanceTimersByTime(100);

      gate.resolve('late');
      await expect(early).resolves.toMatchObject({ status: 'success', value: 'late' });

      expect(pipeline.circuitBreaker?.getSnapshot()).toMatchObject({
        state: 'HALF_OPEN',
        halfOpenSuccesses: 0,
      });
    });
  });

  describe('bulkhead', () => {
    it('rejects executions beyond maxConcurrent with BulkheadFullError', async () => {
      const onBulkheadReject = vi.fn();
      const pipeline = createPipeline({ bulkhead: { maxConcurrent: 2 } }, { onBulkheadReject });
      const gate = deferred<string>();

      const running = [pipeline.execute(() => gate.promise), pipeline.execute(() => gate.promise)];
      const rejected = await pipeline.execute(async () => 'never');

      expect(rejected).toMatchObject({ status: 'failure', attempts: 0, trace: ['FAILED'] });
      if (rejected.status === 'failure') {
        expect(rejected.error).toMatchObject({ name: 'BulkheadFullError', reason: 'full' });
      }
      expect(onBulkheadReject).toHaveBeenCalledWith('svc', 'full');

      gate.resolve('done');
      await Promise.all(running);
      expect(pipeline.bulkhead?.getActiveCount()).toBe(0);
    });

    describe('wait queue', () => {
      const queuedInput: ResilienceConfigInput = {
        retry: { maxAttempts: 1 },
        bulkhead: { maxConcurrent: 1, maxQueueSize: 1, queueTimeoutMs: 100 },
      };

      it('admits a queued execution once a slot is released', async () => {
        const pipeline = createPipeline(queuedInput);
        const gate = deferred<string>();

        const first = pipeline.execute(() => gate.promise);
        const second = pipeline.execute(async () => 'second');
        expect(pipeline.bulkhead?.getQueueLength()).toBe(1);

        gate.resolve('first');
        await expect(first).resolves.toMatchObject({ status: 'success', value: 'first' });
        await expect(second).resolves.toMatchObject({ status: 'success', value: 'second' });
        expect(pipeline.bulkhead?.getQueueLength()).toBe(0);
        expect(pipeline.bulkhead?.getActiveCount()).toBe(0);
      });

      it('rejects with queue_timeout when no slot frees up in time', async () => {
        const onBulkheadReject = vi.fn();
        const pipeline = createPipeline(queuedInput, { onBulkheadReject });
        const gate = deferred<string>();
        const operation = vi.fn<Operation<string>>().mockResolvedValue('never');

        const first = pipeline.execute(() => gate.promise);
        const second = pipeline.execute(operation);
        await vi.advanceTimersByTimeAsync(100);
        const result = await second;

        expect(result).toMatchObject({ status: 'failure', attempts: 0, trace: ['FAILED'] });
        if (result.status === 'failure') {
          expect(isBulkheadFullError(result.error)).toBe(true);
          expect(result.error).toMatchObject({ reason: 'queue_timeout' });
        }
        expect(operation).not.toHaveBeenCalled();
        expect(onBulkheadReject).toHaveBeenCalledWith('svc', 'queue_timeout');

        gate.resolve('first');
        await first;
      });

      it('leaves the queue when the waiting caller aborts', async () => {
        const pipeline = createPipeline(queuedInput);
        const gate = deferred<string>();
        const controller = new AbortController();
        const operation = vi.fn<Operation<string>>().mockResolvedValue('never');

        const first = pipeline.execute(() => gate.promise);
        const second = pipeline.execute(operation, undefined, { signal: controller.signal });
        expect(pipeline.bulkhead?.getQueueLength()).toBe(1);

        controller.abort('client gone');
        const result = await second;

        expect(result).toMatchObject({ status: 'failure', attempts: 0, trace: ['FAILED'] });
        if (result.status === 'failure') {
          expect(isExecutionCancelledError(result.error)).toBe(true);
        }
        expect(pipeline.bulkhead?.getQueueLength()).toBe(0);
        expect(operation).not.toHaveBeenCalled();

        gate.resolve('first');
        await first;
      });
    });

    it('can be disabled along with the circuit breaker', async () => {
      const pipeline = createPipeline({
        bulkhead: { enabled: false },
        circuitBreaker: { enabled: false },
      });

      const result = await pipeline.execute(async () => 42);

      expect(pipeline.bulkhead).toBeUndefined();
      expect(pipeline.circuitBreaker).toBeUndefined();
      expect(result).toMatchObject({ status: 'success', value: 42 });
    });
  });

  describe('hooks', () => {
    it('reports each execution outcome', async () => {
      const onExecution = vi.fn();
      const pipeline = createPipeline({ retry: { maxAttempts: 1 } }, { onExecution });

      await pipeline.execute(async () => 'ok');
      await pipeline.execute(failing());

      expect(onExecution).toHaveBeenNthCalledWith(1, 'svc', {
        status: 'success',
        attempts: 1,
        durationMs: 0,
        error: undefined,
      });
      expect(onExecution).toHaveBeenNthCalledWith(2, 'svc', {
        status: 'failure',
        attempts: 1,
        durationMs: 0,
        error: new Error('down'),
      });
    });

    it('keeps the outcome when a hook throws', async () => {
      const pipeline = createPipeline(
        { retry: { maxAttempts: 2 } },
        {
          onRetry: () => {
            throw new Error('hook exploded');
          },
        },
      );
      const operation = vi
        .fn<Operation<string>>()
        .mockRejectedValueOnce(new Error('blip'))
        .mockResolvedValue('ok');

      const pending = pipeline.execute(operation);
      await vi.advanceTimersByTimeAsync(10);

      await expect(pending).resolves.toMatchObject({ status: 'success', value: 'ok', attempts: 2 });
    });
  });
});
