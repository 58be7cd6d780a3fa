import { Writable } from 'node:stream';
import { context, trace } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createLoggingHooks } from '../src/observability/hooks';
import { createResilienceLogger } from '../src/observability/logger';

function createMemoryDestination(): { destination: Writable; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    },
  });
  return {
    destination,
    entries: () =>
      lines
        .join('')
        .trim()
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line) => {
          const entry: Record<string, unknown> = JSON.parse(line);
          return entry;
        }),
  };
}

describe('createResilienceLogger', () => {
  beforeAll(() => {
    context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());
  });

  afterAll(() => {
    context.disable();
  });

  it('adds trace context fields when a span is active', () => {
    const { destination, entries } = createMemoryDestination();
    const logger = createResilienceLogger({ level: 'info', destination, base: null, timestamp: false });
    const span = trace.wrapSpanContext({
      traceId: 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
      spanId: 'bbbbbbbbbbbbbbbb',
      traceFlags: 1,
    });

    context.with(trace.setSpan(context.active(), span), () => {
      logger.info('hello');
    });

    expect(entries()).toEqual([
      {
        level: 30,
        msg: 'hello',
        traceId: 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa',
        spanId: 'bbbbbbbbbbbbbbbb',
      },
    ]);
  });

  it('omits trace context fields when no span is active', () => {
    const { destination, entries } = createMemoryDestination();
    const logger = createResilienceLogger({ level: 'info', destination, base: null, timestamp: false });

    logger.info('hello');

    expect(entries()).toEqual([{ level: 30, msg: 'hello' }]);
  });

  it('tags entries with the resilience component by default', () => {
    const { destination, entries } = createMemoryDestination();
    const logger = createResilienceLogger({
      level: 'info',
      destination,
      timestamp: false,
      includeTraceContext: false,
    });

    logger.info('ready');

    expect(entries()).toEqual([{ level: 30, msg: 'ready', component: 'resilience' }]);
  });

  it('redacts configured paths', () => {
    const { destination, entries } = createMemoryDestination();
    const logger = createResilienceLogger({
      level: 'info',
      destination,
      base: null,
      timestamp: false,
      redact: ['token'],
    });

    logger.info({ token: 'test-secret', resource: 'payments' }, 'call');

    expect(entries()).toEqual([
      { level: 30, msg: 'call', token: '[Redacted]', resource: 'payments' },
    ]);
  });
});

describe('createLoggingHooks', () => {
  it('writes resilience events at their levels', () => {
    const { destination, entries } = createMemoryDestination();
    const logger = createResilienceLogger({
      level: 'debug',
      destination,
      base: null,
      timestamp: false,
      includeTraceContext: false,
    });
    const hooks = createLoggingHooks(logger);

    hooks.onRetry?.('search', 1, new Error('blip'), 100);
    hooks.onCircuitReject?.('search');
    hooks.onBulkheadReject?.('search', 'queue_full');
    hooks.onTimeout?.('search', 'attempt', 50);
    hooks.onExecution?.('search', { status: 'success', attempts: 1, durationMs: 3 });

    expect(entries()).toEqual([
      expect.objectContaining({ level: 20, msg: 'resilience.retry', resource: 'search', attempt: 1, delayMs: 100 }),
      { level: 40, msg: 'resilience.circuit.rejected', resource: 'search' },
      { level: 40, msg: 'resilience.bulkhead.rejected', resource: 'search', reason: 'queue_full' },
      { level: 40, msg: 'resilience.timeout', resource: 'search', scope: 'attempt', timeoutMs: 50 },
    ]);
  });
});
