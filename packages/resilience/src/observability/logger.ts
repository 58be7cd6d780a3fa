import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { context, trace } from '@opentelemetry/api';

export type CreateResilienceLoggerOptions = {
  level: string;
  destination?: DestinationStream;
  /** Adds `traceId`/`spanId` of the active span (default: true) */
  includeTraceContext?: boolean;
  /** Static bindings; `null` drops pid/hostname (default: `{ component: 'resilience' }`) */
  base?: LoggerOptions['base'];
  timestamp?: LoggerOptions['timestamp'];
  redact?: LoggerOptions['redact'];
};

const traceContextMixin = (): Record<string, unknown> => {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
};

/**
 * Creates the pino logger used by resilience registries.
 */
export function createResilienceLogger(options: CreateResilienceLoggerOptions): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level,
    base: options.base === undefined ? { component: 'resilience' } : options.base,
    ...(options.redact ? { redact: options.redact } : {}),
    ...(options.timestamp !== undefined ? { timestamp: options.timestamp } : {}),
    ...((options.includeTraceContext ?? true) ? { mixin: traceContextMixin } : {}),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
