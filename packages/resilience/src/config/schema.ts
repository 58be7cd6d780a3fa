import { z } from 'zod';

import type { Backoff, BackoffFunction } from '../backoff';
import type { Fallback } from '../types';

const milliseconds = z.number().int().nonnegative();
const jitter = z.number().min(0).max(1).optional();

export const backoffSpecSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fixed'), delayMs: milliseconds, jitter }).strict(),
  z
    .object({
      type: z.literal('linear'),
      initialMs: milliseconds.optional(),
      incrementMs: milliseconds.optional(),
      maxMs: milliseconds.optional(),
      jitter,
    })
    .strict(),
  z
    .object({
      type: z.literal('exponential'),
      baseMs: milliseconds.optional(),
      multiplier: z.number().min(1).optional(),
      maxMs: milliseconds.optional(),
      jitter,
    })
    .strict(),
  z.object({ type: z.literal('schedule'), delaysMs: z.array(milliseconds).min(1), jitter }).strict(),
]);

export type BackoffSpec = z.infer<typeof backoffSpecSchema>;

const classifierSchema = z.custom<(error: unknown) => boolean>(
  (value) => typeof value === 'function',
  { message: 'must be a function' },
);

const backoffFunctionSchema = z.custom<BackoffFunction>((value) => typeof value === 'function', {
  message: 'must be a function',
});

const backoffObjectSchema = z.custom<Backoff>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'getDelayMs' in value &&
    typeof value.getDelayMs === 'function',
  { message: 'must implement getDelayMs(attempt)' },
);

export const backoffInputSchema = z.union([
  backoffSpecSchema,
  z.array(milliseconds),
  backoffFunctionSchema,
  backoffObjectSchema,
]);

export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).optional(),
    backoff: backoffInputSchema.optional(),
    isRetryable: classifierSchema.optional(),
  })
  .strict();

export const circuitBreakerConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    failureRateThreshold: z.number().gt(0).max(1).optional(),
    minimumSamples: z.number().int().min(1).optional(),
    windowSize: z.number().int().min(1).optional(),
    windowDurationMs: milliseconds.optional(),
    openDurationMs: milliseconds.optional(),
    halfOpenMaxTrials: z.number().int().min(1).optional(),
    halfOpenSuccessThreshold: z.number().int().min(1).optional(),
    recordPer: z.enum(['attempt', 'execution']).optional(),
    isFailure: classifierSchema.optional(),
  })
  .strict();

export const bulkheadConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    maxConcurrent: z.number().int().min(1).optional(),
    maxQueueSize: z.number().int().nonnegative().optional(),
    queueTimeoutMs: milliseconds.optional(),
  })
  .strict();

export const timeoutConfigSchema = z
  .object({
    /** Deadline for each attempt */
    attemptMs: z.number().int().positive().optional(),
    /** Deadline for the whole execution, retries and backoff included */
    executionMs: z.number().int().positive().optional(),
  })
  .strict();

export const resilienceConfigSchema = z
  .object({
    retry: retryConfigSchema.optional(),
    circuitBreaker: circuitBreakerConfigSchema.optional(),
    bulkhead: bulkheadConfigSchema.optional(),
    timeout: timeoutConfigSchema.optional(),
    fallback: z
      .custom<Fallback<unknown>>((value) => typeof value === 'function', {
        message: 'must be a function',
      })
      .optional(),
  })
  .strict();

export type ResilienceConfigInput = z.input<typeof resilienceConfigSchema>;
