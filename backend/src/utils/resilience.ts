import { SpanStatusCode } from '@opentelemetry/api';
import { getTracer } from '../orchestrator/telemetry.js';
import { TimeoutError, describeError } from './errors.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('resilience');

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  retryableErrors?: string[];
  signal?: AbortSignal;
}

export interface RetryInvocationContext {
  attempt: number;
}

function errorSignature(error: unknown): string[] {
  if (!error || typeof error !== 'object') {
    return [String(error)];
  }
  const parts: string[] = [];
  for (const key of ['message', 'code', 'status', 'name']) {
    const value = Reflect.get(error, key);
    if (typeof value === 'string' || typeof value === 'number') {
      parts.push(String(value));
    }
  }
  return parts;
}

function abortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * Races `fn` against a timer. The signal handed to `fn` aborts when the timer
 * fires or when the outer signal aborts.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  outerSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const forwardAbort = () => controller.abort();

  if (outerSignal?.aborted) {
    throw abortError(`${operation} aborted before start`);
  }
  outerSignal?.addEventListener('abort', forwardAbort);

  try {
    return await Promise.race([
      fn(controller.signal),
      new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          controller.abort();
          reject(new TimeoutError(operation, timeoutMs));
        }, timeoutMs);
      })
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    outerSignal?.removeEventListener('abort', forwardAbort);
  }
}

export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, context: RetryInvocationContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    retryableErrors = ['ECONNRESET', 'ETIMEDOUT', '429', '503'],
    signal
  } = options;

  const tracer = getTracer();

  return tracer.startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttribute('retry.operation', operation);
    span.setAttribute('retry.max', maxRetries);

    try {
      for (let attempt = 0; ; attempt += 1) {
        try {
          const result = await withTimeout(operation, timeoutMs, (attemptSignal) => fn(attemptSignal, { attempt }), signal);
          if (attempt > 0) {
            log.info({ operation, attempt }, 'operation succeeded after retries');
            span.addEvent('retry.success', { attempt });
          }
          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          const signature = errorSignature(error);
          const isRetryable =
            !signal?.aborted &&
            retryableErrors.some((code) => signature.some((part) => part.includes(code)));

          span.addEvent('retry.failure', { attempt, message: describeError(error) });

          if (!isRetryable || attempt >= maxRetries) {
            span.recordException(error instanceof Error ? error : new Error(describeError(error)));
            span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
            throw error;
          }

          const waitTime = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
          span.addEvent('retry.wait', { attempt: attempt + 1, waitTime });
          log.warn({ operation, attempt: attempt + 1, maxRetries, waitTime }, 'operation failed, retrying');
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        }
      }
    } finally {
      span.end();
    }
  });
}
