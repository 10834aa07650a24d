import type { ObservationError, ObservationErrorKind } from '../../../shared/types.js';

export class ValidationError extends Error {
  readonly kind = 'validation' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** External search, model or embedding service failure. */
export class ProviderError extends Error {
  readonly kind = 'provider' as const;
  readonly provider: string;
  readonly status?: number;
  readonly code?: string;

  constructor(provider: string, message: string, opts: { status?: number; code?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    if (opts.status !== undefined) {
      this.status = opts.status;
    }
    if (opts.code !== undefined) {
      this.code = opts.code;
    }
  }
}

export class TimeoutError extends Error {
  readonly kind = 'timeout' as const;
  readonly code = 'ETIMEDOUT';
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** A query referenced a table, column or operation outside the declared allow-list. */
export class SchemaViolationError extends Error {
  readonly kind = 'schema_violation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'SchemaViolationError';
  }
}

/** Query execution failed; the message is deliberately generic. */
export class ExecutionError extends Error {
  readonly kind = 'execution' as const;

  constructor(message = 'query execution failed', opts: { cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'ExecutionError';
  }
}

export class SynthesisError extends Error {
  readonly kind = 'synthesis' as const;
  readonly rawText: string;

  constructor(message: string, rawText: string) {
    super(message);
    this.name = 'SynthesisError';
    this.rawText = rawText;
  }
}

/**
 * Raised inside the controller when the iteration cap is hit. It never leaves the
 * loop: the session moves to FINALIZING with whatever evidence it has.
 */
export class IterationLimitExceeded extends Error {
  readonly kind = 'iteration_limit' as const;
  readonly iterations: number;

  constructor(iterations: number) {
    super(`iteration limit of ${iterations} reached without a final answer`);
    this.name = 'IterationLimitExceeded';
    this.iterations = iterations;
  }
}

export type ToolError = ValidationError | ProviderError | TimeoutError | SchemaViolationError | ExecutionError;

export function isToolError(value: unknown): value is ToolError {
  return (
    value instanceof ValidationError ||
    value instanceof ProviderError ||
    value instanceof TimeoutError ||
    value instanceof SchemaViolationError ||
    value instanceof ExecutionError
  );
}

export function describeError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return 'unknown error';
  }
}

/**
 * Normalizes anything thrown by a tool into the observation error shape. Errors
 * outside the taxonomy become generic execution failures so driver or network
 * internals never reach the model.
 */
export function toObservationError(value: unknown): ObservationError {
  if (isToolError(value)) {
    return { kind: value.kind, message: value.message };
  }
  if (value instanceof Error && value.name === 'AbortError') {
    return { kind: 'timeout', message: 'operation aborted' };
  }
  const kind: ObservationErrorKind = 'execution';
  return { kind, message: 'tool execution failed' };
}
