import type { FailureKind } from '../models/types.js';

/**
 * Result of a boundary operation that may fail without throwing
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Base class for failures the pipeline recovers from
 */
export abstract class PipelineFailure extends Error {
  abstract readonly kind: FailureKind;
}

/**
 * A claim slice without an extractable claim number
 */
export class SegmentationError extends PipelineFailure {
  readonly kind = 'SegmentationError' as const;

  constructor(
    message: string,
    readonly excerpt: string
  ) {
    super(message);
    this.name = 'SegmentationError';
  }
}

export interface CallErrorOptions {
  retryable?: boolean;
  status?: number;
  retryAfterMs?: number;
  timedOut?: boolean;
  cause?: unknown;
}

/**
 * The reasoning call failed, timed out or was cancelled
 */
export class CallError extends PipelineFailure {
  readonly kind = 'CallError' as const;
  readonly retryable: boolean;
  readonly status?: number;
  readonly retryAfterMs?: number;
  readonly timedOut: boolean;

  constructor(message: string, options: CallErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CallError';
    this.retryable = options.retryable ?? true;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.timedOut = options.timedOut ?? false;
  }

  /**
   * Wrap anything an SDK throws. 4xx responses other than 408/409/429 are not retried.
   */
  static from(error: unknown): CallError {
    if (error instanceof CallError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const status = readNumericField(error, 'status');
    const retryable =
      status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;

    return new CallError(message, {
      retryable,
      status,
      retryAfterMs: readRetryAfterMs(error),
      cause: error,
    });
  }
}

/**
 * No parsing strategy produced a usable rule document
 */
export class ResponseParseError extends PipelineFailure {
  readonly kind = 'ResponseParseError' as const;

  constructor(
    message: string,
    readonly preview: string
  ) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

/**
 * Two candidates share a signature but disagree on statement or identity logic.
 * The first occurrence is kept.
 */
export class MergeSignatureCollisionAmbiguity extends PipelineFailure {
  readonly kind = 'MergeSignatureCollisionAmbiguity' as const;

  constructor(
    message: string,
    readonly signature: string
  ) {
    super(message);
    this.name = 'MergeSignatureCollisionAmbiguity';
  }
}

/**
 * Invalid static configuration. The only fatal error.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}\n${details.map((d) => `  • ${d}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}

function readNumericField(value: unknown, field: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(field in value)) {
    return undefined;
  }
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined;
}

/**
 * Retry-After can arrive as a Headers object or a plain record, in seconds or as an HTTP date
 */
function readRetryAfterMs(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) {
    return undefined;
  }
  const headers: unknown = Reflect.get(error, 'headers');
  let raw: unknown;
  if (headers instanceof Headers) {
    raw = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null) {
    raw = Reflect.get(headers, 'retry-after');
  }
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }

  const seconds = Number(raw);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(String(raw));
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}
