import type { CallError, Result } from '../core/errors.js';

/**
 * One reasoning request: a fixed system instruction and the batch prompt
 */
export interface ReasoningRequest {
  system: string;
  user: string;
}

export interface ReasoningCallOptions {
  /** Aborted by the orchestrator when the attempt times out */
  signal?: AbortSignal;
}

/**
 * Text-in, text-out reasoning service.
 *
 * Implementations make a single attempt and never throw: every failure
 * comes back as a CallError. Retry, timeout and backoff belong to the caller.
 */
export interface ReasoningClient {
  readonly name: string;
  analyze(request: ReasoningRequest, options?: ReasoningCallOptions): Promise<Result<string, CallError>>;
}
