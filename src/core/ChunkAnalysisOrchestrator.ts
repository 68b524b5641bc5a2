import pLimit from 'p-limit';
import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings } from '../config/pipeline.js';
import type { ReasoningClient, ReasoningRequest } from '../concurrent/ReasoningClient.js';
import { buildClaimAnalysisPrompt } from '../jobs/analyze-claims/prompt.js';
import type {
  AnalysisBatch,
  BatchAnalysisOutcome,
  ClaimSegment,
  KnownRule,
  RuleCandidate,
  SequenceEntry,
} from '../models/types.js';
import { RunLogger } from '../utils/logger.js';
import type { ProcessingLog } from '../utils/processingLog.js';
import { CallError, err, type PipelineFailure, type Result } from './errors.js';
import { hasLogicalOperator } from './logicalExpression.js';
import { ResponseParser, UNKNOWN_WILD_TYPE } from './ResponseParser.js';

export type OrchestratorOptions = Pick<
  PipelineSettings,
  | 'maxAttempts'
  | 'requestTimeoutMs'
  | 'backoffBaseMs'
  | 'backoffMaxMs'
  | 'concurrency'
  | 'calibrationSampleSize'
  | 'maxResponseChars'
  | 'minStatementLength'
> & {
  /** Waits between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
};

const WELL_FORMED_WILD_TYPE = /^SEQ ID NO:\d+$/;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Batch confidence in [0, 1].
 *
 * 0.5 + min(0.2 · rulesPerClaim, 0.3) + 0.2 · mean(passed checks / 3),
 * or 0 when nothing was extracted
 */
export function computeBatchConfidence(
  candidates: readonly RuleCandidate[],
  claimCount: number,
  minStatementLength: number = DEFAULT_PIPELINE_SETTINGS.minStatementLength
): number {
  if (candidates.length === 0 || claimCount === 0) {
    return 0;
  }

  const rulesPerClaim = candidates.length / claimCount;
  const checkScore =
    candidates.reduce((sum, candidate) => {
      const passed =
        Number(WELL_FORMED_WILD_TYPE.test(candidate.wildType)) +
        Number(hasLogicalOperator(candidate.logicalExpression)) +
        Number(candidate.statement.length > minStatementLength);
      return sum + passed / 3;
    }, 0) / candidates.length;

  const confidence = 0.5 + Math.min(0.2 * rulesPerClaim, 0.3) + 0.2 * checkScore;
  return Math.min(Math.max(confidence, 0), 1);
}

/**
 * Placeholder for a claim the reasoning call could not cover
 */
export function buildPlaceholder(segment: ClaimSegment, batchId: string, reason: string): RuleCandidate {
  return {
    wildType: segment.sequenceReferences[0] ?? UNKNOWN_WILD_TYPE,
    ruleKind: 'unknown',
    mutationDescriptor: segment.mutationTokens.join('/'),
    logicalExpression: `unresolved(claim ${segment.claimNumber})`,
    identityLogic: '',
    statement: `Claim ${segment.claimNumber} could not be analyzed: ${reason}`,
    comment: 'needs review',
    needsReview: true,
    provenance: { batchId, claimNumbers: [segment.claimNumber] },
  };
}

/**
 * Chunk Analysis Orchestrator
 *
 * Sends every batch to the reasoning client and turns whatever comes back
 * into a BatchAnalysisOutcome. Owns retry, timeout and backoff. Never
 * throws: a batch whose call or parse fails yields one placeholder per claim.
 */
export class ChunkAnalysisOrchestrator {
  private readonly options: Required<OrchestratorOptions>;
  private readonly parser: ResponseParser;
  private readonly logger: RunLogger;

  constructor(
    private readonly client: ReasoningClient,
    options: Partial<OrchestratorOptions> = {},
    private readonly processingLog?: ProcessingLog,
    logger?: RunLogger
  ) {
    this.options = {
      maxAttempts: options.maxAttempts ?? DEFAULT_PIPELINE_SETTINGS.maxAttempts,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_PIPELINE_SETTINGS.requestTimeoutMs,
      backoffBaseMs: options.backoffBaseMs ?? DEFAULT_PIPELINE_SETTINGS.backoffBaseMs,
      backoffMaxMs: options.backoffMaxMs ?? DEFAULT_PIPELINE_SETTINGS.backoffMaxMs,
      concurrency: options.concurrency ?? DEFAULT_PIPELINE_SETTINGS.concurrency,
      calibrationSampleSize: options.calibrationSampleSize ?? DEFAULT_PIPELINE_SETTINGS.calibrationSampleSize,
      maxResponseChars: options.maxResponseChars ?? DEFAULT_PIPELINE_SETTINGS.maxResponseChars,
      minStatementLength: options.minStatementLength ?? DEFAULT_PIPELINE_SETTINGS.minStatementLength,
      sleep: options.sleep ?? defaultSleep,
    };
    this.parser = new ResponseParser(this.options.maxResponseChars);
    this.logger = logger ?? new RunLogger(client.name, 'ChunkAnalysisOrchestrator');
  }

  /**
   * Analyze batches through a bounded worker pool; outcomes keep batch order
   */
  async analyzeBatches(
    batches: readonly AnalysisBatch[],
    knownRules: readonly KnownRule[] = [],
    sequences: readonly SequenceEntry[] = []
  ): Promise<BatchAnalysisOutcome[]> {
    const limit = pLimit(this.options.concurrency);

    this.logger.info('Analyzing batches', {
      batches: batches.length,
      concurrency: this.options.concurrency,
      client: this.client.name,
    });

    return Promise.all(batches.map((batch) => limit(() => this.analyzeBatch(batch, knownRules, sequences))));
  }

  async analyzeBatch(
    batch: AnalysisBatch,
    knownRules: readonly KnownRule[] = [],
    sequences: readonly SequenceEntry[] = []
  ): Promise<BatchAnalysisOutcome> {
    const startedAt = Date.now();
    const claimNumbers = batch.segments.map((segment) => segment.claimNumber);

    if (batch.segments.length === 0) {
      return Object.freeze({
        batchId: batch.batchId,
        batchIndex: batch.index,
        claimNumbers,
        confidence: 0,
        ruleCandidates: [],
        attempts: 0,
        durationMs: 0,
      });
    }

    const request = buildClaimAnalysisPrompt(batch, knownRules, this.options.calibrationSampleSize, sequences);
    const { result, attempts } = await this.invokeWithRetry(request, batch.batchId);
    if (!result.ok) {
      return this.fallback(batch, result.error, attempts, startedAt);
    }

    const parsed = this.parser.parse(result.value, { batchId: batch.batchId, claimNumbers });
    if (!parsed.ok) {
      return this.fallback(batch, parsed.error, attempts, startedAt);
    }

    const { candidates, strategy, skipped, attributedClaims } = parsed.value;
    for (const line of skipped) {
      this.logger.warn('Rule item skipped', { batchId: batch.batchId, detail: line });
    }

    const placeholders: RuleCandidate[] = [];
    if (attributedClaims) {
      for (const segment of batch.segments) {
        if (!attributedClaims.has(segment.claimNumber)) {
          placeholders.push(buildPlaceholder(segment, batch.batchId, 'no rule was attributed to this claim'));
          this.processingLog?.warn('analyze', `No rule attributed to claim ${segment.claimNumber}`, {
            batchId: batch.batchId,
            claimNumber: segment.claimNumber,
          });
        }
      }
    }

    const confidence = computeBatchConfidence(candidates, batch.segments.length, this.options.minStatementLength);
    this.logger.info('Batch analyzed', {
      batchId: batch.batchId,
      rules: candidates.length,
      placeholders: placeholders.length,
      strategy,
      attempts,
      confidence,
    });

    return Object.freeze({
      batchId: batch.batchId,
      batchIndex: batch.index,
      claimNumbers,
      confidence,
      ruleCandidates: [...candidates, ...placeholders],
      parseStrategy: strategy,
      attempts,
      durationMs: Date.now() - startedAt,
    });
  }

  private fallback(
    batch: AnalysisBatch,
    failure: PipelineFailure,
    attempts: number,
    startedAt: number
  ): BatchAnalysisOutcome {
    this.processingLog?.recovered('analyze', failure, { batchId: batch.batchId });

    return Object.freeze({
      batchId: batch.batchId,
      batchIndex: batch.index,
      claimNumbers: batch.segments.map((segment) => segment.claimNumber),
      confidence: 0,
      ruleCandidates: batch.segments.map((segment) => buildPlaceholder(segment, batch.batchId, failure.message)),
      errorMessage: failure.message,
      errorKind: failure.kind,
      attempts,
      durationMs: Date.now() - startedAt,
    });
  }

  /**
   * Up to maxAttempts calls with exponential backoff; non-retryable errors stop at once
   */
  private async invokeWithRetry(
    request: ReasoningRequest,
    batchId: string
  ): Promise<{ result: Result<string, CallError>; attempts: number }> {
    const { maxAttempts } = this.options;
    let result: Result<string, CallError> = err(new CallError('No attempt was made'));

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      result = await this.callWithTimeout(request);
      if (result.ok) {
        return { result, attempts: attempt };
      }

      const error = result.error;
      if (!error.retryable || attempt === maxAttempts) {
        this.logger.warn('Reasoning call failed', {
          batchId,
          attempt,
          maxAttempts,
          retryable: error.retryable,
          error: error.message,
        });
        return { result, attempts: attempt };
      }

      const waitMs = this.backoffDelay(attempt, error);
      this.logger.info('Retrying reasoning call', {
        batchId,
        attempt,
        maxAttempts,
        waitMs,
        error: error.message,
      });
      await this.options.sleep(waitMs);
    }

    return { result, attempts: maxAttempts };
  }

  /**
   * base · 2^(attempt-1), or the server's retry-after hint, capped
   */
  backoffDelay(attempt: number, error?: CallError): number {
    const { backoffBaseMs, backoffMaxMs } = this.options;
    const exponential = backoffBaseMs * 2 ** (attempt - 1);
    const wait = error?.retryAfterMs !== undefined ? error.retryAfterMs : exponential;
    return Math.min(wait, backoffMaxMs);
  }

  private async callWithTimeout(request: ReasoningRequest): Promise<Result<string, CallError>> {
    const { requestTimeoutMs } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<Result<string, CallError>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(err(new CallError(`Reasoning call timed out after ${requestTimeoutMs}ms`, { timedOut: true })));
      }, requestTimeoutMs);
    });

    try {
      return await Promise.race([this.client.analyze(request, { signal: controller.signal }), timeout]);
    } catch (error) {
      return err(CallError.from(error));
    } finally {
      clearTimeout(timer);
    }
  }
}
