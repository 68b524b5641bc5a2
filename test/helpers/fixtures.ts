import type {
  ReasoningCallOptions,
  ReasoningClient,
  ReasoningRequest,
} from '../../src/concurrent/ReasoningClient.js';
import type { CallError, Result } from '../../src/core/errors.js';
import type { AnalysisBatch, BatchAnalysisOutcome, ClaimSegment, RuleCandidate } from '../../src/models/types.js';

export function makeSegment(claimNumber: number, overrides: Partial<ClaimSegment> = {}): ClaimSegment {
  return {
    claimNumber,
    rawText: `A polypeptide according to claim ${claimNumber}`,
    claimKind: 'independent',
    dependencyRefs: [],
    sequenceReferences: [],
    sequenceContexts: [],
    mutationTokens: [],
    complexityScore: 2,
    ...overrides,
  };
}

export function makeBatch(index: number, segments: ClaimSegment[]): AnalysisBatch {
  return {
    batchId: `batch-${String(index + 1).padStart(4, '0')}`,
    index,
    segments,
    totalComplexity: segments.reduce((sum, segment) => sum + segment.complexityScore, 0),
    overflow: false,
  };
}

export function makeCandidate(overrides: Partial<RuleCandidate> = {}): RuleCandidate {
  return {
    wildType: 'SEQ ID NO:2',
    ruleKind: 'identity_threshold',
    mutationDescriptor: 'Y178A/F186R',
    logicalExpression: 'Y178A AND F186R',
    identityLogic: 'seq_identity>=90%',
    statement: 'Variants of SEQ ID NO:2 carrying Y178A and F186R',
    comment: '',
    needsReview: false,
    provenance: { batchId: 'batch-0001', claimNumbers: [1] },
    ...overrides,
  };
}

export function makeOutcome(
  batchIndex: number,
  ruleCandidates: RuleCandidate[],
  overrides: Partial<BatchAnalysisOutcome> = {}
): BatchAnalysisOutcome {
  return {
    batchId: `batch-${String(batchIndex + 1).padStart(4, '0')}`,
    batchIndex,
    claimNumbers: [batchIndex + 1],
    confidence: 0.8,
    ruleCandidates,
    attempts: 1,
    durationMs: 100,
    ...overrides,
  };
}

type Responder = (
  request: ReasoningRequest,
  options?: ReasoningCallOptions
) => Promise<Result<string, CallError>>;

/**
 * In-process reasoning client driven by a responder function
 */
export class FakeReasoningClient implements ReasoningClient {
  readonly name = 'fake';
  readonly requests: ReasoningRequest[] = [];

  constructor(private readonly responder: Responder) {}

  analyze(request: ReasoningRequest, options?: ReasoningCallOptions): Promise<Result<string, CallError>> {
    this.requests.push(request);
    return this.responder(request, options);
  }
}

export const RULE_RESPONSE = JSON.stringify({
  rules: [
    {
      wild_type: 'SEQ ID NO:2',
      rule: 'identity>90%',
      mutation: 'F186R, Y178A',
      mutation_logic: 'Y178A&F186R',
      identity_logic: 'seq_identity>=90%',
      statement: 'Variants of SEQ ID NO:2 carrying Y178A and F186R',
      comment: '',
      claims: [1],
    },
  ],
});
