/**
 * Core data model of the claim analysis pipeline.
 *
 * raw text → ClaimSegment[] → AnalysisBatch[] → BatchAnalysisOutcome[] → MergedRuleSet
 */

export type ClaimKind = 'independent' | 'dependent';

export type RuleKind = 'identical' | 'identity_threshold' | 'conditional' | 'unknown';

/**
 * A SEQ ID NO reference together with the text around it
 */
export interface SequenceReferenceContext {
  identifier: string;
  context: string;
  position: number;
}

/**
 * One legal claim unit
 */
export interface ClaimSegment {
  readonly claimNumber: number;
  readonly rawText: string;
  readonly claimKind: ClaimKind;
  /** Claims this claim depends on (sorted, unique, never itself) */
  readonly dependencyRefs: readonly number[];
  /** Normalized identifiers, e.g. "SEQ ID NO:2" (sorted, unique) */
  readonly sequenceReferences: readonly string[];
  readonly sequenceContexts: readonly SequenceReferenceContext[];
  /** Standardized mutation codes, e.g. "Y178A" (sorted, unique) */
  readonly mutationTokens: readonly string[];
  /** In [1.0, 10.0] */
  readonly complexityScore: number;
}

export interface AnalysisBatch {
  readonly batchId: string;
  readonly index: number;
  readonly segments: readonly ClaimSegment[];
  readonly totalComplexity: number;
  /** Single segment whose own score exceeds the complexity budget */
  readonly overflow: boolean;
}

export interface Provenance {
  batchId: string;
  claimNumbers: number[];
}

/**
 * One rule fragment extracted from a single batch
 */
export interface RuleCandidate {
  wildType: string;
  ruleKind: RuleKind;
  /** Slash-joined mutation codes; empty when the rule names none */
  mutationDescriptor: string;
  logicalExpression: string;
  identityLogic: string;
  statement: string;
  comment: string;
  /** Placeholder synthesized for a claim the reasoning call could not cover */
  needsReview: boolean;
  provenance: Provenance;
}

export type ParseStrategy = 'direct' | 'fenced' | 'balanced';

export type FailureKind =
  | 'SegmentationError'
  | 'CallError'
  | 'ResponseParseError'
  | 'MergeSignatureCollisionAmbiguity';

export interface BatchAnalysisOutcome {
  readonly batchId: string;
  readonly batchIndex: number;
  readonly claimNumbers: readonly number[];
  /** In [0, 1] */
  readonly confidence: number;
  readonly ruleCandidates: readonly RuleCandidate[];
  readonly errorMessage?: string;
  readonly errorKind?: FailureKind;
  readonly parseStrategy?: ParseStrategy;
  readonly attempts: number;
  readonly durationMs: number;
}

export interface MergedRule {
  wildType: string;
  ruleKind: RuleKind;
  mutationDescriptor: string;
  logicalExpression: string;
  identityLogic: string;
  statement: string;
  comment: string;
  needsReview: boolean;
  provenance: Provenance[];
  /** Number of candidates folded into this rule */
  mergedFrom: number;
  priorityScore: number;
  /** In [0, 1] */
  qualityScore: number;
  /** Position of the first contributing candidate across all batches */
  ordinal: number;
}

export interface SignatureCollision {
  signature: string;
  keptOrdinal: number;
  droppedOrdinal: number;
  reason: string;
}

export interface QualityMetrics {
  completeness: {
    claimsAnalyzed: number;
    claimsCovered: number;
    /** In [0, 1] */
    claimsCoverage: number;
    rulesPerClaim: number;
  };
  ruleQuality: {
    averageQualityScore: number;
    highQualityRules: number;
    lowQualityRules: number;
    needsReviewRules: number;
  };
  consistency: {
    uniqueWildTypes: number;
    logicalExpressions: number;
  };
}

export interface ProcessingStats {
  timing: {
    totalProcessingMs: number;
    averageBatchMs: number;
    minBatchMs: number;
    maxBatchMs: number;
  };
  throughput: {
    claimsPerSecond: number;
    rulesPerSecond: number;
  };
  errors: {
    errorCount: number;
    errorMessages: string[];
  };
}

export interface AnalysisSummary {
  batches: {
    total: number;
    successful: number;
    failed: number;
    successRate: number;
  };
  rules: {
    total: number;
    byKind: Record<RuleKind, number>;
    uniqueWildTypes: number;
    wildTypesCovered: string[];
  };
  averageBatchConfidence: number;
}

export interface MergedRuleSet {
  rules: MergedRule[];
  qualityMetrics: QualityMetrics;
  processingStats: ProcessingStats;
  analysisSummary: AnalysisSummary;
  collisions: SignatureCollision[];
}

/**
 * A previously known rule, used to calibrate the reasoning call
 */
export interface KnownRule {
  patent_number?: string;
  wild_type?: string;
  rule?: string;
  mutation?: string;
  mutation_logic?: string;
  identity_logic?: string;
  statement?: string;
  comment?: string;
  [key: string]: unknown;
}

/**
 * One entry of an already-converted sequence listing. Entries are passed to
 * the reasoning call as they are; only the identifier is read.
 */
export interface SequenceEntry {
  sequence_id: string;
  [key: string]: unknown;
}

/**
 * Output document, one per patent
 */
export interface OutputRule {
  wild_type: string;
  rule: string;
  mutation: string;
  mutation_logic: string;
  identity_logic: string;
  statement: string;
  comment: string;
}

export interface OutputDocument {
  patent_number: string;
  group: number;
  rules: OutputRule[];
  metadata: {
    total_rules: number;
    claims_analyzed: number;
    processing_timestamp: string;
    analysis_confidence: number;
  };
}
