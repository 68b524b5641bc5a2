import { DEFAULT_PIPELINE_SETTINGS } from '../config/pipeline.js';
import type {
  AnalysisSummary,
  BatchAnalysisOutcome,
  MergedRule,
  MergedRuleSet,
  ProcessingStats,
  Provenance,
  QualityMetrics,
  RuleCandidate,
  RuleKind,
  SignatureCollision,
} from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import type { ProcessingLog } from '../utils/processingLog.js';
import { compareMutationCodes } from './claimTokenizer.js';
import { MergeSignatureCollisionAmbiguity } from './errors.js';
import { countLogicalOperators, isWellFormedExpression } from './logicalExpression.js';
import { UNKNOWN_WILD_TYPE } from './ResponseParser.js';

const log = createLogger('RuleMerger');

const TYPE_WEIGHTS: Record<RuleKind, number> = {
  identical: 10,
  identity_threshold: 8,
  conditional: 6,
  unknown: 3,
};

export interface RuleMergerOptions {
  /** Jaccard overlap a pair must exceed to be merged */
  similarityThreshold: number;
}

type SignatureFields = Pick<RuleCandidate, 'wildType' | 'ruleKind' | 'mutationDescriptor' | 'logicalExpression'>;

/**
 * Dedup key: (wildType, ruleKind, mutationDescriptor, logicalExpression), whitespace collapsed
 */
export function ruleSignature(rule: SignatureFields): string {
  return [rule.wildType, rule.ruleKind, rule.mutationDescriptor, rule.logicalExpression]
    .map((field) => field.replace(/\s+/g, ' ').trim())
    .join('|');
}

export function mutationSet(descriptor: string): Set<string> {
  return new Set(descriptor.split('/').map((code) => code.trim()).filter((code) => code.length > 0));
}

/**
 * |A ∩ B| / |A ∪ B|; two empty sets score 0
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const union = new Set([...a, ...b]);
  if (union.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / union.size;
}

export function computePriorityScore(
  rule: Pick<RuleCandidate, 'ruleKind' | 'mutationDescriptor' | 'logicalExpression' | 'statement'>
): number {
  return (
    TYPE_WEIGHTS[rule.ruleKind] +
    Math.min(0.5 * mutationSet(rule.mutationDescriptor).size, 3) +
    Math.min(0.2 * countLogicalOperators(rule.logicalExpression), 2) +
    (rule.statement.length > 30 ? 1 : 0)
  );
}

/**
 * Five checks worth 0.2 each
 */
export function computeQualityScore(
  rule: Pick<
    RuleCandidate,
    'wildType' | 'ruleKind' | 'statement' | 'logicalExpression' | 'mutationDescriptor' | 'needsReview'
  >
): number {
  const passed = [
    rule.wildType !== UNKNOWN_WILD_TYPE && rule.wildType.length > 0,
    rule.ruleKind !== 'unknown',
    rule.statement.length > 0,
    isWellFormedExpression(rule.logicalExpression),
    !rule.needsReview && rule.mutationDescriptor.length > 0,
  ].filter(Boolean).length;

  return passed / 5;
}

/**
 * Union of provenances, one entry per batch
 */
function unionProvenance(lists: readonly (readonly Provenance[])[]): Provenance[] {
  const byBatch = new Map<string, Set<number>>();
  for (const list of lists) {
    for (const provenance of list) {
      const claims = byBatch.get(provenance.batchId) ?? new Set<number>();
      for (const n of provenance.claimNumbers) claims.add(n);
      byBatch.set(provenance.batchId, claims);
    }
  }
  return [...byBatch.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([batchId, claims]) => ({ batchId, claimNumbers: [...claims].sort((a, b) => a - b) }));
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

/**
 * Rule Merger
 *
 * Folds the rule candidates of every batch into one rule set: exact
 * duplicates are dropped, similar rules of the same wild type and kind are
 * merged, and the result is scored and sorted by priority.
 */
export class RuleMerger {
  private readonly options: RuleMergerOptions;

  constructor(options: Partial<RuleMergerOptions> = {}, private readonly processingLog?: ProcessingLog) {
    this.options = {
      similarityThreshold: options.similarityThreshold ?? DEFAULT_PIPELINE_SETTINGS.similarityThreshold,
    };
  }

  /**
   * @param claimsAnalyzed Claims submitted for analysis; defaults to the claims named by the outcomes
   */
  merge(outcomes: readonly BatchAnalysisOutcome[], claimsAnalyzed?: readonly number[]): MergedRuleSet {
    const ordered = [...outcomes].sort((a, b) => a.batchIndex - b.batchIndex);
    const collisions: SignatureCollision[] = [];

    const initial = ordered
      .flatMap((outcome) => outcome.ruleCandidates)
      .map((candidate, ordinal) => this.toMergedRule(candidate, ordinal));

    const deduped = this.dedupe(initial, collisions);
    const clustered = this.mergeSimilar(deduped);
    const rules = this.dedupe(clustered, collisions)
      .map((rule) => ({
        ...rule,
        priorityScore: computePriorityScore(rule),
        qualityScore: computeQualityScore(rule),
      }))
      .sort((a, b) => b.priorityScore - a.priorityScore || a.ordinal - b.ordinal);

    const claims = new Set(claimsAnalyzed ?? ordered.flatMap((outcome) => outcome.claimNumbers));

    log.info('Rules merged', {
      candidates: initial.length,
      afterDedup: deduped.length,
      rules: rules.length,
      collisions: collisions.length,
    });

    return {
      rules,
      qualityMetrics: this.qualityMetrics(rules, claims),
      processingStats: this.processingStats(ordered, rules, claims.size),
      analysisSummary: this.analysisSummary(ordered, rules),
      collisions,
    };
  }

  private toMergedRule(candidate: RuleCandidate, ordinal: number): MergedRule {
    const { provenance, ...fields } = candidate;
    return {
      ...fields,
      provenance: [provenance],
      mergedFrom: 1,
      priorityScore: 0,
      qualityScore: 0,
      ordinal,
    };
  }

  /**
   * First occurrence wins; a dropped duplicate's provenance is folded into the kept rule
   */
  private dedupe(rules: readonly MergedRule[], collisions: SignatureCollision[]): MergedRule[] {
    const bySignature = new Map<string, MergedRule>();

    for (const rule of rules) {
      const signature = ruleSignature(rule);
      const kept = bySignature.get(signature);
      if (!kept) {
        bySignature.set(signature, { ...rule });
        continue;
      }

      kept.provenance = unionProvenance([kept.provenance, rule.provenance]);
      kept.mergedFrom += rule.mergedFrom;
      kept.needsReview = kept.needsReview && rule.needsReview;

      if (kept.statement !== rule.statement || kept.identityLogic !== rule.identityLogic) {
        const collision: SignatureCollision = {
          signature,
          keptOrdinal: kept.ordinal,
          droppedOrdinal: rule.ordinal,
          reason:
            kept.statement !== rule.statement ? 'statements differ' : 'identity logic differs',
        };
        collisions.push(collision);
        this.processingLog?.recovered(
          'merge',
          new MergeSignatureCollisionAmbiguity(
            `Signature ${signature} kept rule ${kept.ordinal} over rule ${rule.ordinal}: ${collision.reason}`,
            signature
          )
        );
      }
    }

    return [...bySignature.values()];
  }

  /**
   * Seed-based clustering per wild type. Placeholders never join a cluster.
   */
  private mergeSimilar(rules: readonly MergedRule[]): MergedRule[] {
    const groups = new Map<string, MergedRule[]>();
    for (const rule of rules) {
      const group = groups.get(rule.wildType) ?? [];
      group.push(rule);
      groups.set(rule.wildType, group);
    }

    const merged: MergedRule[] = [];
    for (const group of groups.values()) {
      const clustered = new Set<number>();

      group.forEach((seed, i) => {
        if (clustered.has(i)) return;
        clustered.add(i);
        if (seed.needsReview) {
          merged.push(seed);
          return;
        }

        const seedCodes = mutationSet(seed.mutationDescriptor);
        const cluster = [seed];
        for (let j = i + 1; j < group.length; j++) {
          const other = group[j];
          if (clustered.has(j) || other.needsReview || other.ruleKind !== seed.ruleKind) continue;
          if (jaccard(seedCodes, mutationSet(other.mutationDescriptor)) > this.options.similarityThreshold) {
            cluster.push(other);
            clustered.add(j);
          }
        }

        merged.push(cluster.length > 1 ? this.combine(cluster) : seed);
      });
    }

    return merged;
  }

  private combine(cluster: readonly MergedRule[]): MergedRule {
    const [seed] = cluster;
    const codes = new Set(cluster.flatMap((rule) => [...mutationSet(rule.mutationDescriptor)]));
    const expressions = [
      ...new Set(cluster.map((rule) => rule.logicalExpression).filter((expression) => expression.length > 0)),
    ];
    const note = `merged from ${cluster.length} similar rules`;

    log.debug('Similar rules merged', {
      wildType: seed.wildType,
      ordinals: cluster.map((rule) => rule.ordinal),
    });

    return {
      ...seed,
      mutationDescriptor: [...codes].sort(compareMutationCodes).join('/'),
      logicalExpression:
        expressions.length === 1 ? expressions[0] : expressions.map((expression) => `(${expression})`).join(' OR '),
      comment: seed.comment.length > 0 ? `${seed.comment}; ${note}` : note,
      provenance: unionProvenance(cluster.map((rule) => rule.provenance)),
      mergedFrom: cluster.reduce((sum, rule) => sum + rule.mergedFrom, 0),
      ordinal: Math.min(...cluster.map((rule) => rule.ordinal)),
    };
  }

  private qualityMetrics(rules: readonly MergedRule[], claims: ReadonlySet<number>): QualityMetrics {
    const covered = new Set<number>();
    for (const rule of rules) {
      if (rule.needsReview) continue;
      for (const provenance of rule.provenance) {
        for (const n of provenance.claimNumbers) {
          if (claims.has(n)) covered.add(n);
        }
      }
    }

    const scores = rules.map((rule) => rule.qualityScore);
    return {
      completeness: {
        claimsAnalyzed: claims.size,
        claimsCovered: covered.size,
        claimsCoverage: claims.size > 0 ? covered.size / claims.size : 0,
        rulesPerClaim: claims.size > 0 ? rules.length / claims.size : 0,
      },
      ruleQuality: {
        averageQualityScore: mean(scores),
        highQualityRules: scores.filter((score) => score > 0.8).length,
        lowQualityRules: scores.filter((score) => score < 0.5).length,
        needsReviewRules: rules.filter((rule) => rule.needsReview).length,
      },
      consistency: {
        uniqueWildTypes: new Set(rules.map((rule) => rule.wildType).filter((wildType) => wildType !== UNKNOWN_WILD_TYPE))
          .size,
        logicalExpressions: new Set(
          rules.filter((rule) => !rule.needsReview && rule.logicalExpression.length > 0).map((rule) => rule.logicalExpression)
        ).size,
      },
    };
  }

  private processingStats(
    outcomes: readonly BatchAnalysisOutcome[],
    rules: readonly MergedRule[],
    claimCount: number
  ): ProcessingStats {
    const durations = outcomes.map((outcome) => outcome.durationMs);
    const totalMs = durations.reduce((sum, ms) => sum + ms, 0);
    const seconds = totalMs / 1000;
    const failed = outcomes.filter((outcome) => outcome.errorMessage !== undefined);

    return {
      timing: {
        totalProcessingMs: totalMs,
        averageBatchMs: mean(durations),
        minBatchMs: durations.length > 0 ? Math.min(...durations) : 0,
        maxBatchMs: durations.length > 0 ? Math.max(...durations) : 0,
      },
      throughput: {
        claimsPerSecond: seconds > 0 ? claimCount / seconds : 0,
        rulesPerSecond: seconds > 0 ? rules.length / seconds : 0,
      },
      errors: {
        errorCount: failed.length,
        errorMessages: failed.map((outcome) => `${outcome.batchId}: ${outcome.errorMessage}`),
      },
    };
  }

  private analysisSummary(outcomes: readonly BatchAnalysisOutcome[], rules: readonly MergedRule[]): AnalysisSummary {
    const successful = outcomes.filter((outcome) => outcome.errorMessage === undefined).length;
    const byKind: Record<RuleKind, number> = { identical: 0, identity_threshold: 0, conditional: 0, unknown: 0 };
    for (const rule of rules) {
      byKind[rule.ruleKind]++;
    }
    const wildTypes = [...new Set(rules.map((rule) => rule.wildType))]
      .filter((wildType) => wildType !== UNKNOWN_WILD_TYPE)
      .sort();

    return {
      batches: {
        total: outcomes.length,
        successful,
        failed: outcomes.length - successful,
        successRate: outcomes.length > 0 ? successful / outcomes.length : 0,
      },
      rules: {
        total: rules.length,
        byKind,
        uniqueWildTypes: wildTypes.length,
        wildTypesCovered: wildTypes,
      },
      averageBatchConfidence: mean(outcomes.map((outcome) => outcome.confidence)),
    };
  }
}
