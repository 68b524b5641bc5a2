import { describe, expect, it } from 'vitest';
import { buildPlaceholder } from '../../../src/core/ChunkAnalysisOrchestrator.js';
import {
  RuleMerger,
  computePriorityScore,
  computeQualityScore,
  jaccard,
  ruleSignature,
} from '../../../src/core/RuleMerger.js';
import { ProcessingLog } from '../../../src/utils/processingLog.js';
import { makeCandidate, makeOutcome, makeSegment } from '../../helpers/fixtures.js';

const merger = new RuleMerger();

describe('ruleSignature', () => {
  it('joins the identifying fields with whitespace collapsed', () => {
    expect(
      ruleSignature({
        wildType: 'SEQ ID NO:2',
        ruleKind: 'identical',
        mutationDescriptor: 'Y178A',
        logicalExpression: 'Y178A  AND   F186R ',
      })
    ).toBe('SEQ ID NO:2|identical|Y178A|Y178A AND F186R');
  });
});

describe('jaccard', () => {
  it('scores set overlap', () => {
    expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3);
    expect(jaccard(new Set(), new Set())).toBe(0);
  });
});

describe('RuleMerger', () => {
  describe('deduplication', () => {
    it('folds exact duplicates across batches and unions their provenance', () => {
      const ruleSet = merger.merge([
        makeOutcome(0, [makeCandidate({ provenance: { batchId: 'batch-0001', claimNumbers: [1] } })]),
        makeOutcome(1, [makeCandidate({ provenance: { batchId: 'batch-0002', claimNumbers: [2] } })]),
      ]);

      expect(ruleSet.rules).toHaveLength(1);
      expect(ruleSet.rules[0].mergedFrom).toBe(2);
      expect(ruleSet.rules[0].provenance).toEqual([
        { batchId: 'batch-0001', claimNumbers: [1] },
        { batchId: 'batch-0002', claimNumbers: [2] },
      ]);
      expect(ruleSet.collisions).toEqual([]);
      expect(ruleSet.qualityMetrics.completeness.claimsCoverage).toBe(1);
    });

    it('keeps the first rule and records a collision when statements differ', () => {
      const log = new ProcessingLog();
      const ruleSet = new RuleMerger({}, log).merge([
        makeOutcome(0, [makeCandidate()]),
        makeOutcome(1, [makeCandidate({ statement: 'Another statement' })]),
      ]);

      expect(ruleSet.rules.map((rule) => rule.statement)).toEqual([
        'Variants of SEQ ID NO:2 carrying Y178A and F186R',
      ]);
      expect(ruleSet.collisions).toEqual([
        {
          signature: 'SEQ ID NO:2|identity_threshold|Y178A/F186R|Y178A AND F186R',
          keptOrdinal: 0,
          droppedOrdinal: 1,
          reason: 'statements differ',
        },
      ]);
      expect(log.failures().map((entry) => entry.kind)).toEqual(['MergeSignatureCollisionAmbiguity']);
    });
  });

  describe('similarity merge', () => {
    it('keeps rules apart at a Jaccard overlap of 0.5', () => {
      const ruleSet = merger.merge([
        makeOutcome(0, [
          makeCandidate({ mutationDescriptor: 'W46A/Y178A/F186R', logicalExpression: 'W46A AND Y178A AND F186R' }),
          makeCandidate({ mutationDescriptor: 'L50V/Y178A/F186R', logicalExpression: 'L50V AND Y178A AND F186R' }),
        ]),
      ]);

      expect(ruleSet.rules).toHaveLength(2);
    });

    it('merges rules of the same wild type and kind above the threshold', () => {
      const ruleSet = merger.merge([
        makeOutcome(0, [
          makeCandidate({
            mutationDescriptor: 'W46A/L50V/Y178A/F186R',
            logicalExpression: 'W46A AND L50V AND Y178A AND F186R',
          }),
        ]),
        makeOutcome(1, [
          makeCandidate({
            mutationDescriptor: 'W46A/Y178A/F186R',
            logicalExpression: 'W46A AND Y178A AND F186R',
            provenance: { batchId: 'batch-0002', claimNumbers: [2] },
          }),
        ]),
      ]);

      expect(ruleSet.rules).toHaveLength(1);
      expect(ruleSet.rules[0]).toMatchObject({
        mutationDescriptor: 'W46A/L50V/Y178A/F186R',
        logicalExpression: '(W46A AND L50V AND Y178A AND F186R) OR (W46A AND Y178A AND F186R)',
        comment: 'merged from 2 similar rules',
        mergedFrom: 2,
        ordinal: 0,
        qualityScore: 1,
        provenance: [
          { batchId: 'batch-0001', claimNumbers: [1] },
          { batchId: 'batch-0002', claimNumbers: [2] },
        ],
      });
    });

    it('keeps a single shared expression without parentheses', () => {
      const ruleSet = merger.merge([
        makeOutcome(0, [
          makeCandidate(),
          makeCandidate({ mutationDescriptor: 'W46A/Y178A/F186R', statement: 'Variants carrying W46A too' }),
        ]),
      ]);

      expect(ruleSet.rules).toHaveLength(1);
      expect(ruleSet.rules[0].mutationDescriptor).toBe('W46A/Y178A/F186R');
      expect(ruleSet.rules[0].logicalExpression).toBe('Y178A AND F186R');
    });

    it('never merges rules of different kinds', () => {
      const ruleSet = merger.merge([makeOutcome(0, [makeCandidate(), makeCandidate({ ruleKind: 'conditional' })])]);

      expect(ruleSet.rules).toHaveLength(2);
    });

    it('never merges placeholders', () => {
      const ruleSet = merger.merge([
        makeOutcome(0, [
          buildPlaceholder(makeSegment(1, { mutationTokens: ['Y178A'] }), 'batch-0001', 'timed out'),
          buildPlaceholder(makeSegment(2, { mutationTokens: ['Y178A'] }), 'batch-0001', 'timed out'),
        ]),
      ]);

      expect(ruleSet.rules).toHaveLength(2);
      expect(ruleSet.rules.every((rule) => rule.needsReview)).toBe(true);
    });
  });

  describe('ordering', () => {
    it('sorts by priority, then by first appearance', () => {
      const ruleSet = merger.merge([
        makeOutcome(1, [makeCandidate({ wildType: 'SEQ ID NO:5' }), makeCandidate({ ruleKind: 'identical' })]),
        makeOutcome(0, [makeCandidate({ wildType: 'SEQ ID NO:3' })]),
      ]);

      expect(ruleSet.rules.map((rule) => [rule.ruleKind, rule.wildType])).toEqual([
        ['identical', 'SEQ ID NO:2'],
        ['identity_threshold', 'SEQ ID NO:3'],
        ['identity_threshold', 'SEQ ID NO:5'],
      ]);
      expect(ruleSet.rules.map((rule) => rule.priorityScore)).toEqual([
        computePriorityScore(makeCandidate({ ruleKind: 'identical' })),
        computePriorityScore(makeCandidate()),
        computePriorityScore(makeCandidate()),
      ]);
    });
  });

  describe('metrics', () => {
    const outcomes = [
      makeOutcome(0, [
        makeCandidate({ provenance: { batchId: 'batch-0001', claimNumbers: [1] } }),
        makeCandidate({ wildType: 'SEQ ID NO:3', provenance: { batchId: 'batch-0001', claimNumbers: [2] } }),
      ]),
      makeOutcome(1, [buildPlaceholder(makeSegment(3), 'batch-0002', 'timed out')], {
        claimNumbers: [3, 4],
        confidence: 0,
        errorMessage: 'timed out',
        errorKind: 'CallError',
      }),
    ];
    const ruleSet = merger.merge(outcomes, [1, 2, 3, 4]);

    it('measures completeness against the claims analyzed', () => {
      expect(ruleSet.qualityMetrics.completeness).toEqual({
        claimsAnalyzed: 4,
        claimsCovered: 2,
        claimsCoverage: 0.5,
        rulesPerClaim: 0.75,
      });
      expect(ruleSet.qualityMetrics.ruleQuality.needsReviewRules).toBe(1);
      expect(ruleSet.qualityMetrics.consistency.uniqueWildTypes).toBe(2);
    });

    it('summarizes batches and rule kinds', () => {
      expect(ruleSet.analysisSummary.batches).toEqual({ total: 2, successful: 1, failed: 1, successRate: 0.5 });
      expect(ruleSet.analysisSummary.rules.byKind).toEqual({
        identical: 0,
        identity_threshold: 2,
        conditional: 0,
        unknown: 1,
      });
      expect(ruleSet.analysisSummary.rules.wildTypesCovered).toEqual(['SEQ ID NO:2', 'SEQ ID NO:3']);
      expect(ruleSet.analysisSummary.averageBatchConfidence).toBeCloseTo(0.4);
    });

    it('reports timing and errors', () => {
      expect(ruleSet.processingStats.timing).toEqual({
        totalProcessingMs: 200,
        averageBatchMs: 100,
        minBatchMs: 100,
        maxBatchMs: 100,
      });
      expect(ruleSet.processingStats.throughput.claimsPerSecond).toBeCloseTo(20);
      expect(ruleSet.processingStats.errors).toEqual({ errorCount: 1, errorMessages: ['batch-0002: timed out'] });
    });
  });

  it('handles no outcomes', () => {
    const ruleSet = merger.merge([]);

    expect(ruleSet.rules).toEqual([]);
    expect(ruleSet.qualityMetrics.completeness.claimsCoverage).toBe(0);
    expect(ruleSet.analysisSummary.batches.successRate).toBe(0);
  });
});

describe('scores', () => {
  it('weights rule kind, mutations, operators and statement length', () => {
    const score = computePriorityScore({
      ruleKind: 'identical',
      mutationDescriptor: 'Y178A/F186R',
      logicalExpression: 'Y178A AND F186R',
      statement: 'short',
    });

    expect(score).toBeCloseTo(11.2);
  });

  it('awards 0.2 per passed quality check', () => {
    expect(computeQualityScore(makeCandidate())).toBe(1);
    expect(
      computeQualityScore(
        buildPlaceholder(makeSegment(3, { sequenceReferences: ['SEQ ID NO:2'] }), 'batch-0001', 'timed out')
      )
    ).toBeCloseTo(0.4);
  });
});
