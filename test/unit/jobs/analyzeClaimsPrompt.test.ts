import { describe, expect, it } from 'vitest';
import {
  CLAIM_ANALYSIS_SYSTEM_PROMPT,
  buildClaimAnalysisPrompt,
  relevantSequences,
  summarizeBatch,
} from '../../../src/jobs/analyze-claims/prompt.js';
import { makeBatch, makeSegment } from '../../helpers/fixtures.js';

const batch = makeBatch(1, [
  makeSegment(3, { complexityScore: 2, sequenceReferences: ['SEQ ID NO:2'] }),
  makeSegment(4, {
    complexityScore: 5,
    claimKind: 'dependent',
    dependencyRefs: [3],
    sequenceReferences: ['SEQ ID NO:2', 'SEQ ID NO:4'],
  }),
]);

describe('summarizeBatch', () => {
  it('describes the claims of a batch', () => {
    expect(summarizeBatch(batch)).toEqual({
      batch_id: 'batch-0002',
      claim_numbers: [3, 4],
      complexity_range: [2, 5],
      average_complexity: 3.5,
      independent_claims: 1,
      dependent_claims: 1,
      sequence_reference_count: 2,
    });
  });
});

describe('relevantSequences', () => {
  it('keeps the entries the batch refers to, whatever their spelling', () => {
    const sequences = [
      { sequence_id: 'SEQ_ID_NO_2', length: 120 },
      { sequence_id: '4' },
      { sequence_id: 'SEQ ID NO: 7' },
      { sequence_id: 'P12345' },
    ];

    expect(relevantSequences(batch, sequences)).toEqual({
      SEQ_ID_NO_2: { sequence_id: 'SEQ_ID_NO_2', length: 120 },
      '4': { sequence_id: '4' },
    });
  });
});

describe('buildClaimAnalysisPrompt', () => {
  it('fills every placeholder', () => {
    const request = buildClaimAnalysisPrompt(batch, [], 3);

    expect(request.system).toBe(CLAIM_ANALYSIS_SYSTEM_PROMPT);
    expect(request.user).toContain('Analyse the 2 patent claim(s) below');
    expect(request.user).toContain('No known rules.');
    expect(request.user).toContain('No sequence data.');
    expect(request.user).not.toMatch(/\{(claimCount|batchSummary|knownRules|sequences|claims)\}/);
  });

  it('includes at most the calibration sample of known rules', () => {
    const knownRules = ['SEQ ID NO:11', 'SEQ ID NO:12', 'SEQ ID NO:13'].map((wild_type) => ({ wild_type }));

    const request = buildClaimAnalysisPrompt(batch, knownRules, 2);

    expect(request.user).toContain('SEQ ID NO:12');
    expect(request.user).not.toContain('SEQ ID NO:13');
  });

  it('sends referenced sequence entries with the batch', () => {
    const request = buildClaimAnalysisPrompt(batch, [], 3, [
      { sequence_id: 'SEQ ID NO:4', residues: 'MKTAYIAK' },
      { sequence_id: 'SEQ ID NO:9', residues: 'GGGG' },
    ]);

    expect(request.user).toContain('"residues": "MKTAYIAK"');
    expect(request.user).not.toContain('GGGG');
    expect(request.user).not.toContain('No sequence data.');
  });

  it('keeps dollar signs in claim text literal', () => {
    const request = buildClaimAnalysisPrompt(makeBatch(0, [makeSegment(1, { rawText: "costs $& and $'" })]), [], 0);

    expect(request.user).toContain("costs $& and $'");
  });
});
