import { describe, expect, it } from 'vitest';
import { DEFAULT_COMPLEXITY_WEIGHTS } from '../../../src/config/pipeline.js';
import { ClaimSegmenter, computeComplexity } from '../../../src/core/ClaimSegmenter.js';
import { ProcessingLog } from '../../../src/utils/processingLog.js';

const CLAIMS = [
  '1. 一种多肽，其氨基酸序列如SEQ ID NO: 2所示。',
  '2. 根据权利要求1所述的多肽，包含Y178A突变。',
  '3. 根据权利要求1或2所述的多肽，与SEQ ID NO: 2具有至少90%的同一性。',
].join('\n');

describe('ClaimSegmenter', () => {
  const segmenter = new ClaimSegmenter();

  it('splits numbered claims and classifies dependencies', () => {
    const { segments, failures } = segmenter.segment(CLAIMS);

    expect(failures).toEqual([]);
    expect(segments.map((segment) => segment.claimNumber)).toEqual([1, 2, 3]);
    expect(segments.map((segment) => segment.claimKind)).toEqual(['independent', 'dependent', 'dependent']);
    expect(segments.map((segment) => segment.dependencyRefs)).toEqual([[], [1], [1, 2]]);
  });

  it('strips the number marker from the claim text', () => {
    const { segments } = segmenter.segment(CLAIMS);

    expect(segments[0].rawText).toBe('一种多肽，其氨基酸序列如SEQ ID NO: 2所示。');
  });

  it('extracts sequence references and mutation codes', () => {
    const { segments } = segmenter.segment(CLAIMS);

    expect(segments[0].sequenceReferences).toEqual(['SEQ ID NO:2']);
    expect(segments[0].sequenceContexts[0].identifier).toBe('SEQ ID NO:2');
    expect(segments[0].sequenceContexts[0].context).toContain('SEQ ID NO: 2');
    expect(segments[1].mutationTokens).toEqual(['Y178A']);
    expect(segments[2].sequenceReferences).toEqual(['SEQ ID NO:2']);
  });

  it('keeps complexity scores within bounds', () => {
    const { segments } = segmenter.segment(CLAIMS);

    for (const segment of segments) {
      expect(segment.complexityScore).toBeGreaterThanOrEqual(1);
      expect(segment.complexityScore).toBeLessThanOrEqual(10);
    }
  });

  it('never lists a claim as depending on itself', () => {
    const { segments } = segmenter.segment('1. A polypeptide.\n2. The polypeptide of claim 2 or 1.');

    expect(segments[1].dependencyRefs).toEqual([1]);
  });

  it('drops the preamble and reports it', () => {
    const log = new ProcessingLog();
    const { segments, failures } = new ClaimSegmenter(DEFAULT_COMPLEXITY_WEIGHTS, log).segment(
      '权利要求书\n1. alpha\n2. beta'
    );

    expect(segments.map((segment) => segment.rawText)).toEqual(['alpha', 'beta']);
    expect(failures.map((failure) => failure.message)).toEqual(['Text before the first claim was dropped']);
    expect(failures[0].excerpt).toBe('权利要求书');
    expect(log.failures().map((entry) => entry.kind)).toEqual(['SegmentationError']);
  });

  it('keeps out-of-order numbers inside the current claim and drops empty claims', () => {
    const { segments, failures } = segmenter.segment('1. alpha\n1. beta\n2.\n3. gamma');

    expect(segments.map((segment) => [segment.claimNumber, segment.rawText])).toEqual([
      [1, 'alpha\n1. beta'],
      [3, 'gamma'],
    ]);
    expect(failures.map((failure) => failure.message)).toEqual(['Claim 2 has no text']);
  });

  it('keeps numbered steps inside their claim', () => {
    const { segments, failures } = segmenter.segment(
      [
        '1. A method comprising the steps of:',
        '1) expressing a polypeptide of SEQ ID NO: 2;',
        '2) purifying the polypeptide.',
        '2. The method of claim 1, wherein the polypeptide carries Y178A.',
      ].join('\n')
    );

    expect(failures).toEqual([]);
    expect(segments.map((segment) => segment.claimNumber)).toEqual([1, 2]);
    expect(segments[0].rawText).toBe(
      'A method comprising the steps of:\n1) expressing a polypeptide of SEQ ID NO: 2;\n2) purifying the polypeptide.'
    );
    expect(segments[0].sequenceReferences).toEqual(['SEQ ID NO:2']);
    expect(segments[1].claimKind).toBe('dependent');
    expect(segments[1].dependencyRefs).toEqual([1]);
    expect(segments[1].mutationTokens).toEqual(['Y178A']);
  });

  it('falls back to consecutive inline markers without line structure', () => {
    const { segments } = segmenter.segment('1. alpha at pH 7. value 2. gamma');

    expect(segments.map((segment) => [segment.claimNumber, segment.rawText])).toEqual([
      [1, 'alpha at pH 7. value'],
      [2, 'gamma'],
    ]);
  });

  it('does not take a percentage as a sequence reference', () => {
    const segment = segmenter.buildSegment(1, 'a polypeptide of SEQ ID NO: 2 and 95% identity thereto');

    expect(segment.sequenceReferences).toEqual(['SEQ ID NO:2']);
  });

  it('returns nothing for empty text', () => {
    expect(segmenter.segment('')).toEqual({ segments: [], failures: [] });
  });

  it('returns frozen segments', () => {
    const { segments } = segmenter.segment(CLAIMS);

    expect(Object.isFrozen(segments[0])).toBe(true);
  });
});

describe('computeComplexity', () => {
  it('adds weighted features to the base', () => {
    const score = computeComplexity({
      textLength: 1000,
      sequenceReferences: 2,
      mutations: 3,
      connectives: 1,
      percentages: 1,
    });

    expect(score).toBeCloseTo(4.0);
  });

  it('caps the length term and the total', () => {
    expect(
      computeComplexity({ textLength: 5000, sequenceReferences: 0, mutations: 0, connectives: 0, percentages: 0 })
    ).toBeCloseTo(4.0);
    expect(
      computeComplexity({ textLength: 5000, sequenceReferences: 0, mutations: 40, connectives: 0, percentages: 0 })
    ).toBe(10);
  });
});
