import { describe, expect, it } from 'vitest';
import {
  compareMutationCodes,
  expandNumberList,
  formatSequenceIdentifier,
  mutationCodes,
  tokenizeClaim,
} from '../../../src/core/claimTokenizer.js';

describe('tokenizeClaim', () => {
  it('takes a Chinese claim reference with its list words before connectives', () => {
    const tokens = tokenizeClaim('根据权利要求1-3或5所述的多肽，包含SEQ ID NO: 2所示序列的Y178A/F186R突变');

    expect(tokens.map((token) => [token.kind, token.text])).toEqual([
      ['claimReference', '根据权利要求1-3或5'],
      ['sequenceReference', 'SEQ ID NO: 2'],
      ['mutationCombination', 'Y178A/F186R'],
    ]);
  });

  it('recognizes English references, percentages, connectives and wildcards', () => {
    const tokens = tokenizeClaim('The enzyme of claim 2 or 3, wherein identity is at least 90% and W46X is present.');

    expect(tokens.map((token) => [token.kind, token.text])).toEqual([
      ['claimReference', 'claim 2 or 3'],
      ['percentage', '90%'],
      ['connective', 'and'],
      ['mutationWildcard', 'W46X'],
    ]);
  });

  it('records token offsets', () => {
    const text = 'has Y178A';
    const [token] = tokenizeClaim(text);

    expect(token).toEqual({ kind: 'mutation', text: 'Y178A', start: 4, end: 9 });
    expect(text.slice(token.start, token.end)).toBe('Y178A');
  });

  it('stops a reference list before a percentage', () => {
    const tokens = tokenizeClaim('a polypeptide of SEQ ID NO: 2 and 95% identity thereto');

    expect(tokens.map((token) => [token.kind, token.text])).toEqual([
      ['sequenceReference', 'SEQ ID NO: 2'],
      ['connective', 'and'],
      ['percentage', '95%'],
    ]);
  });

  it('stops a reference list before a quantity with a unit', () => {
    const tokens = tokenizeClaim('The buffer of claim 1 and 5 mM NaCl');

    expect(tokens.map((token) => [token.kind, token.text])).toEqual([
      ['claimReference', 'claim 1'],
      ['connective', 'and'],
    ]);
  });

  it('ignores codes embedded in longer identifiers', () => {
    expect(tokenizeClaim('plasmid pY178AB and XY178A')).toEqual([
      { kind: 'connective', text: 'and', start: 16, end: 19 },
    ]);
  });
});

describe('expandNumberList', () => {
  it('expands ranges and lists', () => {
    expect(expandNumberList('权利要求1-3或5')).toEqual([1, 2, 3, 5]);
    expect(expandNumberList('claims 2 to 4')).toEqual([2, 3, 4]);
  });

  it('keeps only the endpoints of reversed or oversized ranges', () => {
    expect(expandNumberList('9-7')).toEqual([9, 7]);
    expect(expandNumberList('1-1000')).toEqual([1, 1000]);
  });
});

describe('mutation helpers', () => {
  it('splits combinations into codes', () => {
    expect(mutationCodes({ kind: 'mutationCombination', text: 'Y178A/F186R', start: 0, end: 11 })).toEqual([
      'Y178A',
      'F186R',
    ]);
    expect(mutationCodes({ kind: 'percentage', text: '90%', start: 0, end: 3 })).toEqual([]);
  });

  it('orders codes by position, then by code', () => {
    expect(['F186R', 'Y178A', 'W46X', 'A178G'].sort(compareMutationCodes)).toEqual([
      'W46X',
      'A178G',
      'Y178A',
      'F186R',
    ]);
  });

  it('formats sequence identifiers', () => {
    expect(formatSequenceIdentifier(12)).toBe('SEQ ID NO:12');
  });
});
