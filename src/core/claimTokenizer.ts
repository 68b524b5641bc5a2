/**
 * Claim Tokenizer
 *
 * One left-to-right pass over a claim with a single master expression built
 * from an ordered grammar list. At any offset the earliest grammar in the list
 * wins, so a claim reference swallows its own list words ("1或2") before the
 * connective grammar sees them, and a slash-joined combination is taken whole
 * before its parts could match as single substitutions.
 *
 * Grammar order:
 *   1. claimReference       根据/如/依据/按照 权利要求 1-3、5 | claim(s) 1 to 3 or 5
 *   2. sequenceReference    SEQ ID NO: 2, 4 or 6-8
 *   3. mutationCombination  Y178A/F186R/W46X
 *   4. mutationWildcard     W46X
 *   5. mutation             Y178A
 *   6. connective           和/或, and/or, 以及, 任何组合, 和, 或, and, or
 *   7. percentage           90%, 95.5 ％
 */

export type ClaimTokenKind =
  | 'claimReference'
  | 'sequenceReference'
  | 'mutationCombination'
  | 'mutationWildcard'
  | 'mutation'
  | 'connective'
  | 'percentage';

export interface ClaimToken {
  kind: ClaimTokenKind;
  text: string;
  start: number;
  end: number;
}

interface TokenGrammar {
  kind: ClaimTokenKind;
  source: string;
}

const RANGE_SEPARATOR = /\s*(?:-|‑|–|~|～|至|到|(?<![A-Za-z])to(?![A-Za-z]))\s*/.source;
const LIST_SEPARATOR = /\s*(?:,|，|、|或|和|(?<![A-Za-z])(?:or|and)(?![A-Za-z]))\s*/.source;
/** A whole number that is not a quantity: "95%", "2.5", "5 mM" are left alone */
const NUMBER = /\d+(?!\d|\.\d)(?!\s*(?:[%％℃°]|(?:[mμµnp]?M|[mμµnk]?g|[mμµ]?[lL]|k?Da|bp|kb|aa|h|min)(?![A-Za-z])))/.source;
const NUMBER_ITEM = `${NUMBER}(?:${RANGE_SEPARATOR}${NUMBER})?`;
const NUMBER_LIST = `${NUMBER_ITEM}(?:${LIST_SEPARATOR}${NUMBER_ITEM})*`;

const CODE = /[A-Z]\d+[A-Z]/.source;
const CODE_START = /(?<![A-Za-z0-9])/.source;
const CODE_END = /(?![A-Za-z0-9])/.source;

const TOKEN_GRAMMARS: readonly TokenGrammar[] = [
  {
    kind: 'claimReference',
    source: `(?:(?:根据|如|依据|按照)\\s*)?权利要求书?\\s*${NUMBER_LIST}|\\b[Cc]laims?\\s+${NUMBER_LIST}`,
  },
  {
    kind: 'sequenceReference',
    source: `[Ss][Ee][Qq]\\s*[Ii][Dd]\\s*[Nn][Oo]\\.?\\s*[:：]?\\s*${NUMBER_LIST}`,
  },
  { kind: 'mutationCombination', source: `${CODE_START}${CODE}(?:/${CODE})+${CODE_END}` },
  { kind: 'mutationWildcard', source: `${CODE_START}[A-Z]\\d+X${CODE_END}` },
  { kind: 'mutation', source: `${CODE_START}${CODE}${CODE_END}` },
  {
    kind: 'connective',
    source: '和/或|and/or|以及|任何组合|和|或|(?<![A-Za-z])(?:and|or)(?![A-Za-z])',
  },
  { kind: 'percentage', source: '\\d+(?:\\.\\d+)?\\s*[%％]' },
];

const MASTER_PATTERN = new RegExp(
  TOKEN_GRAMMARS.map((grammar) => `(?<${grammar.kind}>${grammar.source})`).join('|'),
  'g'
);

/** Ranges wider than this keep only their endpoints */
const MAX_RANGE_SPAN = 500;

/**
 * Tokenize one claim in a single pass
 */
export function tokenizeClaim(text: string): ClaimToken[] {
  const tokens: ClaimToken[] = [];

  for (const match of text.matchAll(MASTER_PATTERN)) {
    const grammar = TOKEN_GRAMMARS.find((candidate) => match.groups?.[candidate.kind] !== undefined);
    if (!grammar || match.index === undefined) {
      continue;
    }
    tokens.push({
      kind: grammar.kind,
      text: match[0],
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return tokens;
}

/**
 * Expand the numbers of a reference token: singles, ranges and lists.
 *
 * "权利要求1-3或5" → [1, 2, 3, 5]
 */
export function expandNumberList(text: string): number[] {
  const numbers: number[] = [];
  const item = new RegExp(`(\\d+)(?:${RANGE_SEPARATOR}(\\d+))?`, 'g');

  for (const match of text.matchAll(item)) {
    const start = Number(match[1]);
    if (match[2] === undefined) {
      numbers.push(start);
      continue;
    }
    const end = Number(match[2]);
    if (end >= start && end - start <= MAX_RANGE_SPAN) {
      for (let n = start; n <= end; n++) {
        numbers.push(n);
      }
    } else {
      numbers.push(start, end);
    }
  }

  return numbers;
}

/**
 * Mutation codes carried by a mutation token
 */
export function mutationCodes(token: ClaimToken): string[] {
  switch (token.kind) {
    case 'mutationCombination':
      return token.text.split('/');
    case 'mutationWildcard':
    case 'mutation':
      return [token.text];
    default:
      return [];
  }
}

/**
 * "SEQ ID NO:<n>"
 */
export function formatSequenceIdentifier(n: number): string {
  return `SEQ ID NO:${n}`;
}

/**
 * Order mutation codes by residue position, then by code
 */
export function compareMutationCodes(a: string, b: string): number {
  const positionA = Number.parseInt(a.slice(1), 10);
  const positionB = Number.parseInt(b.slice(1), 10);
  if (positionA !== positionB) {
    return positionA - positionB;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
