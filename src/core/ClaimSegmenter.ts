import { DEFAULT_COMPLEXITY_WEIGHTS, type ComplexityWeights } from '../config/pipeline.js';
import type { ClaimSegment, SequenceReferenceContext } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import type { ProcessingLog } from '../utils/processingLog.js';
import {
  compareMutationCodes,
  expandNumberList,
  formatSequenceIdentifier,
  mutationCodes,
  tokenizeClaim,
  type ClaimToken,
} from './claimTokenizer.js';
import { SegmentationError } from './errors.js';

const log = createLogger('ClaimSegmenter');

/** "1." "1、" "1．" "1)" "1:" at the start of a line, not a decimal */
const LINE_BOUNDARY = /^[ \t]*(\d+)[ \t]*([.、．:：)）])(?!\d)/gm;

/** "1. " after whitespace or at the start, for text without line structure */
const INLINE_BOUNDARY = /(?:^|(?<=\s))(\d+)\.\s+/g;

const CONTEXT_RADIUS = 50;
const EXCERPT_LENGTH = 80;

/** Marker punctuation grouped by style, so "1)" steps never split "1." claims */
const MARKER_STYLES: Readonly<Record<string, string>> = {
  '.': 'period',
  '．': 'period',
  '、': 'comma',
  ':': 'colon',
  '：': 'colon',
  ')': 'paren',
  '）': 'paren',
};

interface Boundary {
  claimNumber: number;
  /** Offset of the marker */
  start: number;
  /** Offset of the claim body */
  bodyStart: number;
}

export interface ComplexityFeatures {
  textLength: number;
  sequenceReferences: number;
  mutations: number;
  connectives: number;
  percentages: number;
}

export interface SegmentationResult {
  segments: ClaimSegment[];
  failures: SegmentationError[];
}

/**
 * Complexity score of a claim, in [weights.base, weights.max]
 */
export function computeComplexity(
  features: ComplexityFeatures,
  weights: ComplexityWeights = DEFAULT_COMPLEXITY_WEIGHTS
): number {
  const score =
    weights.base +
    Math.min(features.textLength / weights.lengthDivisor, weights.lengthCap) +
    weights.perSequenceReference * features.sequenceReferences +
    weights.perMutation * features.mutations +
    weights.perConnective * features.connectives +
    weights.perPercentage * features.percentages;

  return Math.min(score, weights.max);
}

/**
 * Claim Segmenter
 *
 * Splits the claims block of one document into ClaimSegments. Slices that
 * cannot be attributed to a claim number are dropped and reported, never thrown.
 */
export class ClaimSegmenter {
  constructor(
    private readonly weights: ComplexityWeights = DEFAULT_COMPLEXITY_WEIGHTS,
    private readonly processingLog?: ProcessingLog
  ) {}

  segment(claimsText: string): SegmentationResult {
    const text = claimsText.replace(/\r\n?/g, '\n');
    const boundaries = this.findBoundaries(text);
    const segments: ClaimSegment[] = [];
    const failures: SegmentationError[] = [];

    const fail = (failure: SegmentationError, claimNumber?: number) => {
      failures.push(failure);
      this.processingLog?.recovered('segment', failure, { claimNumber });
    };

    const preamble = text.slice(0, boundaries[0]?.start ?? text.length).trim();
    if (preamble.length > 0) {
      fail(new SegmentationError('Text before the first claim was dropped', excerpt(preamble)));
    }

    boundaries.forEach((boundary, i) => {
      const end = boundaries[i + 1]?.start ?? text.length;
      const body = text.slice(boundary.bodyStart, end).trim();
      const { claimNumber } = boundary;

      if (body.length === 0) {
        fail(new SegmentationError(`Claim ${claimNumber} has no text`, ''), claimNumber);
        return;
      }

      segments.push(this.buildSegment(claimNumber, body));
    });

    log.info('Claims segmented', { segments: segments.length, dropped: failures.length });
    return { segments, failures };
  }

  /**
   * Build one segment from a claim body. Exposed for callers that already
   * hold per-claim text.
   */
  buildSegment(claimNumber: number, rawText: string): ClaimSegment {
    const tokens = tokenizeClaim(rawText);

    const references = new Set<number>();
    const sequenceNumbers = new Set<number>();
    const sequenceContexts: SequenceReferenceContext[] = [];
    const mutations = new Set<string>();
    let connectives = 0;
    let percentages = 0;
    let hasClaimReference = false;

    for (const token of tokens) {
      switch (token.kind) {
        case 'claimReference':
          hasClaimReference = true;
          for (const n of expandNumberList(token.text)) {
            if (n > 0 && n !== claimNumber) references.add(n);
          }
          break;
        case 'sequenceReference':
          for (const n of expandNumberList(token.text)) {
            sequenceNumbers.add(n);
            sequenceContexts.push(contextOf(rawText, token, formatSequenceIdentifier(n)));
          }
          break;
        case 'connective':
          connectives++;
          break;
        case 'percentage':
          percentages++;
          break;
        default:
          for (const code of mutationCodes(token)) mutations.add(code);
      }
    }

    const sequenceReferences = [...sequenceNumbers].sort((a, b) => a - b).map(formatSequenceIdentifier);
    const mutationTokens = [...mutations].sort(compareMutationCodes);

    const segment: ClaimSegment = {
      claimNumber,
      rawText,
      claimKind: hasClaimReference ? 'dependent' : 'independent',
      dependencyRefs: [...references].sort((a, b) => a - b),
      sequenceReferences,
      sequenceContexts,
      mutationTokens,
      complexityScore: computeComplexity(
        {
          textLength: rawText.length,
          sequenceReferences: sequenceReferences.length,
          mutations: mutationTokens.length,
          connectives,
          percentages,
        },
        this.weights
      ),
    };

    log.debug('Claim parsed', {
      claimNumber,
      claimKind: segment.claimKind,
      dependencyRefs: segment.dependencyRefs,
      complexityScore: segment.complexityScore,
    });

    return Object.freeze(segment);
  }

  /**
   * Claim markers, taken only in consecutive order. Line-leading markers of
   * the first marker's style win when there are at least two of them; any
   * other numbered line stays in the body of the claim it sits in.
   */
  private findBoundaries(text: string): Boundary[] {
    const lineMatches = [...text.matchAll(LINE_BOUNDARY)];
    const style = lineMatches.length > 0 ? MARKER_STYLES[lineMatches[0][2]] : undefined;
    const lineBoundaries = consecutive(lineMatches.filter((match) => MARKER_STYLES[match[2]] === style));
    if (lineBoundaries.length >= 2) {
      return lineBoundaries;
    }

    // No line structure: "n. " anywhere in the text
    const inline = consecutive(text.matchAll(INLINE_BOUNDARY));
    return inline.length > lineBoundaries.length ? inline : lineBoundaries;
  }
}

function consecutive(matches: Iterable<RegExpMatchArray>): Boundary[] {
  const boundaries: Boundary[] = [];
  let last: number | undefined;

  for (const match of matches) {
    const n = Number(match[1]);
    const accepted = last === undefined ? Number.isSafeInteger(n) && n > 0 : n === last + 1;
    if (!accepted) continue;

    const start = match.index ?? 0;
    boundaries.push({ claimNumber: n, start, bodyStart: start + match[0].length });
    last = n;
  }

  return boundaries;
}

function contextOf(text: string, token: ClaimToken, identifier: string): SequenceReferenceContext {
  return {
    identifier,
    context: text.slice(Math.max(0, token.start - CONTEXT_RADIUS), Math.min(text.length, token.end + CONTEXT_RADIUS)),
    position: token.start,
  };
}

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}…` : text;
}
