import { DEFAULT_PIPELINE_SETTINGS } from '../config/pipeline.js';
import type { AnalysisBatch, ClaimSegment } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';

const log = createLogger('ChunkBuilder');

export type ComplexityTier = 'simple' | 'moderate' | 'complex';

const TIER_ORDER: readonly ComplexityTier[] = ['simple', 'moderate', 'complex'];

export interface ChunkBuilderOptions {
  maxBatchSize: number;
  complexityBudget: number;
  tierBounds: { low: number; high: number };
}

/**
 * simple < low ≤ moderate ≤ high < complex
 */
export function complexityTier(score: number, bounds: ChunkBuilderOptions['tierBounds']): ComplexityTier {
  if (score < bounds.low) return 'simple';
  if (score <= bounds.high) return 'moderate';
  return 'complex';
}

export function formatBatchId(index: number): string {
  return `batch-${String(index + 1).padStart(4, '0')}`;
}

/**
 * Chunk Builder
 *
 * Packs segments into batches bounded by size and summed complexity.
 * Simple claims go first, then moderate, then complex; input order is kept
 * inside a tier. A pure function of its inputs.
 */
export class ChunkBuilder {
  private readonly options: ChunkBuilderOptions;

  constructor(options: Partial<ChunkBuilderOptions> = {}) {
    this.options = {
      maxBatchSize: options.maxBatchSize ?? DEFAULT_PIPELINE_SETTINGS.maxBatchSize,
      complexityBudget: options.complexityBudget ?? DEFAULT_PIPELINE_SETTINGS.complexityBudget,
      tierBounds: options.tierBounds ?? DEFAULT_PIPELINE_SETTINGS.tierBounds,
    };
    ChunkBuilder.validate(this.options);
  }

  static validate(options: ChunkBuilderOptions): void {
    const problems: string[] = [];
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize <= 0) {
      problems.push(`maxBatchSize must be a positive integer (got ${options.maxBatchSize})`);
    }
    if (!(options.complexityBudget > 0)) {
      problems.push(`complexityBudget must be positive (got ${options.complexityBudget})`);
    }
    if (options.tierBounds.low > options.tierBounds.high) {
      problems.push('tierBounds.low must not exceed tierBounds.high');
    }
    if (problems.length > 0) {
      throw new ConfigurationError('Invalid chunking configuration', problems);
    }
  }

  /**
   * Complexity-bounded batches for chunked mode
   */
  build(segments: readonly ClaimSegment[]): AnalysisBatch[] {
    const { maxBatchSize, complexityBudget, tierBounds } = this.options;
    const batches: AnalysisBatch[] = [];
    let current: ClaimSegment[] = [];
    let currentComplexity = 0;

    const push = (members: ClaimSegment[], totalComplexity: number, overflow: boolean) => {
      const index = batches.length;
      batches.push(
        Object.freeze({
          batchId: formatBatchId(index),
          index,
          segments: Object.freeze([...members]),
          totalComplexity,
          overflow,
        })
      );
    };

    const flush = () => {
      if (current.length > 0) {
        push(current, currentComplexity, false);
        current = [];
        currentComplexity = 0;
      }
    };

    const tiers = new Map<ComplexityTier, ClaimSegment[]>(TIER_ORDER.map((tier) => [tier, []]));
    for (const segment of segments) {
      tiers.get(complexityTier(segment.complexityScore, tierBounds))?.push(segment);
    }

    for (const tier of TIER_ORDER) {
      for (const segment of tiers.get(tier) ?? []) {
        if (segment.complexityScore > complexityBudget) {
          flush();
          push([segment], segment.complexityScore, true);
          log.warn('Claim exceeds the complexity budget on its own', {
            claimNumber: segment.claimNumber,
            complexityScore: segment.complexityScore,
            complexityBudget,
          });
          continue;
        }

        if (current.length >= maxBatchSize || currentComplexity + segment.complexityScore > complexityBudget) {
          flush();
        }
        current.push(segment);
        currentComplexity += segment.complexityScore;
      }
    }
    flush();

    log.info('Analysis batches built', {
      segments: segments.length,
      batches: batches.length,
      maxBatchSize,
      complexityBudget,
    });
    return batches;
  }

  /**
   * One unbatched unit holding every segment, for single-shot mode
   */
  buildSingleShot(segments: readonly ClaimSegment[]): AnalysisBatch {
    return Object.freeze({
      batchId: formatBatchId(0),
      index: 0,
      segments: Object.freeze([...segments]),
      totalComplexity: segments.reduce((sum, segment) => sum + segment.complexityScore, 0),
      overflow: false,
    });
  }
}
