import {
  DEFAULT_PIPELINE_SETTINGS,
  validatePipelineSettings,
  type ModeThresholds,
  type PipelineSettings,
} from '../config/pipeline.js';
import type { ReasoningClient } from '../concurrent/ReasoningClient.js';
import type {
  AnalysisBatch,
  BatchAnalysisOutcome,
  ClaimSegment,
  KnownRule,
  MergedRuleSet,
  OutputDocument,
  SequenceEntry,
} from '../models/types.js';
import { RunLogger } from '../utils/logger.js';
import { ProcessingLog, type ProcessingLogEntry } from '../utils/processingLog.js';
import { buildOutputDocument } from '../utils/runArtifacts.js';
import { ChunkAnalysisOrchestrator, type OrchestratorOptions } from './ChunkAnalysisOrchestrator.js';
import { ChunkBuilder } from './ChunkBuilder.js';
import { ClaimSegmenter } from './ClaimSegmenter.js';
import { RuleMerger } from './RuleMerger.js';

export type ExecutionMode = 'single' | 'chunked';

export interface PipelineInput {
  patentNumber: string;
  group?: number;
  /** Raw claims block; segmented first */
  claimsText?: string;
  /** Pre-segmented claims; used instead of claimsText when given */
  segments?: readonly ClaimSegment[];
  knownRules?: readonly KnownRule[];
  /** Converted sequence listing; entries referenced by a batch go into its request */
  sequences?: readonly SequenceEntry[];
}

export interface PipelineResult {
  patentNumber: string;
  group: number;
  mode: ExecutionMode;
  segments: readonly ClaimSegment[];
  batches: readonly AnalysisBatch[];
  outcomes: readonly BatchAnalysisOutcome[];
  ruleSet: MergedRuleSet;
  document: OutputDocument;
  processingLog: ProcessingLogEntry[];
}

export type PipelineControllerOptions = Pick<OrchestratorOptions, 'sleep'>;

export interface ModeDecision {
  mode: ExecutionMode;
  textLength: number;
  claimCount: number;
  dependencyRefs: number;
  reasons: string[];
}

/**
 * Chunked when any threshold is exceeded, single-shot otherwise
 */
export function decideExecutionMode(
  segments: readonly ClaimSegment[],
  thresholds: ModeThresholds = DEFAULT_PIPELINE_SETTINGS.modeThresholds
): ModeDecision {
  const textLength = segments.reduce((sum, segment) => sum + segment.rawText.length, 0);
  const claimCount = segments.length;
  const dependencyRefs = segments.reduce((sum, segment) => sum + segment.dependencyRefs.length, 0);

  const reasons: string[] = [];
  if (textLength > thresholds.maxTextLength) {
    reasons.push(`text length ${textLength} > ${thresholds.maxTextLength}`);
  }
  if (claimCount > thresholds.maxClaimCount) {
    reasons.push(`claim count ${claimCount} > ${thresholds.maxClaimCount}`);
  }
  if (textLength > thresholds.combinedTextLength && claimCount > thresholds.combinedClaimCount) {
    reasons.push(
      `text length ${textLength} > ${thresholds.combinedTextLength} with ${claimCount} > ${thresholds.combinedClaimCount} claims`
    );
  }
  if (dependencyRefs > thresholds.maxDependencyRefs) {
    reasons.push(`dependency references ${dependencyRefs} > ${thresholds.maxDependencyRefs}`);
  }

  return {
    mode: reasons.length > 0 ? 'chunked' : 'single',
    textLength,
    claimCount,
    dependencyRefs,
    reasons,
  };
}

/**
 * Pipeline Controller
 *
 * Sequences one run: segment → plan → analyze → merge → output document.
 * Invalid settings throw ConfigurationError before anything runs; every
 * other failure is recorded in the processing log.
 */
export class PipelineController {
  private readonly settings: PipelineSettings;
  private readonly chunkBuilder: ChunkBuilder;

  constructor(
    private readonly client: ReasoningClient,
    settings: PipelineSettings = DEFAULT_PIPELINE_SETTINGS,
    private readonly options: PipelineControllerOptions = {}
  ) {
    this.settings = validatePipelineSettings(settings);
    this.chunkBuilder = new ChunkBuilder({
      maxBatchSize: this.settings.maxBatchSize,
      complexityBudget: this.settings.complexityBudget,
      tierBounds: this.settings.tierBounds,
    });
  }

  /**
   * Batches for the given segments under the configured (or forced) mode
   */
  plan(segments: readonly ClaimSegment[]): { decision: ModeDecision; batches: AnalysisBatch[] } {
    const decision = decideExecutionMode(segments, this.settings.modeThresholds);
    if (this.settings.mode !== 'auto') {
      decision.mode = this.settings.mode;
      decision.reasons = [`mode forced to ${this.settings.mode}`];
    }

    const batches =
      segments.length === 0
        ? []
        : decision.mode === 'chunked'
          ? this.chunkBuilder.build(segments)
          : [this.chunkBuilder.buildSingleShot(segments)];

    return { decision, batches };
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    const runLogger = new RunLogger(input.patentNumber);
    const processingLog = new ProcessingLog(runLogger);
    const group = input.group ?? 1;
    runLogger.started({ provider: this.client.name, mode: this.settings.mode });

    const segments =
      input.segments ??
      new ClaimSegmenter(this.settings.complexityWeights, processingLog).segment(input.claimsText ?? '').segments;
    processingLog.info('segment', `${segments.length} claims segmented`);

    const { decision, batches } = this.plan(segments);
    processingLog.info('batch', `${decision.mode} mode with ${batches.length} batches`);
    runLogger.info('Execution mode decided', { ...decision, batches: batches.length });

    const orchestrator = new ChunkAnalysisOrchestrator(
      this.client,
      { ...this.settings, sleep: this.options.sleep },
      processingLog,
      runLogger
    );
    const outcomes = await orchestrator.analyzeBatches(batches, input.knownRules ?? [], input.sequences ?? []);

    const merger = new RuleMerger({ similarityThreshold: this.settings.similarityThreshold }, processingLog);
    const ruleSet = merger.merge(
      outcomes,
      segments.map((segment) => segment.claimNumber)
    );
    processingLog.info('merge', `${ruleSet.rules.length} rules after merge`);

    const document = buildOutputDocument({
      patentNumber: input.patentNumber,
      group,
      ruleSet,
    });

    runLogger.completed({
      mode: decision.mode,
      batches: batches.length,
      rules: ruleSet.rules.length,
      coverage: ruleSet.qualityMetrics.completeness.claimsCoverage,
      failures: processingLog.failures().length,
    });

    return {
      patentNumber: input.patentNumber,
      group,
      mode: decision.mode,
      segments,
      batches,
      outcomes,
      ruleSet,
      document,
      processingLog: processingLog.toJSON(),
    };
  }
}
