import fs from 'fs/promises';
import path from 'path';
import type { MergedRuleSet, OutputDocument } from '../models/types.js';
import type { PipelineResult } from '../core/PipelineController.js';
import { logger } from './logger.js';

export interface OutputDocumentInput {
  patentNumber: string;
  group: number;
  ruleSet: MergedRuleSet;
}

export interface RunArtifactPaths {
  directory: string;
  rulesPath: string;
  summaryPath: string;
}

function round(value: number, digits: number = 3): number {
  return Number(value.toFixed(digits));
}

/**
 * Output document in the wire format, one per patent
 */
export function buildOutputDocument(input: OutputDocumentInput, now: Date = new Date()): OutputDocument {
  const { ruleSet } = input;

  return {
    patent_number: input.patentNumber,
    group: input.group,
    rules: ruleSet.rules.map((rule) => ({
      wild_type: rule.wildType,
      rule: rule.ruleKind,
      mutation: rule.mutationDescriptor,
      mutation_logic: rule.logicalExpression,
      identity_logic: rule.identityLogic,
      statement: rule.statement,
      comment: rule.comment,
    })),
    metadata: {
      total_rules: ruleSet.rules.length,
      claims_analyzed: ruleSet.qualityMetrics.completeness.claimsAnalyzed,
      processing_timestamp: now.toISOString(),
      analysis_confidence: round(ruleSet.analysisSummary.averageBatchConfidence),
    },
  };
}

/**
 * Quality metrics, processing stats, per-batch outcomes and the processing log
 */
export function buildRunSummary(result: PipelineResult, now: Date = new Date()) {
  return {
    patent_number: result.patentNumber,
    group: result.group,
    mode: result.mode,
    generated_at: now.toISOString(),
    claims: result.segments.length,
    batches: result.outcomes.map((outcome) => ({
      batch_id: outcome.batchId,
      claim_numbers: outcome.claimNumbers,
      confidence: round(outcome.confidence),
      rules: outcome.ruleCandidates.length,
      parse_strategy: outcome.parseStrategy ?? null,
      attempts: outcome.attempts,
      duration_ms: outcome.durationMs,
      error: outcome.errorMessage ?? null,
    })),
    quality_metrics: result.ruleSet.qualityMetrics,
    processing_stats: result.ruleSet.processingStats,
    analysis_summary: result.ruleSet.analysisSummary,
    collisions: result.ruleSet.collisions,
    processing_log: result.processingLog,
  };
}

/**
 * "CN 202210107337" → "CN_202210107337"
 */
export function fileSafePatentNumber(patentNumber: string): string {
  return patentNumber.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'UNKNOWN';
}

/**
 * 2026-10-18T09:05:03.000Z → 20261018_090503
 */
function timestampOf(now: Date): string {
  return now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

/**
 * Write <patent>_rules.json and <patent>_summary.json into a timestamped directory
 */
export async function writeRunArtifacts(
  result: PipelineResult,
  outputDir: string,
  now: Date = new Date()
): Promise<RunArtifactPaths> {
  const patent = fileSafePatentNumber(result.patentNumber);
  const directory = path.join(outputDir, `${patent}_${timestampOf(now)}`);
  await fs.mkdir(directory, { recursive: true });

  const rulesPath = path.join(directory, `${patent}_rules.json`);
  const summaryPath = path.join(directory, `${patent}_summary.json`);

  await fs.writeFile(rulesPath, JSON.stringify(result.document, null, 2), 'utf-8');
  await fs.writeFile(summaryPath, JSON.stringify(buildRunSummary(result, now), null, 2), 'utf-8');

  logger.info('Run artifacts written', { directory, rules: result.document.rules.length });
  return { directory, rulesPath, summaryPath };
}
