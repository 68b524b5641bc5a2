#!/usr/bin/env node

import { AnthropicConfig } from './config/anthropic.js';
import { OpenAIConfig } from './config/openai.js';
import {
  resolvePipelineSettings,
  type AnalysisMode,
  type PipelineSettingsOverrides,
  type ReasoningProvider,
} from './config/pipeline.js';
import { ReasoningClientFactory } from './concurrent/ReasoningClientFactory.js';
import { ChunkBuilder, complexityTier } from './core/ChunkBuilder.js';
import { ClaimSegmenter } from './core/ClaimSegmenter.js';
import { ConfigurationError } from './core/errors.js';
import { PipelineController, decideExecutionMode } from './core/PipelineController.js';
import { loadClaimsDocument } from './utils/claimsDocumentLoader.js';
import { loadExistingRules } from './utils/knownRulesLoader.js';
import { logger } from './utils/logger.js';
import { writeRunArtifacts } from './utils/runArtifacts.js';
import { loadSequenceData } from './utils/sequenceDataLoader.js';

/**
 * CLI for patent claim rule extraction
 *
 * Usage:
 *   npm run dev analyze <claims-file> [options]   - Extract protection rules
 *   npm run dev segment <claims-file>             - Show segments and the batch plan
 *   npm run dev test-connection                   - Test the reasoning provider
 */

const COMMANDS = ['analyze', 'segment', 'test-connection', 'help'];

const PROVIDERS: readonly ReasoningProvider[] = ['openai', 'anthropic'];
const MODES: readonly AnalysisMode[] = ['auto', 'single', 'chunked'];

/**
 * Value following a flag, e.g. --output out/
 */
function readFlag(flags: string[], name: string): string | undefined {
  const index = flags.indexOf(name);
  if (index === -1) return undefined;
  const value = flags[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`Missing value for ${name}`);
  }
  return value;
}

function readNumberFlag(flags: string[], name: string): number | undefined {
  const raw = readFlag(flags, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid value for ${name}`, [`"${raw}" is not a number`]);
  }
  return value;
}

function readChoiceFlag<T extends string>(flags: string[], name: string, choices: readonly T[]): T | undefined {
  const raw = readFlag(flags, name);
  if (raw === undefined) return undefined;
  const choice = choices.find((candidate) => candidate === raw);
  if (choice === undefined) {
    throw new ConfigurationError(`Invalid value for ${name}`, [`"${raw}" must be one of ${choices.join(', ')}`]);
  }
  return choice;
}

function settingsFromFlags(flags: string[]): PipelineSettingsOverrides {
  return {
    provider: readChoiceFlag(flags, '--provider', PROVIDERS),
    mode: readChoiceFlag(flags, '--mode', MODES),
    concurrency: readNumberFlag(flags, '--concurrency'),
    model: readFlag(flags, '--model'),
  };
}

/**
 * Run the full pipeline on one claims file
 */
async function analyze(claimsFile: string, flags: string[]): Promise<void> {
  const settings = resolvePipelineSettings(settingsFromFlags(flags));
  const document = await loadClaimsDocument(claimsFile);
  const patentNumber = readFlag(flags, '--patent') ?? document.patentNumber;
  const group = readNumberFlag(flags, '--group') ?? 1;
  const rulesFile = readFlag(flags, '--rules');
  const sequencesFile = readFlag(flags, '--sequences');
  const outputDir = readFlag(flags, '--output') ?? 'output';

  const knownRules = rulesFile ? await loadExistingRules(rulesFile) : [];
  const sequences = sequencesFile ? await loadSequenceData(sequencesFile) : [];

  OpenAIConfig.resetClient();
  AnthropicConfig.resetClient();
  const client = ReasoningClientFactory.createClient(settings, patentNumber);
  const controller = new PipelineController(client, settings);

  console.log(`\n🔬 Analyzing ${patentNumber} with ${client.name}...\n`);
  const result = await controller.run({
    patentNumber,
    group,
    claimsText: document.claimsText,
    knownRules,
    sequences,
  });

  const paths = await writeRunArtifacts(result, outputDir);
  const { completeness, ruleQuality } = result.ruleSet.qualityMetrics;
  const { batches } = result.ruleSet.analysisSummary;

  console.log(`✅ Analysis complete (${result.mode} mode)`);
  console.log(`   Claims:     ${completeness.claimsAnalyzed} (${completeness.claimsCovered} covered)`);
  console.log(`   Batches:    ${batches.successful}/${batches.total} successful`);
  console.log(`   Rules:      ${result.ruleSet.rules.length} (${ruleQuality.needsReviewRules} need review)`);
  console.log(`   Confidence: ${result.document.metadata.analysis_confidence}`);
  console.log(`   Output:     ${paths.rulesPath}`);
  console.log(`   Summary:    ${paths.summaryPath}`);
}

/**
 * Dry run: segments and batch plan, no reasoning calls
 */
async function segment(claimsFile: string, flags: string[]): Promise<void> {
  const settings = resolvePipelineSettings(settingsFromFlags(flags));
  const document = await loadClaimsDocument(claimsFile);
  const { segments, failures } = new ClaimSegmenter(settings.complexityWeights).segment(document.claimsText);

  console.log(`\n📄 ${document.patentNumber}: ${segments.length} claims\n`);
  for (const claim of segments) {
    const tier = complexityTier(claim.complexityScore, settings.tierBounds);
    const refs = claim.dependencyRefs.length > 0 ? ` → ${claim.dependencyRefs.join(', ')}` : '';
    console.log(
      `  ${String(claim.claimNumber).padStart(3)}. ${claim.claimKind}${refs} | ` +
        `score ${claim.complexityScore.toFixed(2)} (${tier}) | ` +
        `${claim.sequenceReferences.join(', ') || 'no SEQ ID'} | ${claim.mutationTokens.join('/') || 'no mutations'}`
    );
  }
  for (const failure of failures) {
    console.log(`  ⚠️  ${failure.message}: ${failure.excerpt}`);
  }

  const decision = decideExecutionMode(segments, settings.modeThresholds);
  const reasons = decision.reasons.length > 0 ? decision.reasons.join('; ') : 'within all thresholds';
  console.log(`\n🧭 Auto mode would run ${decision.mode} (${reasons})`);

  const batches = new ChunkBuilder(settings).build(segments);
  console.log(`\n📦 Chunked plan: ${batches.length} batches`);
  for (const batch of batches) {
    const claims = batch.segments.map((s) => s.claimNumber).join(', ');
    const overflow = batch.overflow ? ' (overflow)' : '';
    console.log(`  ${batch.batchId}: claims ${claims} | complexity ${batch.totalComplexity.toFixed(2)}${overflow}`);
  }
}

/**
 * Send one tiny request through the configured provider
 */
async function testConnection(flags: string[]): Promise<void> {
  const settings = resolvePipelineSettings(settingsFromFlags(flags));
  console.log(`\n🧪 Testing ${settings.provider} connection...\n`);

  if (!ReasoningClientFactory.validateProvider(settings.provider)) {
    console.log(`❌ ${settings.provider} configuration invalid. Please check your .env file.`);
    process.exit(1);
  }

  const client = ReasoningClientFactory.createClient(settings, 'connection-test');
  const result = await client.analyze(
    { system: 'Answer with JSON only.', user: 'Return {"status": "ok"}.' },
    { signal: AbortSignal.timeout(30000) }
  );

  if (result.ok) {
    console.log(`✅ ${client.name} responded: ${result.value.slice(0, 200)}`);
  } else {
    console.log(`❌ ${client.name} call failed: ${result.error.message}`);
    process.exit(1);
  }
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Patent Claim Rule Extraction

Splits patent claims into analysis batches, extracts protection rules with an
LLM and merges them into one scored rule set per patent.

USAGE:
  npm run dev <command> [options]

COMMANDS:
  analyze <claims-file>          Extract protection rules from a claims file
  segment <claims-file>          Show claim segments and the batch plan (no LLM calls)
  test-connection                Send a test request to the reasoning provider
  help                           Show this help message

OPTIONS (analyze):
  --patent <number>              Patent number (default: read from the file)
  --group <n>                    Group number written to the output (default: 1)
  --rules <file>                 Known rules JSON used as format reference
  --sequences <file>             Sequence listing JSON; referenced entries are sent with each batch
  --output <dir>                 Output directory (default: output)
  --mode auto|single|chunked     Force the execution mode (default: auto)
  --concurrency <n>              Batches analyzed in parallel (default: 4)
  --provider openai|anthropic    Reasoning provider (default: openai)
  --model <name>                 Model override

EXAMPLES:
  npm run dev analyze data/CN202210107337_claims.md
  npm run dev analyze data/CN202210107337_claims.md --rules data/rules.json --sequences data/sequences.json --mode chunked
  npm run dev segment data/CN202210107337_claims.md
  npm run dev test-connection --provider anthropic

ENVIRONMENT:
  Configuration is loaded from .env file (see .env.example)
    - OPENAI_API_KEY, OPENAI_BASE_URL, OPENAI_MODEL
    - ANTHROPIC_API_KEY, ANTHROPIC_MODEL
    - PIPELINE_* settings
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];
  const target = args[1];

  try {
    switch (command) {
      case 'analyze':
        if (!target || target.startsWith('--')) {
          console.error('Error: Claims file is required');
          console.error('Usage: npm run dev analyze <claims-file> [options]');
          process.exit(1);
        }
        await analyze(target, args.slice(2));
        break;

      case 'segment':
        if (!target || target.startsWith('--')) {
          console.error('Error: Claims file is required');
          console.error('Usage: npm run dev segment <claims-file>');
          process.exit(1);
        }
        await segment(target, args.slice(2));
        break;

      case 'test-connection':
        await testConnection(args.slice(1));
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exit(1);
    }
  } catch (error) {
    logger.error('Command failed', {
      error: error instanceof Error ? error.message : String(error),
      details: error instanceof ConfigurationError ? error.details : undefined,
    });
    console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
