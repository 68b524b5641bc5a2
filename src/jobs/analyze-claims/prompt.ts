import type { ReasoningRequest } from '../../concurrent/ReasoningClient.js';
import { formatSequenceIdentifier } from '../../core/claimTokenizer.js';
import { normalizeWildType } from '../../core/ResponseParser.js';
import type { AnalysisBatch, ClaimSegment, KnownRule, SequenceEntry } from '../../models/types.js';

/**
 * Claim Analysis Prompt
 *
 * Template variables to replace:
 * - {claimCount}
 * - {batchSummary}
 * - {knownRules}
 * - {sequences}
 * - {claims}
 */

export const CLAIM_ANALYSIS_SYSTEM_PROMPT = `You are a patent analyst specialising in protein sequence claims.
You read patent claims and state, as structured rules, which sequences and mutations each claim protects.
Always answer with a single JSON document.`;

export const CLAIM_ANALYSIS_PROMPT = `# MISSION
Analyse the {claimCount} patent claim(s) below and extract their protection rules.

# BATCH
{batchSummary}

# WHAT TO EXTRACT
For every claim, produce one or more rules. Each rule describes one protected scope:

1. **wild_type**: the reference sequence, written as "SEQ ID NO:X"
2. **rule**: the protection type, one of
   - "identical": the claim protects the exact sequence
   - "identity>X%": the claim protects sequences with at least X% identity
   - "conditional": protection depends on additional conditions
3. **mutation**: the mutation codes in standard form, slash-joined (e.g. "Y178A/F186R")
4. **mutation_logic**: a logical expression over the mutation codes using &, |, ! and parentheses
   (e.g. "Y178A&(F186R|W46X)")
5. **identity_logic**: the sequence identity condition (e.g. "seq_identity>=90%"), empty if none
6. **statement**: one sentence describing what is protected
7. **comment**: any remark on how the rule was derived
8. **claims**: the claim numbers this rule comes from

A complex claim usually needs several rules, one per protection layer.
Do not output placeholder rules such as "analysis completed".

# KNOWN RULES (format reference)
{knownRules}

# SEQUENCES REFERENCED BY THESE CLAIMS
{sequences}

# CLAIMS
{claims}

# OUTPUT
Return ONLY this JSON structure:
\`\`\`json
{
  "rules": [
    {
      "wild_type": "SEQ ID NO:1",
      "rule": "identity>90%",
      "mutation": "Y178A/F186R",
      "mutation_logic": "Y178A&F186R",
      "identity_logic": "seq_identity>=90%",
      "statement": "...",
      "comment": "...",
      "claims": [1]
    }
  ]
}
\`\`\`
`;

/**
 * Claim fields sent to the model; bookkeeping such as the complexity score stays local
 */
function serializeClaim(segment: ClaimSegment) {
  return {
    claim_number: segment.claimNumber,
    claim_type: segment.claimKind,
    depends_on: segment.dependencyRefs,
    sequence_references: segment.sequenceReferences,
    sequence_contexts: segment.sequenceContexts.map((context) => ({
      identifier: context.identifier,
      position: context.position,
      context: context.context,
    })),
    mutations: segment.mutationTokens,
    text: segment.rawText,
  };
}

export function summarizeBatch(batch: AnalysisBatch) {
  const scores = batch.segments.map((segment) => segment.complexityScore);
  const sequenceReferences = new Set(batch.segments.flatMap((segment) => segment.sequenceReferences));
  const independent = batch.segments.filter((segment) => segment.claimKind === 'independent').length;

  return {
    batch_id: batch.batchId,
    claim_numbers: batch.segments.map((segment) => segment.claimNumber),
    complexity_range: scores.length > 0 ? [Math.min(...scores), Math.max(...scores)] : [0, 0],
    average_complexity:
      scores.length > 0 ? Number((scores.reduce((sum, score) => sum + score, 0) / scores.length).toFixed(2)) : 0,
    independent_claims: independent,
    dependent_claims: batch.segments.length - independent,
    sequence_reference_count: sequenceReferences.size,
  };
}

/**
 * Sequence entries referenced by the batch, keyed by their own identifier.
 * "SEQ_ID_NO_2", "SEQ ID NO: 2" and "2" all match a reference to SEQ ID NO:2.
 */
export function relevantSequences(
  batch: AnalysisBatch,
  sequences: readonly SequenceEntry[]
): Record<string, SequenceEntry> {
  const references = new Set(batch.segments.flatMap((segment) => segment.sequenceReferences));
  const relevant: Record<string, SequenceEntry> = {};

  for (const entry of sequences) {
    const id = entry.sequence_id.trim();
    const identifier = /^\d+$/.test(id) ? formatSequenceIdentifier(Number(id)) : normalizeWildType(id);
    if (references.has(identifier)) {
      relevant[entry.sequence_id] = entry;
    }
  }

  return relevant;
}

export function buildClaimAnalysisPrompt(
  batch: AnalysisBatch,
  knownRules: readonly KnownRule[],
  calibrationSampleSize: number,
  sequences: readonly SequenceEntry[] = []
): ReasoningRequest {
  const sample = knownRules.slice(0, calibrationSampleSize);
  const relevant = relevantSequences(batch, sequences);
  const replacements: Record<string, string> = {
    '{claimCount}': String(batch.segments.length),
    '{batchSummary}': JSON.stringify(summarizeBatch(batch), null, 2),
    '{knownRules}': sample.length > 0 ? JSON.stringify(sample, null, 2) : 'No known rules.',
    '{sequences}':
      Object.keys(relevant).length > 0 ? JSON.stringify(relevant, null, 2) : 'No sequence data.',
    '{claims}': JSON.stringify(batch.segments.map(serializeClaim), null, 2),
  };

  let prompt = CLAIM_ANALYSIS_PROMPT;
  for (const [token, value] of Object.entries(replacements)) {
    prompt = prompt.replaceAll(token, () => value);
  }

  return { system: CLAIM_ANALYSIS_SYSTEM_PROMPT, user: prompt };
}
