import type { ParseStrategy, RuleCandidate, RuleKind } from '../models/types.js';
import { SchemaValidator, formatErrors } from '../utils/validators.js';
import { compareMutationCodes, formatSequenceIdentifier } from './claimTokenizer.js';
import { ResponseParseError, err, ok, type Result } from './errors.js';
import { normalizeLogicalExpression } from './logicalExpression.js';

export const UNKNOWN_WILD_TYPE = 'UNKNOWN';

const PREVIEW_LENGTH = 200;
const MAX_BALANCED_ATTEMPTS = 20;

/**
 * A rule item as the reasoning call writes it
 */
export interface RawRuleItem {
  wild_type?: string;
  rule?: string;
  mutation?: string;
  mutation_logic?: string;
  identity_logic?: string;
  statement?: string;
  comment?: string;
  /** Attribution is read leniently; anything unusable is ignored */
  claims?: unknown;
  claim_number?: unknown;
}

const nonEmpty = { type: 'string', minLength: 1 };

const ruleItemSchema = {
  type: 'object',
  properties: {
    wild_type: { type: 'string' },
    rule: { type: 'string' },
    mutation: { type: 'string' },
    mutation_logic: { type: 'string' },
    identity_logic: { type: 'string' },
    statement: { type: 'string' },
    comment: { type: 'string' },
  },
  anyOf: [
    { required: ['wild_type'], properties: { wild_type: nonEmpty } },
    { required: ['mutation'], properties: { mutation: nonEmpty } },
    { required: ['mutation_logic'], properties: { mutation_logic: nonEmpty } },
    { required: ['statement'], properties: { statement: nonEmpty } },
  ],
};

const ruleItemValidator = new SchemaValidator<RawRuleItem>('rule-item', ruleItemSchema);

export interface ParseContext {
  batchId: string;
  claimNumbers: readonly number[];
}

export interface ParsedResponse {
  candidates: RuleCandidate[];
  strategy: ParseStrategy;
  /** One line per rejected item */
  skipped: string[];
  /** Claims the model attributed rules to; undefined when it attributed none */
  attributedClaims?: Set<number>;
}

export interface ExtractedJson {
  value: unknown;
  strategy: ParseStrategy;
}

/**
 * Response Parser
 *
 * Turns the raw text of a reasoning call into RuleCandidates. Three
 * strategies are tried in order: the whole text as JSON, the first fenced
 * code block, the first balanced {…} or […] substring.
 */
export class ResponseParser {
  constructor(private readonly maxResponseChars: number = 200000) {}

  parse(raw: string, context: ParseContext): Result<ParsedResponse, ResponseParseError> {
    if (raw.length > this.maxResponseChars) {
      return err(
        new ResponseParseError(
          `Response of ${raw.length} characters exceeds the ${this.maxResponseChars} character limit`,
          preview(raw)
        )
      );
    }

    const extracted = this.extractJson(raw);
    if (!extracted) {
      return err(new ResponseParseError('No JSON document found in response', preview(raw)));
    }

    const items = ruleItemsOf(extracted.value);
    if (!items) {
      return err(new ResponseParseError('JSON document holds no rule list', preview(raw)));
    }

    const candidates: RuleCandidate[] = [];
    const skipped: string[] = [];
    let attributedClaims: Set<number> | undefined;

    items.forEach((item, i) => {
      const result = ruleItemValidator.validate(item);
      if (!result.valid || !result.data) {
        skipped.push(`rule ${i}: ${formatErrors(result.errors).join('; ') || 'not an object'}`);
        return;
      }

      const attributed = attributedClaimsOf(result.data, context.claimNumbers);
      if (attributed.length > 0) {
        attributedClaims ??= new Set();
        for (const n of attributed) attributedClaims.add(n);
      }

      candidates.push(
        toRuleCandidate(result.data, {
          batchId: context.batchId,
          claimNumbers: attributed.length > 0 ? attributed : [...context.claimNumbers],
        })
      );
    });

    if (candidates.length === 0) {
      return err(
        new ResponseParseError(
          items.length === 0 ? 'Response holds an empty rule list' : `All ${items.length} rule items were invalid`,
          preview(raw)
        )
      );
    }

    return ok({ candidates, strategy: extracted.strategy, skipped, attributedClaims });
  }

  /**
   * First strategy that yields a JSON object or array
   */
  extractJson(raw: string): ExtractedJson | undefined {
    const direct = tryParse(raw.trim());
    if (direct !== undefined) {
      return { value: direct, strategy: 'direct' };
    }

    const fence = /```[ \t]*(?:json|JSON)?[ \t]*\n?([\s\S]*?)```/.exec(raw);
    if (fence) {
      const fenced = tryParse(fence[1].trim());
      if (fenced !== undefined) {
        return { value: fenced, strategy: 'fenced' };
      }
    }

    let attempts = 0;
    for (let start = 0; start < raw.length && attempts < MAX_BALANCED_ATTEMPTS; start++) {
      const char = raw[start];
      if (char !== '{' && char !== '[') continue;

      attempts++;
      const end = findBalancedEnd(raw, start);
      if (end === -1) continue;

      const balanced = tryParse(raw.slice(start, end + 1));
      if (balanced !== undefined) {
        return { value: balanced, strategy: 'balanced' };
      }
    }

    return undefined;
  }
}

function tryParse(text: string): object | undefined {
  if (text.length === 0) return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === 'object' && value !== null ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Index of the bracket closing the one at `start`, skipping string literals
 */
function findBalancedEnd(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') stack.push('}');
    else if (char === '[') stack.push(']');
    else if (char === '}' || char === ']') {
      if (stack.pop() !== char) return -1;
      if (stack.length === 0) return i;
    }
  }

  return -1;
}

/**
 * Accepted shapes: { rules: [...] }, { protection_rules: [...] }, [...] or a single rule object
 */
function ruleItemsOf(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  for (const key of ['rules', 'protection_rules']) {
    const list: unknown = Reflect.get(value, key);
    if (Array.isArray(list)) return list;
  }
  if (ruleItemValidator.is(value)) {
    return [value];
  }
  return undefined;
}

/**
 * Claims of the batch named by `claims` / `claim_number`, as numbers or numeric strings
 */
function attributedClaimsOf(item: RawRuleItem, batchClaims: readonly number[]): number[] {
  const named = [...(Array.isArray(item.claims) ? item.claims : [item.claims]), item.claim_number]
    .map(toClaimNumber)
    .filter((n): n is number => n !== undefined);
  return batchClaims.filter((n) => named.includes(n));
}

function toClaimNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number(value);
  }
  return undefined;
}

function toRuleCandidate(item: RawRuleItem, provenance: RuleCandidate['provenance']): RuleCandidate {
  return {
    wildType: normalizeWildType(item.wild_type ?? ''),
    ruleKind: classifyRuleKind(item.rule ?? ''),
    mutationDescriptor: normalizeMutationDescriptor(item.mutation ?? ''),
    logicalExpression: normalizeLogicalExpression(item.mutation_logic ?? ''),
    identityLogic: (item.identity_logic ?? '').trim(),
    statement: (item.statement ?? '').trim(),
    comment: (item.comment ?? '').trim(),
    needsReview: false,
    provenance,
  };
}

/**
 * "SEQ_ID_NO_2", "seq id no. 2" → "SEQ ID NO:2"
 */
export function normalizeWildType(raw: string): string {
  const match = /SEQ[\s_]*ID[\s_]*NO[\s_.:：]*(\d+)/i.exec(raw);
  if (match) {
    return formatSequenceIdentifier(Number(match[1]));
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : UNKNOWN_WILD_TYPE;
}

export function classifyRuleKind(raw: string): RuleKind {
  const rule = raw.toLowerCase();
  if (rule.includes('identical') || rule.includes('相同')) {
    return 'identical';
  }
  if (/identity|同一性|[%％≥>]/.test(rule)) {
    return 'identity_threshold';
  }
  if (rule.includes('conditional') || rule.includes('条件')) {
    return 'conditional';
  }
  return 'unknown';
}

/**
 * Standardized codes found in free text, slash-joined in position order
 */
export function normalizeMutationDescriptor(raw: string): string {
  const codes = new Set(raw.toUpperCase().match(/(?<![A-Z0-9])[A-Z]\d+[A-Z](?![A-Z0-9])/g) ?? []);
  return [...codes].sort(compareMutationCodes).join('/');
}

function preview(raw: string): string {
  return raw.length > PREVIEW_LENGTH ? `${raw.slice(0, PREVIEW_LENGTH)}…` : raw;
}
