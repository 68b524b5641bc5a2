import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { SchemaValidator, formatErrors } from '../utils/validators.js';

dotenv.config();

export type ReasoningProvider = 'openai' | 'anthropic';

export type AnalysisMode = 'auto' | 'single' | 'chunked';

/**
 * Weights of the claim complexity score.
 *
 * score = base + min(length / lengthDivisor, lengthCap)
 *       + perSequenceReference·refs + perMutation·mutations
 *       + perConnective·connectives + perPercentage·percentages, capped at max
 */
export interface ComplexityWeights {
  base: number;
  lengthDivisor: number;
  lengthCap: number;
  perSequenceReference: number;
  perMutation: number;
  perConnective: number;
  perPercentage: number;
  max: number;
}

/**
 * Chunked mode triggers when any of these is exceeded
 */
export interface ModeThresholds {
  maxTextLength: number;
  maxClaimCount: number;
  /** Both combined bounds must be exceeded together */
  combinedTextLength: number;
  combinedClaimCount: number;
  maxDependencyRefs: number;
}

export interface PipelineSettings {
  provider: ReasoningProvider;
  model?: string;
  mode: AnalysisMode;
  maxBatchSize: number;
  complexityBudget: number;
  /** Scores below `low` are simple, above `high` complex */
  tierBounds: { low: number; high: number };
  complexityWeights: ComplexityWeights;
  modeThresholds: ModeThresholds;
  /** Jaccard overlap a pair must exceed to be merged */
  similarityThreshold: number;
  maxAttempts: number;
  requestTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  concurrency: number;
  calibrationSampleSize: number;
  maxResponseChars: number;
  /** Statement length a rule needs to pass the confidence check */
  minStatementLength: number;
}

export const DEFAULT_COMPLEXITY_WEIGHTS: ComplexityWeights = {
  base: 1.0,
  lengthDivisor: 500,
  lengthCap: 3.0,
  perSequenceReference: 0.1,
  perMutation: 0.2,
  perConnective: 0.1,
  perPercentage: 0.1,
  max: 10.0,
};

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  provider: 'openai',
  mode: 'auto',
  maxBatchSize: 5,
  complexityBudget: 15,
  tierBounds: { low: 3, high: 6 },
  complexityWeights: DEFAULT_COMPLEXITY_WEIGHTS,
  modeThresholds: {
    maxTextLength: 10000,
    maxClaimCount: 10,
    combinedTextLength: 5000,
    combinedClaimCount: 5,
    maxDependencyRefs: 20,
  },
  similarityThreshold: 0.6,
  maxAttempts: 3,
  requestTimeoutMs: 120000,
  backoffBaseMs: 1000,
  backoffMaxMs: 30000,
  concurrency: 4,
  calibrationSampleSize: 3,
  maxResponseChars: 200000,
  minStatementLength: 20,
};

export type PipelineSettingsOverrides = Partial<
  Omit<PipelineSettings, 'tierBounds' | 'complexityWeights' | 'modeThresholds'>
> & {
  tierBounds?: Partial<PipelineSettings['tierBounds']>;
  complexityWeights?: Partial<ComplexityWeights>;
  modeThresholds?: Partial<ModeThresholds>;
};

const nonNegative = { type: 'number', minimum: 0 };
const positiveInteger = { type: 'integer', minimum: 1 };

const settingsSchema = {
  type: 'object',
  required: [
    'provider',
    'mode',
    'maxBatchSize',
    'complexityBudget',
    'tierBounds',
    'complexityWeights',
    'modeThresholds',
    'similarityThreshold',
    'maxAttempts',
    'requestTimeoutMs',
    'backoffBaseMs',
    'backoffMaxMs',
    'concurrency',
    'calibrationSampleSize',
    'maxResponseChars',
    'minStatementLength',
  ],
  properties: {
    provider: { type: 'string', enum: ['openai', 'anthropic'] },
    model: { type: 'string', minLength: 1 },
    mode: { type: 'string', enum: ['auto', 'single', 'chunked'] },
    maxBatchSize: positiveInteger,
    complexityBudget: { type: 'number', exclusiveMinimum: 0 },
    tierBounds: {
      type: 'object',
      required: ['low', 'high'],
      properties: { low: nonNegative, high: nonNegative },
    },
    complexityWeights: {
      type: 'object',
      required: [
        'base',
        'lengthDivisor',
        'lengthCap',
        'perSequenceReference',
        'perMutation',
        'perConnective',
        'perPercentage',
        'max',
      ],
      properties: {
        base: { type: 'number', minimum: 1 },
        lengthDivisor: { type: 'number', exclusiveMinimum: 0 },
        lengthCap: nonNegative,
        perSequenceReference: nonNegative,
        perMutation: nonNegative,
        perConnective: nonNegative,
        perPercentage: nonNegative,
        max: { type: 'number', minimum: 1, maximum: 10 },
      },
    },
    modeThresholds: {
      type: 'object',
      required: [
        'maxTextLength',
        'maxClaimCount',
        'combinedTextLength',
        'combinedClaimCount',
        'maxDependencyRefs',
      ],
      properties: {
        maxTextLength: nonNegative,
        maxClaimCount: nonNegative,
        combinedTextLength: nonNegative,
        combinedClaimCount: nonNegative,
        maxDependencyRefs: nonNegative,
      },
    },
    similarityThreshold: { type: 'number', minimum: 0, maximum: 1 },
    maxAttempts: positiveInteger,
    requestTimeoutMs: positiveInteger,
    backoffBaseMs: nonNegative,
    backoffMaxMs: nonNegative,
    concurrency: positiveInteger,
    calibrationSampleSize: { type: 'integer', minimum: 0 },
    maxResponseChars: positiveInteger,
    minStatementLength: { type: 'integer', minimum: 0 },
  },
};

const settingsValidator = new SchemaValidator<PipelineSettings>('pipeline-settings', settingsSchema);

/**
 * Validate settings, throwing ConfigurationError before any processing starts
 */
export function validatePipelineSettings(settings: unknown): PipelineSettings {
  const result = settingsValidator.validate(settings);
  if (!result.valid || !result.data) {
    throw new ConfigurationError('Invalid pipeline configuration', formatErrors(result.errors));
  }

  const data = result.data;
  const problems: string[] = [];
  if (data.tierBounds.low > data.tierBounds.high) {
    problems.push(`/tierBounds: low (${data.tierBounds.low}) must not exceed high (${data.tierBounds.high})`);
  }
  if (data.complexityWeights.base > data.complexityWeights.max) {
    problems.push('/complexityWeights: base must not exceed max');
  }
  if (data.backoffBaseMs > data.backoffMaxMs) {
    problems.push('/backoffBaseMs: must not exceed backoffMaxMs');
  }
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid pipeline configuration', problems);
  }

  return data;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid pipeline configuration`, [`${name}: "${raw}" is not a number`]);
  }
  return value;
}

function readEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  allowed: readonly T[]
): T | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new ConfigurationError(`Invalid pipeline configuration`, [
      `${name}: "${raw}" must be one of ${allowed.join(', ')}`,
    ]);
  }
  return match;
}

/**
 * Overrides read from PIPELINE_* environment variables
 */
export function readSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineSettingsOverrides {
  return {
    provider: readEnum(env, 'PIPELINE_PROVIDER', ['openai', 'anthropic'] as const),
    mode: readEnum(env, 'PIPELINE_MODE', ['auto', 'single', 'chunked'] as const),
    model: env.PIPELINE_MODEL?.trim() || undefined,
    maxBatchSize: readNumber(env, 'PIPELINE_MAX_BATCH_SIZE'),
    complexityBudget: readNumber(env, 'PIPELINE_COMPLEXITY_BUDGET'),
    similarityThreshold: readNumber(env, 'PIPELINE_SIMILARITY_THRESHOLD'),
    maxAttempts: readNumber(env, 'PIPELINE_MAX_ATTEMPTS'),
    requestTimeoutMs: readNumber(env, 'PIPELINE_REQUEST_TIMEOUT_MS'),
    concurrency: readNumber(env, 'PIPELINE_CONCURRENCY'),
    calibrationSampleSize: readNumber(env, 'PIPELINE_CALIBRATION_SAMPLE_SIZE'),
  };
}

function assignDefined(target: Record<string, unknown>, source: object): void {
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      target[key] = value;
    }
  }
}

/**
 * Defaults ← environment ← explicit overrides, validated
 */
export function resolvePipelineSettings(
  overrides: PipelineSettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineSettings {
  const { tierBounds, complexityWeights, modeThresholds, ...scalars } = overrides;

  const merged: Record<string, unknown> = { ...DEFAULT_PIPELINE_SETTINGS };
  assignDefined(merged, readSettingsFromEnv(env));
  assignDefined(merged, scalars);

  const nested = (defaults: object, partial?: object): Record<string, unknown> => {
    const value: Record<string, unknown> = { ...defaults };
    if (partial) {
      assignDefined(value, partial);
    }
    return value;
  };
  merged.tierBounds = nested(DEFAULT_PIPELINE_SETTINGS.tierBounds, tierBounds);
  merged.complexityWeights = nested(DEFAULT_COMPLEXITY_WEIGHTS, complexityWeights);
  merged.modeThresholds = nested(DEFAULT_PIPELINE_SETTINGS.modeThresholds, modeThresholds);

  return validatePipelineSettings(merged);
}
