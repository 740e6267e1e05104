/**
 * @module lib/config
 * @description Pipeline configuration schema, defaults, and loader merging a JSON file with EVASION_* environment overrides
 *
 * PURPOSE:
 * - Validate every recognized option (lexicon paths, readability formula, label strategy, market window, split, seed, model hyperparameters)
 * - Merge sources in order: schema defaults < JSON config file < environment variables < explicit overrides
 * - Reject invalid values with ConfigError listing each failing path
 *
 * PATTERNS:
 * - `const config = loadConfig('data/default-config.json')` at script start, then pass the frozen object down
 * - Tests call `resolveConfig({ seed: 7 })` to get a full config without touching disk or env
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { FEATURE_NAMES } from './types';

export const READABILITY_FORMULAS = ['gunning-fog', 'flesch-reading-ease', 'flesch-kincaid-grade'] as const;
export const LABEL_STRATEGIES = ['weak', 'human', 'human-then-weak'] as const;

const featureWeightsSchema = z.record(z.enum(FEATURE_NAMES), z.number());

export const pipelineConfigSchema = z.object({
  // Feature extraction
  hedgingLexiconPath: z.string().nullable().default(null),
  vaguenessLexiconPath: z.string().nullable().default(null),
  sentimentLexiconPath: z.string().nullable().default(null),
  readabilityFormula: z.enum(READABILITY_FORMULAS).default('gunning-fog'),

  // Segmentation
  maxPassageTokens: z.number().int().min(8).default(256),
  maxDocumentChars: z.number().int().positive().default(5_000_000),

  // Labels
  labelStrategy: z.enum(LABEL_STRATEGIES).default('human-then-weak'),
  weakLabelThreshold: z.number().default(0.1),
  ambiguityWeights: featureWeightsSchema.default({
    hedgeDensity: 1.0,
    vaguenessDensity: 0.5,
    modalRate: 0.5,
    passiveRate: 0.1,
    numericDensity: -0.5,
  }),
  marketWindowDays: z.number().int().min(1).default(3),
  maxWindowStartLagDays: z.number().int().min(0).default(7),
  adverseReturnThreshold: z.number().default(-0.02),
  benchmarkEntityId: z.string().nullable().default(null),

  // Split
  evalRatio: z.number().gt(0).lt(1).default(0.3),
  validationRatio: z.number().gt(0).lt(1).default(0.2),
  seed: z.number().int().default(42),

  // Baseline
  regularizationStrength: z.number().min(0).default(0.01),
  baselineEpochs: z.number().int().min(1).default(200),
  baselineLearningRate: z.number().positive().default(0.5),
  baselineBatchSize: z.number().int().min(1).default(32),
  maxVocabulary: z.number().int().min(1).default(5000),
  minDocumentFrequency: z.number().int().min(1).default(1),

  // Encoder
  embeddingDim: z.number().int().min(2).default(16),
  filterCount: z.number().int().min(1).default(24),
  kernelWidth: z.number().int().min(1).default(3),
  maxSequenceLength: z.number().int().min(4).default(256),
  encoderEpochs: z.number().int().min(1).default(20),
  encoderLearningRate: z.number().positive().default(0.01),
  encoderBatchSize: z.number().int().min(1).default(16),
  earlyStoppingPatience: z.number().int().min(0).default(3),
  useAuxiliaryFeatures: z.boolean().default(true),

  // Evaluation
  decisionThreshold: z.number().gt(0).lt(1).default(0.5),
  documentAggregation: z.enum(['mean', 'max']).default('mean'),
  associationTest: z.enum(['point-biserial', 'mean-difference']).default('point-biserial'),
  bootstrapIterations: z.number().int().min(10).default(1000),
  calibrationBins: z.number().int().min(2).default(10),
}).superRefine((config, ctx) => {
  // Passages are windowed with the same tokenizer the encoder truncates with
  if (config.maxPassageTokens > config.maxSequenceLength) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxPassageTokens'],
      message: `must not exceed maxSequenceLength (${config.maxSequenceLength})`,
    });
  }
});

export type PipelineConfig = Readonly<z.infer<typeof pipelineConfigSchema>>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

const NUMERIC_ENV: Record<string, keyof PipelineConfigInput> = {
  EVASION_SEED: 'seed',
  EVASION_EVAL_RATIO: 'evalRatio',
  EVASION_WEAK_LABEL_THRESHOLD: 'weakLabelThreshold',
  EVASION_MARKET_WINDOW_DAYS: 'marketWindowDays',
  EVASION_ADVERSE_RETURN_THRESHOLD: 'adverseReturnThreshold',
  EVASION_REGULARIZATION: 'regularizationStrength',
  EVASION_ENCODER_EPOCHS: 'encoderEpochs',
  EVASION_EARLY_STOPPING_PATIENCE: 'earlyStoppingPatience',
};

const STRING_ENV: Record<string, keyof PipelineConfigInput> = {
  EVASION_HEDGING_LEXICON: 'hedgingLexiconPath',
  EVASION_READABILITY_FORMULA: 'readabilityFormula',
  EVASION_LABEL_STRATEGY: 'labelStrategy',
};

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(NUMERIC_ENV)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') overrides[key] = Number(raw);
  }
  for (const [name, key] of Object.entries(STRING_ENV)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') overrides[key] = raw.trim();
  }
  return overrides;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read ${filePath}: ${describeError(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON: ${describeError(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Validate a partial config against the schema and fill defaults.
 */
export function resolveConfig(input: Record<string, unknown> = {}): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues);
  }
  return Object.freeze(result.data);
}

export function loadConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides: Record<string, unknown> = {},
): PipelineConfig {
  const fromFile = filePath ? readConfigFile(filePath) : {};
  const config = resolveConfig({ ...fromFile, ...envOverrides(env), ...overrides });
  console.log(
    `[Config] Loaded${filePath ? ` ${filePath}` : ' defaults'} (seed=${config.seed}, strategy=${config.labelStrategy}, readability=${config.readabilityFormula})`,
  );
  return config;
}
