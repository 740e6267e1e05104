/**
 * @module lib/baseline-classifier
 * @description Interpretable baseline: TF-IDF text features plus standardized linguistic features into an L2-regularized logistic regression
 *
 * PURPOSE:
 * - Fit the TF-IDF vocabulary and the feature scaler on training documents only
 * - Train weights by seeded mini-batch gradient descent on the regularized log loss
 * - Calibrate probabilities with Platt scaling on the validation documents when both classes are present
 * - Persist and restore the whole model (vocabulary, scaler, weights, calibration) as JSON
 *
 * EXPORTS:
 * - BaselineOptions (interface) - hyperparameters taken from PipelineConfig
 * - BaselineClassifier (class) - fit, predict, toJSON, fromJSON
 *
 * PATTERNS:
 * - `const model = BaselineClassifier.fit(examples, split, config)` then `model.predict(text, features.values)`
 *
 * NOTES:
 * - Same seed and same examples give identical weights; examples are ordered by passage key before shuffling
 * - The bias term is not regularized
 */

import { z } from 'zod';
import type { PipelineConfig } from './config';
import { CheckpointCorruptionError } from './errors';
import { FeatureScaler, featureScalerStateSchema } from './feature-scaler';
import { mulberry32, shuffle } from './random';
import { sigmoid } from './statistics';
import { TfidfVectorizer, loadStopWords, tfidfStateSchema, type SparseVector } from './tfidf-vectorizer';
import {
  FEATURE_NAMES,
  type ClassifierExample,
  type EvasionClassifier,
  type FeatureName,
  type FeatureValues,
  type ModelName,
  type TrainingSplit,
} from './types';

export type BaselineOptions = Pick<
  PipelineConfig,
  | 'maxVocabulary'
  | 'minDocumentFrequency'
  | 'regularizationStrength'
  | 'baselineEpochs'
  | 'baselineLearningRate'
  | 'baselineBatchSize'
  | 'seed'
>;

export interface PlattCalibration {
  slope: number;
  intercept: number;
}

const IDENTITY_CALIBRATION: PlattCalibration = { slope: 1, intercept: 0 };

const BASELINE_FORMAT = 'evasion-baseline';
const BASELINE_VERSION = 1;

const baselineStateSchema = z.object({
  format: z.literal(BASELINE_FORMAT),
  version: z.literal(BASELINE_VERSION),
  vectorizer: tfidfStateSchema,
  scaler: featureScalerStateSchema,
  weights: z.array(z.number().finite()),
  bias: z.number().finite(),
  calibration: z.object({ slope: z.number().finite(), intercept: z.number().finite() }),
});

export type BaselineState = z.infer<typeof baselineStateSchema>;

interface EncodedExample {
  sparse: SparseVector;
  dense: number[];
  label: number;
}

function compareKeys(a: ClassifierExample, b: ClassifierExample): number {
  return a.key.documentId.localeCompare(b.key.documentId) || a.key.passageIndex - b.key.passageIndex;
}

/**
 * Fit p = sigmoid(slope * z + intercept) on validation logits with Platt's
 * smoothed targets, by Newton iterations on the two parameters.
 */
export function fitPlattScaling(logits: readonly number[], labels: readonly number[]): PlattCalibration {
  const positives = labels.filter((y) => y === 1).length;
  const negatives = labels.length - positives;
  if (positives === 0 || negatives === 0) return IDENTITY_CALIBRATION;

  const hiTarget = (positives + 1) / (positives + 2);
  const loTarget = 1 / (negatives + 2);
  const targets = labels.map((y) => (y === 1 ? hiTarget : loTarget));

  let slope = 1;
  let intercept = 0;
  for (let iteration = 0; iteration < 100; iteration++) {
    let gSlope = 0;
    let gIntercept = 0;
    let hSS = 1e-9;
    let hSI = 0;
    let hII = 1e-9;
    for (let i = 0; i < logits.length; i++) {
      const p = sigmoid(slope * logits[i] + intercept);
      const residual = p - targets[i];
      const w = p * (1 - p);
      gSlope += residual * logits[i];
      gIntercept += residual;
      hSS += w * logits[i] * logits[i];
      hSI += w * logits[i];
      hII += w;
    }
    const det = hSS * hII - hSI * hSI;
    if (!Number.isFinite(det) || Math.abs(det) < 1e-12) break;
    const stepSlope = (hII * gSlope - hSI * gIntercept) / det;
    const stepIntercept = (hSS * gIntercept - hSI * gSlope) / det;
    slope -= stepSlope;
    intercept -= stepIntercept;
    if (Math.abs(stepSlope) + Math.abs(stepIntercept) < 1e-10) break;
  }

  if (!Number.isFinite(slope) || !Number.isFinite(intercept)) return IDENTITY_CALIBRATION;
  return { slope, intercept };
}

export class BaselineClassifier implements EvasionClassifier {
  readonly modelName: ModelName = 'baseline';

  private constructor(
    private readonly vectorizer: TfidfVectorizer,
    private readonly scaler: FeatureScaler,
    private readonly weights: number[],
    private readonly bias: number,
    readonly calibration: PlattCalibration,
  ) {}

  get vocabularySize(): number {
    return this.vectorizer.vocabularySize;
  }

  static fit(examples: readonly ClassifierExample[], split: TrainingSplit, options: BaselineOptions): BaselineClassifier {
    const trainIds = new Set(split.trainDocumentIds);
    const validationIds = new Set(split.validationDocumentIds);
    const train = examples.filter((e) => trainIds.has(e.key.documentId)).sort(compareKeys);
    const validation = examples.filter((e) => validationIds.has(e.key.documentId)).sort(compareKeys);

    const vectorizer = new TfidfVectorizer({
      maxFeatures: options.maxVocabulary,
      minDocumentFrequency: options.minDocumentFrequency,
      maxNgram: 2,
      stopWords: loadStopWords(),
    }).fit(train.map((e) => e.text));
    const scaler = FeatureScaler.fit(train.map((e) => e.features));

    const encode = (e: ClassifierExample): EncodedExample => ({
      sparse: vectorizer.transform(e.text),
      dense: scaler.transform(e.features),
      label: e.label,
    });
    const encoded = train.map(encode);

    const sparseSize = vectorizer.vocabularySize;
    const weights = new Array<number>(sparseSize + FEATURE_NAMES.length).fill(0);
    let bias = 0;
    const rng = mulberry32(options.seed);
    const lambda = options.regularizationStrength;
    const lr = options.baselineLearningRate;

    for (let epoch = 0; epoch < options.baselineEpochs && encoded.length > 0; epoch++) {
      const order = shuffle(encoded, rng);
      for (let start = 0; start < order.length; start += options.baselineBatchSize) {
        const batch = order.slice(start, start + options.baselineBatchSize);
        const gradient = new Map<number, number>();
        let biasGradient = 0;

        for (const example of batch) {
          const error = sigmoid(linearScore(weights, bias, example, sparseSize)) - example.label;
          example.sparse.indices.forEach((index, k) => {
            gradient.set(index, (gradient.get(index) ?? 0) + error * example.sparse.values[k]);
          });
          example.dense.forEach((value, k) => {
            const index = sparseSize + k;
            gradient.set(index, (gradient.get(index) ?? 0) + error * value);
          });
          biasGradient += error;
        }

        const scale = 1 / batch.length;
        for (let i = 0; i < weights.length; i++) {
          weights[i] -= lr * ((gradient.get(i) ?? 0) * scale + lambda * weights[i]);
        }
        bias -= lr * biasGradient * scale;
      }
    }

    const uncalibrated = new BaselineClassifier(vectorizer, scaler, weights, bias, IDENTITY_CALIBRATION);
    const calibration = fitPlattScaling(
      validation.map((e) => uncalibrated.rawScore(e.text, e.features)),
      validation.map((e) => e.label),
    );

    console.log(
      `[Baseline] Trained on ${train.length} passages (vocabulary=${sparseSize}, validation=${validation.length}, calibration slope=${calibration.slope.toFixed(3)})`,
    );
    return new BaselineClassifier(vectorizer, scaler, weights, bias, calibration);
  }

  /**
   * Uncalibrated logit
   */
  rawScore(text: string, features: FeatureValues): number {
    const example: EncodedExample = {
      sparse: this.vectorizer.transform(text),
      dense: this.scaler.transform(features),
      label: 0,
    };
    return linearScore(this.weights, this.bias, example, this.vectorizer.vocabularySize);
  }

  predict(text: string, features: FeatureValues): number {
    const z = this.rawScore(text, features);
    return sigmoid(this.calibration.slope * z + this.calibration.intercept);
  }

  /**
   * Learned weights of the standardized linguistic features, in FEATURE_NAMES order
   */
  featureWeights(): Array<{ name: FeatureName; weight: number }> {
    const offset = this.vectorizer.vocabularySize;
    return FEATURE_NAMES.map((name, i) => ({ name, weight: this.weights[offset + i] }));
  }

  toJSON(): BaselineState {
    return {
      format: BASELINE_FORMAT,
      version: BASELINE_VERSION,
      vectorizer: this.vectorizer.toJSON(),
      scaler: this.scaler.toJSON(),
      weights: [...this.weights],
      bias: this.bias,
      calibration: { ...this.calibration },
    };
  }

  static fromJSON(raw: unknown, source = 'baseline-model'): BaselineClassifier {
    const parsed = baselineStateSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CheckpointCorruptionError(source, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid model');
    }
    const state = parsed.data;
    const vectorizer = TfidfVectorizer.fromJSON(state.vectorizer, source);
    const scaler = FeatureScaler.fromJSON(state.scaler, source);
    const expected = vectorizer.vocabularySize + FEATURE_NAMES.length;
    if (state.weights.length !== expected) {
      throw new CheckpointCorruptionError(source, `expected ${expected} weights, found ${state.weights.length}`);
    }
    return new BaselineClassifier(vectorizer, scaler, state.weights, state.bias, state.calibration);
  }
}

function linearScore(weights: readonly number[], bias: number, example: EncodedExample, sparseSize: number): number {
  let z = bias;
  example.sparse.indices.forEach((index, k) => {
    z += weights[index] * example.sparse.values[k];
  });
  example.dense.forEach((value, k) => {
    z += weights[sparseSize + k] * value;
  });
  return z;
}
