/**
 * @module lib/contextual-encoder
 * @description Advanced classifier: a convolutional sequence encoder over token embeddings with optional linguistic features
 *
 * PURPOSE:
 * - Map tokens to learned embeddings (vocabulary from training text, <pad> and <unk> reserved)
 * - Produce contextual token states with a width-k convolution and tanh, max-pool them into a passage embedding
 * - Concatenate standardized FeatureVector values when useAuxiliaryFeatures is on, then a logistic output unit
 * - Train with seeded mini-batch Adam on binary cross-entropy, early stopping on validation loss, best weights restored
 * - Warm-start from a checkpoint for fine-tuning; export a checkpoint after training
 *
 * EXPORTS:
 * - EncoderOptions (type) - hyperparameters taken from PipelineConfig
 * - EncoderFitOptions (interface) - optional initial checkpoint
 * - EpochStats (interface) - per-epoch train/validation loss
 * - ContextualEncoder (class) - fit, predict, toCheckpoint, fromCheckpoint
 *
 * NOTES:
 * - A non-finite batch or validation loss aborts training with TrainingDivergenceError (1-based epoch and batch)
 * - Gradients are computed by hand; the <pad> embedding row stays at zero
 */

import type { PipelineConfig } from './config';
import {
  ENCODER_CHECKPOINT_FORMAT,
  ENCODER_CHECKPOINT_VERSION,
  PAD_TOKEN,
  UNKNOWN_TOKEN,
  parseEncoderCheckpoint,
  type EncoderCheckpoint,
} from './encoder-checkpoint';
import { TrainingDivergenceError } from './errors';
import { FeatureScaler } from './feature-scaler';
import { mulberry32, randn, shuffle, type Rng } from './random';
import { binaryCrossEntropy, mean, sigmoid } from './statistics';
import { tokenize } from './text-statistics';
import {
  FEATURE_NAMES,
  type ClassifierExample,
  type EvasionClassifier,
  type FeatureValues,
  type ModelName,
  type TrainingSplit,
} from './types';

export type EncoderOptions = Pick<
  PipelineConfig,
  | 'embeddingDim'
  | 'filterCount'
  | 'kernelWidth'
  | 'maxSequenceLength'
  | 'encoderEpochs'
  | 'encoderLearningRate'
  | 'encoderBatchSize'
  | 'earlyStoppingPatience'
  | 'useAuxiliaryFeatures'
  | 'maxVocabulary'
  | 'seed'
>;

export interface EncoderFitOptions {
  initialCheckpoint?: EncoderCheckpoint;
}

export interface EpochStats {
  epoch: number;
  trainLoss: number;
  validationLoss: number;
}

interface Architecture {
  embeddingDim: number;
  filterCount: number;
  kernelWidth: number;
  maxSequenceLength: number;
  useAuxiliaryFeatures: boolean;
}

interface Parameters {
  embeddings: number[];
  convWeights: number[];
  convBias: number[];
  outputWeights: number[];
  outputBias: number[];
}

interface ForwardCache {
  ids: number[];
  pooled: number[];
  argmax: number[];
  auxiliary: number[];
  probability: number;
}

const PAD_ID = 0;
const UNKNOWN_ID = 1;

function cloneParameters(p: Parameters): Parameters {
  return {
    embeddings: [...p.embeddings],
    convWeights: [...p.convWeights],
    convBias: [...p.convBias],
    outputWeights: [...p.outputWeights],
    outputBias: [...p.outputBias],
  };
}

function tensors(p: Parameters): number[][] {
  return [p.embeddings, p.convWeights, p.convBias, p.outputWeights, p.outputBias];
}

function zerosLike(p: Parameters): Parameters {
  return {
    embeddings: new Array<number>(p.embeddings.length).fill(0),
    convWeights: new Array<number>(p.convWeights.length).fill(0),
    convBias: new Array<number>(p.convBias.length).fill(0),
    outputWeights: new Array<number>(p.outputWeights.length).fill(0),
    outputBias: [0],
  };
}

/**
 * Adam with bias correction, updating parameter arrays in place
 */
class AdamOptimizer {
  private readonly m: number[][];
  private readonly v: number[][];
  private step = 0;

  constructor(
    private readonly learningRate: number,
    shapes: number[][],
    private readonly beta1 = 0.9,
    private readonly beta2 = 0.999,
    private readonly epsilon = 1e-8,
  ) {
    this.m = shapes.map((t) => new Array<number>(t.length).fill(0));
    this.v = shapes.map((t) => new Array<number>(t.length).fill(0));
  }

  update(params: number[][], grads: number[][]): void {
    this.step++;
    const correction1 = 1 - Math.pow(this.beta1, this.step);
    const correction2 = 1 - Math.pow(this.beta2, this.step);
    params.forEach((tensor, t) => {
      const g = grads[t];
      const m = this.m[t];
      const v = this.v[t];
      for (let i = 0; i < tensor.length; i++) {
        if (g[i] === 0 && m[i] === 0) continue;
        m[i] = this.beta1 * m[i] + (1 - this.beta1) * g[i];
        v[i] = this.beta2 * v[i] + (1 - this.beta2) * g[i] * g[i];
        tensor[i] -= (this.learningRate * (m[i] / correction1)) / (Math.sqrt(v[i] / correction2) + this.epsilon);
      }
    });
  }
}

function buildVocabulary(texts: readonly string[], maxSize: number): string[] {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const token of tokenize(text)) counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  const ranked = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, Math.max(0, maxSize - 2))
    .map(([token]) => token);
  return [PAD_TOKEN, UNKNOWN_TOKEN, ...ranked];
}

function initialParameters(arch: Architecture, vocabularySize: number, rng: Rng): Parameters {
  const { embeddingDim: D, filterCount: F, kernelWidth: K } = arch;
  const auxiliarySize = arch.useAuxiliaryFeatures ? FEATURE_NAMES.length : 0;
  const convScale = Math.sqrt(1 / (K * D));

  const embeddings = new Array<number>(vocabularySize * D);
  for (let i = 0; i < embeddings.length; i++) {
    embeddings[i] = i < D ? 0 : randn(rng) * 0.1;
  }
  const convWeights = new Array<number>(F * K * D);
  for (let i = 0; i < convWeights.length; i++) convWeights[i] = randn(rng) * convScale;
  const outputWeights = new Array<number>(F + auxiliarySize);
  for (let i = 0; i < outputWeights.length; i++) outputWeights[i] = randn(rng) * 0.01;

  return {
    embeddings,
    convWeights,
    convBias: new Array<number>(F).fill(0),
    outputWeights,
    outputBias: [0],
  };
}

function compareKeys(a: ClassifierExample, b: ClassifierExample): number {
  return a.key.documentId.localeCompare(b.key.documentId) || a.key.passageIndex - b.key.passageIndex;
}

export class ContextualEncoder implements EvasionClassifier {
  readonly modelName: ModelName = 'encoder';
  private readonly tokenIds: ReadonlyMap<string, number>;

  private constructor(
    private readonly arch: Architecture,
    private readonly vocabulary: readonly string[],
    private readonly scaler: FeatureScaler | null,
    private parameters: Parameters,
    readonly history: EpochStats[] = [],
    private bestEpoch = 0,
    private bestValidationLoss: number | null = null,
  ) {
    this.tokenIds = new Map(vocabulary.map((token, id) => [token, id]));
  }

  get vocabularySize(): number {
    return this.vocabulary.length;
  }

  get epochsRun(): number {
    return this.history.length;
  }

  static fit(
    examples: readonly ClassifierExample[],
    split: TrainingSplit,
    options: EncoderOptions,
    fitOptions: EncoderFitOptions = {},
  ): ContextualEncoder {
    const trainIds = new Set(split.trainDocumentIds);
    const validationIds = new Set(split.validationDocumentIds);
    const train = examples.filter((e) => trainIds.has(e.key.documentId)).sort(compareKeys);
    const validation = examples.filter((e) => validationIds.has(e.key.documentId)).sort(compareKeys);
    const rng = mulberry32(options.seed);

    let encoder: ContextualEncoder;
    if (fitOptions.initialCheckpoint) {
      encoder = ContextualEncoder.fromCheckpoint(fitOptions.initialCheckpoint);
      console.log(`[Encoder] Fine-tuning from checkpoint (vocabulary=${encoder.vocabularySize})`);
    } else {
      const arch: Architecture = {
        embeddingDim: options.embeddingDim,
        filterCount: options.filterCount,
        kernelWidth: options.kernelWidth,
        maxSequenceLength: options.maxSequenceLength,
        useAuxiliaryFeatures: options.useAuxiliaryFeatures,
      };
      const vocabulary = buildVocabulary(train.map((e) => e.text), options.maxVocabulary);
      const scaler = arch.useAuxiliaryFeatures ? FeatureScaler.fit(train.map((e) => e.features)) : null;
      encoder = new ContextualEncoder(arch, vocabulary, scaler, initialParameters(arch, vocabulary.length, rng));
    }

    encoder.train(train, validation, options, rng);
    return encoder;
  }

  private train(
    train: readonly ClassifierExample[],
    validation: readonly ClassifierExample[],
    options: EncoderOptions,
    rng: Rng,
  ): void {
    if (train.length === 0) {
      console.warn('[Encoder] No training passages; keeping initial weights');
      return;
    }

    const optimizer = new AdamOptimizer(options.encoderLearningRate, tensors(this.parameters));
    const monitored = validation.length > 0 ? validation : train;
    let best = cloneParameters(this.parameters);
    let bestLoss = Infinity;
    let waited = 0;

    for (let epoch = 1; epoch <= options.encoderEpochs; epoch++) {
      const order = shuffle(train, rng);
      const batchLosses: number[] = [];
      let batchNumber = 0;

      for (let start = 0; start < order.length; start += options.encoderBatchSize) {
        batchNumber++;
        const batch = order.slice(start, start + options.encoderBatchSize);
        const grads = zerosLike(this.parameters);
        let lossSum = 0;

        for (const example of batch) {
          const cache = this.forward(example.text, example.features);
          lossSum += binaryCrossEntropy(cache.probability, example.label);
          this.backward(cache, cache.probability - example.label, grads);
        }

        const loss = lossSum / batch.length;
        if (!Number.isFinite(loss)) {
          throw new TrainingDivergenceError('encoder', { epoch, batch: batchNumber, loss });
        }
        batchLosses.push(loss);

        const scale = 1 / batch.length;
        const gradTensors = tensors(grads);
        for (const tensor of gradTensors) {
          for (let i = 0; i < tensor.length; i++) tensor[i] *= scale;
        }
        // <pad> row stays at zero
        for (let d = 0; d < this.arch.embeddingDim; d++) grads.embeddings[d] = 0;
        optimizer.update(tensors(this.parameters), gradTensors);
      }

      const validationLoss = this.loss(monitored);
      if (!Number.isFinite(validationLoss)) {
        throw new TrainingDivergenceError('encoder', { epoch, batch: batchNumber, loss: validationLoss });
      }
      const trainLoss = mean(batchLosses);
      this.history.push({ epoch, trainLoss, validationLoss });
      console.log(
        `[Encoder] epoch ${epoch}/${options.encoderEpochs} train=${trainLoss.toFixed(4)} validation=${validationLoss.toFixed(4)}`,
      );

      if (validationLoss < bestLoss - 1e-9) {
        bestLoss = validationLoss;
        best = cloneParameters(this.parameters);
        this.bestEpoch = epoch;
        waited = 0;
      } else {
        waited++;
        if (waited >= options.earlyStoppingPatience) {
          console.log(`[Encoder] Early stopping at epoch ${epoch} (best epoch ${this.bestEpoch})`);
          break;
        }
      }
    }

    this.parameters = best;
    this.bestValidationLoss = Number.isFinite(bestLoss) ? bestLoss : null;
  }

  private loss(examples: readonly ClassifierExample[]): number {
    return mean(examples.map((e) => binaryCrossEntropy(this.forward(e.text, e.features).probability, e.label)));
  }

  private encodeTokens(text: string): number[] {
    const ids = tokenize(text)
      .slice(0, this.arch.maxSequenceLength)
      .map((token) => this.tokenIds.get(token) ?? UNKNOWN_ID);
    while (ids.length < this.arch.kernelWidth) ids.push(PAD_ID);
    return ids;
  }

  private forward(text: string, features: FeatureValues): ForwardCache {
    const { embeddingDim: D, filterCount: F, kernelWidth: K } = this.arch;
    const { embeddings: E, convWeights: W, convBias: c, outputWeights: u, outputBias } = this.parameters;
    const ids = this.encodeTokens(text);
    const positions = ids.length - K + 1;

    const pooled = new Array<number>(F).fill(-Infinity);
    const argmax = new Array<number>(F).fill(0);
    for (let t = 0; t < positions; t++) {
      for (let f = 0; f < F; f++) {
        let pre = c[f];
        for (let k = 0; k < K; k++) {
          const row = ids[t + k] * D;
          const wOffset = (f * K + k) * D;
          for (let d = 0; d < D; d++) pre += W[wOffset + d] * E[row + d];
        }
        const state = Math.tanh(pre);
        if (state > pooled[f] || Number.isNaN(state)) {
          pooled[f] = state;
          argmax[f] = t;
        }
      }
    }

    const auxiliary = this.scaler ? this.scaler.transform(features) : [];
    let z = outputBias[0];
    for (let f = 0; f < F; f++) z += u[f] * pooled[f];
    for (let j = 0; j < auxiliary.length; j++) z += u[F + j] * auxiliary[j];

    return { ids, pooled, argmax, auxiliary, probability: sigmoid(z) };
  }

  private backward(cache: ForwardCache, dz: number, grads: Parameters): void {
    const { embeddingDim: D, filterCount: F, kernelWidth: K } = this.arch;
    const { embeddings: E, convWeights: W, outputWeights: u } = this.parameters;

    grads.outputBias[0] += dz;
    for (let j = 0; j < cache.auxiliary.length; j++) grads.outputWeights[F + j] += dz * cache.auxiliary[j];

    for (let f = 0; f < F; f++) {
      grads.outputWeights[f] += dz * cache.pooled[f];
      const dPre = dz * u[f] * (1 - cache.pooled[f] * cache.pooled[f]);
      if (dPre === 0) continue;
      grads.convBias[f] += dPre;
      const t = cache.argmax[f];
      for (let k = 0; k < K; k++) {
        const row = cache.ids[t + k] * D;
        const wOffset = (f * K + k) * D;
        for (let d = 0; d < D; d++) {
          grads.convWeights[wOffset + d] += dPre * E[row + d];
          grads.embeddings[row + d] += dPre * W[wOffset + d];
        }
      }
    }
  }

  predict(text: string, features: FeatureValues): number {
    return this.forward(text, features).probability;
  }

  toCheckpoint(): EncoderCheckpoint {
    return {
      format: ENCODER_CHECKPOINT_FORMAT,
      version: ENCODER_CHECKPOINT_VERSION,
      hyperparameters: { ...this.arch },
      vocabulary: [...this.vocabulary],
      scaler: this.scaler ? this.scaler.toJSON() : null,
      parameters: {
        embeddings: [...this.parameters.embeddings],
        convWeights: [...this.parameters.convWeights],
        convBias: [...this.parameters.convBias],
        outputWeights: [...this.parameters.outputWeights],
        outputBias: this.parameters.outputBias[0],
      },
      training: {
        epochsRun: this.history.length,
        bestEpoch: this.bestEpoch,
        bestValidationLoss: this.bestValidationLoss,
      },
    };
  }

  /**
   * Restore an encoder from a parsed or raw checkpoint; raw input is validated first
   */
  static fromCheckpoint(raw: unknown, source = 'encoder-checkpoint'): ContextualEncoder {
    const checkpoint = parseEncoderCheckpoint(raw, source);
    const { parameters } = checkpoint;
    return new ContextualEncoder(
      { ...checkpoint.hyperparameters },
      checkpoint.vocabulary,
      checkpoint.hyperparameters.useAuxiliaryFeatures && checkpoint.scaler
        ? FeatureScaler.fromJSON(checkpoint.scaler, source)
        : null,
      {
        embeddings: [...parameters.embeddings],
        convWeights: [...parameters.convWeights],
        convBias: [...parameters.convBias],
        outputWeights: [...parameters.outputWeights],
        outputBias: [parameters.outputBias],
      },
      [],
      checkpoint.training.bestEpoch,
      checkpoint.training.bestValidationLoss,
    );
  }
}
