/**
 * @module lib/encoder-checkpoint
 * @description JSON checkpoint format for the contextual encoder, validated with zod on every load
 *
 * PURPOSE:
 * - Describe the persisted encoder: hyperparameters, vocabulary, feature scaler and all weight tensors (flattened, row-major)
 * - Reject malformed JSON, missing fields, non-finite weights and tensors whose length disagrees with the hyperparameters
 *
 * EXPORTS:
 * - ENCODER_CHECKPOINT_FORMAT, ENCODER_CHECKPOINT_VERSION (const) - format tag written into every checkpoint
 * - EncoderCheckpoint (type) - parsed checkpoint
 * - parseEncoderCheckpoint (function) - unknown | string -> EncoderCheckpoint, throws CheckpointCorruptionError
 * - serializeEncoderCheckpoint (function) - EncoderCheckpoint -> JSON text
 */

import { z } from 'zod';
import { CheckpointCorruptionError, describeError } from './errors';
import { featureScalerStateSchema } from './feature-scaler';
import { FEATURE_NAMES } from './types';

export const ENCODER_CHECKPOINT_FORMAT = 'evasion-contextual-encoder';
export const ENCODER_CHECKPOINT_VERSION = 1;

export const PAD_TOKEN = '<pad>';
export const UNKNOWN_TOKEN = '<unk>';

const finiteArray = z.array(z.number().finite());

const encoderCheckpointSchema = z.object({
  format: z.literal(ENCODER_CHECKPOINT_FORMAT),
  version: z.literal(ENCODER_CHECKPOINT_VERSION),
  hyperparameters: z.object({
    embeddingDim: z.number().int().positive(),
    filterCount: z.number().int().positive(),
    kernelWidth: z.number().int().positive(),
    maxSequenceLength: z.number().int().positive(),
    useAuxiliaryFeatures: z.boolean(),
  }),
  vocabulary: z.array(z.string()).min(2),
  scaler: featureScalerStateSchema.nullable(),
  parameters: z.object({
    embeddings: finiteArray,
    convWeights: finiteArray,
    convBias: finiteArray,
    outputWeights: finiteArray,
    outputBias: z.number().finite(),
  }),
  training: z.object({
    epochsRun: z.number().int().min(0),
    bestEpoch: z.number().int().min(0),
    bestValidationLoss: z.number().finite().nullable(),
  }),
});

export type EncoderCheckpoint = z.infer<typeof encoderCheckpointSchema>;

function checkShapes(checkpoint: EncoderCheckpoint): string | null {
  const { embeddingDim, filterCount, kernelWidth, useAuxiliaryFeatures } = checkpoint.hyperparameters;
  const { parameters, vocabulary, scaler } = checkpoint;
  const auxiliarySize = useAuxiliaryFeatures ? FEATURE_NAMES.length : 0;

  if (vocabulary[0] !== PAD_TOKEN || vocabulary[1] !== UNKNOWN_TOKEN) {
    return `vocabulary must start with ${PAD_TOKEN} and ${UNKNOWN_TOKEN}`;
  }
  if (new Set(vocabulary).size !== vocabulary.length) return 'vocabulary has duplicate tokens';

  const expected: Array<[string, number, number]> = [
    ['embeddings', parameters.embeddings.length, vocabulary.length * embeddingDim],
    ['convWeights', parameters.convWeights.length, filterCount * kernelWidth * embeddingDim],
    ['convBias', parameters.convBias.length, filterCount],
    ['outputWeights', parameters.outputWeights.length, filterCount + auxiliarySize],
  ];
  for (const [name, actual, wanted] of expected) {
    if (actual !== wanted) return `${name} has ${actual} values, expected ${wanted}`;
  }
  if (useAuxiliaryFeatures && scaler === null) return 'auxiliary features enabled but scaler missing';
  return null;
}

export function parseEncoderCheckpoint(raw: unknown, source = 'encoder-checkpoint'): EncoderCheckpoint {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new CheckpointCorruptionError(source, `invalid JSON: ${describeError(error)}`);
    }
  }

  const parsed = encoderCheckpointSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CheckpointCorruptionError(source, issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid');
  }

  const shapeProblem = checkShapes(parsed.data);
  if (shapeProblem) throw new CheckpointCorruptionError(source, shapeProblem);
  return parsed.data;
}

export function serializeEncoderCheckpoint(checkpoint: EncoderCheckpoint): string {
  return JSON.stringify(checkpoint);
}
