/**
 * @module lib/artifact-store
 * @description Per-run artifact directory: feature and label tables, append-only predictions, report and model files
 *
 * PURPOSE:
 * - Lay out `<root>/runs/<runId>/` with features.jsonl, labels.jsonl, predictions.jsonl, report.json,
 *   baseline-model.json and encoder-checkpoint.json
 * - Keep predictions append-only: a (model, passage) pair can be written once per run
 * - Refuse to start a run whose directory already holds predictions or a report
 * - Validate every row read back with zod
 *
 * PATTERNS:
 * - `const store = new ArtifactStore('artifacts')` then `store.appendPredictions(runId, rows)`
 *
 * NOTES:
 * - Synchronous fs calls; one pipeline run writes one directory
 */

import * as fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { BaselineState } from './baseline-classifier';
import { parseEncoderCheckpoint, serializeEncoderCheckpoint, type EncoderCheckpoint } from './encoder-checkpoint';
import { CheckpointCorruptionError, ConfigError, DuplicatePredictionError, describeError } from './errors';
import {
  passageKeyId,
  type EvaluationReport,
  type FeatureValues,
  type FeatureVector,
  type LabelRecord,
  type PredictionRecord,
} from './types';

const FILES = {
  features: 'features.jsonl',
  labels: 'labels.jsonl',
  predictions: 'predictions.jsonl',
  report: 'report.json',
  baseline: 'baseline-model.json',
  encoder: 'encoder-checkpoint.json',
} as const;

const passageKeySchema = z.object({
  documentId: z.string().min(1),
  passageIndex: z.number().int().min(0),
});

const featureValuesSchema = z.object({
  hedgeDensity: z.number().finite(),
  vaguenessDensity: z.number().finite(),
  modalRate: z.number().finite(),
  passiveRate: z.number().finite(),
  numericDensity: z.number().finite(),
  sentiment: z.number().finite(),
  readability: z.number().finite(),
  avgSentenceLength: z.number().finite(),
  lexicalDiversity: z.number().finite(),
}) satisfies z.ZodType<FeatureValues>;

const featureRowSchema = z.object({ key: passageKeySchema, values: featureValuesSchema });

const labelRowSchema = z.object({
  key: passageKeySchema,
  evasivenessLabel: z.number().int().min(0).nullable(),
  labelSource: z.enum(['human', 'weak']).nullable(),
  ambiguityScore: z.number().finite(),
  marketReactionLabel: z.union([z.literal(0), z.literal(1)]).nullable(),
  windowReturn: z.number().finite().nullable(),
});

const predictionRowSchema = z.object({
  runId: z.string().min(1),
  key: passageKeySchema,
  modelName: z.enum(['baseline', 'encoder']),
  probability: z.number().min(0).max(1),
  predictedClass: z.union([z.literal(0), z.literal(1)]),
});

export class ArtifactStore {
  constructor(private readonly rootDir: string) {}

  runDir(runId: string): string {
    if (!/^[A-Za-z0-9._\-]+$/.test(runId)) {
      throw new ConfigError(`run id "${runId}" may only use letters, digits, '.', '_' or '-'`);
    }
    return path.join(this.rootDir, 'runs', runId);
  }

  private filePath(runId: string, file: string): string {
    const dir = this.runDir(runId);
    fs.mkdirSync(dir, { recursive: true });
    return path.join(dir, file);
  }

  private writeJsonl(runId: string, file: string, rows: readonly unknown[]): string {
    const target = this.filePath(runId, file);
    fs.writeFileSync(target, rows.map((row) => `${JSON.stringify(row)}\n`).join(''));
    return target;
  }

  private readJsonl<T>(runId: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    const target = path.join(this.runDir(runId), file);
    if (!fs.existsSync(target)) return [];
    const lines = fs.readFileSync(target, 'utf-8').split('\n').filter((line) => line.trim().length > 0);
    return lines.map((line, i) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw new CheckpointCorruptionError(`${target}:${i + 1}`, describeError(error));
      }
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new CheckpointCorruptionError(`${target}:${i + 1}`, parsed.error.issues[0]?.message ?? 'invalid row');
      }
      return parsed.data;
    });
  }

  /**
   * Throws before anything is written when the run id was already used to completion
   * or to the point of writing predictions.
   */
  assertFreshRun(runId: string): void {
    const [first] = this.readPredictions(runId);
    if (first) throw new DuplicatePredictionError(runId, first.modelName, passageKeyId(first.key));
    if (fs.existsSync(path.join(this.runDir(runId), FILES.report))) {
      throw new ConfigError(`run "${runId}" already has a report`);
    }
  }

  writeFeatures(runId: string, vectors: readonly FeatureVector[]): string {
    return this.writeJsonl(runId, FILES.features, vectors);
  }

  readFeatures(runId: string): FeatureVector[] {
    return this.readJsonl(runId, FILES.features, featureRowSchema);
  }

  writeLabels(runId: string, labels: readonly LabelRecord[]): string {
    return this.writeJsonl(runId, FILES.labels, labels);
  }

  readLabels(runId: string): LabelRecord[] {
    return this.readJsonl(runId, FILES.labels, labelRowSchema);
  }

  /**
   * Append prediction rows; throws DuplicatePredictionError before writing anything
   * if any (model, passage) pair is already present for the run.
   */
  appendPredictions(runId: string, records: readonly PredictionRecord[]): number {
    const existing = new Set(this.readPredictions(runId).map((p) => `${p.modelName}:${passageKeyId(p.key)}`));
    for (const record of records) {
      const id = `${record.modelName}:${passageKeyId(record.key)}`;
      if (existing.has(id)) throw new DuplicatePredictionError(runId, record.modelName, passageKeyId(record.key));
      existing.add(id);
    }
    const target = this.filePath(runId, FILES.predictions);
    fs.appendFileSync(target, records.map((r) => `${JSON.stringify({ ...r, runId })}\n`).join(''));
    return records.length;
  }

  readPredictions(runId: string): PredictionRecord[] {
    return this.readJsonl(runId, FILES.predictions, predictionRowSchema);
  }

  writeReport(runId: string, report: EvaluationReport): string {
    const target = this.filePath(runId, FILES.report);
    fs.writeFileSync(target, `${JSON.stringify(report, null, 2)}\n`);
    return target;
  }

  readReport(runId: string): unknown {
    return this.readJsonFile(path.join(this.runDir(runId), FILES.report));
  }

  writeBaselineModel(runId: string, state: BaselineState): string {
    const target = this.filePath(runId, FILES.baseline);
    fs.writeFileSync(target, JSON.stringify(state));
    return target;
  }

  readBaselineModel(runId: string): unknown {
    return this.readJsonFile(path.join(this.runDir(runId), FILES.baseline));
  }

  writeEncoderCheckpoint(runId: string, checkpoint: EncoderCheckpoint): string {
    const target = this.filePath(runId, FILES.encoder);
    fs.writeFileSync(target, serializeEncoderCheckpoint(checkpoint));
    return target;
  }

  readEncoderCheckpoint(runId: string): EncoderCheckpoint {
    return loadEncoderCheckpoint(path.join(this.runDir(runId), FILES.encoder));
  }

  private readJsonFile(target: string): unknown {
    let content: string;
    try {
      content = fs.readFileSync(target, 'utf-8');
    } catch (error) {
      throw new CheckpointCorruptionError(target, `cannot read: ${describeError(error)}`);
    }
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new CheckpointCorruptionError(target, `invalid JSON: ${describeError(error)}`);
    }
  }
}

export function loadEncoderCheckpoint(filePath: string): EncoderCheckpoint {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new CheckpointCorruptionError(filePath, `cannot read: ${describeError(error)}`);
  }
  return parseEncoderCheckpoint(content, filePath);
}
