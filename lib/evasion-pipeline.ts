/**
 * @module lib/evasion-pipeline
 * @description Runs one end-to-end evasion analysis: segment, featurize, label, split, train both classifiers, predict, evaluate, persist
 *
 * PURPOSE:
 * - Isolate per-item failures: a document that cannot be segmented or a passage that cannot be featurized is
 *   logged, counted and skipped while the rest of the batch continues
 * - Hold a barrier between featurization and labeling; nothing trains on partial output
 * - Split by document once and hand the same partitions to both classifiers
 * - Let run-level failures (divergence, corrupt checkpoint, leakage) propagate to the caller
 *
 * EXPORTS:
 * - runEvasionPipeline (function) - async batch run returning the report plus every intermediate table
 * - marketDateRange (function) - calendar range of returns needed for a set of filings
 *
 * PATTERNS:
 * - `await runEvasionPipeline({ documents, marketSource }, loadConfig(path), { runId, artifactStore })`
 *
 * NOTES:
 * - Lexicons are loaded once per run and shared read-only by every passage
 * - Predictions cover every featurized passage in the evaluation partition, labeled or not
 */

import type { ArtifactStore } from './artifact-store';
import { BaselineClassifier } from './baseline-classifier';
import type { PipelineConfig } from './config';
import { ContextualEncoder } from './contextual-encoder';
import { assertNoLeakage, splitByDocument, type DocumentSplit } from './data-split';
import { segmentDocument } from './document-segmenter';
import type { EncoderCheckpoint } from './encoder-checkpoint';
import { FeatureExtractionError, InsufficientDataError, SegmentationError } from './errors';
import { evaluate } from './evaluation';
import { createFeatureResources, extractFeatures } from './feature-extractor';
import { buildLabels } from './label-constructor';
import { loadLexicons, type Lexicons } from './lexicons';
import type { MarketDataSource } from './market-data';
import type { SentimentScorer } from './sentiment-scorer';
import {
  isEvasive,
  passageKeyId,
  type ClassifierExample,
  type EvaluationReport,
  type EvasionClassifier,
  type FeatureVector,
  type FilingDocument,
  type HumanAnnotation,
  type LabelRecord,
  type MarketRecord,
  type Passage,
  type PredictionRecord,
  type TrainingSplit,
} from './types';

export interface PipelineInput {
  documents: readonly FilingDocument[];
  annotations?: readonly HumanAnnotation[];
  /** Pre-loaded returns; takes precedence over marketSource */
  marketRecords?: readonly MarketRecord[];
  marketSource?: MarketDataSource;
}

export interface PipelineDependencies {
  runId: string;
  artifactStore?: ArtifactStore;
  initialCheckpoint?: EncoderCheckpoint;
  lexicons?: Lexicons;
  sentimentScorer?: SentimentScorer;
}

export interface PipelineFailures {
  segmentation: string[]; // document ids
  featureExtraction: string[]; // passage ids
}

export interface PipelineResult {
  runId: string;
  report: EvaluationReport;
  passages: Passage[];
  features: FeatureVector[];
  labels: LabelRecord[];
  split: DocumentSplit;
  trainingSplit: TrainingSplit;
  predictions: PredictionRecord[];
  baseline: BaselineClassifier;
  encoder: ContextualEncoder;
  failures: PipelineFailures;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function addDays(isoDate: string, days: number): string {
  return new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Calendar range covering every filing's window: the earliest filing date through the
 * latest filing date plus the start lag and enough calendar days for the trading window.
 */
export function marketDateRange(
  documents: readonly Pick<FilingDocument, 'filingDate'>[],
  config: Pick<PipelineConfig, 'marketWindowDays' | 'maxWindowStartLagDays'>,
): { from: string; to: string } | null {
  if (documents.length === 0) return null;
  const dates = documents.map((d) => d.filingDate).sort();
  const tradingSpan = Math.ceil((config.marketWindowDays * 7) / 5) + 7;
  return { from: dates[0], to: addDays(dates[dates.length - 1], config.maxWindowStartLagDays + tradingSpan) };
}

async function resolveMarketRecords(
  input: PipelineInput,
  documents: readonly FilingDocument[],
  config: PipelineConfig,
): Promise<MarketRecord[]> {
  if (input.marketRecords) return [...input.marketRecords];
  const range = marketDateRange(documents, config);
  if (!input.marketSource || !range) return [];

  const entityIds = new Set(documents.map((d) => d.entityId.toUpperCase()));
  if (config.benchmarkEntityId) entityIds.add(config.benchmarkEntityId.toUpperCase());
  const records = await input.marketSource.load([...entityIds].sort(), range.from, range.to);
  console.log(`[Pipeline] ${records.length} market records from ${input.marketSource.name} (${range.from} to ${range.to})`);
  return records;
}

function segmentAll(
  documents: readonly FilingDocument[],
  config: PipelineConfig,
  failures: PipelineFailures,
): Passage[] {
  const passages: Passage[] = [];
  for (const document of documents) {
    try {
      passages.push(
        ...segmentDocument(document, {
          maxPassageTokens: config.maxPassageTokens,
          maxDocumentChars: config.maxDocumentChars,
        }),
      );
    } catch (error) {
      if (!(error instanceof SegmentationError)) throw error;
      console.warn(`[Segmenter] ${error.message}`);
      failures.segmentation.push(document.id);
    }
  }
  return passages;
}

function featurizeAll(
  passages: readonly Passage[],
  config: PipelineConfig,
  deps: PipelineDependencies,
  failures: PipelineFailures,
): FeatureVector[] {
  const lexicons = deps.lexicons ?? loadLexicons(config);
  const resources = createFeatureResources(lexicons, config.readabilityFormula, deps.sentimentScorer);
  const vectors: FeatureVector[] = [];
  for (const passage of passages) {
    try {
      vectors.push(extractFeatures(passage, resources));
    } catch (error) {
      if (!(error instanceof FeatureExtractionError)) throw error;
      console.warn(`[Features] ${error.message}`);
      failures.featureExtraction.push(passageKeyId(passage.key));
    }
  }
  return vectors;
}

function predictPartition(
  runId: string,
  models: readonly EvasionClassifier[],
  passages: readonly Passage[],
  features: ReadonlyMap<string, FeatureVector>,
  evalDocumentIds: ReadonlySet<string>,
  threshold: number,
): PredictionRecord[] {
  const predictions: PredictionRecord[] = [];
  for (const model of models) {
    for (const passage of passages) {
      if (!evalDocumentIds.has(passage.key.documentId)) continue;
      const vector = features.get(passageKeyId(passage.key));
      if (!vector) continue;
      const probability = model.predict(passage.text, vector.values);
      predictions.push({
        runId,
        key: passage.key,
        modelName: model.modelName,
        probability,
        predictedClass: probability >= threshold ? 1 : 0,
      });
    }
  }
  return predictions;
}

export async function runEvasionPipeline(
  input: PipelineInput,
  config: PipelineConfig,
  deps: PipelineDependencies,
): Promise<PipelineResult> {
  const { runId } = deps;
  const failures: PipelineFailures = { segmentation: [], featureExtraction: [] };
  deps.artifactStore?.assertFreshRun(runId);
  console.log(`[Pipeline] Run ${runId}: ${input.documents.length} documents (seed=${config.seed})`);

  const passages = segmentAll(input.documents, config, failures);
  const features = featurizeAll(passages, config, deps, failures);
  console.log(
    `[Pipeline] ${passages.length} passages, ${features.length} feature vectors (${failures.segmentation.length} documents and ${failures.featureExtraction.length} passages skipped)`,
  );

  const featuresById = new Map(features.map((v) => [passageKeyId(v.key), v]));
  const segmented = new Set(passages.map((p) => p.key.documentId));
  const marketRecords = await resolveMarketRecords(
    input,
    input.documents.filter((d) => segmented.has(d.id)),
    config,
  );

  const { labels } = buildLabels(
    { passages, features: featuresById, annotations: input.annotations, marketRecords },
    config,
  );

  const split = splitByDocument(
    labels.map((l) => ({ documentId: l.key.documentId, label: l.evasivenessLabel })),
    { evalRatio: config.evalRatio, seed: config.seed },
  );
  assertNoLeakage(split);

  const trainDocuments = new Set(split.trainDocumentIds);
  const inner = splitByDocument(
    labels
      .filter((l) => trainDocuments.has(l.key.documentId))
      .map((l) => ({ documentId: l.key.documentId, label: l.evasivenessLabel })),
    { evalRatio: config.validationRatio, seed: config.seed + 1 },
  );
  assertNoLeakage(inner);
  const trainingSplit: TrainingSplit = {
    trainDocumentIds: inner.trainDocumentIds,
    validationDocumentIds: inner.evalDocumentIds,
  };
  console.log(
    `[Pipeline] Split: train=${trainingSplit.trainDocumentIds.length} validation=${trainingSplit.validationDocumentIds.length} eval=${split.evalDocumentIds.length} documents`,
  );

  const passagesById = new Map(passages.map((p) => [passageKeyId(p.key), p]));
  const examples: ClassifierExample[] = [];
  for (const label of labels) {
    if (label.evasivenessLabel === null || !trainDocuments.has(label.key.documentId)) continue;
    const id = passageKeyId(label.key);
    const passage = passagesById.get(id);
    const vector = featuresById.get(id);
    if (!passage || !vector) continue;
    examples.push({
      key: label.key,
      text: passage.text,
      features: vector.values,
      label: isEvasive(label.evasivenessLabel) ? 1 : 0,
    });
  }
  const fitDocuments = new Set(trainingSplit.trainDocumentIds);
  if (!examples.some((e) => fitDocuments.has(e.key.documentId))) {
    throw new InsufficientDataError('no labeled passages in the training partition');
  }

  const baseline = BaselineClassifier.fit(examples, trainingSplit, config);
  const encoder = ContextualEncoder.fit(examples, trainingSplit, config, {
    initialCheckpoint: deps.initialCheckpoint,
  });

  const predictions = predictPartition(
    runId,
    [baseline, encoder],
    passages,
    featuresById,
    new Set(split.evalDocumentIds),
    config.decisionThreshold,
  );

  const report = evaluate(predictions, labels, {
    runId,
    decisionThreshold: config.decisionThreshold,
    calibrationBins: config.calibrationBins,
    bootstrapIterations: config.bootstrapIterations,
    seed: config.seed,
    documentAggregation: config.documentAggregation,
    associationTest: config.associationTest,
    segmentationFailures: failures.segmentation.length,
    featureExtractionFailures: failures.featureExtraction.length,
  });

  if (deps.artifactStore) {
    const store = deps.artifactStore;
    store.appendPredictions(runId, predictions);
    store.writeFeatures(runId, features);
    store.writeLabels(runId, labels);
    store.writeBaselineModel(runId, baseline.toJSON());
    store.writeEncoderCheckpoint(runId, encoder.toCheckpoint());
    const reportPath = store.writeReport(runId, report);
    console.log(`[Pipeline] Artifacts written to ${store.runDir(runId)} (report: ${reportPath})`);
  }

  console.log(`[Pipeline] Run ${runId} complete: ${predictions.length} predictions on ${split.evalDocumentIds.length} documents`);

  return {
    runId,
    report,
    passages,
    features,
    labels,
    split,
    trainingSplit,
    predictions,
    baseline,
    encoder,
    failures,
  };
}
