/**
 * @module lib/evaluation
 * @description Scores each model's predictions against labels, compares models by paired bootstrap, and tests association with market reaction
 *
 * PURPOSE:
 * - Classification metrics per model: precision, recall, F1, accuracy, rank-based ROC-AUC, Brier score
 * - Calibration: equal-width probability buckets and expected calibration error
 * - Champion/challenger comparison: ΔF1 and ΔAUC (encoder minus baseline) with percentile CI and two-sided p-value
 *   from a document-level paired bootstrap
 * - Correlation: aggregate passage probabilities per document, join the market reaction label, run the configured test
 * - Run metadata: failure, exclusion and label-source counts
 *
 * EXPORTS:
 * - classificationMetrics, rocAuc, calibrationBuckets (functions) - metric primitives
 * - compareModels (function) - paired bootstrap
 * - documentAssociation (function) - correlation for one model
 * - evaluate (function) - predictions + labels -> EvaluationReport
 *
 * NOTES:
 * - Pure: no I/O and seeded resampling, so the same inputs always give the same report
 * - Ordinal human labels are scored as binary (label > 0 is evasive)
 * - `interpretation` is always 'association'
 */

import { ASSOCIATION_TESTS, type AssociationSample } from './association-tests';
import { mulberry32, resample } from './random';
import { mean, quantile } from './statistics';
import {
  isEvasive,
  passageKeyId,
  type AssociationResult,
  type AssociationTestName,
  type BootstrapDelta,
  type CalibrationBucket,
  type DocumentAggregation,
  type EvaluationReport,
  type LabelRecord,
  type LabelSource,
  type ModelComparison,
  type ModelMetrics,
  type ModelName,
  type PredictionRecord,
  type RunMetadata,
} from './types';

export interface EvaluationOptions {
  runId: string;
  decisionThreshold: number;
  calibrationBins: number;
  bootstrapIterations: number;
  seed: number;
  documentAggregation: DocumentAggregation;
  associationTest: AssociationTestName;
  labelSources?: readonly LabelSource[];
  segmentationFailures?: number;
  featureExtractionFailures?: number;
}

export interface ScoredPassage {
  documentId: string;
  probability: number;
  label: 0 | 1;
}

const MODEL_ORDER: readonly ModelName[] = ['baseline', 'encoder'];

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Mann-Whitney formulation with average ranks for ties; null when either class is absent
 */
export function rocAuc(rows: readonly ScoredPassage[]): number | null {
  const positives = rows.filter((r) => r.label === 1).length;
  const negatives = rows.length - positives;
  if (positives === 0 || negatives === 0) return null;

  const sorted = [...rows].sort((a, b) => a.probability - b.probability);
  let positiveRankSum = 0;
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j + 1 < sorted.length && sorted[j + 1].probability === sorted[i].probability) j++;
    const averageRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) {
      if (sorted[k].label === 1) positiveRankSum += averageRank;
    }
    i = j + 1;
  }
  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

export function calibrationBuckets(rows: readonly ScoredPassage[], bins: number): CalibrationBucket[] {
  const buckets: Array<{ lower: number; upper: number; probabilities: number[]; labels: number[] }> = [];
  for (let b = 0; b < bins; b++) {
    buckets.push({ lower: b / bins, upper: (b + 1) / bins, probabilities: [], labels: [] });
  }
  for (const row of rows) {
    const index = Math.min(bins - 1, Math.max(0, Math.floor(row.probability * bins)));
    buckets[index].probabilities.push(row.probability);
    buckets[index].labels.push(row.label);
  }
  return buckets.map((b) => ({
    lower: b.lower,
    upper: b.upper,
    count: b.probabilities.length,
    meanPredicted: b.probabilities.length > 0 ? mean(b.probabilities) : null,
    observedRate: b.labels.length > 0 ? mean(b.labels) : null,
  }));
}

function expectedCalibrationError(buckets: readonly CalibrationBucket[], total: number): number {
  if (total === 0) return 0;
  let ece = 0;
  for (const b of buckets) {
    if (b.count === 0 || b.meanPredicted === null || b.observedRate === null) continue;
    ece += (b.count / total) * Math.abs(b.meanPredicted - b.observedRate);
  }
  return ece;
}

function f1Score(rows: readonly ScoredPassage[], threshold: number): number {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  for (const r of rows) {
    const predicted = r.probability >= threshold;
    if (predicted && r.label === 1) tp++;
    else if (predicted) fp++;
    else if (r.label === 1) fn++;
  }
  const precision = safeDivide(tp, tp + fp);
  const recall = safeDivide(tp, tp + fn);
  return safeDivide(2 * precision * recall, precision + recall);
}

export function classificationMetrics(
  modelName: ModelName,
  rows: readonly ScoredPassage[],
  threshold: number,
  bins: number,
): ModelMetrics {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  let tn = 0;
  let squaredError = 0;
  for (const r of rows) {
    const predicted = r.probability >= threshold;
    if (predicted && r.label === 1) tp++;
    else if (predicted) fp++;
    else if (r.label === 1) fn++;
    else tn++;
    squaredError += (r.probability - r.label) ** 2;
  }

  const precision = safeDivide(tp, tp + fp);
  const recall = safeDivide(tp, tp + fn);
  const calibration = calibrationBuckets(rows, bins);

  return {
    modelName,
    passageCount: rows.length,
    positiveCount: tp + fn,
    precision,
    recall,
    f1: safeDivide(2 * precision * recall, precision + recall),
    accuracy: safeDivide(tp + tn, rows.length),
    rocAuc: rocAuc(rows),
    brierScore: safeDivide(squaredError, rows.length),
    expectedCalibrationError: expectedCalibrationError(calibration, rows.length),
    calibration,
  };
}

export interface PairedRow {
  documentId: string;
  label: 0 | 1;
  champion: number;
  challenger: number;
}

function deltaSummary(
  metric: BootstrapDelta['metric'],
  observed: number | null,
  samples: number[],
): BootstrapDelta {
  if (observed === null || samples.length === 0) {
    return { metric, observed, ciLower: null, ciUpper: null, pValue: null, iterations: samples.length };
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const atOrBelow = sorted.filter((d) => d <= 0).length / sorted.length;
  const atOrAbove = sorted.filter((d) => d >= 0).length / sorted.length;
  return {
    metric,
    observed,
    ciLower: quantile(sorted, 0.025),
    ciUpper: quantile(sorted, 0.975),
    pValue: Math.min(1, 2 * Math.min(atOrBelow, atOrAbove)),
    iterations: samples.length,
  };
}

/**
 * Paired bootstrap over documents shared by both models. Each iteration
 * resamples documents with replacement and keeps all of their passages.
 */
export function compareModels(
  pairs: readonly PairedRow[],
  options: Pick<EvaluationOptions, 'bootstrapIterations' | 'seed' | 'decisionThreshold'>,
  champion: ModelName = 'baseline',
  challenger: ModelName = 'encoder',
): ModelComparison {
  const byDocument = new Map<string, PairedRow[]>();
  for (const pair of pairs) {
    const list = byDocument.get(pair.documentId) ?? [];
    list.push(pair);
    byDocument.set(pair.documentId, list);
  }
  const documentIds = [...byDocument.keys()].sort();

  const metricsOf = (rows: readonly PairedRow[]) => {
    const championRows = rows.map((r) => ({ documentId: r.documentId, probability: r.champion, label: r.label }));
    const challengerRows = rows.map((r) => ({ documentId: r.documentId, probability: r.challenger, label: r.label }));
    const championAuc = rocAuc(championRows);
    const challengerAuc = rocAuc(challengerRows);
    return {
      f1: f1Score(challengerRows, options.decisionThreshold) - f1Score(championRows, options.decisionThreshold),
      auc: championAuc === null || challengerAuc === null ? null : challengerAuc - championAuc,
    };
  };

  const observed = metricsOf(pairs);
  const rng = mulberry32(options.seed);
  const f1Samples: number[] = [];
  const aucSamples: number[] = [];

  if (documentIds.length > 0) {
    for (let i = 0; i < options.bootstrapIterations; i++) {
      const rows = resample(documentIds, rng).flatMap((id) => byDocument.get(id) ?? []);
      const delta = metricsOf(rows);
      f1Samples.push(delta.f1);
      if (delta.auc !== null) aucSamples.push(delta.auc);
    }
  }

  return {
    challenger,
    champion,
    sharedDocumentCount: documentIds.length,
    deltas: [
      deltaSummary('f1', documentIds.length > 0 ? observed.f1 : null, f1Samples),
      deltaSummary('rocAuc', observed.auc, aucSamples),
    ],
  };
}

function aggregate(values: readonly number[], method: DocumentAggregation): number {
  return method === 'max' ? Math.max(...values) : mean(values);
}

/**
 * Document-level association between aggregated evasion probability and adverse market reaction.
 * Documents without a market label are left out.
 */
export function documentAssociation(
  modelName: ModelName,
  predictions: readonly PredictionRecord[],
  marketLabels: ReadonlyMap<string, 0 | 1 | null>,
  aggregation: DocumentAggregation,
  test: AssociationTestName,
): AssociationResult {
  const byDocument = new Map<string, number[]>();
  for (const p of predictions) {
    if (p.modelName !== modelName) continue;
    const list = byDocument.get(p.key.documentId) ?? [];
    list.push(p.probability);
    byDocument.set(p.key.documentId, list);
  }

  const samples: AssociationSample[] = [];
  for (const documentId of [...byDocument.keys()].sort()) {
    const adverse = marketLabels.get(documentId);
    if (adverse === null || adverse === undefined) continue;
    samples.push({ score: aggregate(byDocument.get(documentId) ?? [], aggregation), adverse });
  }

  const outcome = ASSOCIATION_TESTS[test](samples);
  return {
    modelName,
    test,
    aggregation,
    documentCount: samples.length,
    adverseCount: samples.filter((s) => s.adverse === 1).length,
    ...outcome,
    interpretation: 'association',
  };
}

function documentMarketLabels(labels: readonly LabelRecord[]): Map<string, 0 | 1 | null> {
  const byDocument = new Map<string, 0 | 1 | null>();
  for (const label of labels) {
    const documentId = label.key.documentId;
    if (!byDocument.has(documentId) || byDocument.get(documentId) === null) {
      byDocument.set(documentId, label.marketReactionLabel);
    }
  }
  return byDocument;
}

export function evaluate(
  predictions: readonly PredictionRecord[],
  labels: readonly LabelRecord[],
  options: EvaluationOptions,
): EvaluationReport {
  const allowedSources = new Set<LabelSource>(options.labelSources ?? ['human', 'weak']);
  const labelById = new Map(labels.map((l) => [passageKeyId(l.key), l]));

  const scoredRows = (modelName: ModelName): Map<string, ScoredPassage> => {
    const rows = new Map<string, ScoredPassage>();
    for (const p of predictions) {
      if (p.modelName !== modelName) continue;
      const id = passageKeyId(p.key);
      const label = labelById.get(id);
      if (!label || label.evasivenessLabel === null || label.labelSource === null) continue;
      if (!allowedSources.has(label.labelSource)) continue;
      rows.set(id, {
        documentId: p.key.documentId,
        probability: p.probability,
        label: isEvasive(label.evasivenessLabel) ? 1 : 0,
      });
    }
    return rows;
  };

  const presentModels = MODEL_ORDER.filter((m) => predictions.some((p) => p.modelName === m));
  const rowsByModel = new Map(presentModels.map((m) => [m, scoredRows(m)]));

  const models = presentModels.map((m) =>
    classificationMetrics(
      m,
      [...(rowsByModel.get(m) ?? new Map<string, ScoredPassage>()).entries()]
        .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
        .map(([, row]) => row),
      options.decisionThreshold,
      options.calibrationBins,
    ),
  );

  let comparison: ModelComparison | null = null;
  const championRows = rowsByModel.get('baseline');
  const challengerRows = rowsByModel.get('encoder');
  if (championRows && challengerRows) {
    const pairs: PairedRow[] = [];
    for (const id of [...championRows.keys()].sort()) {
      const champion = championRows.get(id);
      const challenger = challengerRows.get(id);
      if (!champion || !challenger) continue;
      pairs.push({
        documentId: champion.documentId,
        label: champion.label,
        champion: champion.probability,
        challenger: challenger.probability,
      });
    }
    comparison = compareModels(pairs, options);
  }

  const marketLabels = documentMarketLabels(labels);
  const correlation = presentModels.map((m) =>
    documentAssociation(m, predictions, marketLabels, options.documentAggregation, options.associationTest),
  );

  const predictedDocuments = new Set(predictions.map((p) => p.key.documentId));
  const excludedFromCorrelation = [...predictedDocuments].filter((id) => (marketLabels.get(id) ?? null) === null).length;

  const labelSources: Record<LabelSource, number> = { human: 0, weak: 0 };
  let unlabeledPassages = 0;
  for (const label of labels) {
    if (label.labelSource === null) unlabeledPassages++;
    else labelSources[label.labelSource]++;
  }

  const evaluatedPassages = new Set<string>();
  for (const rows of rowsByModel.values()) for (const id of rows.keys()) evaluatedPassages.add(id);

  const runMetadata: RunMetadata = {
    segmentationFailures: options.segmentationFailures ?? 0,
    featureExtractionFailures: options.featureExtractionFailures ?? 0,
    missingMarketDataDocuments: [...marketLabels.values()].filter((v) => v === null).length,
    excludedFromCorrelation,
    unlabeledPassages,
    evaluatedPassages: evaluatedPassages.size,
  };

  return { runId: options.runId, models, comparison, correlation, labelSources, runMetadata };
}
