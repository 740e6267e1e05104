/**
 * @module lib/types
 * @description Shared record shapes for the disclosure evasion pipeline: documents, passages, feature vectors, labels, predictions and evaluation reports
 *
 * PURPOSE:
 * - Define the durable records carried from segmentation through modeling (Passage, FeatureVector, LabelRecord)
 * - Define the append-only per-run outputs (PredictionRecord) and the derived EvaluationReport
 * - Provide the stable `(documentId, passageIndex)` key helpers used by every map and persisted row
 *
 * NOTES:
 * - A FilingDocument's text is its blocks joined by a blank line; passage offsets point into that string
 * - FEATURE_NAMES is the fixed schema; every FeatureVector carries every name with a finite value
 */

export type PassageType =
  | 'business'
  | 'risk_factors'
  | 'legal_proceedings'
  | 'mda'
  | 'market_risk'
  | 'financial_statements'
  | 'other';

export const BLOCK_SEPARATOR = '\n\n';

export interface FilingDocument {
  id: string;
  entityId: string;
  filingDate: string; // YYYY-MM-DD
  formType?: string;
  blocks: string[];
}

export interface PassageKey {
  documentId: string;
  passageIndex: number;
}

export interface Passage {
  key: PassageKey;
  entityId: string;
  filingDate: string;
  type: PassageType;
  start: number; // inclusive offset into documentText()
  end: number;   // exclusive
  text: string;
}

export const FEATURE_NAMES = [
  'hedgeDensity',
  'vaguenessDensity',
  'modalRate',
  'passiveRate',
  'numericDensity',
  'sentiment',
  'readability',
  'avgSentenceLength',
  'lexicalDiversity',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureValues = Record<FeatureName, number>;

export interface FeatureVector {
  key: PassageKey;
  values: FeatureValues;
}

export type LabelSource = 'human' | 'weak';

export interface LabelRecord {
  key: PassageKey;
  evasivenessLabel: number | null; // binary or ordinal; null when unlabeled
  labelSource: LabelSource | null;
  ambiguityScore: number;
  marketReactionLabel: 0 | 1 | null; // 1 = adverse; null when market data is missing
  windowReturn: number | null;
}

export interface HumanAnnotation {
  key: PassageKey;
  label: number;
}

export interface MarketRecord {
  entityId: string;
  date: string; // YYYY-MM-DD trading day
  return: number; // simple daily return, e.g. -0.012
}

export type ModelName = 'baseline' | 'encoder';

/**
 * One labeled passage as seen by a classifier; label is binary (evasive = 1).
 */
export interface ClassifierExample {
  key: PassageKey;
  text: string;
  features: FeatureValues;
  label: 0 | 1;
}

/**
 * Training documents and the held-out validation documents used for early
 * stopping and probability calibration. Both come from the training partition.
 */
export interface TrainingSplit {
  trainDocumentIds: readonly string[];
  validationDocumentIds: readonly string[];
}

export interface EvasionClassifier {
  readonly modelName: ModelName;
  predict(text: string, features: FeatureValues): number;
}

export interface PredictionRecord {
  runId: string;
  key: PassageKey;
  modelName: ModelName;
  probability: number;
  predictedClass: 0 | 1;
}

export interface CalibrationBucket {
  lower: number;
  upper: number;
  count: number;
  meanPredicted: number | null;
  observedRate: number | null;
}

export interface ModelMetrics {
  modelName: ModelName;
  passageCount: number;
  positiveCount: number;
  precision: number;
  recall: number;
  f1: number;
  accuracy: number;
  rocAuc: number | null;
  brierScore: number;
  expectedCalibrationError: number;
  calibration: CalibrationBucket[];
}

export interface BootstrapDelta {
  metric: 'f1' | 'rocAuc';
  observed: number | null;
  ciLower: number | null;
  ciUpper: number | null;
  pValue: number | null;
  iterations: number;
}

export interface ModelComparison {
  challenger: ModelName;
  champion: ModelName;
  sharedDocumentCount: number;
  deltas: BootstrapDelta[];
}

export type AssociationTestName = 'point-biserial' | 'mean-difference';
export type DocumentAggregation = 'mean' | 'max';

export interface AssociationResult {
  modelName: ModelName;
  test: AssociationTestName;
  aggregation: DocumentAggregation;
  documentCount: number;
  adverseCount: number;
  effectSize: number | null;
  statistic: number | null;
  pValue: number | null;
  interpretation: 'association';
}

export interface RunMetadata {
  segmentationFailures: number;
  featureExtractionFailures: number;
  missingMarketDataDocuments: number;
  excludedFromCorrelation: number;
  unlabeledPassages: number;
  evaluatedPassages: number;
}

export interface EvaluationReport {
  runId: string;
  models: ModelMetrics[];
  comparison: ModelComparison | null;
  correlation: AssociationResult[];
  labelSources: Record<LabelSource, number>;
  runMetadata: RunMetadata;
}

export function documentText(document: FilingDocument): string {
  return document.blocks.join(BLOCK_SEPARATOR);
}

export function passageKeyId(key: PassageKey): string {
  return `${key.documentId}#${key.passageIndex}`;
}

export function isEvasive(label: number): boolean {
  return label > 0;
}
