/**
 * Pipeline error taxonomy
 *
 * Per-item errors (segmentation, feature extraction, market join) are caught at
 * the pipeline boundary, counted, and the batch continues. Run-level errors
 * (training divergence, corrupt checkpoints, bad config) abort the run.
 */

export type EvasionErrorCode =
  | 'SEGMENTATION_FAILED'
  | 'FEATURE_EXTRACTION_FAILED'
  | 'MISSING_MARKET_DATA'
  | 'TRAINING_DIVERGED'
  | 'CHECKPOINT_CORRUPT'
  | 'INVALID_CONFIG'
  | 'DATA_LEAKAGE'
  | 'DUPLICATE_PREDICTION'
  | 'INSUFFICIENT_DATA';

export class EvasionPipelineError extends Error {
  readonly code: EvasionErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: EvasionErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class SegmentationError extends EvasionPipelineError {
  constructor(documentId: string, reason: string) {
    super('SEGMENTATION_FAILED', `Cannot segment document ${documentId}: ${reason}`, { documentId, reason });
  }
}

export class FeatureExtractionError extends EvasionPipelineError {
  constructor(passageId: string, reason: string) {
    super('FEATURE_EXTRACTION_FAILED', `Cannot extract features for passage ${passageId}: ${reason}`, {
      passageId,
      reason,
    });
  }
}

export class MissingMarketDataError extends EvasionPipelineError {
  constructor(documentId: string, entityId: string, filingDate: string, reason: string) {
    super(
      'MISSING_MARKET_DATA',
      `No market window for document ${documentId} (${entityId}, filed ${filingDate}): ${reason}`,
      { documentId, entityId, filingDate, reason },
    );
  }
}

export interface DivergenceState {
  epoch: number;
  batch: number;
  loss: number;
}

export class TrainingDivergenceError extends EvasionPipelineError {
  readonly state: DivergenceState;

  constructor(modelName: string, state: DivergenceState) {
    super(
      'TRAINING_DIVERGED',
      `${modelName} training diverged at epoch ${state.epoch}, batch ${state.batch} (loss=${state.loss})`,
      { modelName, ...state },
    );
    this.state = state;
  }
}

export class CheckpointCorruptionError extends EvasionPipelineError {
  constructor(source: string, reason: string) {
    super('CHECKPOINT_CORRUPT', `Checkpoint ${source} is corrupt: ${reason}`, { source, reason });
  }
}

export class ConfigError extends EvasionPipelineError {
  constructor(reason: string) {
    super('INVALID_CONFIG', `Invalid pipeline configuration: ${reason}`, { reason });
  }
}

export class DataLeakageError extends EvasionPipelineError {
  constructor(documentIds: string[]) {
    super(
      'DATA_LEAKAGE',
      `Documents present in both training and evaluation partitions: ${documentIds.join(', ')}`,
      { documentIds },
    );
  }
}

export class DuplicatePredictionError extends EvasionPipelineError {
  constructor(runId: string, modelName: string, passageId: string) {
    super(
      'DUPLICATE_PREDICTION',
      `Run ${runId} already has a ${modelName} prediction for passage ${passageId}`,
      { runId, modelName, passageId },
    );
  }
}

export class InsufficientDataError extends EvasionPipelineError {
  constructor(reason: string) {
    super('INSUFFICIENT_DATA', `Not enough data to train: ${reason}`, { reason });
  }
}

export function isEvasionPipelineError(error: unknown): error is EvasionPipelineError {
  return error instanceof EvasionPipelineError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
