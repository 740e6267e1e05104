import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArtifactStore } from '@/lib/artifact-store';
import { CheckpointCorruptionError, ConfigError, DuplicatePredictionError } from '@/lib/errors';
import type { FeatureVector, PredictionRecord } from '@/lib/types';
import { makeFeatureValues, makeLabel } from '../../fixtures/filing-documents';

function prediction(documentId: string, passageIndex: number, probability: number): PredictionRecord {
  return {
    runId: 'run-1',
    key: { documentId, passageIndex },
    modelName: 'baseline',
    probability,
    predictedClass: probability >= 0.5 ? 1 : 0,
  };
}

describe('ArtifactStore', () => {
  let root: string;
  let store: ArtifactStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'artifacts-'));
    store = new ArtifactStore(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lays out one directory per run', () => {
    expect(store.runDir('run-1')).toBe(path.join(root, 'runs', 'run-1'));
  });

  it('rejects run ids that could escape the root', () => {
    expect(() => store.runDir('../elsewhere')).toThrow(ConfigError);
    expect(() => store.runDir('')).toThrow(ConfigError);
  });

  it('writes feature and label tables as JSON lines and reads them back', () => {
    const vectors: FeatureVector[] = [{ key: { documentId: 'doc-1', passageIndex: 0 }, values: makeFeatureValues() }];
    const labels = [makeLabel('doc-1', 0, 1, 0), makeLabel('doc-1', 1, null, null)];

    const featurePath = store.writeFeatures('run-1', vectors);
    store.writeLabels('run-1', labels);

    expect(fs.readFileSync(featurePath, 'utf-8').split('\n')).toHaveLength(2);
    expect(store.readFeatures('run-1')).toEqual(vectors);
    expect(store.readLabels('run-1')).toEqual(labels);
  });

  it('appends predictions across calls', () => {
    expect(store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8)])).toBe(1);
    store.appendPredictions('run-1', [prediction('doc-1', 1, 0.2)]);

    expect(store.readPredictions('run-1').map((p) => p.key.passageIndex)).toEqual([0, 1]);
  });

  it('refuses a second prediction for the same model and passage without writing anything', () => {
    store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8)]);

    expect(() =>
      store.appendPredictions('run-1', [prediction('doc-2', 0, 0.4), prediction('doc-1', 0, 0.3)]),
    ).toThrow(DuplicatePredictionError);
    expect(store.readPredictions('run-1')).toHaveLength(1);
  });

  it('accepts a fresh run and refuses one that already wrote predictions or a report', () => {
    expect(() => store.assertFreshRun('run-1')).not.toThrow();

    store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8)]);
    expect(() => store.assertFreshRun('run-1')).toThrow(DuplicatePredictionError);

    fs.mkdirSync(store.runDir('run-2'), { recursive: true });
    fs.writeFileSync(path.join(store.runDir('run-2'), 'report.json'), '{}');
    expect(() => store.assertFreshRun('run-2')).toThrow('Invalid pipeline configuration: run "run-2" already has a report');
  });

  it('refuses duplicates within a single batch', () => {
    expect(() =>
      store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8), prediction('doc-1', 0, 0.8)]),
    ).toThrow(DuplicatePredictionError);
  });

  it('keeps runs separate', () => {
    store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8)]);

    expect(() => store.appendPredictions('run-2', [prediction('doc-1', 0, 0.8)])).not.toThrow();
    expect(store.readPredictions('run-2')[0].runId).toBe('run-2');
  });

  it('returns no rows for a run that wrote nothing', () => {
    expect(store.readPredictions('run-empty')).toEqual([]);
  });

  it('reports the line of a corrupt row', () => {
    store.appendPredictions('run-1', [prediction('doc-1', 0, 0.8)]);
    fs.appendFileSync(path.join(store.runDir('run-1'), 'predictions.jsonl'), '{"runId":"run-1"}\n');

    expect(() => store.readPredictions('run-1')).toThrow(CheckpointCorruptionError);
    expect(() => store.readPredictions('run-1')).toThrow(/predictions\.jsonl:2/);
  });

  it('raises a checkpoint error for a missing encoder checkpoint', () => {
    expect(() => store.readEncoderCheckpoint('run-1')).toThrow(CheckpointCorruptionError);
  });
});
