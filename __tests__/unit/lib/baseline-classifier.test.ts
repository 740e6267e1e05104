import { describe, it, expect } from 'vitest';
import { BaselineClassifier, fitPlattScaling } from '@/lib/baseline-classifier';
import { resolveConfig } from '@/lib/config';
import { CheckpointCorruptionError } from '@/lib/errors';
import {
  EVASIVE_SENTENCE,
  FACTUAL_SENTENCE,
  buildExamples,
  makeFeatureValues,
} from '../../fixtures/filing-documents';

const config = resolveConfig({ baselineEpochs: 100, seed: 5 });
const HEDGED = makeFeatureValues({ hedgeDensity: 0.12, vaguenessDensity: 0.05, modalRate: 0.08 });
const FIGURES = makeFeatureValues({ numericDensity: 0.3 });

describe('fitPlattScaling', () => {
  it('returns the identity when validation has a single class', () => {
    expect(fitPlattScaling([0.5, 1.5, 2], [1, 1, 1])).toEqual({ slope: 1, intercept: 0 });
    expect(fitPlattScaling([], [])).toEqual({ slope: 1, intercept: 0 });
  });

  it('fits an increasing map with zero intercept on symmetric logits', () => {
    const calibration = fitPlattScaling([-2, -1, 1, 2], [0, 0, 1, 1]);

    expect(calibration.slope).toBeGreaterThan(0);
    expect(calibration.intercept).toBeCloseTo(0, 6);
  });
});

describe('BaselineClassifier', () => {
  const { examples, split } = buildExamples(8);
  const model = BaselineClassifier.fit(examples, split, config);

  it('scores hedged text above figure-heavy text', () => {
    expect(model.rawScore(EVASIVE_SENTENCE, HEDGED)).toBeGreaterThan(model.rawScore(FACTUAL_SENTENCE, FIGURES));
    expect(model.predict(EVASIVE_SENTENCE, HEDGED)).toBeGreaterThan(model.predict(FACTUAL_SENTENCE, FIGURES));
  });

  it('returns probabilities in [0, 1]', () => {
    for (const example of examples) {
      const p = model.predict(example.text, example.features);
      expect(p).toBeGreaterThanOrEqual(0);
      expect(p).toBeLessThanOrEqual(1);
    }
  });

  it('learns a positive hedging weight and a negative numeric weight', () => {
    const weights = new Map(model.featureWeights().map((w) => [w.name, w.weight]));

    expect(weights.get('hedgeDensity')).toBeGreaterThan(0);
    expect(weights.get('numericDensity')).toBeLessThan(0);
  });

  it('calibrates on validation documents', () => {
    expect(model.calibration.slope).toBeGreaterThan(0);
  });

  it('fits its vocabulary on training documents only', () => {
    const validationDocument = split.validationDocumentIds[0];
    const withMarker = examples.map((e) =>
      e.key.documentId === validationDocument ? { ...e, text: `${e.text} wombat` } : e,
    );
    const fitted = BaselineClassifier.fit(withMarker, split, config);

    expect(fitted.toJSON().vectorizer.terms).not.toContain('wombat');
    expect(fitted.vocabularySize).toBe(model.vocabularySize);
  });

  it('is deterministic for a fixed seed', () => {
    const again = BaselineClassifier.fit(examples, split, config);

    expect(examples.map((e) => again.predict(e.text, e.features))).toEqual(
      examples.map((e) => model.predict(e.text, e.features)),
    );
  });

  it('ignores example order', () => {
    const reordered = BaselineClassifier.fit([...examples].reverse(), split, config);

    expect(reordered.predict(EVASIVE_SENTENCE, HEDGED)).toBe(model.predict(EVASIVE_SENTENCE, HEDGED));
  });

  it('restores the same predictions from its saved state', () => {
    const restored = BaselineClassifier.fromJSON(JSON.parse(JSON.stringify(model.toJSON())));

    expect(restored.predict(EVASIVE_SENTENCE, HEDGED)).toBeCloseTo(model.predict(EVASIVE_SENTENCE, HEDGED), 12);
    expect(restored.calibration).toEqual(model.calibration);
  });

  it('rejects a saved state with the wrong weight count', () => {
    const state = model.toJSON();

    expect(() => BaselineClassifier.fromJSON({ ...state, weights: state.weights.slice(1) })).toThrow(
      CheckpointCorruptionError,
    );
    expect(() => BaselineClassifier.fromJSON({ ...state, format: 'other-model' })).toThrow(CheckpointCorruptionError);
  });
});
