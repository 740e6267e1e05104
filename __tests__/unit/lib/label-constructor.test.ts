import { describe, it, expect } from 'vitest';
import { resolveConfig } from '@/lib/config';
import { ambiguityScore, buildLabels } from '@/lib/label-constructor';
import { passageKeyId, type FeatureVector, type MarketRecord, type Passage } from '@/lib/types';
import { EVASIVE_SENTENCE, FACTUAL_SENTENCE, makeFeatureValues, makePassage } from '../../fixtures/filing-documents';

const config = resolveConfig({});

// Feature values of the two reference sentences
const HEDGED = makeFeatureValues({ hedgeDensity: 0.25, vaguenessDensity: 1 / 16, modalRate: 0.125 });
const FIGURES = makeFeatureValues({ numericDensity: 3 / 9 });

const PASSAGES: Passage[] = [
  makePassage('doc-1', 0, EVASIVE_SENTENCE),
  makePassage('doc-1', 1, FACTUAL_SENTENCE),
  makePassage('doc-2', 0, EVASIVE_SENTENCE, { entityId: 'NODATA' }),
];

const FEATURES = new Map<string, FeatureVector>(
  [
    { key: PASSAGES[0].key, values: HEDGED },
    { key: PASSAGES[1].key, values: FIGURES },
    { key: PASSAGES[2].key, values: HEDGED },
  ].map((v) => [passageKeyId(v.key), v]),
);

const MARKET: MarketRecord[] = [
  { entityId: 'ACME', date: '2023-03-01', return: -0.01 },
  { entityId: 'ACME', date: '2023-03-02', return: -0.01 },
  { entityId: 'ACME', date: '2023-03-03', return: -0.01 },
];

describe('ambiguityScore', () => {
  it('weights the reference sentences with the default weights', () => {
    expect(ambiguityScore(HEDGED, config.ambiguityWeights)).toBeCloseTo(0.34375, 12);
    expect(ambiguityScore(FIGURES, config.ambiguityWeights)).toBeCloseTo(-1 / 6, 12);
  });

  it('ignores features without a weight', () => {
    expect(ambiguityScore(makeFeatureValues({ readability: 99 }), { hedgeDensity: 1 })).toBe(0);
  });
});

describe('buildLabels', () => {
  it('weak-labels by the ambiguity threshold', () => {
    const result = buildLabels({ passages: PASSAGES, features: FEATURES, marketRecords: MARKET }, { ...config, labelStrategy: 'weak' });
    expect(result.labels.map((l) => [l.evasivenessLabel, l.labelSource])).toEqual([
      [1, 'weak'],
      [0, 'weak'],
      [1, 'weak'],
    ]);
    expect(result.labelSources).toEqual({ human: 0, weak: 3 });
    expect(result.unlabeledPassages).toBe(0);
  });

  it('copies the document market reaction onto its passages', () => {
    const result = buildLabels({ passages: PASSAGES, features: FEATURES, marketRecords: MARKET }, config);
    // three days of -1% compound to about -2.97%, below the -2% threshold
    expect(result.labels[0].marketReactionLabel).toBe(1);
    expect(result.labels[1].marketReactionLabel).toBe(1);
    expect(result.labels[0].windowReturn).toBeCloseTo(0.99 ** 3 - 1, 12);
    expect(result.reactions.get('doc-1')?.windowDates).toEqual(['2023-03-01', '2023-03-02', '2023-03-03']);
  });

  it('keeps evasiveness labels for a document without market data', () => {
    const result = buildLabels({ passages: PASSAGES, features: FEATURES, marketRecords: MARKET }, config);
    expect(result.missingMarketDocuments).toEqual(['doc-2']);
    expect(result.labels[2].marketReactionLabel).toBeNull();
    expect(result.labels[2].windowReturn).toBeNull();
    expect(result.labels[2].evasivenessLabel).toBe(1);
  });

  it('uses only human labels under the human strategy', () => {
    const result = buildLabels(
      {
        passages: PASSAGES,
        features: FEATURES,
        marketRecords: MARKET,
        annotations: [{ key: { documentId: 'doc-1', passageIndex: 0 }, label: 2 }],
      },
      { ...config, labelStrategy: 'human' },
    );
    expect(result.labels.map((l) => [l.evasivenessLabel, l.labelSource])).toEqual([
      [2, 'human'],
      [null, null],
      [null, null],
    ]);
    expect(result.unlabeledPassages).toBe(2);
  });

  it('prefers a human label and falls back to the weak one', () => {
    const result = buildLabels(
      {
        passages: PASSAGES,
        features: FEATURES,
        marketRecords: MARKET,
        annotations: [{ key: { documentId: 'doc-1', passageIndex: 0 }, label: 0 }],
      },
      { ...config, labelStrategy: 'human-then-weak' },
    );
    expect(result.labels.map((l) => [l.evasivenessLabel, l.labelSource])).toEqual([
      [0, 'human'],
      [0, 'weak'],
      [1, 'weak'],
    ]);
    expect(result.labelSources).toEqual({ human: 1, weak: 2 });
  });

  it('ignores annotations under the weak strategy', () => {
    const result = buildLabels(
      {
        passages: PASSAGES,
        features: FEATURES,
        marketRecords: MARKET,
        annotations: [{ key: { documentId: 'doc-1', passageIndex: 0 }, label: 0 }],
      },
      { ...config, labelStrategy: 'weak' },
    );
    expect(result.labels[0].labelSource).toBe('weak');
    expect(result.labels[0].evasivenessLabel).toBe(1);
  });

  it('skips passages without features and freezes records', () => {
    const features = new Map(FEATURES);
    features.delete(passageKeyId(PASSAGES[1].key));
    const result = buildLabels({ passages: PASSAGES, features, marketRecords: MARKET }, config);
    expect(result.labels.map((l) => passageKeyId(l.key))).toEqual(['doc-1#0', 'doc-2#0']);
    expect(Object.isFrozen(result.labels[0])).toBe(true);
    expect(Object.isFrozen(result.labels[0].key)).toBe(true);
  });
});
