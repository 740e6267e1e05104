import { describe, it, expect } from 'vitest';
import { CheckpointCorruptionError } from '@/lib/errors';
import { TfidfVectorizer, loadStopWords } from '@/lib/tfidf-vectorizer';

const TEXTS = ['the risk may rise', 'the risk fell', 'sales rose'];

function vectorizer(overrides: { maxFeatures?: number; minDocumentFrequency?: number } = {}) {
  return new TfidfVectorizer({
    maxFeatures: overrides.maxFeatures ?? 100,
    minDocumentFrequency: overrides.minDocumentFrequency ?? 1,
    maxNgram: 2,
    stopWords: new Set(['the', 'a']),
  });
}

describe('TfidfVectorizer', () => {
  it('drops stop words, single letters and numbers before building bigrams', () => {
    expect(vectorizer().analyze('The risk of a 10% decline may rise')).toEqual([
      'risk',
      'of',
      'decline',
      'may',
      'rise',
      'risk of',
      'of decline',
      'decline may',
      'may rise',
    ]);
  });

  it('builds an alphabetical vocabulary of unigrams and bigrams', () => {
    const v = vectorizer().fit(TEXTS);

    expect(v.terms).toEqual([
      'fell',
      'may',
      'may rise',
      'rise',
      'risk',
      'risk fell',
      'risk may',
      'rose',
      'sales',
      'sales rose',
    ]);
    expect(v.vocabularySize).toBe(10);
  });

  it('uses smooth idf', () => {
    const state = vectorizer().fit(TEXTS).toJSON();
    const idf = new Map(state.terms.map((term, i) => [term, state.idf[i]]));

    expect(idf.get('risk')).toBeCloseTo(Math.log(4 / 3) + 1, 10);
    expect(idf.get('sales')).toBeCloseTo(Math.log(2) + 1, 10);
  });

  it('keeps the most frequent terms under maxFeatures', () => {
    expect(vectorizer({ maxFeatures: 1 }).fit(TEXTS).terms).toEqual(['risk']);
  });

  it('drops terms below minDocumentFrequency', () => {
    expect(vectorizer({ minDocumentFrequency: 2 }).fit(TEXTS).terms).toEqual(['risk']);
  });

  it('returns L2-normalized rows over known terms', () => {
    const v = vectorizer().fit(TEXTS);
    const row = v.transform('Risk fell sharply');
    const risk = Math.log(4 / 3) + 1;
    const fell = Math.log(2) + 1;
    const norm = Math.sqrt(risk * risk + 2 * fell * fell);

    // fell, risk, "risk fell"
    expect(row.indices).toEqual([0, 4, 5]);
    expect(row.values[0]).toBeCloseTo(fell / norm, 10);
    expect(row.values[1]).toBeCloseTo(risk / norm, 10);
    expect(row.values.reduce((sum, x) => sum + x * x, 0)).toBeCloseTo(1, 10);
  });

  it('returns an empty row for text without known terms', () => {
    expect(vectorizer().fit(TEXTS).transform('unrelated words only')).toEqual({ indices: [], values: [] });
  });

  it('restores the same transform from its state', () => {
    const v = vectorizer().fit(TEXTS);
    const restored = TfidfVectorizer.fromJSON(JSON.parse(JSON.stringify(v.toJSON())));

    expect(restored.terms).toEqual(v.terms);
    expect(restored.transform('the risk may fall')).toEqual(v.transform('the risk may fall'));
  });

  it('rejects a state whose terms and idf disagree', () => {
    const state = vectorizer().fit(TEXTS).toJSON();

    expect(() => TfidfVectorizer.fromJSON({ ...state, idf: state.idf.slice(1) })).toThrow(CheckpointCorruptionError);
    expect(() => TfidfVectorizer.fromJSON({ terms: 'risk' })).toThrow(CheckpointCorruptionError);
  });
});

describe('loadStopWords', () => {
  it('reads the bundled English list, keeping modal verbs', () => {
    const stopWords = loadStopWords();

    expect(stopWords.has('the')).toBe(true);
    expect(stopWords.has('may')).toBe(false);
  });
});
