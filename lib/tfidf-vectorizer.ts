/**
 * @module lib/tfidf-vectorizer
 * @description Sparse TF-IDF representation of passage text for the baseline classifier
 *
 * PURPOSE:
 * - Lowercased word tokens with English function words removed, then unigrams and bigrams
 * - Vocabulary capped at maxFeatures terms by document frequency (ties broken alphabetically), after minDocumentFrequency
 * - Smooth idf ln((1 + n) / (1 + df)) + 1 and L2-normalized rows
 *
 * EXPORTS:
 * - SparseVector (interface) - parallel sorted index/value arrays
 * - TfidfVectorizer (class) - fit on training passages, transform any text, toJSON/fromJSON
 * - loadStopWords (function) - reads data/stopwords/english.json
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CheckpointCorruptionError } from './errors';
import { readTermList } from './lexicons';
import { isNumericToken, tokenize } from './text-statistics';

export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface TfidfOptions {
  maxFeatures: number;
  minDocumentFrequency: number;
  maxNgram: number;
  stopWords: ReadonlySet<string>;
}

const DEFAULT_STOP_WORDS_PATH = fileURLToPath(new URL('../data/stopwords/english.json', import.meta.url));

export function loadStopWords(filePath: string = DEFAULT_STOP_WORDS_PATH): Set<string> {
  return new Set(readTermList(filePath).map((w) => w.toLowerCase()));
}

export const tfidfStateSchema = z.object({
  terms: z.array(z.string()),
  idf: z.array(z.number().finite()),
  maxNgram: z.number().int().min(1),
  stopWords: z.array(z.string()),
});

export type TfidfState = z.infer<typeof tfidfStateSchema>;

export class TfidfVectorizer {
  private vocabulary = new Map<string, number>();
  private idf: number[] = [];

  constructor(private readonly options: TfidfOptions) {}

  get vocabularySize(): number {
    return this.idf.length;
  }

  get terms(): string[] {
    return [...this.vocabulary.keys()];
  }

  /**
   * Word unigrams and contiguous n-grams up to maxNgram, after stop-word removal
   */
  analyze(text: string): string[] {
    const words = tokenize(text).filter(
      (t) => t.length > 1 && !isNumericToken(t) && !this.options.stopWords.has(t),
    );
    const grams: string[] = [...words];
    for (let n = 2; n <= this.options.maxNgram; n++) {
      for (let i = 0; i + n <= words.length; i++) {
        grams.push(words.slice(i, i + n).join(' '));
      }
    }
    return grams;
  }

  fit(texts: readonly string[]): this {
    const documentFrequency = new Map<string, number>();
    for (const text of texts) {
      for (const term of new Set(this.analyze(text))) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const selected = [...documentFrequency.entries()]
      .filter(([, df]) => df >= this.options.minDocumentFrequency)
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, this.options.maxFeatures)
      .map(([term]) => term)
      .sort();

    const n = texts.length;
    this.vocabulary = new Map(selected.map((term, index) => [term, index]));
    this.idf = selected.map((term) => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);
    return this;
  }

  transform(text: string): SparseVector {
    const counts = new Map<number, number>();
    for (const term of this.analyze(text)) {
      const index = this.vocabulary.get(term);
      if (index !== undefined) counts.set(index, (counts.get(index) ?? 0) + 1);
    }

    const indices = [...counts.keys()].sort((a, b) => a - b);
    const values = indices.map((i) => (counts.get(i) ?? 0) * this.idf[i]);
    const norm = Math.sqrt(values.reduce((sum, v) => sum + v * v, 0));
    return { indices, values: norm > 0 ? values.map((v) => v / norm) : values };
  }

  toJSON(): TfidfState {
    return {
      terms: this.terms,
      idf: [...this.idf],
      maxNgram: this.options.maxNgram,
      stopWords: [...this.options.stopWords].sort(),
    };
  }

  static fromJSON(raw: unknown, source = 'tfidf'): TfidfVectorizer {
    const parsed = tfidfStateSchema.safeParse(raw);
    if (!parsed.success) throw new CheckpointCorruptionError(source, parsed.error.issues[0]?.message ?? 'invalid state');
    const state = parsed.data;
    if (state.terms.length !== state.idf.length) {
      throw new CheckpointCorruptionError(source, `${state.terms.length} terms but ${state.idf.length} idf weights`);
    }
    const vectorizer = new TfidfVectorizer({
      maxFeatures: state.terms.length,
      minDocumentFrequency: 1,
      maxNgram: state.maxNgram,
      stopWords: new Set(state.stopWords),
    });
    vectorizer.vocabulary = new Map(state.terms.map((term, index) => [term, index]));
    vectorizer.idf = [...state.idf];
    return vectorizer;
  }
}
