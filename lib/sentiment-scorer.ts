/**
 * Sentiment Scorer for disclosure passages
 *
 * Scores management tone on a fixed [-1, +1] scale. The extractor only sees the
 * SentimentScorer interface, so a pretrained scorer can replace the lexicon one
 * as long as it stays synchronous, deterministic and within its declared range.
 */

import type { PolarityLexicon } from './lexicons';

export interface SentimentScorer {
  readonly name: string;
  readonly range: readonly [number, number];
  score(tokens: readonly string[]): number;
}

export const SENTIMENT_RANGE = [-1, 1] as const;

const NEGATORS = new Set(['not', 'no', 'never', 'neither', 'nor', 'without', 'cannot']);

// A polarity word within this many tokens after a negator counts for the opposite side
export const NEGATION_WINDOW = 3;

function isNegator(token: string): boolean {
  return NEGATORS.has(token) || token.endsWith("n't") || token.endsWith('n’t');
}

export class LexiconSentimentScorer implements SentimentScorer {
  readonly name = 'lexicon-polarity';
  readonly range = SENTIMENT_RANGE;

  constructor(private readonly lexicon: PolarityLexicon) {}

  /**
   * (positive - negative) / (positive + negative + 1), so a single hit reads as mild tone.
   * "not profitable" counts as negative, "no losses" as positive.
   */
  score(tokens: readonly string[]): number {
    let positive = 0;
    let negative = 0;
    let lastNegator = -Infinity;
    tokens.forEach((token, i) => {
      if (isNegator(token)) {
        lastNegator = i;
        return;
      }
      const polarity = this.lexicon.positive.has(token) ? 1 : this.lexicon.negative.has(token) ? -1 : 0;
      if (polarity === 0) return;
      const signed = i - lastNegator <= NEGATION_WINDOW ? -polarity : polarity;
      if (signed > 0) positive++;
      else negative++;
    });
    const raw = (positive - negative) / (positive + negative + 1);
    return Math.max(SENTIMENT_RANGE[0], Math.min(SENTIMENT_RANGE[1], raw));
  }
}

/**
 * Clamp an arbitrary scorer's output into its declared range
 */
export function boundedScore(scorer: SentimentScorer, tokens: readonly string[]): number {
  const value = scorer.score(tokens);
  if (!Number.isFinite(value)) return 0;
  const [min, max] = scorer.range;
  return Math.max(min, Math.min(max, value));
}
