import { describe, it, expect } from 'vitest';
import { LexiconSentimentScorer, boundedScore, type SentimentScorer } from '@/lib/sentiment-scorer';
import { tokenize } from '@/lib/text-statistics';

const scorer = new LexiconSentimentScorer({
  positive: new Set(['profitable', 'growth']),
  negative: new Set(['losses', 'decline']),
});

describe('LexiconSentimentScorer', () => {
  it('scores plain polarity hits', () => {
    expect(scorer.score(tokenize('The segment was profitable'))).toBe(0.5);
    expect(scorer.score(tokenize('Losses and a decline'))).toBe(-2 / 3);
    expect(scorer.score(tokenize('Nothing to report'))).toBe(0);
  });

  it('flips a polarity word shortly after a negator', () => {
    expect(scorer.score(tokenize('The segment was not profitable'))).toBe(-0.5);
    expect(scorer.score(tokenize('We had no losses'))).toBe(0.5);
    expect(scorer.score(tokenize("We didn't see growth"))).toBe(-0.5);
  });

  it('stops negating past the window', () => {
    expect(scorer.score(tokenize('Not in the prior three years was it profitable'))).toBe(0.5);
  });
});

describe('boundedScore', () => {
  it('clamps out-of-range and non-finite scores', () => {
    const wild = (value: number): SentimentScorer => ({ name: 'wild', range: [-1, 1], score: () => value });
    expect(boundedScore(wild(3), [])).toBe(1);
    expect(boundedScore(wild(-3), [])).toBe(-1);
    expect(boundedScore(wild(Number.NaN), [])).toBe(0);
  });
});
