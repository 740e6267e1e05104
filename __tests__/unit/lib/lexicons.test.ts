import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '@/lib/errors';
import { PhraseMatcher, loadLexicons, readPolarityLexicon, readTermList } from '@/lib/lexicons';
import { LexiconSentimentScorer, boundedScore, type SentimentScorer } from '@/lib/sentiment-scorer';
import { tokenize } from '@/lib/text-statistics';

describe('PhraseMatcher', () => {
  const matcher = new PhraseMatcher('hedging', ['may', 'under certain conditions', 'certain', 'May']);

  it('deduplicates terms case-insensitively', () => {
    expect(matcher.size).toBe(3);
  });

  it('prefers the longest phrase and does not double count', () => {
    const tokens = tokenize('Under certain conditions we may act with certain intent');
    expect(matcher.countMatches(tokens)).toBe(3);
  });

  it('counts nothing in unrelated text', () => {
    expect(matcher.countMatches(tokenize('Revenue increased'))).toBe(0);
  });
});

describe('lexicon files', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexicons-'));
    fs.writeFileSync(path.join(dir, 'hedges.txt'), '# hedging terms\nmay\n\n  could  \n');
    fs.writeFileSync(path.join(dir, 'terms.json'), JSON.stringify(['likely', 'possibly']));
    fs.writeFileSync(path.join(dir, 'bad.json'), JSON.stringify({ words: ['x'] }));
    fs.writeFileSync(path.join(dir, 'polarity.json'), JSON.stringify({ positive: ['Gain'], negative: ['loss'] }));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads newline lists skipping comments and blanks', () => {
    expect(readTermList(path.join(dir, 'hedges.txt'))).toEqual(['may', 'could']);
  });

  it('reads JSON arrays', () => {
    expect(readTermList(path.join(dir, 'terms.json'))).toEqual(['likely', 'possibly']);
  });

  it('rejects JSON without terms', () => {
    expect(() => readTermList(path.join(dir, 'bad.json'))).toThrow(ConfigError);
  });

  it('rejects a missing file', () => {
    expect(() => readTermList(path.join(dir, 'missing.txt'))).toThrow(ConfigError);
  });

  it('lowercases polarity words', () => {
    const lexicon = readPolarityLexicon(path.join(dir, 'polarity.json'));
    expect([...lexicon.positive]).toEqual(['gain']);
    expect([...lexicon.negative]).toEqual(['loss']);
  });

  it('loads the bundled lexicons when no paths are configured', () => {
    const lexicons = loadLexicons({ hedgingLexiconPath: null, vaguenessLexiconPath: null, sentimentLexiconPath: null });
    expect(lexicons.hedging.size).toBeGreaterThan(0);
    expect(lexicons.vagueness.size).toBeGreaterThan(0);
    expect(Object.isFrozen(lexicons)).toBe(true);
  });

  it('uses a configured hedging list', () => {
    const lexicons = loadLexicons({
      hedgingLexiconPath: path.join(dir, 'hedges.txt'),
      vaguenessLexiconPath: null,
      sentimentLexiconPath: null,
    });
    expect(lexicons.hedging.size).toBe(2);
  });
});

describe('LexiconSentimentScorer', () => {
  const scorer = new LexiconSentimentScorer({ positive: new Set(['gain', 'growth']), negative: new Set(['loss']) });

  it('scores (positive - negative) / (hits + 1)', () => {
    expect(scorer.score(['gain', 'growth', 'loss'])).toBe(0.25);
    expect(scorer.score(['loss'])).toBe(-0.5);
    expect(scorer.score(['neutral'])).toBe(0);
  });

  it('clamps other scorers into their declared range', () => {
    const loud: SentimentScorer = { name: 'loud', range: [-1, 1], score: () => 7 };
    const broken: SentimentScorer = { name: 'broken', range: [-1, 1], score: () => NaN };
    expect(boundedScore(loud, ['x'])).toBe(1);
    expect(boundedScore(broken, ['x'])).toBe(0);
  });
});
