/**
 * @module lib/feature-extractor
 * @description Computes the fixed-schema linguistic and ambiguity feature vector for a passage
 *
 * PURPOSE:
 * - Measure hedging, vagueness, modal and passive rates, numeric density, sentiment, readability, sentence length and lexical diversity
 * - Normalize every count by token or sentence count so passages of different lengths are comparable
 * - Fall back to neutral values for empty passages and any non-finite sub-computation
 *
 * EXPORTS:
 * - NEUTRAL_FEATURES (const) - schema defaults used whenever a value cannot be computed (Gunning Fog readability)
 * - neutralFeatures (function) - the same defaults with the neutral readability of a given formula
 * - createFeatureResources (function) - bundles frozen lexicons, scorer and formula for a run
 * - extractFeatures (function) - pure Passage -> FeatureVector
 * - featureArray (function) - FeatureVector values in FEATURE_NAMES order for model input
 *
 * NOTES:
 * - Deterministic: no clock, no randomness, no I/O; identical text gives bit-identical vectors
 * - Throws FeatureExtractionError only for non-text input (non-string or binary control characters)
 */

import { FeatureExtractionError } from './errors';
import type { Lexicons } from './lexicons';
import { LexiconSentimentScorer, boundedScore, type SentimentScorer } from './sentiment-scorer';
import { NEUTRAL_READABILITY, isNumericToken, profileText, readability, tokenize, type ReadabilityFormula } from './text-statistics';
import { FEATURE_NAMES, passageKeyId, type FeatureValues, type FeatureVector, type Passage } from './types';

export const NEUTRAL_FEATURES: Readonly<FeatureValues> = Object.freeze({
  hedgeDensity: 0,
  vaguenessDensity: 0,
  modalRate: 0,
  passiveRate: 0,
  numericDensity: 0,
  sentiment: 0,
  readability: NEUTRAL_READABILITY['gunning-fog'],
  avgSentenceLength: 0,
  lexicalDiversity: 1,
});

export function neutralFeatures(formula: ReadabilityFormula): FeatureValues {
  return { ...NEUTRAL_FEATURES, readability: NEUTRAL_READABILITY[formula] };
}

const MODAL_VERBS = new Set(['can', 'could', 'may', 'might', 'must', 'shall', 'should', 'will', 'would', 'ought']);

const BE_VERBS = new Set(['am', 'is', 'are', 'was', 'were', 'be', 'been', 'being']);

const IRREGULAR_PARTICIPLES = new Set([
  'made', 'paid', 'held', 'sold', 'taken', 'given', 'known', 'seen', 'done', 'shown', 'built', 'borne',
  'brought', 'bought', 'kept', 'led', 'left', 'lost', 'met', 'set', 'spent', 'told', 'thought', 'won',
  'written', 'found', 'put', 'cut', 'sent', 'granted', 'drawn', 'become', 'begun', 'chosen', 'hidden', 'understood',
]);

// Common words that end like a regular participle but are not one
const PARTICIPLE_LOOKALIKES = new Set([
  'often', 'even', 'then', 'when', 'open', 'seven', 'eleven', 'thirteen', 'fourteen', 'fifteen', 'sixteen',
  'seventeen', 'eighteen', 'nineteen', 'between', 'token', 'keen', 'sudden', 'burden', 'dozen', 'oxygen',
  'hydrogen', 'indeed', 'need', 'exceed', 'proceed', 'succeed', 'speed', 'seed', 'feed', 'hundred', 'kindred',
]);

// Binary payloads and stray control bytes mean the passage is not text
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000E-\u001F\uFFFD]/;

export interface FeatureResources {
  lexicons: Lexicons;
  sentimentScorer: SentimentScorer;
  readabilityFormula: ReadabilityFormula;
}

export function createFeatureResources(
  lexicons: Lexicons,
  readabilityFormula: ReadabilityFormula,
  sentimentScorer: SentimentScorer = new LexiconSentimentScorer(lexicons.polarity),
): FeatureResources {
  return Object.freeze({ lexicons, sentimentScorer, readabilityFormula });
}

function isParticiple(token: string): boolean {
  if (IRREGULAR_PARTICIPLES.has(token)) return true;
  if (PARTICIPLE_LOOKALIKES.has(token)) return false;
  return token.length > 3 && (token.endsWith('ed') || token.endsWith('en'));
}

/**
 * A sentence is passive when a form of "be" is followed by a past participle,
 * allowing one adverb or "not" in between ("was not disclosed", "is currently expected").
 */
function isPassiveSentence(tokens: readonly string[]): boolean {
  for (let i = 0; i < tokens.length - 1; i++) {
    if (!BE_VERBS.has(tokens[i])) continue;
    const next = tokens[i + 1];
    if (isParticiple(next)) return true;
    if ((next === 'not' || next.endsWith('ly')) && i + 2 < tokens.length && isParticiple(tokens[i + 2])) {
      return true;
    }
  }
  return false;
}

function ratio(numerator: number, denominator: number, fallback: number): number {
  if (denominator <= 0) return fallback;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : fallback;
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

export function extractFeatures(passage: Passage, resources: FeatureResources): FeatureVector {
  const id = passageKeyId(passage.key);
  const text: unknown = passage.text;
  if (typeof text !== 'string') {
    throw new FeatureExtractionError(id, `passage text is ${text === null ? 'null' : typeof text}, expected string`);
  }
  if (CONTROL_CHARS.test(text)) {
    throw new FeatureExtractionError(id, 'passage contains binary or control characters');
  }

  const profile = profileText(text);
  const tokens = profile.tokens;
  const neutral = neutralFeatures(resources.readabilityFormula);
  if (tokens.length === 0) {
    return { key: passage.key, values: neutral };
  }

  const { lexicons } = resources;
  const modalCount = tokens.filter((t) => MODAL_VERBS.has(t)).length;
  const numericCount = tokens.filter(isNumericToken).length;
  const passiveCount = profile.sentences.filter((s) => isPassiveSentence(tokenize(s))).length;

  const values: FeatureValues = {
    hedgeDensity: ratio(lexicons.hedging.countMatches(tokens), tokens.length, neutral.hedgeDensity),
    vaguenessDensity: ratio(lexicons.vagueness.countMatches(tokens), tokens.length, neutral.vaguenessDensity),
    modalRate: ratio(modalCount, tokens.length, neutral.modalRate),
    passiveRate: ratio(passiveCount, profile.sentences.length, neutral.passiveRate),
    numericDensity: ratio(numericCount, tokens.length, neutral.numericDensity),
    sentiment: boundedScore(resources.sentimentScorer, tokens),
    readability: finiteOr(readability(profile, resources.readabilityFormula), neutral.readability),
    avgSentenceLength: ratio(tokens.length, profile.sentenceCount, neutral.avgSentenceLength),
    lexicalDiversity: ratio(new Set(tokens).size, tokens.length, neutral.lexicalDiversity),
  };

  return { key: passage.key, values };
}

export function featureArray(vector: FeatureVector): number[] {
  return FEATURE_NAMES.map((name) => vector.values[name]);
}
