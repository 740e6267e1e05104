/**
 * Text statistics for disclosure passages
 *
 * Tokenization, sentence boundaries, syllable estimates and the standard
 * readability formulas. Everything here is derived from the passage text alone.
 */

export type ReadabilityFormula = 'gunning-fog' | 'flesch-reading-ease' | 'flesch-kincaid-grade';

// Numbers keep their currency sign, thousands separators, decimals and percent sign
// so "$340.2" and "12.4%" are single numeric tokens.
const TOKEN_PATTERN = /\$?\d[\d,]*(?:\.\d+)?%?|[a-z]+(?:['’\-][a-z]+)*/gi;

const NUMERIC_TOKEN = /^\$?\d/;

const ABBREVIATIONS = new Set([
  'inc', 'corp', 'co', 'ltd', 'llc', 'no', 'nos', 'vs', 'u.s', 'e.g', 'i.e', 'mr', 'mrs', 'ms', 'dr', 'jan', 'feb',
  'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec', 'approx', 'st', 'etc',
]);

/**
 * Start offsets of the tokens tokenize() would return for the same text
 */
export function tokenOffsets(text: string): number[] {
  const offsets: number[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    if (match.index !== undefined) offsets.push(match.index);
  }
  return offsets;
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    tokens.push(match[0].toLowerCase());
  }
  return tokens;
}

export function isNumericToken(token: string): boolean {
  return NUMERIC_TOKEN.test(token);
}

function precedingWord(text: string, dotIndex: number): string {
  let start = dotIndex;
  while (start > 0 && /[A-Za-z.]/.test(text[start - 1])) start--;
  return text.slice(start, dotIndex).toLowerCase();
}

/**
 * Split text into sentences on terminal punctuation followed by whitespace or end of text.
 * Decimal points and common abbreviations ("Inc.", "U.S.") do not end a sentence.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== '.' && ch !== '!' && ch !== '?') continue;

    let end = i + 1;
    while (end < text.length && (text[end] === '.' || text[end] === '!' || text[end] === '?')) end++;
    const atBoundary = end >= text.length || /\s/.test(text[end]);
    if (!atBoundary) continue;
    if (ch === '.' && ABBREVIATIONS.has(precedingWord(text, i))) continue;

    const sentence = text.slice(start, end).trim();
    if (sentence.length > 0) sentences.push(sentence);
    start = end;
    i = end - 1;
  }

  const tail = text.slice(start).trim();
  if (tail.length > 0) sentences.push(tail);

  return sentences.filter((s) => tokenize(s).length > 0);
}

export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, '');
  if (w.length === 0) return 1;
  if (w.length <= 3) return 1;

  const trimmed = w.replace(/(?:[^laeiouy]es|[^laeiouy]ed|[^laeiouy]e)$/, '').replace(/^y/, '');
  const groups = trimmed.match(/[aeiouy]{1,2}/g);
  return Math.max(1, groups ? groups.length : 1);
}

export interface TextProfile {
  tokens: string[];
  sentences: string[];
  wordCount: number;
  sentenceCount: number;
  syllableCount: number;
  complexWordCount: number;
}

export function profileText(text: string): TextProfile {
  const tokens = tokenize(text);
  const sentences = splitSentences(text);
  let syllableCount = 0;
  let complexWordCount = 0;

  for (const token of tokens) {
    const syllables = isNumericToken(token) ? 1 : countSyllables(token);
    syllableCount += syllables;
    if (syllables >= 3) complexWordCount++;
  }

  return {
    tokens,
    sentences,
    wordCount: tokens.length,
    sentenceCount: Math.max(sentences.length, tokens.length > 0 ? 1 : 0),
    syllableCount,
    complexWordCount,
  };
}

// Score for text with no words: no reading difficulty on each formula's own scale
export const NEUTRAL_READABILITY: Readonly<Record<ReadabilityFormula, number>> = Object.freeze({
  'gunning-fog': 0,
  'flesch-reading-ease': 100,
  'flesch-kincaid-grade': 0,
});

export function readability(profile: TextProfile, formula: ReadabilityFormula): number {
  if (profile.wordCount === 0 || profile.sentenceCount === 0) return NEUTRAL_READABILITY[formula];

  const wordsPerSentence = profile.wordCount / profile.sentenceCount;
  const syllablesPerWord = profile.syllableCount / profile.wordCount;

  switch (formula) {
    case 'gunning-fog':
      return 0.4 * (wordsPerSentence + 100 * (profile.complexWordCount / profile.wordCount));
    case 'flesch-reading-ease':
      return 206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord;
    case 'flesch-kincaid-grade':
      return 0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59;
  }
}
