/**
 * @module lib/lexicons
 * @description Loads the hedging, vagueness and polarity word lists once per run and matches multi-word phrases over token streams
 *
 * PURPOSE:
 * - Read lexicon files (JSON `{ terms: [...] }`, JSON array, or newline-separated text with # comments)
 * - Build a PhraseMatcher that counts non-overlapping, longest-first phrase hits over tokens
 * - Freeze loaded lexicons so workers share them read-only for the lifetime of a run
 *
 * PATTERNS:
 * - `const lexicons = loadLexicons(config)` once at pipeline start
 * - `lexicons.hedging.countMatches(tokens)` returns hits; divide by tokens.length for density
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError, describeError } from './errors';
import { tokenize } from './text-statistics';

const DEFAULT_LEXICON_DIR = fileURLToPath(new URL('../data/lexicons/', import.meta.url));

export const DEFAULT_LEXICON_PATHS = {
  hedging: path.join(DEFAULT_LEXICON_DIR, 'hedging.json'),
  vagueness: path.join(DEFAULT_LEXICON_DIR, 'vagueness.json'),
  sentiment: path.join(DEFAULT_LEXICON_DIR, 'sentiment.json'),
} as const;

export class PhraseMatcher {
  readonly name: string;
  readonly size: number;
  private readonly byFirstToken: ReadonlyMap<string, readonly string[][]>;

  constructor(name: string, terms: readonly string[]) {
    this.name = name;
    const index = new Map<string, string[][]>();
    const seen = new Set<string>();

    for (const term of terms) {
      const tokens = tokenize(term);
      if (tokens.length === 0) continue;
      const normalized = tokens.join(' ');
      if (seen.has(normalized)) continue;
      seen.add(normalized);

      const bucket = index.get(tokens[0]) ?? [];
      bucket.push(tokens);
      index.set(tokens[0], bucket);
    }

    // Longest phrase first so "under certain conditions" wins over "certain"
    for (const bucket of index.values()) {
      bucket.sort((a, b) => b.length - a.length || a.join(' ').localeCompare(b.join(' ')));
    }

    this.byFirstToken = index;
    this.size = seen.size;
  }

  countMatches(tokens: readonly string[]): number {
    let count = 0;
    let i = 0;
    while (i < tokens.length) {
      const length = this.matchAt(tokens, i);
      if (length > 0) {
        count++;
        i += length;
      } else {
        i++;
      }
    }
    return count;
  }

  private matchAt(tokens: readonly string[], position: number): number {
    const candidates = this.byFirstToken.get(tokens[position]);
    if (!candidates) return 0;
    for (const phrase of candidates) {
      if (position + phrase.length > tokens.length) continue;
      let matched = true;
      for (let k = 1; k < phrase.length; k++) {
        if (tokens[position + k] !== phrase[k]) {
          matched = false;
          break;
        }
      }
      if (matched) return phrase.length;
    }
    return 0;
  }
}

export interface PolarityLexicon {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
}

export interface Lexicons {
  hedging: PhraseMatcher;
  vagueness: PhraseMatcher;
  polarity: PolarityLexicon;
}

function readFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read lexicon ${filePath}: ${describeError(error)}`);
  }
}

function stringList(value: unknown, filePath: string, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`lexicon ${filePath} field "${field}" must be an array of strings`);
  }
  return value;
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`lexicon ${filePath} is not valid JSON: ${describeError(error)}`);
  }
}

/**
 * Read a term list. `.json` files hold an array or an object with `terms`;
 * anything else is one term per line.
 */
export function readTermList(filePath: string): string[] {
  const raw = readFile(filePath);
  if (!filePath.toLowerCase().endsWith('.json')) {
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  const parsed = parseJson(raw, filePath);
  if (Array.isArray(parsed)) return stringList(parsed, filePath, '(root)');
  if (typeof parsed === 'object' && parsed !== null && 'terms' in parsed) {
    return stringList(parsed.terms, filePath, 'terms');
  }
  throw new ConfigError(`lexicon ${filePath} must be an array or an object with "terms"`);
}

export function readPolarityLexicon(filePath: string): PolarityLexicon {
  const parsed = parseJson(readFile(filePath), filePath);
  if (typeof parsed !== 'object' || parsed === null || !('positive' in parsed) || !('negative' in parsed)) {
    throw new ConfigError(`polarity lexicon ${filePath} must have "positive" and "negative" arrays`);
  }
  const positive = stringList(parsed.positive, filePath, 'positive').map((w) => w.toLowerCase());
  const negative = stringList(parsed.negative, filePath, 'negative').map((w) => w.toLowerCase());
  return { positive: new Set(positive), negative: new Set(negative) };
}

export interface LexiconPaths {
  hedgingLexiconPath: string | null;
  vaguenessLexiconPath: string | null;
  sentimentLexiconPath: string | null;
}

export function loadLexicons(paths: LexiconPaths): Lexicons {
  const hedgingPath = paths.hedgingLexiconPath ?? DEFAULT_LEXICON_PATHS.hedging;
  const vaguenessPath = paths.vaguenessLexiconPath ?? DEFAULT_LEXICON_PATHS.vagueness;
  const sentimentPath = paths.sentimentLexiconPath ?? DEFAULT_LEXICON_PATHS.sentiment;

  const lexicons: Lexicons = {
    hedging: new PhraseMatcher('hedging', readTermList(hedgingPath)),
    vagueness: new PhraseMatcher('vagueness', readTermList(vaguenessPath)),
    polarity: readPolarityLexicon(sentimentPath),
  };

  console.log(
    `[Lexicons] Loaded hedging=${lexicons.hedging.size}, vagueness=${lexicons.vagueness.size}, polarity=${lexicons.polarity.positive.size}+/${lexicons.polarity.negative.size}-`,
  );
  return Object.freeze(lexicons);
}
