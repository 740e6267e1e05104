/**
 * Document-level train/evaluation split
 *
 * All passages of a filing land in the same partition. Documents are
 * stratified by whether any of their passages is labeled evasive, then each
 * stratum is shuffled with the run seed and round(n * evalRatio) of its
 * documents go to evaluation.
 */

import { DataLeakageError } from './errors';
import { mulberry32, shuffle } from './random';
import { isEvasive } from './types';

export interface SplitItem {
  documentId: string;
  label: number | null;
}

export interface SplitOptions {
  evalRatio: number;
  seed: number;
}

export interface DocumentSplit {
  trainDocumentIds: string[];
  evalDocumentIds: string[];
}

function documentStrata(items: readonly SplitItem[]): { positive: string[]; negative: string[] } {
  const evasiveByDocument = new Map<string, boolean>();
  for (const item of items) {
    const evasive = item.label !== null && isEvasive(item.label);
    evasiveByDocument.set(item.documentId, (evasiveByDocument.get(item.documentId) ?? false) || evasive);
  }

  const positive: string[] = [];
  const negative: string[] = [];
  for (const [documentId, evasive] of evasiveByDocument) {
    (evasive ? positive : negative).push(documentId);
  }
  // Input order must not affect the split
  return { positive: positive.sort(), negative: negative.sort() };
}

export function splitByDocument(items: readonly SplitItem[], options: SplitOptions): DocumentSplit {
  const rng = mulberry32(options.seed);
  const strata = documentStrata(items);
  const train: string[] = [];
  const evaluation: string[] = [];

  for (const stratum of [strata.positive, strata.negative]) {
    const shuffled = shuffle(stratum, rng);
    const evalCount = Math.round(shuffled.length * options.evalRatio);
    evaluation.push(...shuffled.slice(0, evalCount));
    train.push(...shuffled.slice(evalCount));
  }

  // With two or more documents, neither partition may be empty
  if (train.length + evaluation.length >= 2) {
    if (evaluation.length === 0) {
      const moved = train.pop();
      if (moved !== undefined) evaluation.push(moved);
    } else if (train.length === 0) {
      const moved = evaluation.pop();
      if (moved !== undefined) train.push(moved);
    }
  }

  return { trainDocumentIds: train.sort(), evalDocumentIds: evaluation.sort() };
}

export function assertNoLeakage(split: DocumentSplit): void {
  const train = new Set(split.trainDocumentIds);
  const leaked = split.evalDocumentIds.filter((id) => train.has(id));
  if (leaked.length > 0) throw new DataLeakageError(leaked);
}
