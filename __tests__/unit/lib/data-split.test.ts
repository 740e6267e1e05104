import { describe, it, expect } from 'vitest';
import { assertNoLeakage, splitByDocument, type SplitItem } from '@/lib/data-split';
import { DataLeakageError } from '@/lib/errors';

function corpus(positive: number, negative: number): SplitItem[] {
  const items: SplitItem[] = [];
  for (let i = 0; i < positive; i++) {
    items.push({ documentId: `pos-${i}`, label: 0 }, { documentId: `pos-${i}`, label: 1 });
  }
  for (let i = 0; i < negative; i++) {
    items.push({ documentId: `neg-${i}`, label: 0 }, { documentId: `neg-${i}`, label: null });
  }
  return items;
}

describe('splitByDocument', () => {
  it('puts every document in exactly one partition', () => {
    const split = splitByDocument(corpus(10, 10), { evalRatio: 0.3, seed: 7 });
    const all = [...split.trainDocumentIds, ...split.evalDocumentIds];

    expect(all).toHaveLength(20);
    expect(new Set(all).size).toBe(20);
    expect(() => assertNoLeakage(split)).not.toThrow();
  });

  it('stratifies by whether a document has an evasive passage', () => {
    const split = splitByDocument(corpus(10, 10), { evalRatio: 0.3, seed: 7 });

    expect(split.evalDocumentIds).toHaveLength(6);
    expect(split.evalDocumentIds.filter((id) => id.startsWith('pos-'))).toHaveLength(3);
    expect(split.evalDocumentIds.filter((id) => id.startsWith('neg-'))).toHaveLength(3);
  });

  it('returns sorted id lists', () => {
    const split = splitByDocument(corpus(10, 10), { evalRatio: 0.3, seed: 7 });

    expect(split.trainDocumentIds).toEqual([...split.trainDocumentIds].sort());
    expect(split.evalDocumentIds).toEqual([...split.evalDocumentIds].sort());
  });

  it('does not depend on input order', () => {
    const items = corpus(8, 6);
    const forward = splitByDocument(items, { evalRatio: 0.3, seed: 11 });
    const reversed = splitByDocument([...items].reverse(), { evalRatio: 0.3, seed: 11 });

    expect(reversed).toEqual(forward);
  });

  it('is reproducible from the seed', () => {
    const items = corpus(10, 10);

    expect(splitByDocument(items, { evalRatio: 0.3, seed: 3 })).toEqual(
      splitByDocument(items, { evalRatio: 0.3, seed: 3 }),
    );
  });

  it('keeps both partitions non-empty for two documents', () => {
    const split = splitByDocument(corpus(1, 1), { evalRatio: 0.3, seed: 1 });

    expect(split.trainDocumentIds).toHaveLength(1);
    expect(split.evalDocumentIds).toHaveLength(1);
  });

  it('sends a single document to training', () => {
    const split = splitByDocument(corpus(0, 1), { evalRatio: 0.3, seed: 1 });

    expect(split).toEqual({ trainDocumentIds: ['neg-0'], evalDocumentIds: [] });
  });

  it('handles an empty input', () => {
    expect(splitByDocument([], { evalRatio: 0.3, seed: 1 })).toEqual({ trainDocumentIds: [], evalDocumentIds: [] });
  });
});

describe('assertNoLeakage', () => {
  it('throws when a document sits in both partitions', () => {
    const split = { trainDocumentIds: ['a', 'b'], evalDocumentIds: ['b', 'c'] };

    expect(() => assertNoLeakage(split)).toThrow(DataLeakageError);
  });
});
