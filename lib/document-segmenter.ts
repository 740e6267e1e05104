/**
 * Annual Filing Segmenter
 *
 * Splits a filing into passages that can be scored independently:
 * 1. Structural cues first: line-leading "Item 1A", "Item 7", "PART II" headings that
 *    end their line or carry a title, skipping table-of-contents entries with no body
 * 2. Sections longer than maxPassageTokens tokens (as tokenize() counts them, so the
 *    encoder never truncates a passage) are cut into consecutive windows (no overlap)
 * 3. Documents without any heading are windowed as a whole
 *
 * Passages tile the document text exactly: passage[i].end === passage[i + 1].start,
 * the first starts at 0 and the last ends at text.length.
 */

import { SegmentationError } from './errors';
import { tokenOffsets } from './text-statistics';
import { documentText, type FilingDocument, type Passage, type PassageType } from './types';

export interface SegmenterOptions {
  maxPassageTokens: number;
  maxDocumentChars: number;
}

interface Span {
  start: number;
  end: number;
  type: PassageType;
}

// "Item 7 of this report" is a cross-reference, "Item 7." or a bare "Item 7" line is a heading
const HEADING_PATTERN = /^[ \t]*(?:part\s+(?:iv|i{1,3})\b|item\s+(\d{1,2}[a-c]?)(?![\da-z]))(?=[ \t]*(?:[.:\-–—]|$))/gim;

const ITEM_TYPES: Record<string, PassageType> = {
  '1': 'business',
  '1A': 'risk_factors',
  '3': 'legal_proceedings',
  '7': 'mda',
  '7A': 'market_risk',
  '8': 'financial_statements',
};

export function passageTypeForItem(item: string | undefined): PassageType {
  if (!item) return 'other';
  return ITEM_TYPES[item.toUpperCase()] ?? 'other';
}

/**
 * A heading opens a section only when some prose follows its own line before the
 * next heading. Index entries and page numbers ("Item 1A. Risk Factors 12") do not.
 */
function hasBody(text: string, start: number, end: number): boolean {
  const lineEnd = text.indexOf('\n', start);
  const bodyStart = lineEnd === -1 || lineEnd > end ? end : lineEnd;
  return /[a-z]/i.test(text.slice(bodyStart, end));
}

/**
 * Section spans opened by each structural heading. Text before the first
 * heading becomes an 'other' preamble. Returns null when no heading exists.
 */
function findSections(text: string): Span[] | null {
  const candidates: Array<{ start: number; type: PassageType }> = [];
  for (const match of text.matchAll(HEADING_PATTERN)) {
    if (match.index === undefined) continue;
    candidates.push({ start: match.index, type: passageTypeForItem(match[1]) });
  }
  const headings = candidates.filter((heading, i) => {
    const next = i + 1 < candidates.length ? candidates[i + 1].start : text.length;
    return hasBody(text, heading.start, next);
  });
  if (headings.length === 0) return null;

  const spans: Span[] = [];
  if (headings[0].start > 0) {
    spans.push({ start: 0, end: headings[0].start, type: 'other' });
  }
  headings.forEach((heading, i) => {
    const end = i + 1 < headings.length ? headings[i + 1].start : text.length;
    if (end > heading.start) spans.push({ start: heading.start, end, type: heading.type });
  });
  return spans;
}

/**
 * Cut a span at every maxTokens-th token so each window holds at most maxTokens tokens.
 */
function windowSpan(text: string, span: Span, maxTokens: number): Span[] {
  const offsets = tokenOffsets(text.slice(span.start, span.end));
  const cuts: number[] = [];
  for (let tokenIndex = maxTokens; tokenIndex < offsets.length; tokenIndex += maxTokens) {
    cuts.push(span.start + offsets[tokenIndex]);
  }

  if (cuts.length === 0) return [span];

  const windows: Span[] = [];
  let start = span.start;
  for (const cut of cuts) {
    windows.push({ start, end: cut, type: span.type });
    start = cut;
  }
  windows.push({ start, end: span.end, type: span.type });
  return windows;
}

/**
 * Fold whitespace-only spans into their neighbour so every passage has content
 * while the tiling stays gap-free.
 */
function absorbBlankSpans(text: string, spans: Span[]): Span[] {
  const merged: Span[] = [];
  let pendingStart: number | null = null;

  for (const span of spans) {
    const hasContent = /\S/.test(text.slice(span.start, span.end));
    if (!hasContent) {
      const last = merged[merged.length - 1];
      if (last) last.end = span.end;
      else pendingStart = pendingStart ?? span.start;
      continue;
    }
    merged.push({ ...span, start: pendingStart ?? span.start });
    pendingStart = null;
  }

  return merged;
}

export function segmentDocument(document: FilingDocument, options: SegmenterOptions): Passage[] {
  const text = documentText(document);

  if (text.trim().length === 0) {
    throw new SegmentationError(document.id, 'document is empty');
  }
  if (text.length > options.maxDocumentChars) {
    throw new SegmentationError(
      document.id,
      `document has ${text.length} characters, limit is ${options.maxDocumentChars}`,
    );
  }

  const sections = findSections(text) ?? [{ start: 0, end: text.length, type: 'other' as const }];
  const windows = sections.flatMap((section) => windowSpan(text, section, options.maxPassageTokens));
  const spans = absorbBlankSpans(text, windows);

  return spans.map((span, passageIndex) => ({
    key: { documentId: document.id, passageIndex },
    entityId: document.entityId,
    filingDate: document.filingDate,
    type: span.type,
    start: span.start,
    end: span.end,
    text: text.slice(span.start, span.end),
  }));
}

/**
 * Reassemble the covered text of a document from its passages
 */
export function reassemble(passages: readonly Passage[]): string {
  return [...passages]
    .sort((a, b) => a.start - b.start)
    .map((p) => p.text)
    .join('');
}
