/**
 * @module lib/filing-preprocessor
 * @description Turns a raw EDGAR full-submission file into a FilingDocument of clean text blocks
 *
 * PURPOSE:
 * - Pull the primary document out of the first <TEXT>...</TEXT> section of a submission
 * - Strip HTML while preserving paragraph structure so Item headings stay line-leading
 * - Repair tokens glued together by tag removal ("operationsRevenue", "Item 1.Business")
 * - Drop XBRL noise: URLs, prefix:tag names, CIK-like ids, ISO dates, fiscal duration codes, footnote marks
 *
 * EXPORTS:
 * - extractPrimaryText, cleanHtml, repairGluedTokens, removeXbrlNoise, splitBlocks (functions) - individual stages
 * - preprocessFiling (function) - full raw -> FilingDocument transformation
 * - parseFilingFilename (function) - reads "TICKER_10K_2023.txt" style names
 *
 * NOTES:
 * - Case is preserved; the segmenter and tokenizer are case-insensitive
 * - Decimal figures such as "12.4%" or "$340.2" are kept since numeric density is a feature
 */

import type { FilingDocument } from './types';

export interface FilingMetadata {
  id: string;
  entityId: string;
  filingDate: string;
  formType?: string;
}

const TEXT_SECTION = /<TEXT>([\s\S]*?)<\/TEXT>/i;

/**
 * Primary document of a full submission. Plain HTML or text without
 * submission wrappers is returned unchanged.
 */
export function extractPrimaryText(raw: string): string {
  const match = raw.match(TEXT_SECTION);
  if (match) return match[1].trim();
  if (/<SEC-DOCUMENT>|<DOCUMENT>/i.test(raw)) return '';
  return raw.trim();
}

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  rsquo: '’',
  lsquo: '‘',
  rdquo: '"',
  ldquo: '"',
  mdash: ' - ',
  ndash: '-',
  bull: ' ',
};

function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => codePointOrSpace(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => codePointOrSpace(parseInt(dec, 10)))
    .replace(/&([a-z]+);/gi, (entity: string, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? entity);
}

function codePointOrSpace(code: number): string {
  if (!Number.isFinite(code) || code < 32 || code > 0x10ffff) return ' ';
  if (code === 160) return ' ';
  return String.fromCodePoint(code);
}

/**
 * Clean HTML while preserving document structure
 */
export function cleanHtml(html: string): string {
  let text = html;

  // Remove script, style and hidden inline-XBRL header blocks with their content
  text = text.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '');
  text = text.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '');
  text = text.replace(/<ix:header\b[\s\S]*?<\/ix:header>/gi, '');

  // Block-level elements become line breaks
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(?:p|h[1-6]|li|table)>/gi, '\n\n');
  text = text.replace(/<\/(?:div|tr)>/gi, '\n');
  text = text.replace(/<\/t[dh]>/gi, ' ');

  // Remove all remaining HTML tags
  text = text.replace(/<[^>]+>/g, '');
  text = decodeEntities(text);

  // Clean up whitespace
  text = text.replace(/\r\n?/g, '\n');
  text = text.replace(/[\t\f\v ]/g, ' ');
  text = text.replace(/ {2,}/g, ' ');
  text = text.replace(/ *\n */g, '\n');
  text = text.replace(/\n{3,}/g, '\n\n');

  return text.trim();
}

export function repairGluedTokens(text: string): string {
  return text
    .replace(/([a-z]{2,})([A-Z][a-z])/g, '$1 $2')
    .replace(/(\d)([A-Z][a-z]{2,})/g, '$1 $2')
    .replace(/\b(item\s*\d{1,2}[a-c]?)\.(?=[a-z])/gi, '$1. ');
}

export function removeXbrlNoise(text: string): string {
  return text
    .replace(/([a-z])(?=https?:\/\/)/gi, '$1 ')
    .replace(/https?:\/\/\S+/gi, ' ')
    .replace(/\b[a-z]{2,10}(?:-[a-z]{2,10})?:[A-Za-z0-9_\-.]+\b/gi, ' ')
    .replace(/\b\d{8,12}\b/g, ' ')
    .replace(/\b\d{4}-\d{2}-\d{2}\b/g, ' ')
    .replace(/\bfy\d{2,4}\b|\bp\d+[ymdw]\b|\bp\d+y\d+m?\d*d?\b/gi, ' ')
    .replace(/[†‡*©®]+/g, ' ')
    .replace(/ {2,}/g, ' ');
}

/**
 * Paragraphs separated by blank lines, internal whitespace collapsed.
 */
export function splitBlocks(text: string): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map((block) =>
      block
        .split('\n')
        .map((line) => line.replace(/\s+/g, ' ').trim())
        .filter((line) => line.length > 0)
        .join('\n'),
    )
    .filter((block) => block.length > 0);
}

export function preprocessFiling(raw: string, metadata: FilingMetadata): FilingDocument {
  const primary = extractPrimaryText(raw);
  // XBRL names ("dei:DocumentType") must be gone before camel case is split
  const cleaned = repairGluedTokens(removeXbrlNoise(cleanHtml(primary)));
  const blocks = splitBlocks(cleaned);

  if (blocks.length === 0) {
    console.warn(`[Preprocessor] ${metadata.id}: no text content extracted`);
  }

  return {
    id: metadata.id,
    entityId: metadata.entityId,
    filingDate: metadata.filingDate,
    formType: metadata.formType,
    blocks,
  };
}

export interface FilingFilenameParts {
  entityId: string;
  formType: string;
  year: number;
}

/**
 * Parse "AAPL_10K_2023.txt" into entity, form type and fiscal year.
 */
export function parseFilingFilename(filename: string): FilingFilenameParts | null {
  const base = filename.replace(/^.*[\\/]/, '').replace(/\.[^.]+$/, '');
  const match = base.match(/^([A-Za-z0-9.\-]+)_(10-?K|10-?Q|8-?K)_(\d{4})$/i);
  if (!match) return null;
  const form = match[2].toUpperCase().replace(/^(\d+)-?([A-Z])$/, '$1-$2');
  return { entityId: match[1].toUpperCase(), formType: form, year: parseInt(match[3], 10) };
}
