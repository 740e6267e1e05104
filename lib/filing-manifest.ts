/**
 * Filing manifest
 *
 * CSV listing the filings of a batch: `path,filingDate` plus optional
 * `documentId`, `entityId` and `formType`. Missing ids are taken from an
 * "AAPL_10K_2023.txt" style filename.
 */

import * as fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { parseFilingFilename, preprocessFiling } from './filing-preprocessor';
import { normalizeDate } from './market-data';
import type { FilingDocument } from './types';

export interface ManifestEntry {
  documentId: string;
  entityId: string;
  filingDate: string;
  formType?: string;
  path: string;
}

const manifestRowSchema = z.object({
  path: z.string().min(1),
  filingDate: z.string().min(1),
  documentId: z.string().optional(),
  entityId: z.string().optional(),
  formType: z.string().optional(),
});

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

export function parseManifestCsv(content: string, source = 'manifest.csv'): ManifestEntry[] {
  let rows: unknown;
  try {
    rows = parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (error) {
    throw new ConfigError(`cannot parse manifest ${source}: ${describeError(error)}`);
  }
  if (!Array.isArray(rows)) throw new ConfigError(`manifest ${source} has no rows`);

  const entries: ManifestEntry[] = [];
  const seen = new Set<string>();
  rows.forEach((row: unknown, i) => {
    const line = i + 2;
    const parsed = manifestRowSchema.safeParse(row);
    if (!parsed.success) {
      console.warn(`[Manifest] ${source}:${line} skipped: ${parsed.error.issues[0]?.message ?? 'invalid row'}`);
      return;
    }
    const filingDate = normalizeDate(parsed.data.filingDate);
    if (!filingDate) {
      console.warn(`[Manifest] ${source}:${line} skipped: bad filing date "${parsed.data.filingDate}"`);
      return;
    }

    const fromName = parseFilingFilename(parsed.data.path);
    const entityId = present(parsed.data.entityId)?.toUpperCase() ?? fromName?.entityId;
    if (!entityId) {
      console.warn(`[Manifest] ${source}:${line} skipped: no entityId and filename does not name one`);
      return;
    }
    const documentId = present(parsed.data.documentId) ?? path.basename(parsed.data.path).replace(/\.[^.]+$/, '');
    if (seen.has(documentId)) {
      throw new ConfigError(`manifest ${source} lists document ${documentId} twice`);
    }
    seen.add(documentId);

    entries.push({
      documentId,
      entityId,
      filingDate,
      formType: present(parsed.data.formType) ?? fromName?.formType,
      path: parsed.data.path,
    });
  });
  return entries;
}

/**
 * Read and preprocess every filing of a manifest. Paths are relative to `baseDir`.
 * A file that cannot be read is logged and left out.
 */
export async function loadManifestFilings(entries: readonly ManifestEntry[], baseDir: string): Promise<FilingDocument[]> {
  const documents: FilingDocument[] = [];
  for (const entry of entries) {
    const filePath = path.resolve(baseDir, entry.path);
    try {
      const raw = await fs.promises.readFile(filePath, 'utf-8');
      documents.push(
        preprocessFiling(raw, {
          id: entry.documentId,
          entityId: entry.entityId,
          filingDate: entry.filingDate,
          formType: entry.formType,
        }),
      );
    } catch (error) {
      console.warn(`[Manifest] Cannot read ${filePath}: ${describeError(error)}`);
    }
  }
  return documents;
}
