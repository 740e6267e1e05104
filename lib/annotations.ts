/**
 * Human evasiveness annotations
 *
 * CSV with header `documentId,passageIndex,label`. Labels are non-negative
 * integers: 0/1 for binary annotation, 0..k for ordinal scales.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import type { HumanAnnotation } from './types';

const nonNegativeInteger = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((value) => Number(value));

const annotationRowSchema = z.object({
  documentId: z.string().min(1),
  passageIndex: nonNegativeInteger,
  label: nonNegativeInteger,
});

export function parseAnnotationsCsv(content: string, source = 'annotations.csv'): HumanAnnotation[] {
  let rows: unknown;
  try {
    rows = parse(content, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (error) {
    throw new ConfigError(`cannot parse annotations ${source}: ${describeError(error)}`);
  }
  if (!Array.isArray(rows)) throw new ConfigError(`annotations ${source} did not parse to rows`);

  const annotations: HumanAnnotation[] = [];
  rows.forEach((row: unknown, i: number) => {
    const parsed = annotationRowSchema.safeParse(row);
    if (!parsed.success) {
      console.warn(`[Annotations] ${source} row ${i + 2} ignored: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    const { documentId, passageIndex, label } = parsed.data;
    annotations.push({ key: { documentId, passageIndex }, label });
  });
  return annotations;
}

export function loadAnnotations(filePath: string): HumanAnnotation[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read annotations ${filePath}: ${describeError(error)}`);
  }
  const annotations = parseAnnotationsCsv(content, filePath);
  console.log(`[Annotations] Loaded ${annotations.length} human labels from ${filePath}`);
  return annotations;
}
