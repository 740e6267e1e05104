/**
 * Post-filing market reaction
 *
 * Joins a filing to the entity's daily returns after its filing date and
 * classifies the compounded window return as adverse or not. With a benchmark
 * configured, the benchmark's return over the same trading days is subtracted
 * (abnormal return).
 */

import { MissingMarketDataError } from './errors';
import type { FilingDocument, MarketRecord } from './types';

export interface MarketWindowOptions {
  marketWindowDays: number;
  maxWindowStartLagDays: number;
  adverseReturnThreshold: number;
  benchmarkEntityId: string | null;
}

export interface MarketReaction {
  documentId: string;
  windowDates: string[];
  rawReturn: number;
  benchmarkReturn: number | null;
  windowReturn: number;
  adverse: boolean;
}

export type MarketIndex = ReadonlyMap<string, readonly MarketRecord[]>;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Group records by entity, sorted by date, keeping the first record seen for a duplicated day
 */
export function indexMarketRecords(records: readonly MarketRecord[]): MarketIndex {
  const byEntity = new Map<string, MarketRecord[]>();
  for (const record of records) {
    const key = record.entityId.toUpperCase();
    const list = byEntity.get(key) ?? [];
    list.push(record);
    byEntity.set(key, list);
  }
  for (const [key, list] of byEntity) {
    const seen = new Set<string>();
    const unique = list
      .filter((r) => Number.isFinite(r.return))
      .sort((a, b) => a.date.localeCompare(b.date))
      .filter((r) => {
        if (seen.has(r.date)) return false;
        seen.add(r.date);
        return true;
      });
    byEntity.set(key, unique);
  }
  return byEntity;
}

export function calendarDaysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS);
}

export function compound(returns: readonly number[]): number {
  return returns.reduce((acc, r) => acc * (1 + r), 1) - 1;
}

type WindowDocument = Pick<FilingDocument, 'id' | 'entityId' | 'filingDate'>;

export function computeMarketReaction(
  document: WindowDocument,
  index: MarketIndex,
  options: MarketWindowOptions,
): MarketReaction {
  const fail = (reason: string) =>
    new MissingMarketDataError(document.id, document.entityId, document.filingDate, reason);

  const series = index.get(document.entityId.toUpperCase());
  if (!series || series.length === 0) throw fail('no returns for entity');

  const window = series.filter((r) => r.date >= document.filingDate).slice(0, options.marketWindowDays);
  if (window.length < options.marketWindowDays) {
    throw fail(`only ${window.length} of ${options.marketWindowDays} trading days after filing`);
  }

  const lag = calendarDaysBetween(document.filingDate, window[0].date);
  if (lag > options.maxWindowStartLagDays) {
    throw fail(`first trading day ${window[0].date} is ${lag} days after filing`);
  }

  const windowDates = window.map((r) => r.date);
  const rawReturn = compound(window.map((r) => r.return));

  let benchmarkReturn: number | null = null;
  if (options.benchmarkEntityId) {
    const benchmark = index.get(options.benchmarkEntityId.toUpperCase()) ?? [];
    const byDate = new Map(benchmark.map((r) => [r.date, r.return]));
    const matched: number[] = [];
    for (const date of windowDates) {
      const value = byDate.get(date);
      if (value === undefined) throw fail(`benchmark ${options.benchmarkEntityId} has no return on ${date}`);
      matched.push(value);
    }
    benchmarkReturn = compound(matched);
  }

  const windowReturn = benchmarkReturn === null ? rawReturn : rawReturn - benchmarkReturn;
  if (!Number.isFinite(windowReturn)) throw fail('window return is not finite');

  return {
    documentId: document.id,
    windowDates,
    rawReturn,
    benchmarkReturn,
    windowReturn,
    adverse: windowReturn < options.adverseReturnThreshold,
  };
}
