/**
 * @module lib/market-data
 * @description Daily return series per entity, loaded from local CSV files or Yahoo Finance
 *
 * PURPOSE:
 * - Define the MarketDataSource contract consumed by the label constructor
 * - Parse long-format return files (`entityId,date,return`) and semicolon price files (`Date;AAPL`, day-first dates)
 * - Convert close prices into simple daily returns
 * - Fetch daily closes from Yahoo Finance through the shared yahoo-finance2 client
 *
 * EXPORTS:
 * - MarketDataSource (interface) - `load(entityIds, from, to)` returning MarketRecord rows
 * - CsvMarketDataSource, YahooMarketDataSource (classes) - the two implementations
 * - parseReturnsCsv, parsePriceCsv, pricesToReturns, normalizeDate, formatReturnsCsv (functions) - parsing helpers
 *
 * NOTES:
 * - Malformed rows are skipped with a warning; a source never invents a return
 * - Records come back sorted by entity then date
 */

import * as fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import type { MarketRecord } from './types';
import yahooFinance from './yahoo-finance-singleton';

export interface MarketDataSource {
  readonly name: string;
  load(entityIds: readonly string[], from: string, to: string): Promise<MarketRecord[]>;
}

export interface PricePoint {
  date: string;
  close: number;
}

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

function parseRows(content: string, delimiter: string, source: string): Record<string, string>[] {
  let rows: unknown;
  try {
    rows = parse(content, {
      columns: true,
      delimiter,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new ConfigError(`cannot parse market CSV ${source}: ${describeError(error)}`);
  }
  const parsed = csvRowsSchema.safeParse(rows);
  if (!parsed.success) {
    throw new ConfigError(`market CSV ${source} has an unexpected shape`);
  }
  return parsed.data;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function isValidDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Normalize "2023-11-03", "03/11/2023", "03-11-2023" or "03.11.2023" (day first) to YYYY-MM-DD
 */
export function normalizeDate(raw: string): string | null {
  const value = raw.trim();

  const iso = value.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isValidDate(year, month, day) ? `${iso[1]}-${iso[2]}-${iso[3]}` : null;
  }

  const dayFirst = value.match(/^(\d{1,2})[/.\-](\d{1,2})[/.\-](\d{4})$/);
  if (dayFirst) {
    const [day, month, year] = [Number(dayFirst[1]), Number(dayFirst[2]), Number(dayFirst[3])];
    return isValidDate(year, month, day) ? `${year}-${pad(month)}-${pad(day)}` : null;
  }

  return null;
}

function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const cleaned = raw.trim().replace(/\s/g, '').replace(',', '.');
  if (cleaned === '') return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function sortRecords(records: MarketRecord[]): MarketRecord[] {
  return records.sort((a, b) => a.entityId.localeCompare(b.entityId) || a.date.localeCompare(b.date));
}

/**
 * Long-format returns: header `entityId,date,return`
 */
export function parseReturnsCsv(content: string, source = 'returns.csv'): MarketRecord[] {
  const rows = parseRows(content, ',', source);
  const records: MarketRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const entityId = row.entityId?.trim().toUpperCase();
    const date = row.date ? normalizeDate(row.date) : null;
    const ret = parseNumber(row.return);
    if (!entityId || !date || ret === null) {
      skipped++;
      continue;
    }
    records.push({ entityId, date, return: ret });
  }

  if (skipped > 0) console.warn(`[MarketData] ${source}: skipped ${skipped} malformed rows`);
  return sortRecords(records);
}

export function formatReturnsCsv(records: readonly MarketRecord[]): string {
  const lines = ['entityId,date,return', ...records.map((r) => `${r.entityId},${r.date},${r.return}`)];
  return `${lines.join('\n')}\n`;
}

export function pricesToReturns(entityId: string, prices: readonly PricePoint[]): MarketRecord[] {
  const sorted = [...prices].sort((a, b) => a.date.localeCompare(b.date));
  const records: MarketRecord[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1].close;
    if (previous <= 0) continue;
    records.push({ entityId, date: sorted[i].date, return: (sorted[i].close - previous) / previous });
  }
  return records;
}

/**
 * Semicolon price file: `Date;AAPL` with day-first dates. The second column
 * header names the entity unless one is given.
 */
export function parsePriceCsv(content: string, entityId?: string, source = 'prices.csv'): MarketRecord[] {
  const rows = parseRows(content, ';', source);
  if (rows.length === 0) return [];

  const columns = Object.keys(rows[0]);
  const dateColumn = columns.find((c) => c.toLowerCase() === 'date');
  const priceColumn = columns.find((c) => c !== dateColumn);
  if (!dateColumn || !priceColumn) {
    throw new ConfigError(`price CSV ${source} must have a Date column and a price column`);
  }

  const prices: PricePoint[] = [];
  for (const row of rows) {
    const date = normalizeDate(row[dateColumn] ?? '');
    const close = parseNumber(row[priceColumn]);
    if (date && close !== null) prices.push({ date, close });
  }

  return pricesToReturns((entityId ?? priceColumn).trim().toUpperCase(), prices);
}

export function parseMarketCsv(content: string, source: string): MarketRecord[] {
  const header = content.replace(/^﻿/, '').split(/\r?\n/, 1)[0] ?? '';
  if (header.includes(';')) return parsePriceCsv(content, undefined, source);
  return parseReturnsCsv(content, source);
}

function inRange(record: MarketRecord, entityIds: ReadonlySet<string>, from: string, to: string): boolean {
  return entityIds.has(record.entityId) && record.date >= from && record.date <= to;
}

export class CsvMarketDataSource implements MarketDataSource {
  readonly name = 'csv';
  private cache: MarketRecord[] | null = null;

  constructor(private readonly filePaths: readonly string[]) {}

  private async readAll(): Promise<MarketRecord[]> {
    if (this.cache) return this.cache;
    const all: MarketRecord[] = [];
    for (const filePath of this.filePaths) {
      let content: string;
      try {
        content = await fs.promises.readFile(filePath, 'utf-8');
      } catch (error) {
        throw new ConfigError(`cannot read market data ${filePath}: ${describeError(error)}`);
      }
      const records = parseMarketCsv(content, path.basename(filePath));
      console.log(`[MarketData] ${path.basename(filePath)}: ${records.length} daily returns`);
      all.push(...records);
    }
    this.cache = sortRecords(all);
    return this.cache;
  }

  async load(entityIds: readonly string[], from: string, to: string): Promise<MarketRecord[]> {
    const wanted = new Set(entityIds.map((id) => id.toUpperCase()));
    const records = await this.readAll();
    return records.filter((r) => inRange(r, wanted, from, to));
  }
}

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class YahooMarketDataSource implements MarketDataSource {
  readonly name = 'yahoo-finance';

  /**
   * Fetch daily closes per ticker. A ticker that fails is logged and contributes
   * no records, so its documents surface as missing market data downstream.
   */
  async load(entityIds: readonly string[], from: string, to: string): Promise<MarketRecord[]> {
    const records: MarketRecord[] = [];
    // One extra week before `from` so the first in-range day has a prior close
    const period1 = new Date(`${from}T00:00:00Z`);
    period1.setUTCDate(period1.getUTCDate() - 7);
    const period2 = new Date(`${to}T00:00:00Z`);
    period2.setUTCDate(period2.getUTCDate() + 1);

    for (const entityId of entityIds) {
      try {
        const result = await yahooFinance.chart(entityId, { period1, period2, interval: '1d' });
        const prices: PricePoint[] = [];
        for (const quote of result.quotes) {
          const close = quote.adjclose ?? quote.close;
          if (close === null || close === undefined || !Number.isFinite(close)) continue;
          prices.push({ date: toIsoDate(new Date(quote.date)), close });
        }
        const returns = pricesToReturns(entityId.toUpperCase(), prices).filter((r) => r.date >= from && r.date <= to);
        console.log(`[MarketData] ${entityId}: ${returns.length} daily returns from Yahoo Finance`);
        records.push(...returns);
      } catch (error) {
        console.warn(`[MarketData] Failed to fetch ${entityId} from Yahoo Finance: ${describeError(error)}`);
      }
    }

    return sortRecords(records);
  }
}
