import { describe, it, expect } from 'vitest';
import { MissingMarketDataError } from '@/lib/errors';
import { calendarDaysBetween, compound, computeMarketReaction, indexMarketRecords } from '@/lib/market-reaction';
import type { MarketRecord } from '@/lib/types';

const RECORDS: MarketRecord[] = [
  { entityId: 'ACME', date: '2023-03-01', return: 0.01 },
  { entityId: 'ACME', date: '2023-03-02', return: -0.02 },
  { entityId: 'ACME', date: '2023-03-03', return: -0.03 },
  { entityId: 'ACME', date: '2023-03-06', return: 0.05 },
  { entityId: 'SPY', date: '2023-03-01', return: 0 },
  { entityId: 'SPY', date: '2023-03-02', return: -0.01 },
  { entityId: 'SPY', date: '2023-03-03', return: -0.02 },
];

const OPTIONS = {
  marketWindowDays: 3,
  maxWindowStartLagDays: 7,
  adverseReturnThreshold: -0.02,
  benchmarkEntityId: null,
};

const index = indexMarketRecords(RECORDS);
const filing = { id: 'doc-1', entityId: 'acme', filingDate: '2023-03-01' };

describe('computeMarketReaction', () => {
  it('compounds the trading days from the filing date on', () => {
    const reaction = computeMarketReaction(filing, index, OPTIONS);
    expect(reaction.windowDates).toEqual(['2023-03-01', '2023-03-02', '2023-03-03']);
    // 1.01 * 0.98 * 0.97 - 1
    expect(reaction.rawReturn).toBeCloseTo(-0.039894, 10);
    expect(reaction.benchmarkReturn).toBeNull();
    expect(reaction.windowReturn).toBe(reaction.rawReturn);
    expect(reaction.adverse).toBe(true);
  });

  it('subtracts the benchmark over the same days', () => {
    const reaction = computeMarketReaction(filing, index, { ...OPTIONS, benchmarkEntityId: 'spy' });
    // 1.00 * 0.99 * 0.98 - 1
    expect(reaction.benchmarkReturn).toBeCloseTo(-0.0298, 10);
    expect(reaction.windowReturn).toBeCloseTo(-0.010094, 10);
    expect(reaction.adverse).toBe(false);
  });

  it('fails when the benchmark misses a window day', () => {
    const later = { ...filing, filingDate: '2023-03-02' };
    expect(() => computeMarketReaction(later, index, { ...OPTIONS, benchmarkEntityId: 'SPY' })).toThrow(
      MissingMarketDataError,
    );
  });

  it('fails when the window is cut short', () => {
    expect(() => computeMarketReaction({ ...filing, filingDate: '2023-03-04' }, index, OPTIONS)).toThrow(
      'only 1 of 3 trading days after filing',
    );
  });

  it('fails when the first trading day is too far from the filing', () => {
    expect(() =>
      computeMarketReaction({ ...filing, filingDate: '2023-02-20' }, index, { ...OPTIONS, marketWindowDays: 1 }),
    ).toThrow('is 9 days after filing');
  });

  it('fails for an entity without returns', () => {
    expect(() => computeMarketReaction({ ...filing, entityId: 'NONE' }, index, OPTIONS)).toThrow('no returns for entity');
  });
});

describe('indexMarketRecords', () => {
  it('sorts by date, keeps the first record of a day and drops non-finite returns', () => {
    const indexed = indexMarketRecords([
      { entityId: 'x', date: '2023-03-02', return: 0.2 },
      { entityId: 'X', date: '2023-03-01', return: 0.1 },
      { entityId: 'X', date: '2023-03-02', return: 0.3 },
      { entityId: 'X', date: '2023-03-03', return: NaN },
    ]);
    expect(indexed.get('X')).toEqual([
      { entityId: 'X', date: '2023-03-01', return: 0.1 },
      { entityId: 'x', date: '2023-03-02', return: 0.2 },
    ]);
  });
});

describe('window helpers', () => {
  it('counts calendar days and compounds returns', () => {
    expect(calendarDaysBetween('2023-03-01', '2023-03-08')).toBe(7);
    expect(compound([0.1, -0.1])).toBeCloseTo(-0.01, 12);
    expect(compound([])).toBe(0);
  });
});
