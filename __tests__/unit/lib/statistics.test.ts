import { describe, it, expect } from 'vitest';
import {
  binaryCrossEntropy,
  incompleteBeta,
  logGamma,
  mean,
  quantile,
  sigmoid,
  standardDeviation,
  twoSidedTPValue,
  variance,
} from '@/lib/statistics';
import { mulberry32, resample, shuffle } from '@/lib/random';

describe('descriptive statistics', () => {
  it('computes mean and returns NaN for no values', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBeNaN();
  });

  it('uses the sample (n - 1) variance', () => {
    // mean 5, squared deviations sum to 32
    expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(32 / 7, 12);
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12);
    expect(variance([3])).toBeNaN();
  });

  it('interpolates quantiles linearly', () => {
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([1, 2, 3, 4], 0)).toBe(1);
    expect(quantile([1, 2, 3, 4], 1)).toBe(4);
    expect(quantile([10], 0.975)).toBe(10);
    expect(quantile([], 0.5)).toBeNaN();
  });
});

describe('sigmoid and cross entropy', () => {
  it('is stable at extreme logits', () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(1000)).toBe(1);
    expect(sigmoid(-1000)).toBe(0);
  });

  it('clamps probabilities before taking logs', () => {
    expect(Number.isFinite(binaryCrossEntropy(0, 1))).toBe(true);
    expect(binaryCrossEntropy(1, 1)).toBeCloseTo(0, 10);
    expect(binaryCrossEntropy(0.5, 0)).toBeCloseTo(Math.log(2), 12);
  });
});

describe('t distribution', () => {
  it('matches known gamma and beta values', () => {
    expect(logGamma(5)).toBeCloseTo(Math.log(24), 10);
    expect(logGamma(0.5)).toBeCloseTo(Math.log(Math.sqrt(Math.PI)), 10);
    expect(incompleteBeta(0.5, 2, 2)).toBeCloseTo(0.5, 10);
    expect(incompleteBeta(0, 2, 3)).toBe(0);
    expect(incompleteBeta(1, 2, 3)).toBe(1);
  });

  it('gives p = 1 at t = 0 and p ~ 0.05 at the df=10 critical value', () => {
    expect(twoSidedTPValue(0, 10)).toBeCloseTo(1, 10);
    expect(twoSidedTPValue(2.228, 10)).toBeCloseTo(0.05, 3);
    expect(twoSidedTPValue(-2.228, 10)).toBeCloseTo(0.05, 3);
  });

  it('handles infinite and NaN statistics', () => {
    expect(twoSidedTPValue(Infinity, 5)).toBe(0);
    expect(twoSidedTPValue(-Infinity, 5)).toBe(0);
    expect(twoSidedTPValue(NaN, 5)).toBeNaN();
  });
});

describe('seeded randomness', () => {
  it('replays the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('shuffles into a permutation without touching the input', () => {
    const items = ['a', 'b', 'c', 'd', 'e'];
    const shuffled = shuffle(items, mulberry32(7));
    expect(items).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect([...shuffled].sort()).toEqual(items);
    expect(shuffle(items, mulberry32(7))).toEqual(shuffled);
  });

  it('resamples with replacement to the same length', () => {
    const sample = resample([1, 2, 3], mulberry32(1));
    expect(sample).toHaveLength(3);
    for (const value of sample) expect([1, 2, 3]).toContain(value);
  });
});
