/**
 * Association tests between document evasion scores and the binary market
 * reaction label. Results describe association only; no causal reading.
 *
 * - point-biserial: Pearson r between score and adverse flag, t = r * sqrt((n - 2) / (1 - r^2)), df = n - 2
 * - mean-difference: Welch's t on scores of adverse vs non-adverse documents, effect size Cohen's d
 */

import { mean, twoSidedTPValue, variance } from './statistics';
import type { AssociationTestName } from './types';

export interface AssociationSample {
  score: number;
  adverse: 0 | 1;
}

export interface AssociationOutcome {
  effectSize: number | null;
  statistic: number | null;
  pValue: number | null;
}

const UNDEFINED_OUTCOME: AssociationOutcome = { effectSize: null, statistic: null, pValue: null };

function groups(samples: readonly AssociationSample[]): { adverse: number[]; other: number[] } {
  const adverse: number[] = [];
  const other: number[] = [];
  for (const s of samples) (s.adverse === 1 ? adverse : other).push(s.score);
  return { adverse, other };
}

export function pointBiserial(samples: readonly AssociationSample[]): AssociationOutcome {
  const n = samples.length;
  const { adverse, other } = groups(samples);
  if (n < 3 || adverse.length === 0 || other.length === 0) return UNDEFINED_OUTCOME;

  const scores = samples.map((s) => s.score);
  const flags = samples.map((s) => s.adverse);
  const mx = mean(scores);
  const my = mean(flags);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    sxy += (scores[i] - mx) * (flags[i] - my);
    sxx += (scores[i] - mx) ** 2;
    syy += (flags[i] - my) ** 2;
  }
  if (sxx === 0 || syy === 0) return UNDEFINED_OUTCOME;

  const r = sxy / Math.sqrt(sxx * syy);
  const df = n - 2;
  const t = Math.abs(r) >= 1 ? Math.sign(r) * Infinity : r * Math.sqrt(df / (1 - r * r));
  return { effectSize: r, statistic: t, pValue: twoSidedTPValue(t, df) };
}

export function meanDifference(samples: readonly AssociationSample[]): AssociationOutcome {
  const { adverse, other } = groups(samples);
  if (adverse.length < 2 || other.length < 2) return UNDEFINED_OUTCOME;

  const m1 = mean(adverse);
  const m0 = mean(other);
  const v1 = variance(adverse);
  const v0 = variance(other);
  const n1 = adverse.length;
  const n0 = other.length;

  const pooled = Math.sqrt(((n1 - 1) * v1 + (n0 - 1) * v0) / (n1 + n0 - 2));
  const effectSize = pooled > 0 ? (m1 - m0) / pooled : null;

  const se2 = v1 / n1 + v0 / n0;
  if (se2 === 0) return { effectSize, statistic: null, pValue: null };
  const t = (m1 - m0) / Math.sqrt(se2);
  const df = se2 ** 2 / ((v1 / n1) ** 2 / (n1 - 1) + (v0 / n0) ** 2 / (n0 - 1));
  return { effectSize, statistic: t, pValue: twoSidedTPValue(t, df) };
}

export const ASSOCIATION_TESTS: Record<AssociationTestName, (samples: readonly AssociationSample[]) => AssociationOutcome> = {
  'point-biserial': pointBiserial,
  'mean-difference': meanDifference,
};
