/**
 * Standardizes FeatureVector values with training-set mean and standard
 * deviation. A feature that is constant in training gets std 1 so it maps to 0.
 */

import { z } from 'zod';
import { CheckpointCorruptionError } from './errors';
import { mean, standardDeviation } from './statistics';
import { FEATURE_NAMES, type FeatureValues } from './types';

export const featureScalerStateSchema = z.object({
  means: z.array(z.number().finite()).length(FEATURE_NAMES.length),
  stds: z.array(z.number().finite().positive()).length(FEATURE_NAMES.length),
});

export type FeatureScalerState = z.infer<typeof featureScalerStateSchema>;

export class FeatureScaler {
  private constructor(
    private readonly means: number[],
    private readonly stds: number[],
  ) {}

  static fit(rows: readonly FeatureValues[]): FeatureScaler {
    const means: number[] = [];
    const stds: number[] = [];
    for (const name of FEATURE_NAMES) {
      const column = rows.map((row) => row[name]);
      const m = column.length > 0 ? mean(column) : 0;
      const s = column.length > 1 ? standardDeviation(column) : 0;
      means.push(Number.isFinite(m) ? m : 0);
      stds.push(Number.isFinite(s) && s > 1e-12 ? s : 1);
    }
    return new FeatureScaler(means, stds);
  }

  transform(values: FeatureValues): number[] {
    return FEATURE_NAMES.map((name, i) => (values[name] - this.means[i]) / this.stds[i]);
  }

  toJSON(): FeatureScalerState {
    return { means: [...this.means], stds: [...this.stds] };
  }

  static fromJSON(raw: unknown, source = 'feature-scaler'): FeatureScaler {
    const parsed = featureScalerStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CheckpointCorruptionError(source, parsed.error.issues[0]?.message ?? 'invalid scaler state');
    }
    return new FeatureScaler(parsed.data.means, parsed.data.stds);
  }
}
