/**
 * Seeded randomness
 *
 * Every random draw in the pipeline (split, batch order, weight init,
 * bootstrap resampling) goes through these so a run is reproducible from its seed.
 */

export type Rng = () => number;

/**
 * Mulberry32 PRNG, uniform in [0, 1)
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform for N(0,1)
 */
export function randn(rng: Rng): number {
  let u = 0;
  let v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export function shuffle<T>(items: readonly T[], rng: Rng): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/**
 * Sample n items with replacement
 */
export function resample<T>(items: readonly T[], rng: Rng): T[] {
  const out: T[] = new Array(items.length);
  for (let i = 0; i < items.length; i++) {
    out[i] = items[Math.floor(rng() * items.length)];
  }
  return out;
}
