import type { Row } from './types.js';

/** Default seed for reproducible detection samples. */
export const DEFAULT_SAMPLE_SEED = 42;

/**
 * Small seeded PRNG (mulberry32). Returns floats in [0, 1).
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw `size` rows without replacement. The same seed and input always give
 * the same sample, and sampled rows keep their original relative order.
 */
export function sampleRows(rows: readonly Row[], size: number, seed = DEFAULT_SAMPLE_SEED): Row[] {
  if (size >= rows.length) {
    return [...rows];
  }
  if (size <= 0) {
    return [];
  }

  const random = createRandom(seed);
  const indices = rows.map((_, i) => i);
  // Partial Fisher-Yates: the first `size` slots end up holding the sample.
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (indices.length - i));
    const picked = indices[j] ?? j;
    indices[j] = indices[i] ?? i;
    indices[i] = picked;
  }

  return indices
    .slice(0, size)
    .sort((a, b) => a - b)
    .flatMap((i) => {
      const row = rows[i];
      return row === undefined ? [] : [row];
    });
}
