/** Source of uniformly distributed numbers in [0, 1), injectable for deterministic tests. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Fisher–Yates shuffle. Returns a new array; the input is not modified. */
export function shuffled<T>(values: readonly T[], random: RandomSource = defaultRandom): T[] {
  const out = [...values];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = out[i];
    const other = out[j];
    if (tmp === undefined || other === undefined) continue;
    out[i] = other;
    out[j] = tmp;
  }
  return out;
}

/** `[0, 1, ..., n - 1]` */
export function identityOrder(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/**
 * Build a random source from a seed (mulberry32). Used by tests and by the
 * `--seed` option so a shuffled run can be reproduced.
 */
export function seededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
