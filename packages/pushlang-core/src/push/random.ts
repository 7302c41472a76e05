/**
 * Random number source for instructions that sample values
 * (INTEGER.RAND, CODE.RAND, NAME.RAND, ...).
 *
 * A seeded source is reproducible across runs; without a seed the source
 * falls back to Math.random.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  if (seed === undefined) {
    return { next: () => Math.random() };
  }
  const generator = mulberry32(seed);
  return { next: generator };
}

/**
 * Integer in [lo, hi], both inclusive
 */
export function randomInt(random: RandomSource, lo: number, hi: number): number {
  if (hi < lo) return lo;
  return lo + Math.floor(random.next() * (hi - lo + 1));
}

/**
 * Float in [lo, hi)
 */
export function randomFloat(random: RandomSource, lo: number, hi: number): number {
  if (hi <= lo) return lo;
  return lo + random.next() * (hi - lo);
}

export function randomElement<T>(random: RandomSource, values: readonly T[]): T | undefined {
  if (values.length === 0) return undefined;
  return values[randomInt(random, 0, values.length - 1)];
}
