import type { RandomSource, RangeQuery } from "../types";

/** mulberry32: small seeded PRNG, returns floats in [0, 1). */
export function seededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in `[min, max]` inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomArray(size: number, maxValue: number, random: RandomSource = Math.random): number[] {
  return Array.from({ length: size }, () => randomInt(random, 1, maxValue));
}

/** Half range sums, half point updates, in random order. */
export function randomQueries(
  count: number,
  arraySize: number,
  maxValue: number,
  random: RandomSource = Math.random,
): RangeQuery[] {
  if (arraySize < 1) throw new Error("randomQueries needs arraySize >= 1");

  const out: RangeQuery[] = [];
  for (let i = 0; i < count; i++) {
    if (random() < 0.5) {
      const lo = randomInt(random, 0, arraySize - 1);
      const hi = randomInt(random, lo, arraySize - 1);
      out.push({ kind: "range", lo, hi });
    } else {
      const index = randomInt(random, 0, arraySize - 1);
      const value = randomInt(random, 1, maxValue);
      out.push({ kind: "update", index, value });
    }
  }
  return out;
}
