export type Random = () => number;

/** Seeded PRNG returning floats in [0, 1). */
export function mulberry32(seed: number): Random {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: Random, bound: number): number {
  return Math.floor(rng() * bound);
}

export function pick<T>(items: readonly T[], rng: Random): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(rng, items.length)];
}
