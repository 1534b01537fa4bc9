/**
 * Seeded uniform generator (mulberry32). Every sampling call creates its own
 * instance, so streams never leak between calls.
 */
export type RandomSource = () => number;

export function createSeededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(rng: RandomSource, lo: number, hi: number): number {
  return lo + (hi - lo) * rng();
}

/**
 * Fisher–Yates shuffle in place, walking from the last index down (length - 1 draws).
 */
export function shuffleInPlace<T>(items: T[], rng: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
