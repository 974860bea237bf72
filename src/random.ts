/** A source of uniform floats in [0, 1). Production uses a time-seeded generator; tests pass a fixed seed. */
export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRng(seed?: number): Rng {
  const s = seed !== undefined && Number.isFinite(seed) ? seed : Date.now();
  return mulberry32(s);
}

/** Uniform index in [0, length). */
export function randomIndex(rng: Rng, length: number): number {
  const i = Math.floor(rng() * length);
  // Guard against generators that can return exactly 1.
  return Math.min(Math.max(i, 0), length - 1);
}

export function pickRandom<T>(items: readonly T[], rng: Rng): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomIndex(rng, items.length)];
}
