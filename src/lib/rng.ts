/** Deterministic RNG helpers for hazard schedules and seeded playouts. */

/** A function that returns a pseudo-random number in [0, 1) */
export type RNG = () => number;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.floor(value) >>> 0;
}

/**
 * Hash one or more numeric inputs into a 32-bit seed (FNV-1a).
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Create a seeded xorshift32 RNG. If no seed is provided one is auto-generated.
 */
export function createRNG(seed?: number): { rng: RNG; seed: number } {
  const resolved = seed ?? Math.floor(Math.random() * 0x100000000);
  let state = toUint32(resolved) || 1;
  const rng: RNG = () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
  return { rng, seed: resolved };
}

/** Integer in [0, n) */
export function randomInt(rng: RNG, n: number): number {
  return Math.floor(rng() * n);
}
