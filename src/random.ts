/**
 * LSYS — Random sources
 *
 * The expander never reaches for a global generator; callers pass a
 * `RandomSource` so that equal seeds replay equal generation sequences.
 */

export interface RandomSource {
  /** A uniformly distributed number in [0, 1). */
  next(): number;
}

/** Largest seed `SeededRandom` takes: seeds are unsigned 32-bit integers. */
export const MAX_SEED = 4294967295;

/**
 * Mulberry32 generator. Small and fast, with a full 2^32 period, which
 * is plenty for picking replacement cases.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(public readonly seed: number) {
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new RangeError(`Seed must be an integer from 0 to ${MAX_SEED}, got ${seed}`);
    }
    this.state = seed;
  }

  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/** A fresh 32-bit seed for runs that did not ask for one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}

/**
 * Build a seeded source. Without a seed one is drawn at random; read it
 * back from `.seed` to replay the run.
 */
export function createRandomSource(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? randomSeed());
}
