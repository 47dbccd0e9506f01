// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic pseudo-random numbers for reproducible simulated games.
// All randomness flows through a seed; nothing reads Math.random().

import type { ChanceOutcome } from "../types/index";

/**
 * mulberry32, a small 32-bit seeded PRNG.
 * Returns a function that produces the next float in [0, 1).
 */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRng {
  private readonly rng: () => number;

  constructor(seed: number) {
    this.rng = mulberry32(seed);
  }

  /** Returns the next pseudo-random float in [0, 1). */
  next(): number {
    return this.rng();
  }

  /**
   * Pick a random element from the array.
   * @throws {RangeError} if the array is empty.
   */
  pick<T>(array: readonly T[]): T {
    if (array.length === 0) {
      throw new RangeError("Cannot pick from an empty array");
    }
    return array[Math.floor(this.rng() * array.length)];
  }

  /**
   * Samples a chance outcome by its probability. Falls back to the last
   * outcome when rounding leaves the draw just above the cumulative sum.
   * @throws {RangeError} if there are no outcomes.
   */
  sampleOutcome(outcomes: readonly ChanceOutcome[]): ChanceOutcome {
    if (outcomes.length === 0) {
      throw new RangeError("Cannot sample from an empty outcome list");
    }
    const draw = this.rng();
    let cumulative = 0;
    for (const outcome of outcomes) {
      cumulative += outcome.probability;
      if (draw < cumulative) return outcome;
    }
    return outcomes[outcomes.length - 1];
  }
}

/** Creates a new SeededRng from the given seed. */
export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}
