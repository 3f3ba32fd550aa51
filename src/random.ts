/**
 * Source of randomness for slot assignment.
 *
 * Generation only ever needs "pick one of N", so that is all an
 * implementation provides. Tests inject {@link SeededRandom} or a stub.
 *
 * @category Generation
 */
export interface RandomSource {
  /** Returns an integer in `[0, n)`. `n` is always at least 1. */
  pick(n: number): number;
}

/** {@link RandomSource} backed by `Math.random`. */
export const mathRandom: RandomSource = {
  pick(n) {
    return Math.floor(Math.random() * n);
  },
};

/**
 * Deterministic {@link RandomSource} (mulberry32).
 *
 * @example
 * ```typescript
 * const random = new SeededRandom(42);
 * random.pick(3); // same value on every run
 * ```
 */
export class SeededRandom implements RandomSource {
  #state: number;

  constructor(seed: number) {
    this.#state = seed >>> 0;
  }

  next(): number {
    this.#state = (this.#state + 0x6d2b79f5) >>> 0;
    let t = this.#state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  pick(n: number): number {
    return Math.floor(this.next() * n);
  }
}

/**
 * Returns a shuffled copy of `items` (Fisher-Yates).
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = random.pick(i + 1);
    [result[i], result[j]] = [result[j]!, result[i]!];
  }
  return result;
}
