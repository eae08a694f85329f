import seedrandom from 'seedrandom';

/**
 * Source of uniform randomness used by the allocation strategies.
 * Implementations must be deterministic for a given seed.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Fisher-Yates shuffle, in place. */
  shuffle<T>(items: T[]): void;
  /** Uniform pick from a non-empty list. */
  choice<T>(items: readonly T[]): T;
}

export type Seed = number | string;

/**
 * Shared shuffle/choice implementation on top of a single `next()` draw.
 */
export abstract class BaseRandomSource implements RandomSource {
  abstract next(): number;

  shuffle<T>(items: T[]): void {
    for (let i = items.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      const current = items[i] as T;
      items[i] = items[j] as T;
      items[j] = current;
    }
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    const index = Math.min(items.length - 1, Math.floor(this.next() * items.length));
    return items[index] as T;
  }
}

/**
 * Instance-scoped generator backed by seedrandom's ARC4 PRNG. Seeding one
 * instance never touches `Math.random` or any other engine's source.
 */
export class SeededRandomSource extends BaseRandomSource {
  private readonly prng: seedrandom.PRNG;
  readonly seed: Seed | undefined;

  private constructor(prng: seedrandom.PRNG, seed: Seed | undefined) {
    super();
    this.prng = prng;
    this.seed = seed;
  }

  /**
   * Create a source for `seed`. Without a seed the generator is auto-seeded
   * from system entropy and results differ from run to run.
   */
  static fromSeed(seed?: Seed): SeededRandomSource {
    const prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
    return new SeededRandomSource(prng, seed);
  }

  next(): number {
    return this.prng();
  }
}
