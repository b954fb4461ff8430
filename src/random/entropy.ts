import seedrandom from 'seedrandom';
import { Randomizer, bounds } from './randomizer';

/**
 * Randomizer over a seedrandom generator: either auto-seeded from system
 * entropy or seeded with a string for repeatable runs.
 */
export class PrngRandomizer implements Randomizer {
  constructor(private readonly prng: seedrandom.PRNG) {}

  /** Seeded from the platform's entropy source. */
  static fromEntropy(): PrngRandomizer {
    return new PrngRandomizer(seedrandom(undefined, { entropy: true }));
  }

  static fromSeed(seed: string): PrngRandomizer {
    return new PrngRandomizer(seedrandom(seed));
  }

  range(a: number, b: number): number {
    const [low, high] = bounds(a, b);
    if (low === high) return low;
    return low + Math.floor(this.prng() * (high - low));
  }

  random(): number {
    return this.prng();
  }
}
