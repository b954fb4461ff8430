import { Randomizer, bounds } from './randomizer';

const MASK = (1n << 64n) - 1n;
const MAX = Number(MASK);

/** Largest double below 1. */
const BELOW_ONE = 1 - 2 ** -53;

/**
 * Deterministic 64 bit linear feedback shift register.
 *
 * The sequence depends only on the seed, so a maze generated from a seed can
 * be regenerated from the same seed. A zero seed yields zeros forever.
 */
export class LFSR implements Randomizer {
  private state: bigint;

  constructor(seed: bigint | number) {
    this.state = BigInt(seed) & MASK;
  }

  /** Shifts in one bit and returns it. */
  nextBit(): boolean {
    const x = this.state;
    const bit = (x ^ (x >> 2n) ^ (x >> 3n) ^ (x >> 5n)) & 1n;
    this.state = (x >> 1n) | (bit << 63n);
    return bit !== 0n;
  }

  /** Shifts in 64 new bits and returns the resulting register. */
  advance(): bigint {
    for (let i = 0; i < 64; i++) this.nextBit();
    return this.state;
  }

  range(a: number, b: number): number {
    const value = this.advance();
    const [low, high] = bounds(a, b);
    if (low === high) return low;
    return low + Number(value % BigInt(high - low));
  }

  random(): number {
    return Math.min(Number(this.advance()) / MAX, BELOW_ONE);
  }
}

/**
 * Parses a decimal or `0x` prefixed hexadecimal seed.
 *
 * @throws Error for text that is not an unsigned 64 bit integer.
 */
export function parseSeed(text: string): bigint {
  const value = text.trim();
  if (!/^(0x[0-9a-f]+|[0-9]+)$/i.test(value)) {
    throw new Error(`invalid seed: ${text}`);
  }
  const seed = BigInt(value);
  if (seed > MASK) throw new Error(`invalid seed: ${text} does not fit in 64 bits`);
  return seed;
}
