/**
 * Source of randomness for maze generation.
 *
 * Every operation that needs randomness takes a randomizer argument; there
 * is no ambient generator.
 */
export interface Randomizer {
  /**
   * An integer in `[min(low, high), max(low, high))`, or `low` when both
   * bounds are equal.
   */
  range(low: number, high: number): number;

  /** A float in `[0, 1)`. */
  random(): number;
}

/** Orders a pair of bounds. */
export function bounds(a: number, b: number): [number, number] {
  return a < b ? [a, b] : [b, a];
}
