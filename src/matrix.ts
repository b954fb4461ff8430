import { Pos, comparePos, posKey } from './physical';

/**
 * A fixed size, row-major grid of values addressed by {@link Pos}.
 *
 * Two access styles exist: {@link Matrix.get} returns `undefined` outside
 * the grid and is meant for untrusted positions; {@link Matrix.at} and
 * {@link Matrix.set} treat an outside position as a programmer error and
 * throw a `RangeError`.
 */
export default class Matrix<T> {
  readonly width: number;
  readonly height: number;
  private readonly data: T[];

  constructor(width: number, height: number, init: (pos: Pos) => T) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`invalid matrix dimensions ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Array<T>(width * height);
    for (let row = 0; row < height; row++) {
      for (let col = 0; col < width; col++) {
        this.data[col + row * width] = init({ col, row });
      }
    }
  }

  /** A matrix with every cell set to `value`. */
  static filled<T>(width: number, height: number, value: T): Matrix<T> {
    return new Matrix(width, height, () => value);
  }

  isInside(pos: Pos): boolean {
    return pos.col >= 0 && pos.row >= 0 && pos.col < this.width && pos.row < this.height;
  }

  get(pos: Pos): T | undefined {
    return this.isInside(pos) ? this.data[pos.col + pos.row * this.width] : undefined;
  }

  at(pos: Pos): T {
    return this.data[this.indexOf(pos)];
  }

  set(pos: Pos, value: T): void {
    this.data[this.indexOf(pos)] = value;
  }

  /** All positions, row by row. A fresh array on every call. */
  positions(): Pos[] {
    const result: Pos[] = [];
    for (let row = 0; row < this.height; row++) {
      for (let col = 0; col < this.width; col++) {
        result.push({ col, row });
      }
    }
    return result;
  }

  /** All values in position order. */
  values(): T[] {
    return this.data.slice();
  }

  map<U>(fn: (value: T, pos: Pos) => U): Matrix<U> {
    return new Matrix(this.width, this.height, (pos) => fn(this.at(pos), pos));
  }

  clone(): Matrix<T> {
    return this.map((value) => value);
  }

  /**
   * Flood fills from `pos` with `value`, following `neighbors` depth first
   * through cells that do not already hold `value`.
   *
   * @returns the number of cells written; 0 when `pos` is outside.
   */
  fill(pos: Pos, value: T, neighbors: (pos: Pos) => Iterable<Pos>): number {
    if (!this.isInside(pos)) return 0;

    let count = 1;
    this.set(pos, value);
    const path = [pos];
    while (path.length > 0) {
      const current = path[path.length - 1];
      let next: Pos | undefined;
      for (const candidate of neighbors(current)) {
        if (this.isInside(candidate) && this.at(candidate) !== value) {
          next = candidate;
          break;
        }
      }
      if (next) {
        count++;
        this.set(next, value);
        path.push(next);
      } else {
        path.pop();
      }
    }
    return count;
  }

  /**
   * Groups the borders between cells holding different values.
   *
   * Every pair of neighbouring cells with different values is reported once,
   * under the key of its two values (lower first), with the cell holding the
   * lower value first. Both the groups and the pairs are sorted.
   */
  edges(this: Matrix<number>, neighbors: (pos: Pos) => Iterable<Pos>): Edge[] {
    const groups = new Map<string, Edge>();
    const seen = new Set<string>();
    for (const p1 of this.positions()) {
      for (const p2 of neighbors(p1)) {
        if (!this.isInside(p2)) continue;
        const k1 = this.at(p1);
        const k2 = this.at(p2);
        if (k1 === k2) continue;
        const [low, high] = k1 < k2 ? [k1, k2] : [k2, k1];
        const pair: [Pos, Pos] = k1 < k2 ? [p1, p2] : [p2, p1];
        const pairKey = `${posKey(pair[0])}|${posKey(pair[1])}`;
        if (seen.has(pairKey)) continue;
        seen.add(pairKey);
        const groupKey = `${low}:${high}`;
        let edge = groups.get(groupKey);
        if (!edge) {
          edge = { values: [low, high], pairs: [] };
          groups.set(groupKey, edge);
        }
        edge.pairs.push(pair);
      }
    }
    const result = [...groups.values()];
    for (const edge of result) {
      edge.pairs.sort((a, b) => comparePos(a[0], b[0]) || comparePos(a[1], b[1]));
    }
    return result.sort((a, b) => a.values[0] - b.values[0] || a.values[1] - b.values[1]);
  }

  /**
   * Elementwise sum over the region both matrices cover; the result has the
   * size of `this`, cells outside `other` keep their value.
   */
  add(this: Matrix<number>, other: Matrix<number>): Matrix<number> {
    return this.map((value, pos) => value + (other.get(pos) ?? 0));
  }

  private indexOf(pos: Pos): number {
    if (!this.isInside(pos)) {
      throw new RangeError(
        `position (${pos.col}, ${pos.row}) is outside the ${this.width}x${this.height} matrix`
      );
    }
    return pos.col + pos.row * this.width;
  }
}

/** Border between two regions of a matrix, as found by {@link Matrix.edges}. */
export interface Edge {
  values: [number, number];
  pairs: Array<[Pos, Pos]>;
}

/**
 * Applies `filter` to every position of a `width` × `height` grid.
 *
 * @returns the number of accepted positions and the acceptance mask.
 */
export function filter(
  width: number,
  height: number,
  predicate: (pos: Pos) => boolean
): { count: number; mask: Matrix<boolean> } {
  let count = 0;
  const mask = new Matrix(width, height, (pos) => {
    const accepted = predicate(pos);
    if (accepted) count++;
    return accepted;
  });
  return { count, mask };
}

/**
 * Splits `x` into its floor and the fractional remainder in `[0, 1)`.
 */
export function partition(x: number): [number, number] {
  const whole = Math.floor(x);
  return [whole, x - whole];
}
