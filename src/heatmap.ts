import type Maze from './maze';
import Matrix from './matrix';
import type { Pos } from './physical';
import type { Randomizer } from './random/randomizer';
import { randomWall } from './initialize/common';
import { onceWarn } from './utils/warnings';

/**
 * Traffic analysis: how many shortest routes between chosen room pairs pass
 * through each room, and a post-processor that opens walls where traffic is
 * heavy.
 *
 * @module heatmap
 */

/**
 * Standard route sets:
 *
 * - `vertical`: from the top to the bottom of every column
 * - `horizontal`: from the left to the right end of every row
 * - `full`: from every room on the top or left edge to its mirror image
 */
export type HeatMapType = 'vertical' | 'horizontal' | 'full';

const HEAT_MAP_TYPES: readonly HeatMapType[] = ['vertical', 'horizontal', 'full'];

/** @throws Error for anything but the three type names. */
export function parseHeatMapType(text: string): HeatMapType {
  const value = text.trim();
  const type = HEAT_MAP_TYPES.find((t) => t === value);
  if (!type) throw new Error(`unknown heat map type: ${text}`);
  return type;
}

/** The `(from, to)` pairs for a heat map type on a `width` × `height` grid. */
export function heatMapPairs(type: HeatMapType, width: number, height: number): Array<[Pos, Pos]> {
  const pairs: Array<[Pos, Pos]> = [];
  switch (type) {
    case 'vertical':
      for (let col = 0; col < width; col++) {
        pairs.push([{ col, row: 0 }, { col, row: height - 1 }]);
      }
      break;
    case 'horizontal':
      for (let row = 0; row < height; row++) {
        pairs.push([{ col: 0, row }, { col: width - 1, row }]);
      }
      break;
    case 'full':
      for (let row = 0; row < height; row++) {
        for (let col = 0; col < width; col++) {
          if (col === 0 || row === 0) {
            pairs.push([{ col, row }, { col: width - 1 - col, row: height - 1 - row }]);
          }
        }
      }
      break;
  }
  return pairs;
}

/**
 * Counts, per room, the shortest routes of `pairs` passing through it.
 * Pairs without a route contribute nothing. Partial maps over disjoint pair
 * sets can be combined with `Matrix.add`.
 */
export function heatmap<T>(maze: Maze<T>, pairs: Iterable<[Pos, Pos]>): Matrix<number> {
  const result = Matrix.filled(maze.width, maze.height, 0);
  for (const [from, to] of pairs) {
    const path = maze.walk(from, to);
    if (!path) {
      onceWarn('heatmap:disconnected', 'heatmap: some room pairs are not connected and were skipped');
      continue;
    }
    for (const pos of path) result.set(pos, result.at(pos) + 1);
  }
  return result;
}

/** {@link heatmap} over the pairs of a standard type. */
export function heatmapOfType<T>(maze: Maze<T>, type: HeatMapType): Matrix<number> {
  return heatmap(maze, heatMapPairs(type, maze.width, maze.height));
}

/** Parameters of {@link breakWalls}. */
export interface BreakSpec {
  type: HeatMapType;
  /** Number of rounds. */
  count: number;
}

/**
 * Parses `<heat map type>[,<count>]`; the count defaults to 1.
 *
 * @throws Error for an unknown type or a count that is not a decimal integer.
 */
export function parseBreakSpec(text: string): BreakSpec {
  const parts = text.split(',').map((part) => part.trim());
  if (parts.length > 2) throw new Error(`invalid break specification: ${text}`);
  const type = parseHeatMapType(parts[0]);
  if (parts.length === 1) return { type, count: 1 };
  const countText = parts[1];
  if (!/^[0-9]+$/.test(countText)) throw new Error(`invalid count: ${countText}`);
  return { type, count: Number(countText) };
}

/**
 * Opens extra walls in busy rooms, `spec.count` times over.
 *
 * Each round recomputes the heat map; a room with heat `h` gets a random wall
 * to an inner neighbour opened when `1 / (random() * h) < 0.5`, so rooms
 * with a heat of 2 or less are never touched.
 */
export function breakWalls<T>(maze: Maze<T>, spec: BreakSpec, rng: Randomizer): Maze<T> {
  for (let round = 0; round < spec.count; round++) {
    const heat = heatmapOfType(maze, spec.type);
    for (const pos of heat.positions()) {
      if (1 / (rng.random() * heat.at(pos)) < 0.5) {
        const wallPos = randomWall(maze, rng, pos, (p) => maze.isInside(p));
        if (wallPos) maze.open(wallPos);
      }
    }
  }
  return maze;
}
