import type Maze from '../maze';
import Matrix from '../matrix';
import type { Pos } from '../physical';
import type { Randomizer } from '../random/randomizer';
import type { WallPos } from '../wall';

/**
 * Helpers shared by the initializers.
 *
 * Every initializer receives a `candidates` mask: `true` for rooms it may
 * carve. Initializers that track progress work on their own copy of it.
 */

/** Signature of an initializer; the maze is modified in place and returned. */
export type Initializer = <T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>) => Maze<T>;

/** A uniformly chosen position whose mask value is `true`. */
export function randomRoom(rng: Randomizer, mask: Matrix<boolean>): Pos | undefined {
  const available = mask.positions().filter((pos) => mask.at(pos));
  if (available.length === 0) return undefined;
  return available[rng.range(0, available.length)];
}

/**
 * A uniformly chosen wall of `pos` leading to a room accepted by `accept`.
 */
export function randomWall<T>(
  maze: Maze<T>,
  rng: Randomizer,
  pos: Pos,
  accept: (back: Pos) => boolean
): WallPos | undefined {
  const walls = maze.wallPositions(pos).filter((wp) => accept(maze.back(wp).pos));
  if (walls.length === 0) return undefined;
  return walls[rng.range(0, walls.length)];
}

/** Whether `pos` is inside the mask and marked. */
export function isCandidate(mask: Matrix<boolean>, pos: Pos): boolean {
  return mask.get(pos) === true;
}

/**
 * Joins separated regions of the candidate rooms.
 *
 * Candidate rooms are grouped into regions connected by open walls; for every
 * pair of adjacent regions one randomly chosen wall between them is opened.
 */
export function connectAll<T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>): void {
  const areas = Matrix.filled(maze.width, maze.height, 0);
  let index = 0;
  for (const pos of maze.positions()) {
    if (!candidates.at(pos) || areas.at(pos) > 0) continue;
    index++;
    areas.fill(pos, index, (p) => maze.neighbors(p).filter((n) => isCandidate(candidates, n)));
  }

  for (const edge of areas.edges((p) => maze.adjacent(p))) {
    if (edge.values[0] === 0) continue;
    const walls = edge.pairs.flatMap(([a, b]) => {
      const wallPos = maze.connectingWall(a, b);
      return wallPos ? [wallPos] : [];
    });
    if (walls.length > 0) maze.open(walls[rng.range(0, walls.length)]);
  }
}
