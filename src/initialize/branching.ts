import type Maze from '../maze';
import type Matrix from '../matrix';
import type { Pos } from '../physical';
import type { Randomizer } from '../random/randomizer';
import type { WallPos } from '../wall';
import { isCandidate, randomRoom } from './common';

/**
 * Randomized Prim: grows a spanning tree from a random room by repeatedly
 * opening a random frontier wall into an unreached room.
 *
 * When the frontier runs dry while unreached candidates remain, the candidate
 * area is disconnected and growth restarts from a new random room. The result
 * has exactly one route between any two rooms of a connected candidate area.
 */
export function branching<T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>): Maze<T> {
  const remaining = candidates.clone();
  const frontierOf = (pos: Pos): WallPos[] =>
    maze.wallPositions(pos).filter((wp) => isCandidate(remaining, maze.back(wp).pos));

  for (let seed = randomRoom(rng, remaining); seed; seed = randomRoom(rng, remaining)) {
    remaining.set(seed, false);
    const frontier = frontierOf(seed);
    while (frontier.length > 0) {
      const [wallPos] = frontier.splice(rng.range(0, frontier.length), 1);
      const next = maze.back(wallPos).pos;
      if (!isCandidate(remaining, next)) continue;
      remaining.set(next, false);
      maze.open(wallPos);
      frontier.push(...frontierOf(next));
    }
  }
  return maze;
}
