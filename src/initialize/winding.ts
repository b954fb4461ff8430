import type Maze from '../maze';
import type Matrix from '../matrix';
import type { Pos } from '../physical';
import type { Randomizer } from '../random/randomizer';
import { isCandidate, randomRoom } from './common';

/**
 * Depth first backtracker: walks into random unreached neighbours, backing up
 * along the walked path at dead ends. Produces long winding corridors and no
 * loops.
 */
export function winding<T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>): Maze<T> {
  const remaining = candidates.clone();
  const path: Pos[] = [];
  let current = randomRoom(rng, remaining);

  while (current) {
    remaining.set(current, false);
    const from = current;
    const exits = maze
      .wallPositions(from)
      .filter((wp) => isCandidate(remaining, maze.back(wp).pos));

    if (exits.length > 0) {
      const wallPos = exits[rng.range(0, exits.length)];
      maze.open(wallPos);
      path.push(from);
      current = maze.back(wallPos).pos;
    } else {
      current = path.pop() ?? randomRoom(rng, remaining);
    }
  }
  return maze;
}
