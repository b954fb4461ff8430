import type Maze from '../maze';
import type Matrix from '../matrix';
import type { Randomizer } from '../random/randomizer';
import { isCandidate } from './common';

/** Opens every wall between two candidate rooms. */
export function clear<T>(maze: Maze<T>, _rng: Randomizer, candidates: Matrix<boolean>): Maze<T> {
  for (const pos of maze.positions()) {
    if (!candidates.at(pos)) continue;
    for (const wallPos of maze.wallPositions(pos)) {
      if (isCandidate(candidates, maze.back(wallPos).pos)) maze.open(wallPos);
    }
  }
  return maze;
}
