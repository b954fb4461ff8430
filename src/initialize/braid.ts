import type Maze from '../maze';
import type Matrix from '../matrix';
import type { Randomizer } from '../random/randomizer';
import { WallPos, compareWallPos, wallPosKey } from '../wall';
import { clear } from './clear';
import { connectAll, isCandidate } from './common';

/**
 * Builds a maze without dead ends: starts from a cleared area and closes
 * inner walls in random order, skipping any wall whose closing would leave
 * one of its rooms with two or fewer open walls. Regions cut off in the
 * process are joined again afterwards.
 */
export function braid<T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>): Maze<T> {
  clear(maze, rng, candidates);

  // One representative per inner wall: the side facing up, or left on a row.
  const unique = new Map<string, WallPos>();
  for (const pos of maze.positions()) {
    if (!candidates.at(pos)) continue;
    for (const wallPos of maze.wallPositions(pos)) {
      const back = maze.back(wallPos);
      if (!isCandidate(candidates, back.pos)) continue;
      const dx = wallPos.pos.col - back.pos.col;
      const dy = wallPos.pos.row - back.pos.row;
      const canonical = dy < 0 || (dy === 0 && dx < 0) ? wallPos : back;
      unique.set(wallPosKey(canonical), canonical);
    }
  }

  const walls = [...unique.values()].sort(compareWallPos);
  for (let i = 0; i < walls.length; i++) {
    const j = rng.range(0, walls.length);
    [walls[i], walls[j]] = [walls[j], walls[i]];
  }

  for (const wallPos of walls) {
    const back = maze.back(wallPos);
    if (maze.rooms.at(wallPos.pos).openWalls() > 2 && maze.rooms.at(back.pos).openWalls() > 2) {
      maze.close(wallPos);
    }
  }

  connectAll(maze, rng, candidates);
  return maze;
}
