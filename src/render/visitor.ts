import type Maze from '../maze';
import Matrix from '../matrix';
import type { PhysicalPos } from '../physical';
import type { WallPos } from '../wall';

/**
 * Tracks which walls have been drawn, and finds the next closed wall still
 * to draw. Only rooms some generation step reached are scanned, row by row.
 */
export class Visitor<T> {
  private readonly drawn: Matrix<number>;
  private index = 0;

  constructor(private readonly maze: Maze<T>) {
    this.drawn = Matrix.filled(maze.width, maze.height, 0);
  }

  /** Marks a wall, and the same wall seen from the other side, as drawn. */
  visit(wallPos: WallPos): void {
    for (const { pos, wall } of [wallPos, this.maze.back(wallPos)]) {
      const mask = this.drawn.get(pos);
      if (mask !== undefined) this.drawn.set(pos, mask | wall.mask);
    }
  }

  visited(wallPos: WallPos): boolean {
    return ((this.drawn.get(wallPos.pos) ?? 0) & wallPos.wall.mask) !== 0;
  }

  nextWall(): WallPos | undefined {
    const { width, height } = this.maze;
    for (; this.index < width * height; this.index++) {
      const pos = { col: this.index % width, row: Math.floor(this.index / width) };
      if (!this.maze.rooms.at(pos).visited) continue;
      const found = this.maze
        .wallPositions(pos)
        .find((wp) => !this.maze.isOpen(wp) && !this.visited(wp));
      if (found) return found;
    }
    return undefined;
  }
}

/** A path command: move to or draw a line to a point, or close the outline. */
export type Operation =
  | { op: 'M'; to: PhysicalPos }
  | { op: 'L'; to: PhysicalPos }
  | { op: 'Z' };

/**
 * The outlines of every cavity, as path operations: each closed wall of a
 * reached room appears exactly once. An outline that returns to its first
 * wall is closed with `Z`.
 */
export function outline<T>(maze: Maze<T>): Operation[] {
  const operations: Operation[] = [];
  const visitor = new Visitor(maze);

  for (let start = visitor.nextWall(); start; start = visitor.nextWall()) {
    let first = true;
    for (const [current, next] of maze.followWall(start)) {
      if (visitor.visited(current)) break;
      visitor.visit(current);
      const [from, to] = maze.corners(current);
      if (first) {
        operations.push({ op: 'M', to: from });
        first = false;
      }
      operations.push({ op: 'L', to });
      if (!next) operations.push({ op: 'Z' });
    }
  }
  return operations;
}
