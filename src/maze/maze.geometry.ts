import type Maze from '../maze';
import { PhysicalPos, Pos, ViewBox } from '../physical';
import type { WallPos } from '../wall';

/**
 * Physical layout helpers for {@link Maze}: wall corners and mapping
 * rectangles back to rooms.
 *
 * @module maze.geometry
 */

/**
 * The two endpoints of a wall, in span order: the start corner, then the end
 * corner.
 */
export function corners<T>(this: Maze<T>, wallPos: WallPos): [PhysicalPos, PhysicalPos] {
  const c = this.center(wallPos.pos);
  const [start, end] = wallPos.wall.span;
  return [
    { x: c.x + start.dx, y: c.y + start.dy },
    { x: c.x + end.dx, y: c.y + end.dy },
  ];
}

/**
 * Positions at Chebyshev distance `distance` from `pos`, clockwise: the top
 * row left to right, the right column downwards, the bottom row right to
 * left, then the left column upwards.
 */
export function surround(pos: Pos, distance: number): Pos[] {
  const d = distance;
  const result: Pos[] = [];
  for (let col = pos.col - d; col <= pos.col + d; col++) {
    result.push({ col, row: pos.row - d });
  }
  for (let row = pos.row - d + 1; row < pos.row + d; row++) {
    result.push({ col: pos.col + d, row });
  }
  if (d !== 0) {
    for (let col = pos.col + d; col >= pos.col - d; col--) {
      result.push({ col, row: pos.row + d });
    }
  }
  for (let row = pos.row + d - 1; row > pos.row - d; row--) {
    result.push({ col: pos.col - d, row });
  }
  return result;
}

/**
 * Rooms whose centre or any corner lies inside the rectangle.
 *
 * Rings around the room under the rectangle's centre are searched outwards
 * until a ring contributes nothing, so the result is an approximation: a
 * rectangle strictly inside a room, touching neither its centre nor a
 * corner, yields nothing. Positions outside the maze may be included.
 */
export function roomsTouchedBy<T>(this: Maze<T>, box: ViewBox): Pos[] {
  const start = this.roomAt(box.center());
  const result: Pos[] = [];
  for (let distance = 0; ; distance++) {
    const before = result.length;
    for (const p of surround(start, distance)) {
      const c = this.center(p);
      const touched =
        box.contains(c) ||
        this.walls(p).some((wall) =>
          box.contains({ x: c.x + wall.span[0].dx, y: c.y + wall.span[0].dy })
        );
      if (touched) result.push(p);
    }
    if (result.length === before) break;
  }
  return result;
}
