import type Maze from '../maze';
import { Pos, offsetPos, posEquals } from '../physical';
import type { WallPos } from '../wall';

/**
 * Wall state and connectivity queries for {@link Maze}.
 *
 * `setOpen` is the only mutator of wall state. It always writes both sides
 * of a wall, which is what keeps `isOpen(w) === isOpen(back(w))` true for
 * every wall position.
 *
 * @module maze.topology
 */

/** Whether the wall is open; always false for rooms outside the maze. */
export function isOpen<T>(this: Maze<T>, wallPos: WallPos): boolean {
  const room = this.rooms.get(wallPos.pos);
  return room ? room.isOpen(wallPos.wall) : false;
}

/**
 * Opens or closes a wall on both of its sides. Sides outside the maze are
 * skipped.
 */
export function setOpen<T>(this: Maze<T>, wallPos: WallPos, value: boolean): void {
  const back = this.back(wallPos);
  this.rooms.get(wallPos.pos)?.setOpen(wallPos.wall, value);
  this.rooms.get(back.pos)?.setOpen(back.wall, value);
}

/** The wall of `from` leading to `to`, if the rooms are adjacent. */
export function connectingWall<T>(this: Maze<T>, from: Pos, to: Pos): WallPos | undefined {
  const wall = this.walls(from).find((w) =>
    posEquals(offsetPos(from, w.dir[0], w.dir[1]), to)
  );
  return wall ? { pos: from, wall } : undefined;
}

/** True for the same room, or for adjacent rooms with an open wall between them. */
export function connected<T>(this: Maze<T>, pos1: Pos, pos2: Pos): boolean {
  if (posEquals(pos1, pos2)) return true;
  const wallPos = connectingWall.call(this, pos1, pos2);
  return wallPos ? isOpen.call(this, wallPos) : false;
}

/** Open walls of the room at `pos`. */
export function doors<T>(this: Maze<T>, pos: Pos): WallPos[] {
  return this.wallPositions(pos).filter((wp) => isOpen.call(this, wp));
}

/** Rooms inside the maze reachable from `pos` through one open wall. */
export function neighbors<T>(this: Maze<T>, pos: Pos): Pos[] {
  return doors
    .call(this, pos)
    .map((wp) => this.back(wp).pos)
    .filter((p) => this.isInside(p));
}

/** Every position sharing a wall with `pos`, inside the maze or not. */
export function adjacent<T>(this: Maze<T>, pos: Pos): Pos[] {
  return this.walls(pos).map((w) => offsetPos(pos, w.dir[0], w.dir[1]));
}
