import { PhysicalPos, Pos, ViewBox, offsetPos } from './physical';
import type { ShapeGeometry } from './shape/geometry';
import { hex } from './shape/hex';
import { quad } from './shape/quad';
import { tri } from './shape/tri';
import type { ShapeName, Wall, WallPos } from './wall';

/**
 * Shape dispatch.
 *
 * A maze is tagged with one of three fixed tilings; every geometric question
 * is answered by switching on that tag and consulting the matching static
 * table and formulas in `./shape/*`.
 *
 * @module shape
 */

export type Shape = ShapeName;

export const SHAPES: readonly Shape[] = ['tri', 'quad', 'hex'];

export function geometry(shape: Shape): ShapeGeometry {
  switch (shape) {
    case 'tri':
      return tri;
    case 'quad':
      return quad;
    case 'hex':
      return hex;
    default:
      throw new Error(`unknown shape: ${String(shape)}`);
  }
}

/** Number of walls of every room. */
export function wallCount(shape: Shape): number {
  return geometry(shape).wallCount;
}

/** Every wall slot of the shape, in catalog order. */
export function allWalls(shape: Shape): readonly Wall[] {
  return geometry(shape).catalog.all;
}

export function walls(shape: Shape, pos: Pos): readonly Wall[] {
  return geometry(shape).walls(pos);
}

/** The same wall seen from the room on its other side. */
export function back(shape: Shape, wallPos: WallPos): WallPos {
  const g = geometry(shape);
  const { pos, wall } = wallPos;
  return {
    pos: offsetPos(pos, wall.dir[0], wall.dir[1]),
    wall: g.catalog.all[g.backIndex(wall.index)],
  };
}

export function opposite(shape: Shape, wallPos: WallPos): Wall | undefined {
  return geometry(shape).opposite(wallPos);
}

export function center(shape: Shape, pos: Pos): PhysicalPos {
  return geometry(shape).center(pos);
}

export function roomAt(shape: Shape, pos: PhysicalPos): Pos {
  return geometry(shape).roomAt(pos);
}

/**
 * The room containing `pos` together with the wall whose span covers the
 * direction from the room's centre to `pos`. Not bounds checked.
 */
export function wallPosAt(shape: Shape, pos: PhysicalPos): WallPos {
  const g = geometry(shape);
  const room = g.roomAt(pos);
  const c = g.center(room);
  const a = Math.atan2(pos.y - c.y, pos.x - c.x);
  const wall = g.walls(room).find((w) => w.inSpan(a));
  if (!wall) throw new Error(`${shape} walls of (${room.col}, ${room.row}) do not cover angle ${a}`);
  return { pos: room, wall };
}

/** Smallest `[cols, rows]` whose viewbox covers `width` × `height`. */
export function minimalDimensions(shape: Shape, width: number, height: number): [number, number] {
  return geometry(shape).minimalDimensions(width, height);
}

/**
 * Every wall meeting at the start corner of `wallPos`'s span, one per room,
 * starting with `wallPos` itself. Positions may lie outside any maze.
 */
export function cornerWalls(shape: Shape, wallPos: WallPos): WallPos[] {
  const all = allWalls(shape);
  return [
    wallPos,
    ...wallPos.wall.cornerWallOffsets.map((o) => ({
      pos: offsetPos(wallPos.pos, o.dx, o.dy),
      wall: all[o.wall],
    })),
  ];
}

/**
 * Bounding box of a `cols` × `rows` grid.
 *
 * Only the first and last column of every row are inspected: the tiling is
 * regular, so horizontal extremes only occur there.
 */
export function viewbox(shape: Shape, cols: number, rows: number): ViewBox {
  const g = geometry(shape);
  const corners: PhysicalPos[] = [];
  for (let row = 0; row < rows && cols > 0; row++) {
    for (const col of [0, cols - 1]) {
      const p = { col, row };
      const c = g.center(p);
      for (const wall of g.walls(p)) {
        corners.push({ x: c.x + wall.span[0].dx, y: c.y + wall.span[0].dy });
      }
    }
  }
  return ViewBox.enclosing(corners) ?? new ViewBox({ x: 0, y: 0 }, 0, 0);
}

/**
 * Parses a shape name (`tri`, `quad`, `hex`) or wall count (`3`, `4`, `6`).
 *
 * @throws Error for anything else.
 */
export function parseShape(text: string): Shape {
  const value = text.trim().toLowerCase();
  switch (value) {
    case 'tri':
    case '3':
      return 'tri';
    case 'quad':
    case '4':
      return 'quad';
    case 'hex':
    case '6':
      return 'hex';
    default:
      throw new Error(`unknown shape: ${text}`);
  }
}

/**
 * @throws Error when no shape has `count` walls.
 */
export function shapeFromWallCount(count: number): Shape {
  const shape = SHAPES.find((s) => wallCount(s) === count);
  if (!shape) throw new Error(`invalid wall count: ${count}`);
  return shape;
}
