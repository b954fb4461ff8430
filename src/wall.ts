import { Angle, Pos, angle, comparePos, posEquals, posKey } from './physical';

/** The three supported tilings. */
export type ShapeName = 'tri' | 'quad' | 'hex';

const RADIAN_BOUND = 2 * Math.PI;

/**
 * A wall sharing the start corner of another wall, relative to the room of
 * the wall it is listed on.
 */
export interface CornerWallOffset {
  readonly dx: number;
  readonly dy: number;
  /** Catalog index of the neighbouring wall. */
  readonly wall: number;
}

/** Static description of one wall slot, as written in a shape table. */
export interface WallDefinition {
  name: string;
  /** Direction to the room on the other side. */
  dir: readonly [number, number];
  /** Start and end of the span, in multiples of the shape's angle step. */
  span: readonly [number, number];
  cornerWallOffsets: readonly CornerWallOffset[];
}

/**
 * One wall slot of a shape. Instances are created once per shape and never
 * mutated; identity comparison is therefore safe, but {@link Wall.equals}
 * follows the (shape, index, direction) definition.
 */
export class Wall {
  constructor(
    readonly name: string,
    readonly shape: ShapeName,
    /** Position in the shape's catalog. */
    readonly index: number,
    /** Position in the clockwise wall list of the rooms owning this wall. */
    readonly ordinal: number,
    readonly dir: readonly [number, number],
    readonly span: readonly [Angle, Angle],
    readonly cornerWallOffsets: readonly CornerWallOffset[],
    /** Catalog index of the counter-clockwise neighbour in the same room. */
    readonly previous: number,
    /** Catalog index of the clockwise neighbour in the same room. */
    readonly next: number
  ) {}

  /** Bit of this wall in a room's open-wall mask. */
  get mask(): number {
    return 1 << this.index;
  }

  /** Maps any angle into `[0, 2π)`. */
  static normalizedAngle(a: number): number {
    if (a >= 0 && a < RADIAN_BOUND) return a;
    const t = a % RADIAN_BOUND;
    return t >= 0 ? t : t + RADIAN_BOUND;
  }

  /**
   * Whether the direction `a` from the room centre hits this wall. Spans are
   * half open: the start is included, the end belongs to the next wall.
   */
  inSpan(a: number): boolean {
    const n = Wall.normalizedAngle(a);
    const [start, end] = this.span;
    return start.a < end.a
      ? start.a <= n && n < end.a
      : start.a <= n || n < end.a;
  }

  equals(other: Wall): boolean {
    return (
      this.shape === other.shape &&
      this.index === other.index &&
      this.dir[0] === other.dir[0] &&
      this.dir[1] === other.dir[1]
    );
  }

  toString(): string {
    return this.name;
  }
}

/** A wall in a specific room. */
export interface WallPos {
  pos: Pos;
  wall: Wall;
}

export function wallPos(p: Pos, wall: Wall): WallPos {
  return { pos: p, wall };
}

export function wallPosEquals(a: WallPos, b: WallPos): boolean {
  return posEquals(a.pos, b.pos) && a.wall.equals(b.wall);
}

/** Orders by room position, then wall index. */
export function compareWallPos(a: WallPos, b: WallPos): number {
  return comparePos(a.pos, b.pos) || a.wall.index - b.wall.index;
}

export function wallPosKey(wp: WallPos): string {
  return `${posKey(wp.pos)}:${wp.wall.index}`;
}

export function formatWallPos(wp: WallPos): string {
  return `(${wp.pos.col}, ${wp.pos.row}) ${wp.wall.name}`;
}

// Trigonometry rounds 0, ±1/2, ±√3/2, ±√2/2 and ±1 a few ulps off; snapping
// makes corners shared by neighbouring rooms compare equal.
const EXACT = [0, 0.5, Math.sqrt(3) / 2, Math.SQRT1_2, 1];

function snap(v: number): number {
  for (const e of EXACT) {
    if (Math.abs(v - e) < 1e-12) return e;
    if (Math.abs(v + e) < 1e-12) return -e;
  }
  return v;
}

function spanAngle(multiple: number, step: number): Angle {
  const a = Wall.normalizedAngle(multiple * step);
  return angle(a, snap(Math.cos(a)), snap(Math.sin(a)));
}

/**
 * A shape's complete wall table: every wall slot, plus the clockwise wall
 * list for each room variant.
 */
export interface WallCatalog {
  readonly shape: ShapeName;
  readonly all: readonly Wall[];
  /** One clockwise wall list per room variant (parity). */
  readonly rooms: readonly (readonly Wall[])[];
  byName(name: string): Wall;
}

/**
 * Builds a catalog from definitions listed in index order. `roomLists` holds,
 * per room variant, the clockwise list of wall names; it determines each
 * wall's ordinal and its previous/next neighbours.
 *
 * A malformed table throws: every wall must appear in exactly one room list,
 * and every corner offset must reference an existing wall.
 */
export function buildCatalog(
  shape: ShapeName,
  step: number,
  definitions: readonly WallDefinition[],
  roomLists: readonly (readonly string[])[]
): WallCatalog {
  const indexOf = new Map<string, number>();
  definitions.forEach((d, i) => indexOf.set(d.name, i));

  const placement = new Map<number, { ordinal: number; list: readonly number[] }>();
  for (const names of roomLists) {
    const list = names.map((name) => {
      const index = indexOf.get(name);
      if (index === undefined) {
        throw new Error(`${shape}: room list references unknown wall ${name}`);
      }
      return index;
    });
    list.forEach((index, ordinal) => {
      if (placement.has(index)) {
        throw new Error(`${shape}: wall ${names[ordinal]} listed in more than one room`);
      }
      placement.set(index, { ordinal, list });
    });
  }

  const all = definitions.map((d, index) => {
    const placed = placement.get(index);
    if (!placed) throw new Error(`${shape}: wall ${d.name} belongs to no room`);
    for (const offset of d.cornerWallOffsets) {
      if (offset.wall < 0 || offset.wall >= definitions.length) {
        throw new Error(`${shape}: wall ${d.name} has a corner offset to unknown wall ${offset.wall}`);
      }
    }
    const { ordinal, list } = placed;
    const count = list.length;
    return new Wall(
      `${shape}:${d.name}`,
      shape,
      index,
      ordinal,
      d.dir,
      [spanAngle(d.span[0], step), spanAngle(d.span[1], step)],
      d.cornerWallOffsets,
      list[(ordinal + count - 1) % count],
      list[(ordinal + 1) % count]
    );
  });

  const rooms = roomLists.map((names) => names.map((name) => all[indexOf.get(name) ?? -1]));
  return {
    shape,
    all,
    rooms,
    byName(name: string): Wall {
      const index = indexOf.get(name);
      if (index === undefined) throw new Error(`${shape}: unknown wall ${name}`);
      return all[index];
    },
  };
}
