/**
 * Grid and physical coordinate primitives.
 *
 * A {@link Pos} addresses a room in the room matrix; a {@link PhysicalPos}
 * is a point in the continuous plane the rooms are drawn on. Walls are
 * described by angles around a room centre, and rectangles in the plane are
 * {@link ViewBox} instances.
 *
 * @module physical
 */

/** A room position: column and row, both possibly negative. */
export interface Pos {
  col: number;
  row: number;
}

/** A point in the plane. The y axis points down. */
export interface PhysicalPos {
  x: number;
  y: number;
}

/** An angle in radians with its precomputed cosine (`dx`) and sine (`dy`). */
export interface Angle {
  readonly a: number;
  readonly dx: number;
  readonly dy: number;
}

export function pos(col: number, row: number): Pos {
  return { col, row };
}

export function posEquals(a: Pos, b: Pos): boolean {
  return a.col === b.col && a.row === b.row;
}

/** Lexicographic ordering by column, then row. */
export function comparePos(a: Pos, b: Pos): number {
  return a.col - b.col || a.row - b.row;
}

/** Stable string key for maps and sets. */
export function posKey(p: Pos): string {
  return `${p.col},${p.row}`;
}

export function offsetPos(p: Pos, dx: number, dy: number): Pos {
  return { col: p.col + dx, row: p.row + dy };
}

export function physicalPos(x: number, y: number): PhysicalPos {
  return { x, y };
}

export function addPhysical(a: PhysicalPos, b: PhysicalPos): PhysicalPos {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subPhysical(a: PhysicalPos, b: PhysicalPos): PhysicalPos {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scalePhysical(p: PhysicalPos, s: number): PhysicalPos {
  return { x: p.x * s, y: p.y * s };
}

/** Squared length of the vector `p`. */
export function valueSquared(p: PhysicalPos): number {
  return p.x * p.x + p.y * p.y;
}

/**
 * Builds an angle. When `dx`/`dy` are omitted they are computed; the wall
 * tables pass exact values so that corners of adjacent rooms coincide.
 */
export function angle(a: number, dx = Math.cos(a), dy = Math.sin(a)): Angle {
  return { a, dx, dy };
}

/**
 * An axis aligned rectangle: top-left corner plus size.
 */
export class ViewBox {
  constructor(
    readonly corner: PhysicalPos,
    readonly width: number,
    readonly height: number
  ) {}

  static centeredAt(center: PhysicalPos, width: number, height: number): ViewBox {
    return new ViewBox(
      { x: center.x - 0.5 * width, y: center.y - 0.5 * height },
      width,
      height
    );
  }

  /**
   * The smallest box containing every point, or `undefined` for no points.
   */
  static enclosing(points: Iterable<PhysicalPos>): ViewBox | undefined {
    let left = Infinity;
    let top = Infinity;
    let right = -Infinity;
    let bottom = -Infinity;
    for (const p of points) {
      left = Math.min(left, p.x);
      top = Math.min(top, p.y);
      right = Math.max(right, p.x);
      bottom = Math.max(bottom, p.y);
    }
    if (left > right || top > bottom) return undefined;
    return new ViewBox({ x: left, y: top }, right - left, bottom - top);
  }

  get left(): number {
    return this.corner.x;
  }

  get top(): number {
    return this.corner.y;
  }

  get right(): number {
    return this.corner.x + this.width;
  }

  get bottom(): number {
    return this.corner.y + this.height;
  }

  center(): PhysicalPos {
    return { x: this.corner.x + 0.5 * this.width, y: this.corner.y + 0.5 * this.height };
  }

  /** Grows the box by `d` on every side; a negative `d` shrinks it. */
  expand(d: number): ViewBox {
    return new ViewBox(
      { x: this.corner.x - d, y: this.corner.y - d },
      this.width + 2 * d,
      this.height + 2 * d
    );
  }

  /** Edges are inclusive. */
  contains(p: PhysicalPos): boolean {
    return p.x >= this.left && p.x <= this.right && p.y >= this.top && p.y <= this.bottom;
  }

  union(other: ViewBox): ViewBox {
    const left = Math.min(this.left, other.left);
    const top = Math.min(this.top, other.top);
    return new ViewBox(
      { x: left, y: top },
      Math.max(this.right, other.right) - left,
      Math.max(this.bottom, other.bottom) - top
    );
  }

  /** Cuts along the horizontal line `y = at`; returns the top and bottom parts. */
  splitHorizontal(at: number): [ViewBox, ViewBox] {
    const y = Math.min(Math.max(at, this.top), this.bottom);
    return [
      new ViewBox(this.corner, this.width, y - this.top),
      new ViewBox({ x: this.left, y }, this.width, this.bottom - y),
    ];
  }

  /** Cuts along the vertical line `x = at`; returns the left and right parts. */
  splitVertical(at: number): [ViewBox, ViewBox] {
    const x = Math.min(Math.max(at, this.left), this.right);
    return [
      new ViewBox(this.corner, x - this.left, this.height),
      new ViewBox({ x, y: this.top }, this.right - x, this.height),
    ];
  }

  /** Scales both the position and the size. */
  scale(s: number): ViewBox {
    return new ViewBox(scalePhysical(this.corner, s), this.width * s, this.height * s);
  }
}
