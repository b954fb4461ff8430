import type { PhysicalPos, Pos } from '../physical';
import type { ShapeName, Wall, WallCatalog, WallPos } from '../wall';

/**
 * Per-shape geometry: the wall table plus the closed-form placement of rooms
 * on the plane. One implementation exists for each tiling.
 */
export interface ShapeGeometry {
  readonly name: ShapeName;
  readonly wallCount: number;
  readonly catalog: WallCatalog;

  /** Clockwise walls of the room at `pos`; may depend on its parity. */
  walls(pos: Pos): readonly Wall[];

  /** Catalog index of the same wall seen from the neighbouring room. */
  backIndex(index: number): number;

  /** The wall across the room, or `undefined` for odd wall counts. */
  opposite(wallPos: WallPos): Wall | undefined;

  center(pos: Pos): PhysicalPos;

  /**
   * The room containing `pos`. Not bounds checked: the result may lie
   * outside any maze.
   */
  roomAt(pos: PhysicalPos): Pos;

  /** Smallest grid whose viewbox covers `width` × `height`. */
  minimalDimensions(width: number, height: number): [number, number];
}
