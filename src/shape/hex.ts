import { partition } from '../matrix';
import type { PhysicalPos, Pos } from '../physical';
import { buildCatalog, Wall, WallPos } from '../wall';
import type { ShapeGeometry } from './geometry';

/**
 * Pointy-top hexagonal rooms.
 *
 * Odd rows are shifted half a room to the left of even rows, so the wall
 * list (and the direction offsets to diagonal neighbours) depends on row
 * parity. Walls are stored in back-to-back pairs: `index ^ 1` is the same
 * wall seen from the other room.
 */

const D = Math.PI / 6;

const COS_30 = Math.sqrt(3) / 2;

const SIN_30 = 0.5;

const HORIZONTAL_MULTIPLICATOR = 2 * COS_30;

const VERTICAL_MULTIPLICATOR = 2 - SIN_30;

const TOP_HEIGHT = 1 + SIN_30;

const I = {
  LEFT0: 0,
  RIGHT0: 1,
  LEFT1: 2,
  RIGHT1: 3,
  UP_LEFT0: 4,
  DOWN_RIGHT1: 5,
  UP_LEFT1: 6,
  DOWN_RIGHT0: 7,
  UP_RIGHT0: 8,
  DOWN_LEFT1: 9,
  UP_RIGHT1: 10,
  DOWN_LEFT0: 11,
} as const;

const catalog = buildCatalog(
  'hex',
  D,
  [
    {
      name: 'LEFT0',
      dir: [-1, 0],
      span: [5, 7],
      cornerWallOffsets: [
        { dx: -1, dy: 0, wall: I.DOWN_RIGHT0 },
        { dx: 0, dy: 1, wall: I.UP_RIGHT1 },
      ],
    },
    {
      name: 'RIGHT0',
      dir: [1, 0],
      span: [11, 13],
      cornerWallOffsets: [
        { dx: 1, dy: 0, wall: I.UP_LEFT0 },
        { dx: 1, dy: -1, wall: I.DOWN_LEFT1 },
      ],
    },
    {
      name: 'LEFT1',
      dir: [-1, 0],
      span: [5, 7],
      cornerWallOffsets: [
        { dx: -1, dy: 0, wall: I.DOWN_RIGHT1 },
        { dx: -1, dy: 1, wall: I.UP_RIGHT0 },
      ],
    },
    {
      name: 'RIGHT1',
      dir: [1, 0],
      span: [11, 13],
      cornerWallOffsets: [
        { dx: 1, dy: 0, wall: I.UP_LEFT1 },
        { dx: 0, dy: -1, wall: I.DOWN_LEFT0 },
      ],
    },
    {
      name: 'UP_LEFT0',
      dir: [0, -1],
      span: [7, 9],
      cornerWallOffsets: [
        { dx: 0, dy: -1, wall: I.DOWN_LEFT1 },
        { dx: -1, dy: 0, wall: I.RIGHT0 },
      ],
    },
    {
      name: 'DOWN_RIGHT1',
      dir: [0, 1],
      span: [1, 3],
      cornerWallOffsets: [
        { dx: 0, dy: 1, wall: I.UP_RIGHT0 },
        { dx: 1, dy: 0, wall: I.LEFT1 },
      ],
    },
    {
      name: 'UP_LEFT1',
      dir: [-1, -1],
      span: [7, 9],
      cornerWallOffsets: [
        { dx: -1, dy: -1, wall: I.DOWN_LEFT0 },
        { dx: -1, dy: 0, wall: I.RIGHT1 },
      ],
    },
    {
      name: 'DOWN_RIGHT0',
      dir: [1, 1],
      span: [1, 3],
      cornerWallOffsets: [
        { dx: 1, dy: 1, wall: I.UP_RIGHT1 },
        { dx: 1, dy: 0, wall: I.LEFT0 },
      ],
    },
    {
      name: 'UP_RIGHT0',
      dir: [1, -1],
      span: [9, 11],
      cornerWallOffsets: [
        { dx: 1, dy: -1, wall: I.LEFT1 },
        { dx: 0, dy: -1, wall: I.DOWN_RIGHT1 },
      ],
    },
    {
      name: 'DOWN_LEFT1',
      dir: [-1, 1],
      span: [3, 5],
      cornerWallOffsets: [
        { dx: -1, dy: 1, wall: I.RIGHT0 },
        { dx: 0, dy: 1, wall: I.UP_LEFT0 },
      ],
    },
    {
      name: 'UP_RIGHT1',
      dir: [0, -1],
      span: [9, 11],
      cornerWallOffsets: [
        { dx: 0, dy: -1, wall: I.LEFT0 },
        { dx: -1, dy: -1, wall: I.DOWN_RIGHT0 },
      ],
    },
    {
      name: 'DOWN_LEFT0',
      dir: [0, 1],
      span: [3, 5],
      cornerWallOffsets: [
        { dx: 0, dy: 1, wall: I.RIGHT1 },
        { dx: 1, dy: 1, wall: I.UP_LEFT1 },
      ],
    },
  ],
  [
    ['LEFT0', 'UP_LEFT0', 'UP_RIGHT0', 'RIGHT0', 'DOWN_RIGHT0', 'DOWN_LEFT0'],
    ['LEFT1', 'UP_LEFT1', 'UP_RIGHT1', 'RIGHT1', 'DOWN_RIGHT1', 'DOWN_LEFT1'],
  ]
);

/** Named hex walls; the digit is the row parity they belong to. */
export const HexWalls = {
  LEFT0: catalog.byName('LEFT0'),
  RIGHT0: catalog.byName('RIGHT0'),
  LEFT1: catalog.byName('LEFT1'),
  RIGHT1: catalog.byName('RIGHT1'),
  UP_LEFT0: catalog.byName('UP_LEFT0'),
  DOWN_RIGHT1: catalog.byName('DOWN_RIGHT1'),
  UP_LEFT1: catalog.byName('UP_LEFT1'),
  DOWN_RIGHT0: catalog.byName('DOWN_RIGHT0'),
  UP_RIGHT0: catalog.byName('UP_RIGHT0'),
  DOWN_LEFT1: catalog.byName('DOWN_LEFT1'),
  UP_RIGHT1: catalog.byName('UP_RIGHT1'),
  DOWN_LEFT0: catalog.byName('DOWN_LEFT0'),
} as const;

const isOddRow = (pos: Pos): boolean => (pos.row & 1) === 1;

export const hex: ShapeGeometry = {
  name: 'hex',
  wallCount: 6,
  catalog,

  walls(pos: Pos): readonly Wall[] {
    return catalog.rooms[isOddRow(pos) ? 1 : 0];
  },

  backIndex(index: number): number {
    return index ^ 0b0001;
  },

  opposite(wallPos: WallPos): Wall | undefined {
    const index = wallPos.wall.index;
    // Left and right walls are paired back-to-back with each other
    return catalog.all[(index & ~0b0011) === 0 ? index ^ 0b0001 : index ^ 0b0011];
  },

  center(pos: Pos): PhysicalPos {
    return {
      x: (pos.col + (isOddRow(pos) ? 0.5 : 1)) * HORIZONTAL_MULTIPLICATOR,
      y: pos.row * VERTICAL_MULTIPLICATOR + 1,
    };
  },

  roomAt(pos: PhysicalPos): Pos {
    const [approxRow, relY] = partition(pos.y / VERTICAL_MULTIPLICATOR);
    const oddRow = (approxRow & 1) === 1;
    const [approxCol, relX] = partition(
      pos.x / HORIZONTAL_MULTIPLICATOR - (oddRow ? 0 : 0.5)
    );

    // Points above the slanted top edges belong to the previous row
    const pastCenterX = relX > 0.5;
    const corner = (pastCenterX ? relX - 0.5 : 0.5 - relX) / TOP_HEIGHT > relY;
    const pastCenterY = relY > 0.5;

    let col = approxCol;
    if (corner && oddRow && !pastCenterX) col -= 1;
    else if (corner && !oddRow && pastCenterX) col += 1;

    let row = approxRow;
    if (corner) row += pastCenterY ? 1 : -1;

    return { col, row };
  },

  minimalDimensions(width: number, height: number): [number, number] {
    const rows = Math.max(1, Math.ceil((height - SIN_30) / VERTICAL_MULTIPLICATOR));
    // With more than one row the shifted rows add half a room of width
    const hoffset = rows > 1 ? 0.5 : 0;
    const cols = Math.max(1, Math.ceil(width / HORIZONTAL_MULTIPLICATOR - hoffset));
    return [cols, rows];
  },
};
