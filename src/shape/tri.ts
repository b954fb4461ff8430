import { partition } from '../matrix';
import type { PhysicalPos, Pos } from '../physical';
import { buildCatalog, Wall } from '../wall';
import type { ShapeGeometry } from './geometry';

/**
 * Triangular rooms.
 *
 * Rooms alternate between pointing down (`(col + row)` even, flat edge on
 * top) and pointing up ("reversed", flat edge at the bottom). Each room is
 * half as wide as its flat edge, so neighbouring columns overlap.
 */

const D = Math.PI / 6;

const HORIZONTAL_MULTIPLICATOR = Math.sqrt(3) / 2;

const VERTICAL_MULTIPLICATOR = 2 - 1 / 2;

const OFFSET = 1 / 4;

const I = {
  LEFT0: 0,
  RIGHT1: 1,
  LEFT1: 2,
  RIGHT0: 3,
  UP: 4,
  DOWN: 5,
} as const;

const catalog = buildCatalog(
  'tri',
  D,
  [
    {
      name: 'LEFT0',
      dir: [-1, 0],
      span: [3, 7],
      cornerWallOffsets: [
        { dx: -1, dy: 0, wall: I.DOWN },
        { dx: -1, dy: 1, wall: I.RIGHT0 },
        { dx: 0, dy: 1, wall: I.RIGHT1 },
        { dx: 1, dy: 1, wall: I.UP },
        { dx: 1, dy: 0, wall: I.LEFT1 },
      ],
    },
    {
      name: 'RIGHT1',
      dir: [1, 0],
      span: [9, 13],
      cornerWallOffsets: [
        { dx: 1, dy: 0, wall: I.UP },
        { dx: 1, dy: -1, wall: I.LEFT1 },
        { dx: 0, dy: -1, wall: I.LEFT0 },
        { dx: -1, dy: -1, wall: I.DOWN },
        { dx: -1, dy: 0, wall: I.RIGHT0 },
      ],
    },
    {
      name: 'LEFT1',
      dir: [-1, 0],
      span: [5, 9],
      cornerWallOffsets: [
        { dx: -1, dy: 0, wall: I.LEFT0 },
        { dx: -2, dy: 0, wall: I.DOWN },
        { dx: -2, dy: 1, wall: I.RIGHT0 },
        { dx: -1, dy: 1, wall: I.RIGHT1 },
        { dx: 0, dy: 1, wall: I.UP },
      ],
    },
    {
      name: 'RIGHT0',
      dir: [1, 0],
      span: [11, 15],
      cornerWallOffsets: [
        { dx: 1, dy: 0, wall: I.RIGHT1 },
        { dx: 2, dy: 0, wall: I.UP },
        { dx: 2, dy: -1, wall: I.LEFT1 },
        { dx: 1, dy: -1, wall: I.LEFT0 },
        { dx: 0, dy: -1, wall: I.DOWN },
      ],
    },
    {
      name: 'UP',
      dir: [0, -1],
      span: [7, 11],
      cornerWallOffsets: [
        { dx: 0, dy: -1, wall: I.LEFT1 },
        { dx: -1, dy: -1, wall: I.LEFT0 },
        { dx: -2, dy: -1, wall: I.DOWN },
        { dx: -2, dy: 0, wall: I.RIGHT0 },
        { dx: -1, dy: 0, wall: I.RIGHT1 },
      ],
    },
    {
      name: 'DOWN',
      dir: [0, 1],
      span: [1, 5],
      cornerWallOffsets: [
        { dx: 0, dy: 1, wall: I.RIGHT0 },
        { dx: 1, dy: 1, wall: I.RIGHT1 },
        { dx: 2, dy: 1, wall: I.UP },
        { dx: 2, dy: 0, wall: I.LEFT1 },
        { dx: 1, dy: 0, wall: I.LEFT0 },
      ],
    },
  ],
  [
    ['LEFT0', 'UP', 'RIGHT0'],
    ['LEFT1', 'RIGHT1', 'DOWN'],
  ]
);

/** Named tri walls; the digit is the room parity they belong to. */
export const TriWalls = {
  LEFT0: catalog.byName('LEFT0'),
  RIGHT1: catalog.byName('RIGHT1'),
  LEFT1: catalog.byName('LEFT1'),
  RIGHT0: catalog.byName('RIGHT0'),
  UP: catalog.byName('UP'),
  DOWN: catalog.byName('DOWN'),
} as const;

/** Whether the room points up. */
export function isReversed(pos: Pos): boolean {
  return ((pos.col + pos.row) & 1) !== 0;
}

export const tri: ShapeGeometry = {
  name: 'tri',
  wallCount: 3,
  catalog,

  walls(pos: Pos): readonly Wall[] {
    return catalog.rooms[isReversed(pos) ? 1 : 0];
  },

  backIndex(index: number): number {
    return index ^ 0b0001;
  },

  opposite(): Wall | undefined {
    // A triangle has no wall across from another
    return undefined;
  },

  center(pos: Pos): PhysicalPos {
    return {
      x: (pos.col + 0.5) * HORIZONTAL_MULTIPLICATOR,
      y: (pos.row + 0.5) * VERTICAL_MULTIPLICATOR + (isReversed(pos) ? OFFSET : -OFFSET),
    };
  },

  roomAt(pos: PhysicalPos): Pos {
    // Vertices lie on whole multiples of the shifted x coordinate, so every
    // strip between two of them is split by one slanted edge
    const [row, relY] = partition(pos.y / VERTICAL_MULTIPLICATOR);
    const [col, relX] = partition(pos.x / HORIZONTAL_MULTIPLICATOR - 0.5);
    const left = isReversed({ col, row }) ? relX < relY : relX + relY < 1;
    return { col: left ? col : col + 1, row };
  },

  minimalDimensions(width: number, height: number): [number, number] {
    return [
      Math.max(1, Math.ceil(width / HORIZONTAL_MULTIPLICATOR - 1)),
      Math.ceil(Math.max(height, VERTICAL_MULTIPLICATOR) / VERTICAL_MULTIPLICATOR),
    ];
  },
};
