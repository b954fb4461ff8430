import type { PhysicalPos, Pos } from '../physical';
import { buildCatalog, Wall, WallPos } from '../wall';
import type { ShapeGeometry } from './geometry';

/**
 * Square rooms.
 *
 * Corners sit at unit distance from the centre, so a room is √2 wide. The
 * wall list is the same for every room.
 */

const D = Math.PI / 4;

const MULTIPLICATOR = Math.SQRT2;

const I = { UP: 0, LEFT: 1, DOWN: 2, RIGHT: 3 } as const;

const catalog = buildCatalog(
  'quad',
  D,
  [
    {
      name: 'UP',
      dir: [0, -1],
      span: [5, 7],
      cornerWallOffsets: [
        { dx: 0, dy: -1, wall: I.LEFT },
        { dx: -1, dy: -1, wall: I.DOWN },
        { dx: -1, dy: 0, wall: I.RIGHT },
      ],
    },
    {
      name: 'LEFT',
      dir: [-1, 0],
      span: [3, 5],
      cornerWallOffsets: [
        { dx: -1, dy: 0, wall: I.DOWN },
        { dx: -1, dy: 1, wall: I.RIGHT },
        { dx: 0, dy: 1, wall: I.UP },
      ],
    },
    {
      name: 'DOWN',
      dir: [0, 1],
      span: [1, 3],
      cornerWallOffsets: [
        { dx: 0, dy: 1, wall: I.RIGHT },
        { dx: 1, dy: 1, wall: I.UP },
        { dx: 1, dy: 0, wall: I.LEFT },
      ],
    },
    {
      name: 'RIGHT',
      dir: [1, 0],
      span: [7, 1],
      cornerWallOffsets: [
        { dx: 1, dy: 0, wall: I.UP },
        { dx: 1, dy: -1, wall: I.LEFT },
        { dx: 0, dy: -1, wall: I.DOWN },
      ],
    },
  ],
  [['LEFT', 'UP', 'RIGHT', 'DOWN']]
);

/** Named quad walls. */
export const QuadWalls = {
  UP: catalog.byName('UP'),
  LEFT: catalog.byName('LEFT'),
  DOWN: catalog.byName('DOWN'),
  RIGHT: catalog.byName('RIGHT'),
} as const;

const ROOM = catalog.rooms[0];

export const quad: ShapeGeometry = {
  name: 'quad',
  wallCount: 4,
  catalog,

  walls(): readonly Wall[] {
    return ROOM;
  },

  backIndex(index: number): number {
    return index ^ 0b10;
  },

  opposite(wallPos: WallPos): Wall | undefined {
    return catalog.all[(wallPos.wall.index + 2) % 4];
  },

  center(pos: Pos): PhysicalPos {
    return {
      x: (pos.col + 0.5) * MULTIPLICATOR,
      y: (pos.row + 0.5) * MULTIPLICATOR,
    };
  },

  roomAt(pos: PhysicalPos): Pos {
    return {
      col: Math.floor(pos.x / MULTIPLICATOR),
      row: Math.floor(pos.y / MULTIPLICATOR),
    };
  },

  minimalDimensions(width: number, height: number): [number, number] {
    return [
      Math.ceil(Math.max(width, MULTIPLICATOR) / MULTIPLICATOR),
      Math.ceil(Math.max(height, MULTIPLICATOR) / MULTIPLICATOR),
    ];
  },
};

