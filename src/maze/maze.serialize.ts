import type Maze from '../maze';
import Matrix from '../matrix';
import Room from '../room';
import { Shape, allWalls, parseShape } from '../shape';

/**
 * JSON form of a maze.
 *
 * Only the shape tag, the grid size and the room states are stored; wall
 * tables are static per shape and rebuilt on load. Rooms are listed row by
 * row.
 *
 * @module maze.serialize
 */

export const FORMAT_VERSION = 1;

export interface RoomJSON<T> {
  /** Open walls as a bitmask over catalog indices. */
  open: number;
  visited: boolean;
  data: T;
}

export interface MazeJSON<T> {
  formatVersion: number;
  shape: Shape;
  width: number;
  height: number;
  rooms: RoomJSON<T>[];
}

export function toJSONImpl<T>(maze: Maze<T>): MazeJSON<T> {
  return {
    formatVersion: FORMAT_VERSION,
    shape: maze.shape,
    width: maze.width,
    height: maze.height,
    rooms: maze.rooms.values().map((room) => ({
      open: room.openMask,
      visited: room.visited,
      data: room.data,
    })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function dimension(json: Record<string, unknown>, key: string): number {
  const value = json[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`invalid maze JSON: ${key} must be a non-negative integer`);
  }
  return value;
}

/**
 * Rebuilds the shape, size and room states of a maze from its JSON form.
 * Payloads are taken over as they are.
 *
 * @throws Error when the structure is malformed, a room opens a wall it does
 *   not have, or the two sides of a wall disagree.
 */
export function fromJSONImpl<T>(
  json: unknown,
  build: (shape: Shape, rooms: Matrix<Room<T>>) => Maze<T>,
  payload: (value: unknown) => T
): Maze<T> {
  if (!isRecord(json)) throw new Error('invalid maze JSON: expected an object');
  if (json.formatVersion !== FORMAT_VERSION) {
    throw new Error(`invalid maze JSON: unsupported formatVersion ${String(json.formatVersion)}`);
  }
  if (typeof json.shape !== 'string') throw new Error('invalid maze JSON: shape must be a string');
  const shape = parseShape(json.shape);
  const width = dimension(json, 'width');
  const height = dimension(json, 'height');
  const rooms = json.rooms;
  if (!Array.isArray(rooms) || rooms.length !== width * height) {
    throw new Error(`invalid maze JSON: expected ${width * height} rooms`);
  }

  const catalog = allWalls(shape);
  const matrix = new Matrix(width, height, ({ col, row }) => {
    const entry: unknown = rooms[col + row * width];
    const open = isRecord(entry) ? entry.open : undefined;
    const visited = isRecord(entry) ? entry.visited : undefined;
    if (typeof open !== 'number' || !Number.isInteger(open) || typeof visited !== 'boolean') {
      throw new Error(`invalid maze JSON: malformed room (${col}, ${row})`);
    }
    const room = new Room(payload(isRecord(entry) ? entry.data : undefined));
    room.openMask = open;
    room.visited = visited;
    return room;
  });
  const maze = build(shape, matrix);

  for (const pos of maze.positions()) {
    const room = maze.rooms.at(pos);
    const own = maze.walls(pos).reduce((mask, wall) => mask | wall.mask, 0);
    if ((room.openMask & ~own) !== 0 || room.openMask >= 1 << catalog.length) {
      throw new Error(`invalid maze JSON: room (${pos.col}, ${pos.row}) opens walls it does not have`);
    }
    for (const wallPos of maze.wallPositions(pos)) {
      const back = maze.back(wallPos);
      if (maze.isInside(back.pos) && maze.isOpen(wallPos) !== maze.isOpen(back)) {
        throw new Error(
          `invalid maze JSON: wall ${wallPos.wall.name} of (${pos.col}, ${pos.row}) is open on one side only`
        );
      }
    }
  }
  return maze;
}
