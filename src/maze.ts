import Matrix from './matrix';
import { PhysicalPos, Pos, ViewBox } from './physical';
import Room from './room';
import * as shapes from './shape';
import type { Shape } from './shape';
import type { Wall, WallPos } from './wall';
import type { Randomizer } from './random/randomizer';
import {
  isOpen as _isOpen,
  setOpen as _setOpen,
  connectingWall as _connectingWall,
  connected as _connected,
  doors as _doors,
  neighbors as _neighbors,
  adjacent as _adjacent,
} from './maze/maze.topology';
import {
  corners as _corners,
  roomsTouchedBy as _roomsTouchedBy,
} from './maze/maze.geometry';
import {
  MazeJSON,
  toJSONImpl as _toJSONImpl,
  fromJSONImpl as _fromJSONImpl,
} from './maze/maze.serialize';
import { Path, FollowWallItem, walk as _walk, followWall as _followWall } from './walk';
import { Method, MethodName, initialize as _initialize } from './initialize/method';

/**
 * A grid of rooms of one shape, joined or separated by walls, each room
 * carrying a payload of type `T`.
 *
 * Geometry questions are forwarded to the shape; wall state lives in the
 * rooms and is only ever changed through {@link Maze.setOpen}, which keeps
 * both sides of a wall in agreement.
 *
 * Typical use:
 * ```ts
 * const maze = Maze.create('hex', 10, 8).initialize(new LFSR(12345n));
 * const path = maze.walk({ col: 0, row: 0 }, { col: 9, row: 7 });
 * ```
 */
export default class Maze<T = undefined> {
  constructor(
    readonly shape: Shape,
    readonly rooms: Matrix<Room<T>>
  ) {}

  /** A fully closed maze without payloads. */
  static create(shape: Shape, width: number, height: number): Maze<undefined> {
    return Maze.createWithData(shape, width, height, () => undefined);
  }

  /** A fully closed maze with a payload computed per room. */
  static createWithData<T>(
    shape: Shape,
    width: number,
    height: number,
    data: (pos: Pos) => T
  ): Maze<T> {
    return new Maze(shape, new Matrix(width, height, (pos) => new Room(data(pos))));
  }

  get width(): number {
    return this.rooms.width;
  }

  get height(): number {
    return this.rooms.height;
  }

  /** Every room position, row by row. */
  positions(): Pos[] {
    return this.rooms.positions();
  }

  isInside(pos: Pos): boolean {
    return this.rooms.isInside(pos);
  }

  /** The payload of a room, or `undefined` outside the maze. */
  data(pos: Pos): T | undefined {
    return this.rooms.get(pos)?.data;
  }

  /** @throws RangeError outside the maze. */
  setData(pos: Pos, data: T): void {
    this.rooms.at(pos).data = data;
  }

  // Geometry

  walls(pos: Pos): readonly Wall[] {
    return shapes.walls(this.shape, pos);
  }

  allWalls(): readonly Wall[] {
    return shapes.allWalls(this.shape);
  }

  /** The walls of `pos` paired with the position, clockwise. */
  wallPositions(pos: Pos): WallPos[] {
    return this.walls(pos).map((wall) => ({ pos, wall }));
  }

  back(wallPos: WallPos): WallPos {
    return shapes.back(this.shape, wallPos);
  }

  opposite(wallPos: WallPos): Wall | undefined {
    return shapes.opposite(this.shape, wallPos);
  }

  /** The counter-clockwise neighbour of a wall in the same room. */
  previousWall(wallPos: WallPos): WallPos {
    return { pos: wallPos.pos, wall: this.allWalls()[wallPos.wall.previous] };
  }

  /** The clockwise neighbour of a wall in the same room. */
  nextWall(wallPos: WallPos): WallPos {
    return { pos: wallPos.pos, wall: this.allWalls()[wallPos.wall.next] };
  }

  center(pos: Pos): PhysicalPos {
    return shapes.center(this.shape, pos);
  }

  roomAt(pos: PhysicalPos): Pos {
    return shapes.roomAt(this.shape, pos);
  }

  /** The room containing `pos` and the wall facing it; may lie outside the maze. */
  wallPosAt(pos: PhysicalPos): WallPos {
    return shapes.wallPosAt(this.shape, pos);
  }

  corners(wallPos: WallPos): [PhysicalPos, PhysicalPos] {
    return _corners.call(this, wallPos);
  }

  cornerWalls(wallPos: WallPos): WallPos[] {
    return shapes.cornerWalls(this.shape, wallPos);
  }

  /** Bounding box of every room. */
  viewbox(): ViewBox {
    return shapes.viewbox(this.shape, this.width, this.height);
  }

  /**
   * Rooms whose centre or a corner lies in the box; see
   * {@link roomsTouchedBy} in `maze.geometry` for the search.
   */
  roomsTouchedBy(box: ViewBox): Pos[];
  roomsTouchedBy(center: PhysicalPos, width: number, height: number): Pos[];
  roomsTouchedBy(box: ViewBox | PhysicalPos, width?: number, height?: number): Pos[] {
    const viewbox =
      box instanceof ViewBox ? box : ViewBox.centeredAt(box, width ?? 0, height ?? 0);
    return _roomsTouchedBy.call(this, viewbox);
  }

  // Topology

  isOpen(wallPos: WallPos): boolean {
    return _isOpen.call(this, wallPos);
  }

  setOpen(wallPos: WallPos, value: boolean): void {
    _setOpen.call(this, wallPos, value);
  }

  open(wallPos: WallPos): void {
    this.setOpen(wallPos, true);
  }

  close(wallPos: WallPos): void {
    this.setOpen(wallPos, false);
  }

  connectingWall(from: Pos, to: Pos): WallPos | undefined {
    return _connectingWall.call(this, from, to);
  }

  connected(pos1: Pos, pos2: Pos): boolean {
    return _connected.call(this, pos1, pos2);
  }

  doors(pos: Pos): WallPos[] {
    return _doors.call(this, pos);
  }

  neighbors(pos: Pos): Pos[] {
    return _neighbors.call(this, pos);
  }

  adjacent(pos: Pos): Pos[] {
    return _adjacent.call(this, pos);
  }

  // Algorithms

  walk(from: Pos, to: Pos): Path | undefined {
    return _walk.call(this, from, to);
  }

  followWall(start: WallPos): Iterable<FollowWallItem> {
    return _followWall.call(this, start);
  }

  /**
   * Carves the maze in place and returns it. See `initialize/method` for the
   * available methods.
   */
  initialize(
    rng: Randomizer,
    method?: Method | MethodName,
    filter?: (pos: Pos) => boolean
  ): this {
    _initialize.call(this, rng, method, filter);
    return this;
  }

  // Snapshots

  /** Deep copy of the wall state; payloads are shared. */
  clone(): Maze<T> {
    return new Maze(this.shape, this.rooms.map((room) => room.clone()));
  }

  toJSON(): MazeJSON<T> {
    return _toJSONImpl(this);
  }

  /**
   * Restores a maze written by {@link Maze.toJSON}. Payloads are passed
   * through `payload`, or kept as they are.
   */
  static fromJSON(json: unknown): Maze<unknown>;
  static fromJSON<T>(json: unknown, payload: (value: unknown) => T): Maze<T>;
  static fromJSON(json: unknown, payload: (value: unknown) => unknown = (v) => v): Maze<unknown> {
    return _fromJSONImpl(json, (shape, rooms) => new Maze(shape, rooms), payload);
  }
}
