import type Maze from './maze';
import { Pos, posEquals, posKey } from './physical';
import { WallPos, wallPosEquals } from './wall';

/**
 * Path search and wall following over the open-wall graph of a maze.
 *
 * @module walk
 */

/** A `(current, next)` pair from {@link followWall}; `next` is undefined for the last wall. */
export type FollowWallItem = [WallPos, WallPos | undefined];

interface Entry {
  priority: number;
  sequence: number;
  pos: Pos;
}

/**
 * Binary min-heap of positions keyed by f-score, with first-in order on ties,
 * tracking which positions are currently queued.
 *
 * A position pushed twice stays in {@link OpenSet.contains} until both of its
 * entries are popped; `walk` relies on this to tell a stale entry of a room
 * from the last one.
 */
export class OpenSet {
  private readonly heap: Entry[] = [];
  private readonly present = new Map<string, number>();
  private sequence = 0;

  get size(): number {
    return this.heap.length;
  }

  push(priority: number, pos: Pos): void {
    this.heap.push({ priority, sequence: this.sequence++, pos });
    const key = posKey(pos);
    this.present.set(key, (this.present.get(key) ?? 0) + 1);
    this.siftUp(this.heap.length - 1);
  }

  pop(): Pos | undefined {
    const top = this.heap[0];
    if (!top) return undefined;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    const key = posKey(top.pos);
    const count = (this.present.get(key) ?? 1) - 1;
    if (count > 0) this.present.set(key, count);
    else this.present.delete(key);
    return top.pos;
  }

  contains(pos: Pos): boolean {
    return this.present.has(posKey(pos));
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private swap(i: number, j: number): void {
    const t = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = t;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.heap.length && this.less(left, smallest)) smallest = left;
      if (right < this.heap.length && this.less(right, smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}

/**
 * A route through a maze, from its first to its last room inclusive.
 *
 * The route is stored as a successor map and expanded on every iteration, so
 * a path may be iterated any number of times.
 */
export class Path implements Iterable<Pos> {
  constructor(
    readonly from: Pos,
    readonly to: Pos,
    private readonly successors: ReadonlyMap<string, Pos>
  ) {}

  *[Symbol.iterator](): Iterator<Pos> {
    let current = this.from;
    yield current;
    while (!posEquals(current, this.to)) {
      const next = this.successors.get(posKey(current));
      if (!next) throw new Error(`incomplete path at (${current.col}, ${current.row})`);
      yield next;
      current = next;
    }
  }

  toArray(): Pos[] {
    return [...this];
  }

  /** Number of rooms on the path. */
  get length(): number {
    return this.toArray().length;
  }
}

/**
 * Shortest path between two rooms through open walls, or `undefined` when
 * the rooms are not connected.
 *
 * The search runs from `to` back towards `from` with a Manhattan distance
 * heuristic, so the recorded predecessors already point forward along the
 * returned path. A neighbour is queued with the popped room as predecessor
 * whenever the popped room is no longer in the open set; better routes found
 * to an already queued room while it is queued are not recorded.
 */
export function walk<T>(this: Maze<T>, from: Pos, to: Pos): Path | undefined {
  if (!this.isInside(from) || !this.isInside(to)) return undefined;
  const start = to;
  const end = from;
  const h = (p: Pos): number => Math.abs(p.col - end.col) + Math.abs(p.row - end.row);

  const g = new Map<string, number>([[posKey(start), 0]]);
  const cameFrom = new Map<string, Pos>();
  const closed = new Set<string>();
  const openSet = new OpenSet();
  openSet.push(h(start), start);

  for (let current = openSet.pop(); current; current = openSet.pop()) {
    if (posEquals(current, end)) return new Path(from, to, cameFrom);
    const currentKey = posKey(current);
    closed.add(currentKey);
    const currentG = g.get(currentKey) ?? Infinity;

    for (const door of this.doors(current)) {
      const next = this.back(door).pos;
      const nextKey = posKey(next);
      if (!this.isInside(next) || closed.has(nextKey)) continue;

      const score = currentG + 1;
      const currentQueued = openSet.contains(current);
      if (!currentQueued || score < currentG) {
        cameFrom.set(nextKey, current);
        g.set(nextKey, score);
        if (!currentQueued) openSet.push(score + h(next), next);
      }
    }
  }
  return undefined;
}

/**
 * Follows closed walls from `start`, never crossing an open wall, until
 * `start` comes round again.
 *
 * Each step moves to the back of the current wall and takes the first closed
 * wall meeting at the start of its span; when all of them are open the back
 * itself is used. Walls are visited in span direction, so a room's own walls
 * come out clockwise. An open `start` yields nothing. The returned iterable
 * restarts from `start` on every iteration.
 */
export function followWall<T>(this: Maze<T>, start: WallPos): Iterable<FollowWallItem> {
  const step = (current: WallPos): WallPos => {
    const back = this.back(current);
    return this.cornerWalls(back).slice(1).find((wp) => !this.isOpen(wp)) ?? back;
  };
  const isStartOpen = (): boolean => this.isOpen(start);

  return {
    *[Symbol.iterator](): Iterator<FollowWallItem> {
      if (isStartOpen()) return;
      let current = start;
      for (;;) {
        const next = step(current);
        if (wallPosEquals(next, start)) {
          yield [current, undefined];
          return;
        }
        yield [current, next];
        current = next;
      }
    },
  };
}
