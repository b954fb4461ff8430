import type { Wall } from './wall';

/**
 * One cell of a maze: which of its walls are open, whether any generation
 * step has reached it, and a caller-defined payload.
 */
export default class Room<T> {
  /** Bitmask of open walls, one bit per catalog index. */
  openMask = 0;

  /** Set when a wall is first opened; never cleared by closing walls. */
  visited = false;

  constructor(public data: T) {}

  isOpen(wall: Wall): boolean {
    return (this.openMask & wall.mask) !== 0;
  }

  setOpen(wall: Wall, value: boolean): void {
    if (value) {
      this.openMask |= wall.mask;
      this.visited = true;
    } else {
      this.openMask &= ~wall.mask;
    }
  }

  /** Number of open walls. */
  openWalls(): number {
    let count = 0;
    for (let m = this.openMask; m !== 0; m &= m - 1) count++;
    return count;
  }

  /** Copies the wall state; the payload is shared. */
  clone(): Room<T> {
    const room = new Room(this.data);
    room.openMask = this.openMask;
    room.visited = this.visited;
    return room;
  }
}
