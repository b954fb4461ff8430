import type Maze from '../maze';
import type Matrix from '../matrix';
import { PhysicalPos, ViewBox } from '../physical';
import type { Randomizer } from '../random/randomizer';
import { clear } from './clear';
import { connectAll, isCandidate } from './common';

/** A straight cut through a box, across its longer side. */
interface Split {
  direction: 'horizontal' | 'vertical';
  box: ViewBox;
  at: number;
}

/** Places a cut 20% to 100% of the way across the longer side of `box`. */
function randomSplit(box: ViewBox, rng: Randomizer): Split {
  const cut = 0.8 * rng.random() + 0.2;
  return box.width > box.height
    ? { direction: 'vertical', box, at: box.left + cut * box.width }
    : { direction: 'horizontal', box, at: box.top + cut * box.height };
}

/** Whether `p` lies before the cut: above it, or left of it. */
function before(split: Split, p: PhysicalPos): boolean {
  return split.direction === 'horizontal' ? p.y < split.at : p.x < split.at;
}

/** Whether `p` lies within the box along the cut line. */
function alongCut(split: Split, p: PhysicalPos): boolean {
  return split.direction === 'horizontal'
    ? p.x >= split.box.left && p.x <= split.box.right
    : p.y >= split.box.top && p.y <= split.box.bottom;
}

function applySplit<T>(
  maze: Maze<T>,
  rng: Randomizer,
  candidates: Matrix<boolean>,
  split: Split,
  threshold: number
): void {
  const { box, at } = split;
  const [a, b] =
    split.direction === 'horizontal'
      ? [maze.roomAt({ x: box.left, y: at }), maze.roomAt({ x: box.right, y: at })]
      : [maze.roomAt({ x: at, y: box.top }), maze.roomAt({ x: at, y: box.bottom })];

  for (let row = Math.min(a.row, b.row) - 1; row <= Math.max(a.row, b.row) + 1; row++) {
    for (let col = Math.min(a.col, b.col) - 1; col <= Math.max(a.col, b.col) + 1; col++) {
      const pos = { col, row };
      if (!isCandidate(candidates, pos)) continue;
      for (const wallPos of maze.wallPositions(pos)) {
        const back = maze.back(wallPos);
        if (!isCandidate(candidates, back.pos)) continue;
        const c1 = maze.center(pos);
        const c2 = maze.center(back.pos);
        if (before(split, c1) !== before(split, c2) && (alongCut(split, c1) || alongCut(split, c2))) {
          maze.close(wallPos);
        }
      }
    }
  }

  const halves = split.direction === 'horizontal' ? box.splitHorizontal(at) : box.splitVertical(at);
  for (const half of halves.map((h) => randomSplit(h, rng))) {
    const { width, height } = half.box;
    if ([width, height].every((v) => v > threshold * (1 + rng.random()))) {
      applySplit(maze, rng, candidates, half, threshold);
    }
  }
}

/**
 * Recursive division: clears the candidate area, then closes walls along
 * random straight cuts, recursing into both sides of each cut until they get
 * narrower than about two rooms. Regions left without a passage are joined
 * afterwards.
 */
export function dividing<T>(maze: Maze<T>, rng: Randomizer, candidates: Matrix<boolean>): Maze<T> {
  clear(maze, rng, candidates);

  const box = ViewBox.enclosing(
    maze.positions().flatMap((pos) => maze.wallPositions(pos).map((wp) => maze.corners(wp)[0]))
  );
  if (!box) return maze;

  const c0 = maze.center({ col: 0, row: 0 });
  const c1 = maze.center({ col: 1, row: 1 });
  const threshold = 2 * Math.hypot(c0.x - c1.x, c0.y - c1.y);

  applySplit(maze, rng, candidates, randomSplit(box, rng), threshold);
  connectAll(maze, rng, candidates);
  return maze;
}
