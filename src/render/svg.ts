import { config } from '../config';
import type Maze from '../maze';
import type { PhysicalPos, Pos } from '../physical';
import { Operation, outline } from './visitor';

/**
 * SVG output: path data for walls and solutions, and a standalone document.
 *
 * Coordinates are written with at most four decimals.
 */

function num(v: number): string {
  return String(Number(v.toFixed(4)));
}

function point(p: PhysicalPos): string {
  return `${num(p.x)} ${num(p.y)}`;
}

export function formatOperations(operations: readonly Operation[]): string {
  return operations
    .map((o) => (o.op === 'Z' ? 'Z' : `${o.op} ${point(o.to)}`))
    .join(' ');
}

/** Path data drawing every wall of the maze. */
export function pathData<T>(maze: Maze<T>): string {
  return formatOperations(outline(maze));
}

/** Path data through the centres of the rooms of a route. */
export function solutionPathData<T>(maze: Maze<T>, path: Iterable<Pos>): string {
  const operations: Operation[] = [];
  for (const pos of path) {
    operations.push({ op: operations.length === 0 ? 'M' : 'L', to: maze.center(pos) });
  }
  return formatOperations(operations);
}

export interface SvgOptions {
  /** Route drawn on top of the walls. */
  solution?: Iterable<Pos>;
  /** Wall stroke width; defaults to `config.svgStrokeWidth`. */
  strokeWidth?: number;
  wallColor?: string;
  solutionColor?: string;
}

/** A complete SVG document; the view box leaves room for the stroke. */
export function toSvg<T>(maze: Maze<T>, options: SvgOptions = {}): string {
  const strokeWidth = options.strokeWidth ?? config.svgStrokeWidth;
  const box = maze.viewbox().expand(strokeWidth);
  const stroke = (color: string): string =>
    `fill="none" stroke="${color}" stroke-width="${num(strokeWidth)}" ` +
    'stroke-linecap="round" stroke-linejoin="round"';

  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${point(box.corner)} ${num(box.width)} ${num(box.height)}">`,
    `  <path d="${pathData(maze)}" ${stroke(options.wallColor ?? 'black')}/>`,
  ];
  if (options.solution) {
    lines.push(
      `  <path d="${solutionPathData(maze, options.solution)}" ${stroke(options.solutionColor ?? 'red')}/>`
    );
  }
  lines.push('</svg>');
  return lines.join('\n') + '\n';
}
