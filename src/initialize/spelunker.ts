import type Maze from '../maze';
import type Matrix from '../matrix';
import type { Pos } from '../physical';
import type { Randomizer } from '../random/randomizer';
import { isReversed } from '../shape/tri';
import type { WallPos } from '../wall';
import { connectAll, isCandidate, randomRoom, randomWall } from './common';

/**
 * Spelunker program steps:
 *
 * - `forward` carves through the wall ahead into an unreached room
 * - `left`/`right` turn to the previous/next wall of the room
 * - `forkLeft`/`forkRight` leave a new spelunker behind, facing the
 *   previous/next wall, which runs the program from its start later
 */
export type Instruction = 'forward' | 'left' | 'right' | 'forkLeft' | 'forkRight';

const SYMBOLS: Readonly<Record<Instruction, string>> = {
  forward: '|',
  left: '<',
  right: '>',
  forkLeft: '}',
  forkRight: '{',
};

const INSTRUCTIONS: readonly Instruction[] = ['forward', 'left', 'right', 'forkLeft', 'forkRight'];

const BY_SYMBOL = new Map<string, Instruction>(INSTRUCTIONS.map((i) => [SYMBOLS[i], i]));

/**
 * Parses a program such as `||<|>|}||{|`.
 *
 * @throws Error on unknown characters, or for a program that never moves
 *   forward.
 */
export function parseInstructions(text: string): Instruction[] {
  const result = [...text].map((c) => {
    const instruction = BY_SYMBOL.get(c);
    if (!instruction) throw new Error(`invalid spelunker instruction: ${c}`);
    return instruction;
  });
  if (!result.includes('forward')) {
    throw new Error(`invalid spelunker program: ${text} never moves forward`);
  }
  return result;
}

export function formatInstructions(instructions: readonly Instruction[]): string {
  return instructions.map((i) => SYMBOLS[i]).join('');
}

/**
 * The wall facing the one a spelunker entered through. Triangles have no
 * opposite wall, so the spelunker veers by room orientation instead.
 */
function ahead<T>(maze: Maze<T>, entry: WallPos): WallPos {
  const wall = maze.opposite(entry);
  if (wall) return { pos: entry.pos, wall };
  return isReversed(entry.pos) ? maze.nextWall(entry) : maze.previousWall(entry);
}

/**
 * Carves corridors by running a turtle-like program from random starting
 * walls, only ever advancing into rooms no corridor has reached. Forks queue
 * further runs. Separate corridor systems are joined at the end.
 */
export function spelunker<T>(
  maze: Maze<T>,
  rng: Randomizer,
  candidates: Matrix<boolean>,
  instructions: readonly Instruction[]
): Maze<T> {
  if (!instructions.includes('forward')) {
    throw new Error(`invalid spelunker program: ${formatInstructions(instructions)} never moves forward`);
  }
  const remaining = candidates.clone();
  const accept = (p: Pos): boolean => isCandidate(remaining, p);

  const origins: WallPos[] = [];
  const first = randomRoom(rng, remaining);
  const firstWall = first && randomWall(maze, rng, first, accept);
  if (firstWall) origins.push(firstWall);

  for (;;) {
    let origin = origins.pop();
    if (!origin) {
      const room = randomRoom(rng, remaining);
      if (!room) break;
      remaining.set(room, false);
      origin = randomWall(maze, rng, room, accept);
      if (!origin) continue;
    }
    let wallPos: WallPos = origin;

    const pending = origins.length;
    let advanced = false;
    run: for (let i = 0; ; i = (i + 1) % instructions.length) {
      switch (instructions[i]) {
        case 'forward': {
          remaining.set(wallPos.pos, false);
          const back = maze.back(wallPos);
          if (!accept(back.pos) || maze.rooms.at(back.pos).visited) break run;
          maze.open(wallPos);
          wallPos = ahead(maze, back);
          remaining.set(wallPos.pos, false);
          advanced = true;
          break;
        }
        case 'left':
          wallPos = maze.previousWall(wallPos);
          break;
        case 'right':
          wallPos = maze.nextWall(wallPos);
          break;
        case 'forkLeft':
          origins.push(maze.previousWall(wallPos));
          break;
        case 'forkRight':
          origins.push(maze.nextWall(wallPos));
          break;
      }
    }
    // Forks from a run that went nowhere would only repeat it.
    if (!advanced) origins.length = pending;
  }

  connectAll(maze, rng, candidates);
  return maze;
}
