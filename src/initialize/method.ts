import { config } from '../config';
import type Maze from '../maze';
import { filter } from '../matrix';
import type { Pos } from '../physical';
import type { Randomizer } from '../random/randomizer';
import { onceWarn } from '../utils/warnings';
import { braid } from './braid';
import { branching } from './branching';
import { clear } from './clear';
import type { Initializer } from './common';
import { dividing } from './dividing';
import { Instruction, formatInstructions, parseInstructions, spelunker } from './spelunker';
import { winding } from './winding';

/**
 * Initialization method selection and dispatch.
 *
 * | name        | result                                               |
 * |-------------|------------------------------------------------------|
 * | `branching` | randomized Prim spanning tree, many short branches   |
 * | `winding`   | depth first spanning tree, long corridors            |
 * | `braid`     | loops everywhere, no dead ends                       |
 * | `clear`     | every inner wall open                                |
 * | `dividing`  | recursive division into chambers                     |
 * | `spelunker` | corridors carved by a small turtle program           |
 *
 * @module initialize/method
 */

export type MethodName = 'braid' | 'branching' | 'clear' | 'dividing' | 'spelunker' | 'winding';

/** A fully specified method; only the spelunker carries parameters. */
export type Method =
  | { name: Exclude<MethodName, 'spelunker'> }
  | { name: 'spelunker'; instructions: readonly Instruction[] };

export const METHOD_NAMES: readonly MethodName[] = [
  'braid',
  'branching',
  'clear',
  'dividing',
  'spelunker',
  'winding',
];

const SIMPLE: Readonly<Record<Exclude<MethodName, 'spelunker'>, Initializer>> = {
  braid,
  branching,
  clear,
  dividing,
  winding,
};

const SPELUNKER_PREFIX = 'spelunker(';
const SPELUNKER_SUFFIX = ')';

/** Expands a bare name; a bare `spelunker` runs `config.spelunkerInstructions`. */
export function toMethod(method: Method | MethodName): Method {
  if (typeof method !== 'string') return method;
  return method === 'spelunker'
    ? { name: 'spelunker', instructions: parseInstructions(config.spelunkerInstructions) }
    : { name: method };
}

/**
 * Parses a method name, or `spelunker(<program>)`.
 *
 * @throws Error for unknown names and malformed programs.
 */
export function parseMethod(text: string): Method {
  const value = text.trim();
  if (value.startsWith(SPELUNKER_PREFIX) && value.endsWith(SPELUNKER_SUFFIX)) {
    const program = value.slice(SPELUNKER_PREFIX.length, value.length - SPELUNKER_SUFFIX.length);
    return { name: 'spelunker', instructions: parseInstructions(program) };
  }
  const name = METHOD_NAMES.find((n) => n === value);
  if (!name) throw new Error(`unknown initialization method: ${text}`);
  return toMethod(name);
}

/** Inverse of {@link parseMethod}. */
export function formatMethod(method: Method): string {
  return method.name === 'spelunker'
    ? `${SPELUNKER_PREFIX}${formatInstructions(method.instructions)}${SPELUNKER_SUFFIX}`
    : method.name;
}

/**
 * Opens walls of a closed maze with the given method. Rooms rejected by
 * `predicate` are left untouched; every accepted room ends up marked as
 * visited. Walls already open stay open.
 *
 * With the same randomizer sequence the result is always the same.
 */
export function initialize<T>(
  this: Maze<T>,
  rng: Randomizer,
  method: Method | MethodName = config.defaultMethod,
  predicate: (pos: Pos) => boolean = () => true
): Maze<T> {
  const resolved = toMethod(method);
  const { count, mask } = filter(this.width, this.height, predicate);
  if (count === 0) {
    onceWarn('initialize:empty', `initialize(${formatMethod(resolved)}): no candidate rooms, maze left unchanged`);
    return this;
  }

  if (resolved.name === 'spelunker') {
    spelunker(this, rng, mask, resolved.instructions);
  } else {
    SIMPLE[resolved.name](this, rng, mask);
  }

  for (const pos of this.positions()) {
    if (mask.at(pos)) this.rooms.at(pos).visited = true;
  }
  return this;
}
