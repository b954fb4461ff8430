/**
 * Public entry point.
 *
 * Mazes of triangular, square or hexagonal rooms: generation, path finding
 * and outline extraction for vector output.
 */
export { default as Maze } from './maze';
export { default as Matrix, filter, partition } from './matrix';
export type { Edge } from './matrix';
export { default as Room } from './room';
export { config } from './config';
export type { PolymazeConfig } from './config';
export {
  SHAPES,
  parseShape,
  shapeFromWallCount,
  wallCount,
  minimalDimensions,
} from './shape';
export type { Shape } from './shape';
export { QuadWalls } from './shape/quad';
export { HexWalls } from './shape/hex';
export { TriWalls } from './shape/tri';
export * from './physical';
export { Wall, wallPos, wallPosEquals, compareWallPos, wallPosKey, formatWallPos } from './wall';
export type { WallPos, ShapeName } from './wall';
export { Path, OpenSet } from './walk';
export type { FollowWallItem } from './walk';
export { METHOD_NAMES, parseMethod, formatMethod, toMethod } from './initialize/method';
export type { Method, MethodName } from './initialize/method';
export { parseInstructions, formatInstructions } from './initialize/spelunker';
export type { Instruction } from './initialize/spelunker';
export { connectAll } from './initialize/common';
export type { Randomizer } from './random/randomizer';
export { LFSR, parseSeed } from './random/lfsr';
export { PrngRandomizer } from './random/entropy';
export {
  heatmap,
  heatmapOfType,
  heatMapPairs,
  parseHeatMapType,
  parseBreakSpec,
  breakWalls,
} from './heatmap';
export type { HeatMapType, BreakSpec } from './heatmap';
export { Visitor, outline } from './render/visitor';
export type { Operation } from './render/visitor';
export { pathData, solutionPathData, toSvg } from './render/svg';
export type { SvgOptions } from './render/svg';
export { onceWarn, resetWarnings } from './utils/warnings';
