import type { MethodName } from './initialize/method';

/**
 * Global polymaze configuration contract & default instance.
 *
 * A single mutable object lets callers (and tests) adjust library behaviour
 * without threading options through every initializer or renderer call.
 * Subsystems read the values at call time, so changes take effect on the next
 * operation.
 *
 * USAGE
 * -----
 *   import { config } from 'polymaze';
 *   config.warnings = true;             // surface one-time guidance on stderr
 *   config.defaultMethod = 'winding';   // used by Maze.initialize() without a method
 *
 * This is a plain serializable object: no setters, no proxies.
 */
export interface PolymazeConfig {
  /**
   * Emit one-time guidance through `console.warn`, for example when an
   * initializer is given a filter that rejects every room.
   * Default: false
   */
  warnings: boolean;

  /**
   * Initialization method used when `Maze.initialize` is called without one.
   * Default: 'branching'
   */
  defaultMethod: MethodName;

  /**
   * Program run by the spelunker initializer when none is given.
   * See `parseInstructions` for the instruction characters.
   */
  spelunkerInstructions: string;

  /** Stroke width written by `toSvg`, in maze units. Default: 0.1 */
  svgStrokeWidth: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding.
 */
export const config: PolymazeConfig = {
  warnings: false,
  defaultMethod: 'branching',
  spelunkerInstructions: '||<|>|}||{|',
  svgStrokeWidth: 0.1,
};
