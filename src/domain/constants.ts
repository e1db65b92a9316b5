/**
 * Constants for the N-Puzzle solver
 */

import type { Move, SolverOptions } from './types.js';

// Supported grid sizes
export const MIN_SIZE = 3;
export const MAX_SIZE = 8;

// Largest size where optimal search reliably finishes
export const PRACTICAL_SIZE = 4;

// Tile value of the empty cell
export const BLANK = 0;

// Order in which transitions are generated
export const MOVES: readonly Move[] = ['U', 'D', 'L', 'R'];

export const OPPOSITE_MOVES: Record<Move, Move> = {
  U: 'D',
  D: 'U',
  L: 'R',
  R: 'L',
};

// Row/column offsets of the blank for each move
export const MOVE_DELTAS: Record<Move, { dr: number; dc: number }> = {
  U: { dr: -1, dc: 0 },
  D: { dr: 1, dc: 0 },
  L: { dr: 0, dc: -1 },
  R: { dr: 0, dc: 1 },
};

// Each linear conflict forces one tile out of the line and back
export const LINEAR_CONFLICT_COST = 2;

// Default solver options
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  useHeuristic: true,
  maxExpansions: Number.POSITIVE_INFINITY,
};
