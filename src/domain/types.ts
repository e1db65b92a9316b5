/**
 * Core type definitions for the N-Puzzle solver
 */

// Direction the blank travels
export type Move = 'U' | 'D' | 'L' | 'R';

// Flattened n*n grid in row-major order, 0 is the blank
export type Board = readonly number[];

// Cell position on the grid (0-based)
export interface Coord {
  row: number;
  col: number;
}

// Goal coordinates indexed by tile value
export type GoalPositions = readonly Coord[];

// A board reachable in one move
export interface Neighbor {
  board: Board;
  move: Move;
}

// Priority queue record, ordered by f then h then g
export interface FrontierEntry {
  f: number;
  h: number;
  g: number;
  board: Board;
}

// Parent link for path reconstruction
export interface ParentLink {
  parent: string | null;
  move: Move | null;
  board: Board;
}

// Solver options
export interface SolverOptions {
  useHeuristic: boolean;
  maxExpansions: number;
}

// Search statistics
export interface SearchStats {
  expanded: number;
  maxFrontier: number;
  timeTaken: number; // milliseconds
}

// Outcome of a successful search
export interface SearchResult extends SearchStats {
  moves: number;
  path: Move[];
  boards: Board[];
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Parsed puzzle input
export interface PuzzleInput {
  n: number;
  board: Board;
}

export type Solution =
  | { solvable: true; result: SearchResult }
  | { solvable: false; inversions: number };

export type Evaluation =
  | { solvable: true; uniformCost: SearchResult; astar: SearchResult }
  | { solvable: false; inversions: number };

export function manhattanDistance(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}
