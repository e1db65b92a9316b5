/**
 * Error types raised by the solver and its input layer
 */

import type { Move, SearchStats } from './types.js';

export class InvalidBoardError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid board: ${errors.join('; ')}`);
    this.name = 'InvalidBoardError';
    this.errors = errors;
  }
}

export class BoardParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardParseError';
  }
}

export class IllegalMoveError extends Error {
  readonly move: Move;

  constructor(move: Move, blankRow: number, blankCol: number) {
    super(`Blank at (${blankRow}, ${blankCol}) cannot move ${move}`);
    this.name = 'IllegalMoveError';
    this.move = move;
  }
}

/**
 * The frontier ran dry without reaching the goal. For a board that passed
 * the solvability check this means the engine or the check is broken.
 */
export class SearchExhaustedError extends Error {
  readonly expanded: number;

  constructor(expanded: number) {
    super(`Frontier exhausted after ${expanded} expansions without reaching the goal`);
    this.name = 'SearchExhaustedError';
    this.expanded = expanded;
  }
}

export class SearchLimitError extends Error {
  readonly stats: SearchStats;

  constructor(stats: SearchStats) {
    super(`Expansion limit reached after ${stats.expanded} expansions`);
    this.name = 'SearchLimitError';
    this.stats = stats;
  }
}
