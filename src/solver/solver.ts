/**
 * Main Solver Interface
 */

import type { Board, Evaluation, Solution, SolverOptions, ValidationResult } from '../domain/types.js';
import { InvalidBoardError } from '../domain/errors.js';
import { validateBoard } from '../constraints/validator.js';
import { inversionCount, isSolvable } from '../constraints/solvability.js';
import { astarSolve } from './astar.js';

/**
 * Main N-Puzzle Solver class
 *
 * Rejects malformed boards and gates the search on solvability, so the
 * search engine only ever sees boards that can reach the goal.
 */
export class PuzzleSolver {
  /**
   * Validate, check solvability, then search
   */
  solve(n: number, board: Board, options: Partial<SolverOptions> = {}): Solution {
    PuzzleSolver.assertValid(n, board);

    if (!isSolvable(n, board)) {
      return { solvable: false, inversions: inversionCount(board) };
    }

    return { solvable: true, result: astarSolve(n, board, options) };
  }

  /**
   * Run uniform-cost search and A* on the same board for comparison
   */
  evaluate(n: number, board: Board, options: Partial<SolverOptions> = {}): Evaluation {
    PuzzleSolver.assertValid(n, board);

    if (!isSolvable(n, board)) {
      return { solvable: false, inversions: inversionCount(board) };
    }

    const uniformCost = astarSolve(n, board, { ...options, useHeuristic: false });
    const astar = astarSolve(n, board, { ...options, useHeuristic: true });

    return { solvable: true, uniformCost, astar };
  }

  /**
   * Throw InvalidBoardError when the board fails validation
   */
  static assertValid(n: number, board: Board): ValidationResult {
    const validation = validateBoard(n, board);
    if (!validation.valid) {
      throw new InvalidBoardError(validation.errors);
    }
    return validation;
  }
}

/**
 * Quick solve function for simple cases
 */
export function solvePuzzle(
  n: number,
  board: Board,
  options: Partial<SolverOptions> = {}
): Solution {
  const solver = new PuzzleSolver();
  return solver.solve(n, board, options);
}
