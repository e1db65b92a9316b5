/**
 * Generate the boards reachable by one blank move
 */

import type { Board, Move, Neighbor } from '../domain/types.js';
import { MOVES, MOVE_DELTAS, OPPOSITE_MOVES } from '../domain/constants.js';
import { IllegalMoveError } from '../domain/errors.js';
import { findBlank, swapCells, toCoord, toIndex } from '../state/board-state.js';

/**
 * All (board, move) pairs one blank move away, in U, D, L, R order
 *
 * Corners yield 2 entries, edges 3, interior cells 4.
 */
export function neighbors(n: number, board: Board): Neighbor[] {
  const blank = findBlank(board);
  const { row, col } = toCoord(n, blank);
  const result: Neighbor[] = [];

  for (const move of MOVES) {
    const { dr, dc } = MOVE_DELTAS[move];
    const target = { row: row + dr, col: col + dc };

    if (target.row < 0 || target.row >= n || target.col < 0 || target.col >= n) {
      continue;
    }

    result.push({ board: swapCells(board, blank, toIndex(n, target)), move });
  }

  return result;
}

/**
 * Apply a single move to a board
 */
export function applyMove(n: number, board: Board, move: Move): Board {
  const blank = findBlank(board);
  const { row, col } = toCoord(n, blank);
  const { dr, dc } = MOVE_DELTAS[move];
  const target = { row: row + dr, col: col + dc };

  if (target.row < 0 || target.row >= n || target.col < 0 || target.col >= n) {
    throw new IllegalMoveError(move, row, col);
  }

  return swapCells(board, blank, toIndex(n, target));
}

/**
 * The move that undoes the given one
 */
export function oppositeMove(move: Move): Move {
  return OPPOSITE_MOVES[move];
}

/**
 * Apply a move sequence and return every board visited, start included
 */
export function replayMoves(n: number, start: Board, path: readonly Move[]): Board[] {
  const boards: Board[] = [start];
  let current = start;

  for (const move of path) {
    current = applyMove(n, current, move);
    boards.push(current);
  }

  return boards;
}

/**
 * Undo a move sequence from its final board
 */
export function rewindMoves(n: number, end: Board, path: readonly Move[]): Board {
  let current = end;
  for (let i = path.length - 1; i >= 0; i--) {
    current = applyMove(n, current, oppositeMove(path[i]));
  }
  return current;
}
