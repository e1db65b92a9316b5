/**
 * Value keys and ordering for boards
 *
 * Arrays compare by identity, so the search tables are keyed by a string
 * built from the cell values.
 */

import type { Board } from '../domain/types.js';

/**
 * Lookup key for a board, equal for equal cell values
 */
export function boardKey(board: Board): string {
  return board.join(',');
}

/**
 * Lexicographic order over cell values
 */
export function compareBoards(a: Board, b: Board): number {
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }

  return a.length - b.length;
}
