/**
 * Solvability check for the n-puzzle
 *
 * Odd n: solvable iff the inversion count is even.
 * Even n: solvable iff (blank row from bottom is even AND inversions odd)
 *         or (blank row from bottom is odd AND inversions even).
 */

import type { Board } from '../domain/types.js';
import { BLANK } from '../domain/constants.js';
import { findBlank } from '../state/board-state.js';

/**
 * Count pairs of tiles out of ascending order, ignoring the blank
 */
export function inversionCount(board: Board): number {
  const tiles = board.filter(value => value !== BLANK);
  let inversions = 0;

  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }

  return inversions;
}

/**
 * Check whether any move sequence can reach the goal
 */
export function isSolvable(n: number, board: Board): boolean {
  const inversions = inversionCount(board);

  if (n % 2 === 1) {
    return inversions % 2 === 0;
  }

  // Counted from the bottom starting at 1
  const blankRow = Math.floor(findBlank(board) / n);
  const fromBottom = n - blankRow;

  if (fromBottom % 2 === 0) {
    return inversions % 2 === 1;
  }
  return inversions % 2 === 0;
}
