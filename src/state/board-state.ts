/**
 * Board state helpers
 *
 * Boards are plain readonly arrays. Every transition produces a new array,
 * so a board can be shared freely between the frontier and the lookup maps.
 */

import type { Board, Coord } from '../domain/types.js';
import { BLANK } from '../domain/constants.js';

/**
 * Canonical goal: tiles 1..n^2-1 in row-major order, blank last
 */
export function goalBoard(n: number): Board {
  const cells: number[] = [];
  for (let value = 1; value < n * n; value++) {
    cells.push(value);
  }
  cells.push(BLANK);
  return cells;
}

export function isGoal(n: number, board: Board): boolean {
  const last = n * n - 1;
  if (board.length !== n * n || board[last] !== BLANK) return false;

  for (let i = 0; i < last; i++) {
    if (board[i] !== i + 1) return false;
  }
  return true;
}

/**
 * Flat index of the blank, -1 if the board has none
 */
export function findBlank(board: Board): number {
  return board.indexOf(BLANK);
}

export function toCoord(n: number, index: number): Coord {
  return { row: Math.floor(index / n), col: index % n };
}

export function toIndex(n: number, coord: Coord): number {
  return coord.row * n + coord.col;
}

/**
 * Return a copy of the board with two cells exchanged
 */
export function swapCells(board: Board, i: number, j: number): Board {
  const next = board.slice();
  next[i] = board[j];
  next[j] = board[i];
  return next;
}

/**
 * Split a flat board into its rows
 */
export function toRows(n: number, board: Board): number[][] {
  const rows: number[][] = [];
  for (let r = 0; r < n; r++) {
    rows.push(board.slice(r * n, (r + 1) * n));
  }
  return rows;
}
