/**
 * Heuristic functions for A* search
 *
 * Manhattan distance plus linear conflict. Both terms are 0 exactly at the
 * goal, and each move changes the sum by a bounded amount.
 */

import type { Board, Coord, GoalPositions } from '../domain/types.js';
import { manhattanDistance } from '../domain/types.js';
import { BLANK, LINEAR_CONFLICT_COST } from '../domain/constants.js';
import { toCoord } from '../state/board-state.js';

const goalPositionCache = new Map<number, GoalPositions>();

/**
 * Precompute the goal coordinates of every tile value
 */
export function buildGoalPositions(n: number): GoalPositions {
  const positions: Coord[] = [];

  positions[BLANK] = { row: n - 1, col: n - 1 };
  for (let value = 1; value < n * n; value++) {
    positions[value] = toCoord(n, value - 1);
  }

  return Object.freeze(positions.map(coord => Object.freeze(coord)));
}

/**
 * Goal positions for n, built once and shared read-only
 */
export function getGoalPositions(n: number): GoalPositions {
  let positions = goalPositionCache.get(n);
  if (!positions) {
    positions = buildGoalPositions(n);
    goalPositionCache.set(n, positions);
  }
  return positions;
}

/**
 * Sum of row and column distances from each tile to its goal cell
 */
export function manhattan(n: number, board: Board, goal: GoalPositions): number {
  let distance = 0;

  for (let index = 0; index < board.length; index++) {
    const value = board[index];
    if (value === BLANK) continue;
    distance += manhattanDistance(toCoord(n, index), goal[value]);
  }

  return distance;
}

/**
 * Extra moves for goal-aligned tiles that must pass each other
 *
 * For every row, the tiles whose goal row is that row are compared pairwise
 * by goal column; each reversed pair costs 2. Columns are handled the same
 * way by goal row.
 */
export function linearConflict(n: number, board: Board, goal: GoalPositions): number {
  let conflict = 0;

  for (let line = 0; line < n; line++) {
    const rowTargets: number[] = [];
    const colTargets: number[] = [];

    for (let offset = 0; offset < n; offset++) {
      const rowValue = board[line * n + offset];
      if (rowValue !== BLANK && goal[rowValue].row === line) {
        rowTargets.push(goal[rowValue].col);
      }

      const colValue = board[offset * n + line];
      if (colValue !== BLANK && goal[colValue].col === line) {
        colTargets.push(goal[colValue].row);
      }
    }

    conflict += countReversedPairs(rowTargets) * LINEAR_CONFLICT_COST;
    conflict += countReversedPairs(colTargets) * LINEAR_CONFLICT_COST;
  }

  return conflict;
}

/**
 * Combined admissible estimate of the remaining moves
 */
export function heuristic(n: number, board: Board, goal: GoalPositions): number {
  return manhattan(n, board, goal) + linearConflict(n, board, goal);
}

function countReversedPairs(targets: number[]): number {
  let pairs = 0;
  for (let i = 0; i < targets.length; i++) {
    for (let j = i + 1; j < targets.length; j++) {
      if (targets[i] > targets[j]) pairs++;
    }
  }
  return pairs;
}
