/**
 * A* Search Algorithm for the N-Puzzle
 *
 * With the heuristic disabled every estimate is 0 and the same loop runs as
 * uniform-cost search.
 */

import type {
  Board,
  FrontierEntry,
  ParentLink,
  SearchResult,
  SolverOptions,
} from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { SearchExhaustedError, SearchLimitError } from '../domain/errors.js';
import { isGoal } from '../state/board-state.js';
import { boardKey } from '../state/state-hash.js';
import {
  PriorityQueue,
  compareFrontierEntries,
  createFrontierEntry,
  reconstructPath,
} from './search-node.js';
import { getGoalPositions, heuristic } from './heuristics.js';
import { neighbors } from './action-generator.js';

/**
 * A* Search implementation for the sliding-tile puzzle
 *
 * The caller must check solvability first; an unsolvable start either runs
 * until the state space is exhausted or hits the expansion limit.
 */
export function astarSolve(
  n: number,
  start: Board,
  options: Partial<SolverOptions> = {}
): SearchResult {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };

  if (isGoal(n, start)) {
    return {
      moves: 0,
      path: [],
      boards: [start],
      expanded: 0,
      maxFrontier: 0,
      timeTaken: 0,
    };
  }

  const goal = getGoalPositions(n);
  const estimate = (board: Board): number =>
    opts.useHeuristic ? heuristic(n, board, goal) : 0;

  const startKey = boardKey(start);
  const bestCost = new Map<string, number>([[startKey, 0]]);
  const parents = new Map<string, ParentLink>([
    [startKey, { parent: null, move: null, board: start }],
  ]);

  const openSet = new PriorityQueue<FrontierEntry>(compareFrontierEntries);
  openSet.push(createFrontierEntry(0, estimate(start), start));

  let expanded = 0;
  let maxFrontier = 0;
  const startTime = Date.now();

  while (!openSet.isEmpty()) {
    const current = openSet.pop();
    if (current === undefined) break;

    const currentKey = boardKey(current.board);

    // A cheaper path to this board was pushed after this entry
    if (current.g !== bestCost.get(currentKey)) continue;

    expanded++;
    maxFrontier = Math.max(maxFrontier, openSet.size());

    // Goal check
    if (isGoal(n, current.board)) {
      const { path, boards } = reconstructPath(currentKey, parents);
      return {
        moves: current.g,
        path,
        boards,
        expanded,
        maxFrontier,
        timeTaken: Date.now() - startTime,
      };
    }

    // Check expansion limit
    if (expanded >= opts.maxExpansions) {
      throw new SearchLimitError({ expanded, maxFrontier, timeTaken: Date.now() - startTime });
    }

    for (const { board, move } of neighbors(n, current.board)) {
      const nextCost = current.g + 1;
      const nextKey = boardKey(board);
      const known = bestCost.get(nextKey);

      if (known === undefined || nextCost < known) {
        bestCost.set(nextKey, nextCost);
        parents.set(nextKey, { parent: currentKey, move, board });
        openSet.push(createFrontierEntry(nextCost, estimate(board), board));
      }
    }
  }

  throw new SearchExhaustedError(expanded);
}

/**
 * Solve with A* by default, or uniform-cost search when the heuristic is off
 */
export function astar(n: number, start: Board, useHeuristic = true): SearchResult {
  return astarSolve(n, start, { useHeuristic });
}
