/**
 * Tests for the A* solver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { astar, astarSolve } from '../../src/solver/astar.js';
import { PuzzleSolver, solvePuzzle } from '../../src/solver/solver.js';
import { getGoalPositions, heuristic } from '../../src/solver/heuristics.js';
import { replayMoves } from '../../src/solver/action-generator.js';
import { goalBoard } from '../../src/state/board-state.js';
import type { Board, Move } from '../../src/domain/types.js';
import {
  InvalidBoardError,
  SearchExhaustedError,
  SearchLimitError,
} from '../../src/domain/errors.js';

function scramble(n: number, moves: Move[]): Board {
  const boards = replayMoves(n, goalBoard(n), moves);
  return boards[boards.length - 1];
}

describe('A* Search', () => {
  it('should return immediately for a solved board', () => {
    const start = goalBoard(3);
    const result = astar(3, start);

    assert.strictEqual(result.moves, 0);
    assert.deepStrictEqual(result.path, []);
    assert.deepStrictEqual(result.boards, [start]);
    assert.strictEqual(result.expanded, 0);
    assert.strictEqual(result.maxFrontier, 0);
    assert.strictEqual(result.timeTaken, 0);
  });

  it('should solve a one-move board', () => {
    const result = astar(3, [1, 2, 3, 4, 5, 6, 7, 0, 8]);

    assert.strictEqual(result.moves, 1);
    assert.deepStrictEqual(result.path, ['R']);
    assert.strictEqual(result.expanded, 2);
    assert.strictEqual(result.maxFrontier, 2);
  });

  it('should expand more states without the heuristic on a one-move board', () => {
    const result = astar(3, [1, 2, 3, 4, 5, 6, 7, 0, 8], false);

    assert.strictEqual(result.moves, 1);
    assert.deepStrictEqual(result.path, ['R']);
    assert.strictEqual(result.expanded, 4);
    assert.strictEqual(result.maxFrontier, 4);
  });

  it('should return every board along the path', () => {
    const start = [1, 2, 3, 4, 0, 6, 7, 5, 8];
    const result = astar(3, start);

    assert.strictEqual(result.moves, 2);
    assert.deepStrictEqual(result.path, ['D', 'R']);
    assert.deepStrictEqual(result.boards, [
      start,
      [1, 2, 3, 4, 5, 6, 7, 0, 8],
      [1, 2, 3, 4, 5, 6, 7, 8, 0],
    ]);
  });

  it('should solve a 4x4 board one move away', () => {
    const start = [
      1, 2, 3, 4,
      5, 6, 7, 8,
      9, 10, 11, 0,
      13, 14, 15, 12,
    ];
    const result = astar(4, start);

    assert.strictEqual(result.moves, 1);
    assert.deepStrictEqual(result.path, ['D']);
  });

  it('should match uniform-cost search on move count', () => {
    const scrambles: Move[][] = [
      ['U', 'L', 'U', 'L', 'D', 'R'],
      ['L', 'L', 'U', 'R', 'U', 'L', 'D', 'D', 'R', 'U'],
      ['U', 'U', 'L', 'D', 'L', 'U', 'R', 'R', 'D', 'L', 'D', 'L'],
    ];

    for (const moves of scrambles) {
      const start = scramble(3, moves);
      const informed = astar(3, start, true);
      const uninformed = astar(3, start, false);

      assert.strictEqual(informed.moves, uninformed.moves);
      assert.ok(informed.moves <= moves.length);
      assert.ok(informed.expanded <= uninformed.expanded);
      assert.ok(heuristic(3, start, getGoalPositions(3)) <= informed.moves);
    }
  });

  it('should expand a reproducible number of states', () => {
    const start = scramble(3, ['U', 'L', 'U', 'L', 'D', 'R']);
    assert.deepStrictEqual(start, [4, 1, 3, 2, 0, 5, 7, 8, 6]);

    const informed = astar(3, start, true);
    const uninformed = astar(3, start, false);

    assert.strictEqual(informed.moves, 6);
    assert.strictEqual(informed.expanded, 7);
    assert.strictEqual(uninformed.expanded, 84);
  });

  it('should skip frontier entries superseded by a cheaper path', () => {
    // Boards reached again at lower cost leave stale entries behind; counting
    // them as expansions would change these totals
    const first = astar(3, [1, 3, 2, 8, 7, 5, 0, 6, 4]);
    assert.strictEqual(first.moves, 20);
    assert.strictEqual(first.path.join(''), 'URURDDLLUURDRULLDRRD');
    assert.strictEqual(first.expanded, 276);
    assert.strictEqual(first.maxFrontier, 172);

    const second = astar(3, [7, 1, 5, 6, 0, 3, 8, 4, 2]);
    assert.strictEqual(second.moves, 22);
    assert.strictEqual(second.path.join(''), 'LURRDLDLURURDDLURULDDR');
    assert.strictEqual(second.expanded, 299);
    assert.strictEqual(second.maxFrontier, 189);
  });

  it('should produce a path that replays to the goal', () => {
    const start = scramble(3, ['U', 'L', 'L', 'U', 'R', 'D', 'R', 'U', 'L', 'L', 'D']);
    const result = astar(3, start);
    const replayed = replayMoves(3, start, result.path);

    assert.strictEqual(result.boards.length, result.moves + 1);
    assert.strictEqual(result.path.length, result.moves);
    assert.deepStrictEqual(replayed, result.boards);
    assert.deepStrictEqual(result.boards[result.boards.length - 1], goalBoard(3));
  });

  it('should stop at the expansion limit', () => {
    assert.throws(
      () => astarSolve(3, [1, 2, 3, 4, 5, 6, 7, 0, 8], { maxExpansions: 1 }),
      (err: unknown) => {
        assert.ok(err instanceof SearchLimitError);
        assert.strictEqual(err.stats.expanded, 1);
        return true;
      }
    );
  });

  it('should raise a distinct error when the frontier runs dry', () => {
    // 2x2 board with two tiles swapped: its component has 12 states, none the goal
    assert.throws(
      () => astarSolve(2, [2, 1, 3, 0], { useHeuristic: false }),
      (err: unknown) => {
        assert.ok(err instanceof SearchExhaustedError);
        assert.strictEqual(err.expanded, 12);
        return true;
      }
    );
  });
});

describe('Puzzle Solver', () => {
  it('should report unsolvable boards without searching', () => {
    const solution = solvePuzzle(3, [1, 2, 3, 4, 5, 6, 8, 7, 0]);

    assert.deepStrictEqual(solution, { solvable: false, inversions: 1 });
  });

  it('should solve valid boards', () => {
    const solution = new PuzzleSolver().solve(3, [1, 2, 3, 4, 5, 6, 7, 0, 8]);

    assert.strictEqual(solution.solvable, true);
    if (solution.solvable) {
      assert.deepStrictEqual(solution.result.path, ['R']);
    }
  });

  it('should pass options through to the search', () => {
    const solution = solvePuzzle(3, [1, 2, 3, 4, 5, 6, 7, 0, 8], { useHeuristic: false });

    assert.strictEqual(solution.solvable, true);
    if (solution.solvable) {
      assert.strictEqual(solution.result.expanded, 4);
    }
  });

  it('should reject malformed boards', () => {
    assert.throws(() => solvePuzzle(3, [1, 1, 2, 3, 4, 5, 6, 7, 0]), InvalidBoardError);
    assert.throws(() => solvePuzzle(2, [1, 2, 3, 0]), InvalidBoardError);
  });

  it('should compare uniform-cost search with A*', () => {
    const start = scramble(3, ['U', 'L', 'U', 'L', 'D', 'R', 'D', 'R']);
    const evaluation = new PuzzleSolver().evaluate(3, start);

    assert.strictEqual(evaluation.solvable, true);
    if (evaluation.solvable) {
      assert.strictEqual(evaluation.uniformCost.moves, evaluation.astar.moves);
      assert.ok(evaluation.astar.expanded <= evaluation.uniformCost.expanded);
    }
  });

  it('should not evaluate unsolvable boards', () => {
    const evaluation = new PuzzleSolver().evaluate(3, [2, 1, 3, 4, 5, 6, 7, 8, 0]);

    assert.deepStrictEqual(evaluation, { solvable: false, inversions: 1 });
  });
});
