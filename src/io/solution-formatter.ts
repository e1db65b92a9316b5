/**
 * Format boards and solutions for human-readable output
 */

import type { Board, Evaluation, SearchResult } from '../domain/types.js';
import { BLANK } from '../domain/constants.js';
import { toRows } from '../state/board-state.js';

export const UNSOLVABLE_MESSAGE = 'This puzzle configuration is NOT solvable.';

export interface FormatOptions {
  show: boolean;
}

/**
 * Format a board as right-aligned rows with the blank left empty
 */
export function formatBoard(n: number, board: Board): string {
  const width = String(n * n - 1).length;

  return toRows(n, board)
    .map(row => row
      .map(value => value === BLANK ? ' '.repeat(width) : String(value).padStart(width))
      .join(' '))
    .join('\n');
}

/**
 * Format a search result for console output
 */
export function formatSolution(
  n: number,
  result: SearchResult,
  options: FormatOptions = { show: false }
): string {
  const lines: string[] = [];

  lines.push(`Minimum moves: ${result.moves}`);
  lines.push(`Move sequence: ${result.path.join('')}`);

  if (options.show) {
    lines.push(formatSteps(n, result.boards));
  }

  return lines.join('\n');
}

/**
 * Format every board along a solution path
 */
export function formatSteps(n: number, boards: Board[]): string {
  return boards
    .map((board, i) => `\nStep ${i}:\n${formatBoard(n, board)}`)
    .join('\n');
}

/**
 * Format search statistics
 */
export function formatSearchStats(label: string, result: SearchResult): string {
  return [
    `${label}:`,
    `  Expanded states: ${result.expanded}`,
    `  Max frontier size: ${result.maxFrontier}`,
    `  Runtime: ${(result.timeTaken / 1000).toFixed(3)} seconds`,
  ].join('\n');
}

/**
 * Format a uniform-cost versus A* comparison
 */
export function formatEvaluation(
  n: number,
  evaluation: Evaluation,
  options: FormatOptions = { show: false }
): string {
  if (!evaluation.solvable) {
    return UNSOLVABLE_MESSAGE;
  }

  const lines: string[] = [];

  lines.push('=== Evaluation Results ===');
  lines.push(formatSearchStats('UCS (no heuristic)', evaluation.uniformCost));
  lines.push('');
  lines.push(formatSearchStats('A* with heuristic', evaluation.astar));
  lines.push('');
  lines.push('=== Solution (A* with heuristic) ===');
  lines.push(formatSolution(n, evaluation.astar, options));

  return lines.join('\n');
}

/**
 * Format a search result as JSON
 */
export function formatSolutionJSON(result: SearchResult): string {
  return JSON.stringify({
    moves: result.moves,
    path: result.path,
    boards: result.boards,
    stats: {
      expanded: result.expanded,
      maxFrontier: result.maxFrontier,
      timeTaken: result.timeTaken,
    },
  }, null, 2);
}
