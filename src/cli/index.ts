#!/usr/bin/env node
/**
 * N-Puzzle Solver - CLI Interface
 */

import type { SolverOptions } from '../domain/types.js';
import { readBoard } from '../io/board-parser.js';
import { PuzzleSolver } from '../solver/solver.js';
import {
  UNSOLVABLE_MESSAGE,
  formatBoard,
  formatEvaluation,
  formatSolution,
  formatSolutionJSON,
} from '../io/solution-formatter.js';
import { type CLIOptions, HELP_TEXT, parseArgs } from './args.js';

function runSolve(options: CLIOptions): void {
  if (options.inputFile === undefined) {
    console.log(HELP_TEXT);
    return;
  }

  const { n, board } = readBoard(options.inputFile);
  const validation = PuzzleSolver.assertValid(n, board);
  const solverOptions: Partial<SolverOptions> = options.maxExpansions !== undefined
    ? { maxExpansions: options.maxExpansions }
    : {};

  if (options.outputFormat === 'text') {
    console.log(`n = ${n}`);
    console.log('Start:');
    console.log(formatBoard(n, board));
    console.log('');

    for (const warning of validation.warnings) {
      console.log(`Warning: ${warning}`);
    }
  }

  const solver = new PuzzleSolver();

  if (options.evaluation) {
    if (options.outputFormat === 'text') {
      console.log('Running Uniform Cost Search (h = 0) and A* with heuristic...');
      console.log('');
    }

    const evaluation = solver.evaluate(n, board, solverOptions);

    if (options.outputFormat === 'json') {
      console.log(JSON.stringify(evaluation, null, 2));
    } else {
      console.log(formatEvaluation(n, evaluation, { show: options.show }));
    }
    return;
  }

  const solution = solver.solve(n, board, solverOptions);

  if (!solution.solvable) {
    console.log(options.outputFormat === 'json'
      ? JSON.stringify({ solvable: false, inversions: solution.inversions }, null, 2)
      : UNSOLVABLE_MESSAGE);
    return;
  }

  if (options.outputFormat === 'json') {
    console.log(formatSolutionJSON(solution.result));
  } else {
    console.log(formatSolution(n, solution.result, { show: options.show }));
  }
}

// Main entry point
function main(): void {
  const options = parseArgs(process.argv.slice(2));

  switch (options.command) {
    case 'solve':
      runSolve(options);
      break;

    case 'help':
    default:
      console.log(HELP_TEXT);
      break;
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
}
