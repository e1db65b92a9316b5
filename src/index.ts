/**
 * N-Puzzle Solver
 *
 * Finds minimum-length solutions to sliding-tile puzzles with A* search
 * over Manhattan distance plus linear conflict.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/board-state.js';
export * from './state/state-hash.js';

// Constraint exports
export * from './constraints/solvability.js';
export * from './constraints/validator.js';

// Solver exports
export * from './solver/solver.js';
export * from './solver/astar.js';
export * from './solver/search-node.js';
export * from './solver/heuristics.js';
export * from './solver/action-generator.js';

// I/O exports
export * from './io/board-parser.js';
export * from './io/solution-formatter.js';
