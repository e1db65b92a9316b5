/**
 * Input validation for puzzle boards
 */

import type { Board, ValidationResult } from '../domain/types.js';
import { MIN_SIZE, MAX_SIZE, PRACTICAL_SIZE } from '../domain/constants.js';

/**
 * Validate a grid size and board before search
 */
export function validateBoard(n: number, board: Board): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Check 1: Size is supported
  if (!Number.isInteger(n) || n < MIN_SIZE || n > MAX_SIZE) {
    errors.push(`n must be an integer between ${MIN_SIZE} and ${MAX_SIZE}, got ${n}`);
    return { valid: false, errors, warnings };
  }

  // Check 2: Board has n^2 cells
  const cellCount = n * n;
  if (board.length !== cellCount) {
    errors.push(`Board must have ${cellCount} cells, got ${board.length}`);
    return { valid: false, errors, warnings };
  }

  // Check 3: Values are a permutation of 0..n^2-1
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  const outOfRange: number[] = [];

  for (const value of board) {
    if (!Number.isInteger(value) || value < 0 || value >= cellCount) {
      outOfRange.push(value);
    } else if (seen.has(value)) {
      duplicates.add(value);
    } else {
      seen.add(value);
    }
  }

  if (outOfRange.length > 0) {
    errors.push(`Values out of range 0..${cellCount - 1}: ${outOfRange.join(', ')}`);
  }

  if (duplicates.size > 0) {
    errors.push(`Duplicated values: ${[...duplicates].sort((a, b) => a - b).join(', ')}`);
  }

  const missing = missingValues(cellCount, seen);
  if (missing.length > 0) {
    errors.push(`Missing values: ${missing.join(', ')}`);
  }

  if (n > PRACTICAL_SIZE) {
    warnings.push(`Optimal search on a ${n}x${n} board may not finish in practical time`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Values of 0..cellCount-1 absent from the set, ascending
 */
export function missingValues(cellCount: number, present: ReadonlySet<number>): number[] {
  const missing: number[] = [];
  for (let value = 0; value < cellCount; value++) {
    if (!present.has(value)) missing.push(value);
  }
  return missing;
}
