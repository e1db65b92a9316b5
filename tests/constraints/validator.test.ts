/**
 * Tests for board validation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { validateBoard, missingValues } from '../../src/constraints/validator.js';
import { goalBoard } from '../../src/state/board-state.js';

describe('Board Validation', () => {
  it('should accept a permutation of 0..n^2-1', () => {
    const result = validateBoard(3, [8, 6, 7, 2, 5, 4, 3, 0, 1]);

    assert.strictEqual(result.valid, true);
    assert.deepStrictEqual(result.errors, []);
    assert.deepStrictEqual(result.warnings, []);
  });

  it('should reject unsupported sizes', () => {
    const result = validateBoard(2, [1, 2, 3, 0]);

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.errors, ['n must be an integer between 3 and 8, got 2']);
  });

  it('should reject a wrong cell count', () => {
    const result = validateBoard(3, [1, 2, 3, 0]);

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.errors, ['Board must have 9 cells, got 4']);
  });

  it('should report duplicated and missing values', () => {
    const result = validateBoard(3, [1, 1, 2, 3, 4, 5, 6, 7, 0]);

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.errors, [
      'Duplicated values: 1',
      'Missing values: 8',
    ]);
  });

  it('should report values out of range', () => {
    const result = validateBoard(3, [1, 2, 3, 4, 5, 6, 7, 9, 0]);

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.errors, [
      'Values out of range 0..8: 9',
      'Missing values: 8',
    ]);
  });

  it('should warn about large boards', () => {
    const result = validateBoard(5, goalBoard(5));

    assert.strictEqual(result.valid, true);
    assert.deepStrictEqual(result.warnings, [
      'Optimal search on a 5x5 board may not finish in practical time',
    ]);
  });
});

describe('Missing Values', () => {
  it('should list absent values in ascending order', () => {
    assert.deepStrictEqual(missingValues(5, new Set([0, 3])), [1, 2, 4]);
  });
});
