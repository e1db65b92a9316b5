/**
 * Parse puzzle boards from text files
 *
 * Three layouts are accepted, tried in order:
 * - tab-delimited rows, where an empty cell is the blank
 * - column-aligned rows, where one row may leave the blank cell empty
 * - whitespace-separated rows with an explicit 0 for the blank
 */

import * as fs from 'fs';

import type { Board, PuzzleInput } from '../domain/types.js';
import { MIN_SIZE, MAX_SIZE } from '../domain/constants.js';
import { BoardParseError } from '../domain/errors.js';
import { missingValues } from '../constraints/validator.js';

// A number and the character column it starts at
interface Token {
  value: number;
  start: number;
}

/**
 * Read and parse a board file
 */
export function readBoard(filePath: string): PuzzleInput {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseBoard(content);
}

/**
 * Parse board text into its size and flattened cells
 */
export function parseBoard(text: string): PuzzleInput {
  const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');

  const n = lines.length;
  if (n < MIN_SIZE || n > MAX_SIZE) {
    throw new BoardParseError(`n must be between ${MIN_SIZE} and ${MAX_SIZE}, got n=${n}`);
  }

  const tabRows = parseTabDelimited(lines, n);
  if (tabRows) {
    return { n, board: checkPermutation(n, tabRows.flat()) };
  }

  const tokenRows = lines.map(tokenize);
  const counts = tokenRows.map(tokens => tokens.length);

  if (counts.every(count => count === n)) {
    const board = tokenRows.flatMap(tokens => tokens.map(token => token.value));
    return { n, board: checkPermutation(n, board) };
  }

  const blankRows = counts.filter(count => count === n - 1).length;
  const aligned =
    Math.max(...counts) === n &&
    counts.every(count => count === n || count === n - 1) &&
    blankRows === 1;

  if (!aligned) {
    return { n, board: checkPermutation(n, parseWhitespace(lines, n)) };
  }

  const rows = fillMissingBlank(tokenRows, counts.indexOf(n), n);
  const board = rows.flat();

  try {
    return { n, board: checkPermutation(n, board) };
  } catch (err) {
    if (err instanceof BoardParseError) {
      throw new BoardParseError(
        `${err.message} Your file may not be consistently column-aligned.`
      );
    }
    throw err;
  }
}

/**
 * Rows split on tabs, or null when the file is not tab-delimited
 */
function parseTabDelimited(lines: string[], n: number): number[][] | null {
  if (!lines.some(line => line.includes('\t'))) return null;

  const rows: number[][] = [];

  for (const line of lines) {
    const cells = line.split('\t');
    if (cells.length !== n) return null;

    rows.push(cells.map(cell => {
      const trimmed = cell.trim();
      return trimmed === '' ? 0 : parseCell(trimmed);
    }));
  }

  return rows;
}

/**
 * Numbers in a line with their starting columns
 */
function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  for (const match of line.matchAll(/\d+/g)) {
    tokens.push({ value: Number(match[0]), start: match.index ?? 0 });
  }
  return tokens;
}

/**
 * Plain whitespace split; every row must hold n numbers
 */
function parseWhitespace(lines: string[], n: number): number[] {
  const rows = lines.map(line => line.trim().split(/\s+/).map(parseCell));

  if (rows.some(row => row.length !== n)) {
    throw new BoardParseError(
      'Could not parse as tab-delimited or space-aligned grid. ' +
      'If using spaces, the file must be column-aligned; otherwise include 0 for blank.'
    );
  }

  return rows.flat();
}

/**
 * Insert the blank into the one short row using the column starts of an
 * anchor row that holds all n numbers
 */
function fillMissingBlank(tokenRows: Token[][], anchorIndex: number, n: number): number[][] {
  const anchors = tokenRows[anchorIndex].map(token => token.start);

  const gaps: number[] = [];
  for (let i = 0; i < n - 1; i++) {
    gaps.push(anchors[i + 1] - anchors[i]);
  }
  const minGap = gaps.length > 0 ? Math.min(...gaps) : 2;
  const tolerance = Math.max(1, Math.floor(minGap / 2));

  return tokenRows.map(tokens => {
    if (tokens.length === n) {
      return tokens.map(token => token.value);
    }

    const row: number[] = [];
    let next = 0;

    for (const anchor of anchors) {
      const token = tokens[next];
      if (token !== undefined && Math.abs(token.start - anchor) <= tolerance) {
        row.push(token.value);
        next++;
      } else {
        row.push(0);
      }
    }

    return row;
  });
}

function parseCell(cell: string): number {
  if (!/^\d+$/.test(cell)) {
    throw new BoardParseError(`Invalid cell value "${cell}"`);
  }
  return Number(cell);
}

/**
 * Ensure the cells are exactly 0..n^2-1
 */
function checkPermutation(n: number, cells: number[]): Board {
  const cellCount = n * n;
  const present = new Set(cells);
  const missing = missingValues(cellCount, present);
  const extra = [...present].filter(value => value >= cellCount).sort((a, b) => a - b);

  if (cells.length !== cellCount || missing.length > 0 || extra.length > 0) {
    throw new BoardParseError(
      `Board must contain all numbers 0..${cellCount - 1} exactly once. ` +
      `Missing=[${missing.join(', ')}], Extra=[${extra.join(', ')}].`
    );
  }

  return cells;
}
