/**
 * Parser for the sparse matrix text format.
 *
 * ```text
 * rows=3
 * cols=4
 * (0, 1, 5)
 * (2, 3, -7)
 * ```
 *
 * The first two lines give the shape. Every further non-blank line is a
 * `(row, col, value)` triple; the value may be negative. Entries are applied
 * with `set`, so an entry outside the declared shape grows the matrix.
 */

import { MalformedEntryError, MalformedHeaderError } from '../error.js';
import { SparseMatrix } from '../sparse/index.js';

const ROWS_PATTERN = /^rows=(\d+)$/;
const COLS_PATTERN = /^cols=(\d+)$/;
const ENTRY_PATTERN = /^\((\d+),\s*(\d+),\s*(-?\d+)\)$/;

/**
 * Parse a digit string, or undefined if it is not a safe integer.
 */
function toInt(digits: string | undefined): number | undefined {
  if (digits === undefined) return undefined;
  const n = Number.parseInt(digits, 10);
  return Number.isSafeInteger(n) ? n : undefined;
}

function parseHeader(line: string | undefined, pattern: RegExp): number | undefined {
  if (line === undefined) return undefined;
  return toInt(pattern.exec(line.trim())?.[1]);
}

/**
 * Parse matrix text.
 *
 * @param source - Where the text came from (a file path), used in error messages
 * @throws MalformedHeaderError if the `rows=` / `cols=` lines are missing or invalid
 * @throws MalformedEntryError if an entry line is not a valid triple
 */
export function parseSparseMatrix(text: string, source?: string): SparseMatrix {
  const lines = text.split('\n');

  if (lines.length < 2) {
    throw new MalformedHeaderError('Not enough lines for matrix dimensions', source);
  }

  const rowCount = parseHeader(lines[0], ROWS_PATTERN);
  const colCount = parseHeader(lines[1], COLS_PATTERN);
  if (rowCount === undefined || colCount === undefined) {
    throw new MalformedHeaderError('Invalid matrix dimensions', source);
  }

  const matrix = new SparseMatrix(rowCount, colCount);

  for (let i = 2; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    if (line === '') continue;

    const match = ENTRY_PATTERN.exec(line);
    const row = toInt(match?.[1]);
    const col = toInt(match?.[2]);
    const value = toInt(match?.[3]);
    if (row === undefined || col === undefined || value === undefined) {
      throw new MalformedEntryError(i + 1, line, source);
    }

    matrix.set(row, col, value);
  }

  return matrix;
}
