/**
 * Arithmetic on sparse matrices.
 *
 * Every operation checks shapes before doing any work and returns a new
 * matrix; operands are never modified.
 */

import { DimensionMismatchError } from '../error.js';
import { SparseMatrix } from './matrix.js';
import type { SparseEntry } from './matrix.js';
import { canMultiply, shapeEquals, shapeToString } from './shape.js';

function assertSameShape(operation: string, A: SparseMatrix, B: SparseMatrix): void {
  if (!shapeEquals(A.shape, B.shape)) {
    throw new DimensionMismatchError(operation, shapeToString(A.shape), shapeToString(B.shape));
  }
}

/**
 * Copy A, then fold each of B's entries into the copy with `combine`.
 */
function elementwise(
  A: SparseMatrix,
  B: SparseMatrix,
  combine: (current: number, value: number) => number
): SparseMatrix {
  const result = new SparseMatrix(A.rowCount, A.colCount);

  for (const { row, col, value } of A.entries()) {
    result.set(row, col, value);
  }
  for (const { row, col, value } of B.entries()) {
    result.set(row, col, combine(result.get(row, col), value));
  }

  return result;
}

/**
 * Add two matrices: result = A + B
 */
export function sparseAdd(A: SparseMatrix, B: SparseMatrix): SparseMatrix {
  assertSameShape('addition', A, B);
  return elementwise(A, B, (current, value) => current + value);
}

/**
 * Subtract two matrices: result = A - B
 */
export function sparseSub(A: SparseMatrix, B: SparseMatrix): SparseMatrix {
  assertSameShape('subtraction', A, B);
  return elementwise(A, B, (current, value) => current - value);
}

/**
 * Group B's non-zero entries by row, each row sorted by column.
 *
 * Stored zeros are dropped here, so they never contribute to a product.
 */
function indexRows(B: SparseMatrix): Map<number, SparseEntry[]> {
  const byRow = new Map<number, SparseEntry[]>();
  for (const entry of B.entries()) {
    if (entry.value === 0) continue;
    const row = byRow.get(entry.row);
    if (row === undefined) {
      byRow.set(entry.row, [entry]);
    } else {
      row.push(entry);
    }
  }
  for (const row of byRow.values()) {
    row.sort((a, b) => a.col - b.col);
  }
  return byRow;
}

/**
 * Matrix-matrix multiplication: result = A * B
 *
 * For each entry A[i][k] = v (in A's order) and each non-zero B[k][j] (by
 * ascending j), accumulates v * B[k][j] into result[i][j].
 */
export function sparseMul(A: SparseMatrix, B: SparseMatrix): SparseMatrix {
  if (!canMultiply(A.shape, B.shape)) {
    throw new DimensionMismatchError(
      'multiplication',
      `${A.colCount}×${B.colCount}`,
      shapeToString(B.shape)
    );
  }

  const result = new SparseMatrix(A.rowCount, B.colCount);
  const bRows = indexRows(B);

  for (const { row: i, col: k, value: v } of A.entries()) {
    const bRow = bRows.get(k);
    if (bRow === undefined) continue;

    for (const { col: j, value: w } of bRow) {
      result.set(i, j, result.get(i, j) + v * w);
    }
  }

  return result;
}
