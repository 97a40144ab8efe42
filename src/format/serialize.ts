import type { SparseMatrix } from '../sparse/index.js';

/**
 * Format a matrix as text:
 *
 * ```text
 * rows=<rowCount>
 * cols=<colCount>
 * (<row>, <col>, <value>)
 * ```
 *
 * with one entry line per stored entry, in the matrix's iteration order.
 */
export function formatSparseMatrix(matrix: SparseMatrix): string {
  const lines = [`rows=${matrix.rowCount}`, `cols=${matrix.colCount}`];
  for (const { row, col, value } of matrix.entries()) {
    lines.push(`(${row}, ${col}, ${value})`);
  }
  return lines.join('\n').trimEnd();
}
