/**
 * Shape of a matrix: its logical row and column counts.
 *
 * Zero-sized shapes (0 rows or 0 columns) are legal.
 */
export interface MatrixShape {
  readonly rows: number;
  readonly cols: number;
}

/** Create a shape */
export function shape(rows: number, cols: number): MatrixShape {
  if (!isDimension(rows) || !isDimension(cols)) {
    throw new RangeError(`Matrix dimensions must be non-negative integers, got ${rows}x${cols}`);
  }
  return { rows, cols };
}

/** Check if a value is usable as a row or column count */
export function isDimension(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

/** Check if two shapes are equal */
export function shapeEquals(a: MatrixShape, b: MatrixShape): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}

/** Check if `a * b` is defined */
export function canMultiply(a: MatrixShape, b: MatrixShape): boolean {
  return a.cols === b.rows;
}

/** Format shape as string for messages */
export function shapeToString(s: MatrixShape): string {
  return `${s.rows}×${s.cols}`;
}
