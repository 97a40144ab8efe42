/**
 * Dictionary-of-keys sparse matrix.
 *
 * Entries are kept in a map keyed by `(row, col)`:
 * - a missing key reads as 0
 * - iteration follows the order in which keys were first set; overwriting an
 *   entry keeps its position
 * - a stored value may be 0 (an explicit zero is still an entry)
 *
 * The shape grows to fit: setting `(row, col)` outside the current shape
 * raises `rowCount` to `row + 1` and/or `colCount` to `col + 1`. Every stored
 * key is therefore inside the shape.
 */

import { InvalidIndexError, InvalidValueError } from '../error.js';
import type { MatrixShape } from './shape.js';
import { shape, shapeEquals } from './shape.js';
import { sparseAdd, sparseMul, sparseSub } from './ops.js';

/**
 * A `(row, col, value)` triple.
 */
export interface SparseEntry {
  readonly row: number;
  readonly col: number;
  readonly value: number;
}

function keyOf(row: number, col: number): string {
  return `${row},${col}`;
}

function isIndex(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

export class SparseMatrix {
  private _rowCount: number;
  private _colCount: number;
  private readonly data = new Map<string, SparseEntry>();

  constructor(rowCount: number, colCount: number) {
    const s = shape(rowCount, colCount);
    this._rowCount = s.rows;
    this._colCount = s.cols;
  }

  /**
   * Build a matrix from triplets. Later entries overwrite earlier ones at the
   * same position.
   */
  static fromEntries(
    rowCount: number,
    colCount: number,
    entries: Iterable<readonly [number, number, number] | SparseEntry>
  ): SparseMatrix {
    const m = new SparseMatrix(rowCount, colCount);
    for (const e of entries) {
      if ('row' in e) {
        m.set(e.row, e.col, e.value);
      } else {
        m.set(e[0], e[1], e[2]);
      }
    }
    return m;
  }

  get rowCount(): number {
    return this._rowCount;
  }

  get colCount(): number {
    return this._colCount;
  }

  get shape(): MatrixShape {
    return { rows: this._rowCount, cols: this._colCount };
  }

  /** Number of stored entries, explicit zeros included */
  get nnz(): number {
    return this.data.size;
  }

  /**
   * Value at `(row, col)`, or 0 when nothing is stored there. Indices outside
   * the shape are not an error.
   */
  get(row: number, col: number): number {
    return this.data.get(keyOf(row, col))?.value ?? 0;
  }

  /** True if an entry is stored at `(row, col)` */
  has(row: number, col: number): boolean {
    return this.data.has(keyOf(row, col));
  }

  /**
   * Store `value` at `(row, col)`, growing the shape if needed.
   *
   * @throws InvalidIndexError if an index is negative or not an integer
   * @throws InvalidValueError if the value is not a safe integer
   */
  set(row: number, col: number, value: number): void {
    if (!isIndex(row) || !isIndex(col)) {
      throw new InvalidIndexError(row, col);
    }
    if (!Number.isSafeInteger(value)) {
      throw new InvalidValueError(value);
    }

    if (row >= this._rowCount) this._rowCount = row + 1;
    if (col >= this._colCount) this._colCount = col + 1;

    this.data.set(keyOf(row, col), { row, col, value });
  }

  /** Stored entries in insertion order */
  entries(): IterableIterator<SparseEntry> {
    return this.data.values();
  }

  [Symbol.iterator](): IterableIterator<SparseEntry> {
    return this.entries();
  }

  clone(): SparseMatrix {
    return SparseMatrix.fromEntries(this._rowCount, this._colCount, this.entries());
  }

  /**
   * Same shape and same value at every position inside it. Where entries are
   * stored, and in which order, does not matter.
   */
  equals(other: SparseMatrix): boolean {
    if (!shapeEquals(this.shape, other.shape)) {
      return false;
    }
    for (const { row, col, value } of this.entries()) {
      if (other.get(row, col) !== value) return false;
    }
    for (const { row, col, value } of other.entries()) {
      if (this.get(row, col) !== value) return false;
    }
    return true;
  }

  /** Dense row-major copy */
  toDense(): number[][] {
    const dense: number[][] = [];
    for (let r = 0; r < this._rowCount; r++) {
      dense.push(new Array<number>(this._colCount).fill(0));
    }
    for (const { row, col, value } of this.entries()) {
      const line = dense[row];
      if (line !== undefined) line[col] = value;
    }
    return dense;
  }

  /** this + other */
  add(other: SparseMatrix): SparseMatrix {
    return sparseAdd(this, other);
  }

  /** this - other */
  sub(other: SparseMatrix): SparseMatrix {
    return sparseSub(this, other);
  }

  /** this * other */
  mul(other: SparseMatrix): SparseMatrix {
    return sparseMul(this, other);
  }
}
