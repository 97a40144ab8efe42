/**
 * Named binary operations and selection by menu key or name.
 */

import { InvalidOperationError } from './error.js';
import { sparseAdd, sparseMul, sparseSub } from './sparse/index.js';
import type { SparseMatrix } from './sparse/index.js';

export type OperationName = 'addition' | 'subtraction' | 'multiplication';

export interface Operation {
  /** Menu key */
  readonly key: string;
  readonly name: OperationName;
  readonly alias: string;
  readonly apply: (A: SparseMatrix, B: SparseMatrix) => SparseMatrix;
}

/**
 * The operations menu, in display order.
 */
export const OPERATIONS: readonly Operation[] = [
  { key: '1', name: 'subtraction', alias: 'sub', apply: sparseSub },
  { key: '2', name: 'multiplication', alias: 'mul', apply: sparseMul },
  { key: '3', name: 'addition', alias: 'add', apply: sparseAdd },
];

/**
 * Find an operation by menu key (`"1"`), name (`"addition"`) or alias
 * (`"add"`). Matching ignores case and surrounding whitespace.
 *
 * @throws InvalidOperationError if nothing matches
 */
export function selectOperation(choice: string): Operation {
  const wanted = choice.trim().toLowerCase();
  const op = OPERATIONS.find((o) => o.key === wanted || o.name === wanted || o.alias === wanted);
  if (op === undefined) {
    throw new InvalidOperationError(choice);
  }
  return op;
}

/**
 * Run the selected operation on `A` and `B`.
 */
export function applyOperation(choice: string, A: SparseMatrix, B: SparseMatrix): SparseMatrix {
  return selectOperation(choice).apply(A, B);
}

/** Menu lines such as `1: subtraction` */
export function operationMenu(): string[] {
  return OPERATIONS.map((o) => `${o.key}: ${o.name}`);
}
