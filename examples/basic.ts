/**
 * Basic Usage Example
 *
 * Builds two small matrices, combines them, and round-trips the text format.
 */

import {
  SparseMatrix,
  formatSparseMatrix,
  parseSparseMatrix,
  DimensionMismatchError,
} from '../src/index.js';

console.log('=== sparsemat Basic Examples ===\n');

const A = SparseMatrix.fromEntries(2, 3, [
  [0, 0, 1],
  [0, 2, 4],
  [1, 1, -2],
]);
const B = parseSparseMatrix('rows=3\ncols=2\n(0, 1, 3)\n(2, 0, 5)\n(1, 0, 6)');

console.log('--- A ---');
console.log(formatSparseMatrix(A));
console.log('\n--- B ---');
console.log(formatSparseMatrix(B));

console.log('\n--- A * B ---');
const product = A.mul(B);
console.log(formatSparseMatrix(product));
console.log('dense:', product.toDense());

console.log('\n--- A + A ---');
console.log(formatSparseMatrix(A.add(A)));

console.log('\n--- A + B (shape mismatch) ---');
try {
  A.add(B);
} catch (err) {
  if (!(err instanceof DimensionMismatchError)) throw err;
  console.log(err.message);
}
