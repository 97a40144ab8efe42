export { SparseMatrix } from './matrix.js';
export { sparseAdd, sparseSub, sparseMul } from './ops.js';
export { shape, isDimension, shapeEquals, canMultiply, shapeToString } from './shape.js';

export type { SparseEntry } from './matrix.js';
export type { MatrixShape } from './shape.js';
