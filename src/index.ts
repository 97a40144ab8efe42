/**
 * sparsemat - sparse integer matrices in TypeScript
 *
 * @example
 * ```ts
 * import { parseSparseMatrix, formatSparseMatrix } from 'sparsemat';
 *
 * const A = parseSparseMatrix('rows=1\ncols=2\n(0, 0, 1)\n(0, 1, 2)');
 * const B = parseSparseMatrix('rows=2\ncols=1\n(0, 0, 3)\n(1, 0, 4)');
 *
 * console.log(formatSparseMatrix(A.mul(B)));
 * // rows=1
 * // cols=1
 * // (0, 0, 11)
 * ```
 *
 * @packageDocumentation
 */

// === Matrix ===
export { SparseMatrix } from './sparse/index.js';
export type { SparseEntry, MatrixShape } from './sparse/index.js';

// === Arithmetic ===
export { sparseAdd, sparseSub, sparseMul } from './sparse/index.js';

// === Shape Utilities ===
export { shape, isDimension, shapeEquals, canMultiply, shapeToString } from './sparse/index.js';

// === Text Format ===
export { parseSparseMatrix, formatSparseMatrix } from './format/index.js';

// === Files ===
export { readText, writeText, loadMatrix, saveMatrix, fileStore, MemoryStore } from './io.js';
export type { TextStore } from './io.js';

// === Operations ===
export { OPERATIONS, selectOperation, applyOperation, operationMenu } from './operations.js';
export type { Operation, OperationName } from './operations.js';

// === Configuration & Reporting ===
export { DEFAULT_CONFIG, resolveConfig } from './config.js';
export type { CalculatorConfig, Env } from './config.js';
export { ConsoleReporter, MemoryReporter } from './reporter.js';
export type { Reporter, ConsoleReporterOptions } from './reporter.js';

// === Command ===
export { main, runCalculation, runInteractive, readlinePrompt } from './cli.js';
export type { CalculationRequest, CalculatorDeps, MainOptions, Prompt } from './cli.js';

// === Errors ===
export {
  SparseMatrixError,
  InvalidIndexError,
  InvalidValueError,
  InvalidArgumentsError,
  SourceNotFoundError,
  MalformedHeaderError,
  MalformedEntryError,
  DimensionMismatchError,
  InvalidOperationError,
  WriteFailureError,
} from './error.js';
