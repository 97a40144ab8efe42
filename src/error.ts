/**
 * Base error class for sparsemat.
 */
export class SparseMatrixError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SparseMatrixError';
  }
}

/**
 * Error thrown when a row or column index is negative or not an integer.
 */
export class InvalidIndexError extends SparseMatrixError {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number) {
    super(`Invalid index (${row}, ${col}): indices must be non-negative integers`);
    this.name = 'InvalidIndexError';
    this.row = row;
    this.col = col;
  }
}

/**
 * Error thrown when a stored value is not a safe integer.
 */
export class InvalidValueError extends SparseMatrixError {
  readonly value: number;

  constructor(value: number) {
    super(
      Number.isInteger(value)
        ? `Invalid value ${value}: outside the safe integer range`
        : `Invalid value ${value}: matrix values must be integers`
    );
    this.name = 'InvalidValueError';
    this.value = value;
  }
}

/**
 * Error thrown when command-line arguments cannot be used.
 */
export class InvalidArgumentsError extends SparseMatrixError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidArgumentsError';
  }
}

/**
 * Error thrown when a matrix source cannot be read.
 */
export class SourceNotFoundError extends SparseMatrixError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`File not found: ${path}`, options);
    this.name = 'SourceNotFoundError';
    this.path = path;
  }
}

/**
 * Error thrown when the `rows=` / `cols=` header is missing or malformed.
 */
export class MalformedHeaderError extends SparseMatrixError {
  readonly source: string | undefined;

  constructor(reason: string, source?: string) {
    super(`${reason}${source === undefined ? '' : ` in ${source}`}. Expected 'rows=X' and 'cols=Y'`);
    this.name = 'MalformedHeaderError';
    this.source = source;
  }
}

/**
 * Error thrown when an entry line is not a `(row, col, value)` triple.
 */
export class MalformedEntryError extends SparseMatrixError {
  /** 1-based line number */
  readonly line: number;
  readonly content: string;
  readonly source: string | undefined;

  constructor(line: number, content: string, source?: string) {
    super(
      `Invalid format at line ${line}${source === undefined ? '' : ` in ${source}`}: ${content}`
    );
    this.name = 'MalformedEntryError';
    this.line = line;
    this.content = content;
    this.source = source;
  }
}

/**
 * Error thrown when operand shapes are incompatible.
 */
export class DimensionMismatchError extends SparseMatrixError {
  readonly operation: string;
  readonly expected: string;
  readonly actual: string;

  constructor(operation: string, expected: string, actual: string) {
    super(`Cannot perform ${operation}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
    this.operation = operation;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when an operation choice does not name a known operation.
 */
export class InvalidOperationError extends SparseMatrixError {
  readonly choice: string;

  constructor(choice: string) {
    super(`Invalid operation choice: '${choice}'`);
    this.name = 'InvalidOperationError';
    this.choice = choice;
  }
}

/**
 * Error thrown when a result cannot be written.
 */
export class WriteFailureError extends SparseMatrixError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Could not write output file: ${path}`, options);
    this.name = 'WriteFailureError';
    this.path = path;
  }
}
