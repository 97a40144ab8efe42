import { describe, it, expect } from 'vitest';
import { parseSparseMatrix, formatSparseMatrix } from '../../src/format/index.js';
import { SparseMatrix } from '../../src/sparse/index.js';
import { MalformedEntryError, MalformedHeaderError } from '../../src/error.js';
import { randomMatrix, seededRandom } from '../helpers/random.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('Text format', () => {
  describe('parsing', () => {
    it('parses header and entries', () => {
      const A = parseSparseMatrix('rows=3\ncols=4\n(0, 1, 5)\n(2, 3, -7)');
      expect(A.shape).toEqual({ rows: 3, cols: 4 });
      expect(A.get(0, 1)).toBe(5);
      expect(A.get(2, 3)).toBe(-7);
      expect(A.nnz).toBe(2);
    });

    it('parses a header with no entries', () => {
      const A = parseSparseMatrix('rows=0\ncols=0');
      expect(A.shape).toEqual({ rows: 0, cols: 0 });
      expect(A.nnz).toBe(0);
    });

    it('skips blank lines and surrounding whitespace', () => {
      const A = parseSparseMatrix('rows=2\r\ncols=2\r\n\r\n   \n  (1, 1, 3)  \r\n');
      expect(A.get(1, 1)).toBe(3);
      expect(A.nnz).toBe(1);
    });

    it('accepts entries without spaces after commas', () => {
      const A = parseSparseMatrix('rows=1\ncols=1\n(0,0,4)');
      expect(A.get(0, 0)).toBe(4);
    });

    it('grows the matrix for entries outside the header shape', () => {
      const A = parseSparseMatrix('rows=1\ncols=1\n(3, 2, 1)');
      expect(A.rowCount).toBe(4);
      expect(A.colCount).toBe(3);
    });

    it('keeps the last value for repeated positions', () => {
      const A = parseSparseMatrix('rows=2\ncols=2\n(0, 0, 1)\n(0, 0, 9)');
      expect(A.get(0, 0)).toBe(9);
      expect(A.nnz).toBe(1);
    });
  });

  describe('header errors', () => {
    it('rejects a misspelled header', () => {
      expect(() => parseSparseMatrix('rowz=3\ncols=2')).toThrow(MalformedHeaderError);
      expect(() => parseSparseMatrix('rows=3\ncolumns=2')).toThrow(MalformedHeaderError);
    });

    it('rejects text with fewer than two lines', () => {
      expect(() => parseSparseMatrix('')).toThrow(MalformedHeaderError);
      expect(() => parseSparseMatrix('rows=3')).toThrow(MalformedHeaderError);
    });

    it('rejects non-numeric and negative dimensions', () => {
      expect(() => parseSparseMatrix('rows=-1\ncols=2')).toThrow(MalformedHeaderError);
      expect(() => parseSparseMatrix('rows=3\ncols=x')).toThrow(MalformedHeaderError);
      expect(() => parseSparseMatrix('rows=3abc\ncols=2')).toThrow(MalformedHeaderError);
    });

    it('names the source in the message', () => {
      expect(() => parseSparseMatrix('rows=3', 'a.txt')).toThrow(
        "Not enough lines for matrix dimensions in a.txt. Expected 'rows=X' and 'cols=Y'"
      );
    });
  });

  describe('entry errors', () => {
    it('reports the line number and content of a short triple', () => {
      const err = catchError(() => parseSparseMatrix('rows=3\ncols=3\n(0, 0, 1)\n(1, 2)'));
      expect(err).toBeInstanceOf(MalformedEntryError);
      expect(err).toMatchObject({ line: 4, content: '(1, 2)' });
    });

    it('counts blank lines when numbering', () => {
      const err = catchError(() => parseSparseMatrix('rows=3\ncols=3\n\n\n  oops  '));
      expect(err).toMatchObject({ line: 5, content: 'oops' });
    });

    it('rejects trailing characters', () => {
      expect(() => parseSparseMatrix('rows=1\ncols=1\n(0, 0, 1) x')).toThrow(MalformedEntryError);
    });

    it('rejects negative indices', () => {
      expect(() => parseSparseMatrix('rows=1\ncols=1\n(-1, 0, 1)')).toThrow(MalformedEntryError);
    });

    it('rejects non-integer values', () => {
      expect(() => parseSparseMatrix('rows=1\ncols=1\n(0, 0, 1.5)')).toThrow(MalformedEntryError);
    });

    it('rejects values outside the safe integer range', () => {
      expect(() => parseSparseMatrix('rows=1\ncols=1\n(0, 0, 99999999999999999999)')).toThrow(
        MalformedEntryError
      );
    });

    it('names the source in the message', () => {
      expect(() => parseSparseMatrix('rows=1\ncols=1\nbad', 'a.txt')).toThrow(
        'Invalid format at line 3 in a.txt: bad'
      );
    });
  });

  describe('serialization', () => {
    it('writes header and entries in insertion order', () => {
      const A = new SparseMatrix(2, 3);
      A.set(1, 2, -4);
      A.set(0, 0, 7);
      expect(formatSparseMatrix(A)).toBe('rows=2\ncols=3\n(1, 2, -4)\n(0, 0, 7)');
    });

    it('writes only the header for an empty matrix', () => {
      expect(formatSparseMatrix(new SparseMatrix(0, 0))).toBe('rows=0\ncols=0');
    });

    it('writes stored zeros', () => {
      const A = SparseMatrix.fromEntries(1, 1, [[0, 0, 0]]);
      expect(formatSparseMatrix(A)).toBe('rows=1\ncols=1\n(0, 0, 0)');
    });

    it('writes the grown shape', () => {
      const A = new SparseMatrix(1, 1);
      A.set(2, 4, 1);
      expect(formatSparseMatrix(A)).toBe('rows=3\ncols=5\n(2, 4, 1)');
    });
  });

  describe('round trip', () => {
    it('reproduces canonical text', () => {
      const text = 'rows=3\ncols=3\n(2, 0, -1)\n(0, 2, 8)\n(1, 1, 0)';
      expect(formatSparseMatrix(parseSparseMatrix(text))).toBe(text);
    });

    it('load, save and reload gives the same values', () => {
      const rand = seededRandom(7);
      for (let i = 0; i < 10; i++) {
        const A = randomMatrix(rand, 4, 3);
        const reloaded = parseSparseMatrix(formatSparseMatrix(A));
        expect(reloaded.equals(A)).toBe(true);
      }
    });
  });
});
