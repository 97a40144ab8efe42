/**
 * Reading and writing matrix files.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { SourceNotFoundError, WriteFailureError } from './error.js';
import { formatSparseMatrix, parseSparseMatrix } from './format/index.js';
import type { SparseMatrix } from './sparse/index.js';

/**
 * Where matrix text comes from and goes to.
 */
export interface TextStore {
  /** @throws SourceNotFoundError */
  readText(path: string): Promise<string>;
  /** @throws WriteFailureError */
  writeText(path: string, text: string): Promise<void>;
}

/**
 * Read a UTF-8 file. Any failure (missing file, a directory, permissions) is
 * reported as a missing source.
 */
export async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (cause) {
    throw new SourceNotFoundError(path, { cause });
  }
}

/**
 * Write a UTF-8 file, replacing any existing content.
 */
export async function writeText(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, 'utf8');
  } catch (cause) {
    throw new WriteFailureError(path, { cause });
  }
}

/** The local filesystem */
export const fileStore: TextStore = { readText, writeText };

/**
 * In-memory store keyed by path.
 */
export class MemoryStore implements TextStore {
  readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  async readText(path: string): Promise<string> {
    const text = this.files.get(path);
    if (text === undefined) {
      throw new SourceNotFoundError(path);
    }
    return text;
  }

  async writeText(path: string, text: string): Promise<void> {
    this.files.set(path, text);
  }
}

/**
 * Read and parse a matrix file.
 */
export async function loadMatrix(path: string, store: TextStore = fileStore): Promise<SparseMatrix> {
  const text = await store.readText(path);
  return parseSparseMatrix(text, path);
}

/**
 * Format a matrix and write it to `path`.
 */
export async function saveMatrix(
  path: string,
  matrix: SparseMatrix,
  store: TextStore = fileStore
): Promise<void> {
  await store.writeText(path, formatSparseMatrix(matrix));
}
