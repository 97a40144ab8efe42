export { parseSparseMatrix } from './parse.js';
export { formatSparseMatrix } from './serialize.js';
