export { parseLine, parseLineResult, splitFullName, splitCityPostal } from './pipe-line.js';
export { parsePipeFile } from './pipe-file.js';
export type { ParseOptions } from './types.js';
