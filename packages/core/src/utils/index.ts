export { stripBom, splitLines } from './text.js';
