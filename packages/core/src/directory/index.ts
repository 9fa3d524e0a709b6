export { ClientDirectory } from './client-directory.js';
export type { ClientDirectoryOptions, LoadOptions } from './client-directory.js';
export { createUnknownClient } from './unknown.js';
