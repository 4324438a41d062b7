/**
 * Repository analysis package
 */

export * from './types.js';
export * from './file-types.js';
export * from './ignore.js';
export * from './key-files.js';
export * from './scanner.js';
