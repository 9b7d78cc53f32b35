/**
 * Module registry exports barrel file.
 */
export * from './schema.js';
export * from './defaults.js';
export * from './loader.js';
