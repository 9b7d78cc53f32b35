/**
 * Atomic writer exports barrel file.
 */
export { AtomicFileWriter, ensureDirectory, tempPathFor, removeTempFile } from './atomic-writer.js';
export type { FileWriter, WriteOptions, WriteOutcome, WriteOutcomeKind } from './types.js';
export { FILE_MODE, EXECUTABLE_MODE } from './types.js';
