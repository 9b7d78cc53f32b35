/**
 * Per-run context passed explicitly to every component.
 */
import { Logger } from '../utils/logger.js';
import { AtomicFileWriter } from './writer/atomic-writer.js';
import type { FileWriter } from './writer/types.js';

export interface RunContext {
  /** Absolute output root */
  baseDir: string;
  /** Replace existing files instead of skipping them */
  overwrite: boolean;
  log: Logger;
  writer: FileWriter;
}

export interface RunContextInit {
  baseDir: string;
  overwrite: boolean;
  log: Logger;
  /** Defaults to an AtomicFileWriter logging through `log` */
  writer?: FileWriter;
}

export function createRunContext(init: RunContextInit): RunContext {
  return {
    baseDir: init.baseDir,
    overwrite: init.overwrite,
    log: init.log,
    writer: init.writer ?? new AtomicFileWriter(init.log),
  };
}
