/**
 * Atomic writer type definitions.
 */
import type { BootstrapError } from '../../utils/errors.js';

/**
 * Result of writing one artifact. Exactly one is produced per write.
 */
export type WriteOutcome =
  | { kind: 'written'; path: string }
  | { kind: 'skipped-existing'; path: string }
  | { kind: 'failed'; path: string; error: BootstrapError };

export type WriteOutcomeKind = WriteOutcome['kind'];

export interface WriteOptions {
  /** Replace an existing destination instead of skipping it */
  overwrite: boolean;
  /** Set owner/group/other read+execute bits (0755) */
  executable?: boolean;
  /** Explicit permission bits; wins over `executable` */
  mode?: number;
}

/**
 * Anything that can place content at a path and report a WriteOutcome.
 * The scaffold builder depends on this, not on the atomic writer directly.
 */
export interface FileWriter {
  write(destPath: string, content: string | Uint8Array, options: WriteOptions): Promise<WriteOutcome>;
}

export const FILE_MODE = 0o644;
export const EXECUTABLE_MODE = 0o755;
