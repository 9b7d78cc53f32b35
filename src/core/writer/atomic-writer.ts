/**
 * Crash-safe, idempotent file writes.
 *
 * Content goes to a sibling temp file in the destination directory, gets its
 * final permission bits and an fsync, and only then is renamed over the
 * destination. The rename is the last step: a destination is either absent,
 * old content, or complete new content.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import {
  BootstrapError,
  DirectoryCreateError,
  WriteError,
  ErrorCodes,
  errorMessage,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import {
  EXECUTABLE_MODE,
  FILE_MODE,
  type FileWriter,
  type WriteOptions,
  type WriteOutcome,
} from './types.js';

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Walk from the root towards `dirPath` and return the first component that
 * exists but is not a directory.
 */
async function findBlockingComponent(dirPath: string): Promise<string | undefined> {
  const resolved = path.resolve(dirPath);
  const { root } = path.parse(resolved);
  let current = root;
  for (const segment of resolved.slice(root.length).split(path.sep).filter(Boolean)) {
    current = path.join(current, segment);
    try {
      const stat = await fs.promises.stat(current);
      if (!stat.isDirectory()) return current;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Create a directory and all its ancestors.
 *
 * @throws DirectoryCreateError when a component is a non-directory or mkdir fails
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.promises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOTDIR' || code === 'EEXIST') {
      const blocking = (await findBlockingComponent(dirPath)) ?? dirPath;
      throw new DirectoryCreateError(
        ErrorCodes.DIRECTORY_CREATE,
        `Path exists and is not a directory: ${blocking}`,
        { directory: dirPath, blocking }
      );
    }
    throw new DirectoryCreateError(
      ErrorCodes.DIRECTORY_CREATE,
      `Failed to create directory: ${dirPath} (${errorMessage(error)})`,
      { directory: dirPath, errno: code }
    );
  }
}

/**
 * Remove a temp file, returning the failure message instead of throwing.
 */
export async function removeTempFile(tmpPath: string): Promise<string | undefined> {
  try {
    await fs.promises.rm(tmpPath, { force: true });
    return undefined;
  } catch (error) {
    return errorMessage(error);
  }
}

/**
 * Sibling temp path: same directory, so the final rename never crosses filesystems.
 */
export function tempPathFor(destPath: string): string {
  return `${destPath}.tmp-${process.pid}-${randomBytes(4).toString('hex')}`;
}

export class AtomicFileWriter implements FileWriter {
  constructor(private readonly log: Logger) {}

  async write(destPath: string, content: string | Uint8Array, options: WriteOptions): Promise<WriteOutcome> {
    try {
      await ensureDirectory(path.dirname(destPath));
    } catch (error) {
      return this.failed(destPath, error);
    }

    let existing: fs.Stats | undefined;
    try {
      existing = await fs.promises.lstat(destPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        return this.failed(
          destPath,
          new WriteError(ErrorCodes.TEMP_WRITE, `Cannot inspect destination: ${destPath} (${errorMessage(error)})`, {
            path: destPath,
          })
        );
      }
    }

    if (existing?.isDirectory()) {
      return this.failed(
        destPath,
        new WriteError(ErrorCodes.DESTINATION_IS_DIRECTORY, `Destination is a directory: ${destPath}`, {
          path: destPath,
        })
      );
    }

    if (existing && !options.overwrite) {
      this.log.warn(`File exists, skipping: ${destPath} (set FORCE=1 to overwrite)`);
      return { kind: 'skipped-existing', path: destPath };
    }

    const mode = options.mode ?? (options.executable ? EXECUTABLE_MODE : FILE_MODE);
    const tmpPath = tempPathFor(destPath);

    try {
      const handle = await fs.promises.open(tmpPath, 'wx', mode);
      try {
        await handle.writeFile(content);
        // open() applies the umask; chmod sets the exact bits before the file becomes visible
        await handle.chmod(mode);
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      const cleanupError = await removeTempFile(tmpPath);
      return this.failed(
        destPath,
        new WriteError(ErrorCodes.TEMP_WRITE, `Failed to write temp file for ${destPath}: ${errorMessage(error)}`, {
          path: destPath,
          tmpPath,
          ...(cleanupError ? { cleanupError } : {}),
        })
      );
    }

    try {
      await fs.promises.rename(tmpPath, destPath);
    } catch (error) {
      const cleanupError = await removeTempFile(tmpPath);
      return this.failed(
        destPath,
        new WriteError(ErrorCodes.RENAME, `Failed to move temp file into place: ${destPath} (${errorMessage(error)})`, {
          path: destPath,
          tmpPath,
          ...(cleanupError ? { cleanupError } : {}),
        })
      );
    }

    this.log.info(`Wrote: ${destPath}`);
    return { kind: 'written', path: destPath };
  }

  private failed(destPath: string, error: unknown): WriteOutcome {
    const failure =
      error instanceof BootstrapError
        ? error
        : new WriteError(ErrorCodes.TEMP_WRITE, errorMessage(error), { path: destPath });
    this.log.error(`Failed to write ${destPath}: ${failure.message}`);
    return { kind: 'failed', path: destPath, error: failure };
  }
}
