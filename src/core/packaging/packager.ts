/**
 * Packager: directory subtree -> single compressed archive.
 *
 * The file list is taken before the archive's temp file exists, and the
 * archive's own path is excluded when it lies inside the source tree, so an
 * archive never contains itself.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { listRegularFiles } from '../../utils/file-system.js';
import { ArchiveError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { ensureDirectory, removeTempFile, tempPathFor } from '../writer/atomic-writer.js';
import { relativeInside } from '../manifest/generator.js';
import type { Archiver, PackageArtifact } from './types.js';

export interface PackageOptions {
  /** Relative paths to leave out; a trailing '/' leaves out a subtree */
  exclude?: readonly string[];
}

/**
 * Archive every regular file under sourceDir into archivePath.
 *
 * @throws ArchiveError when listing, archiving or the final rename fails
 * @throws DirectoryCreateError when the archive's directory cannot be created
 */
export async function packageDirectory(
  sourceDir: string,
  archivePath: string,
  archiver: Archiver,
  options: PackageOptions = {}
): Promise<PackageArtifact> {
  const self = relativeInside(sourceDir, archivePath);
  const exclude = [...(options.exclude ?? []), ...(self ? [self] : [])];

  let files: string[];
  try {
    files = await listRegularFiles(sourceDir, exclude);
  } catch (error) {
    throw new ArchiveError(ErrorCodes.ARCHIVE_FAILED, `Cannot list ${sourceDir}: ${errorMessage(error)}`, {
      sourceDir,
    });
  }

  await ensureDirectory(path.dirname(archivePath));
  const tmpPath = tempPathFor(archivePath);

  try {
    await archiver.create(sourceDir, files, tmpPath);
    await fs.promises.rename(tmpPath, archivePath);
  } catch (error) {
    const cleanupError = await removeTempFile(tmpPath);
    throw new ArchiveError(ErrorCodes.ARCHIVE_FAILED, `Failed to archive ${sourceDir}: ${errorMessage(error)}`, {
      sourceDir,
      archivePath,
      ...(cleanupError ? { cleanupError } : {}),
    });
  }

  return { sourceDir, archivePath, fileCount: files.length };
}
