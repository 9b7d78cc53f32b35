/**
 * File system operations - reading, existence checks, directory creation and
 * regular-file listing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a path exists (without following a trailing symlink).
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.lstat(filePath);
    return true;
  } catch { /* path not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Convert a platform path to the forward-slash form used in manifests and archives.
 */
export function toPosix(relPath: string): string {
  return relPath.split(path.sep).join('/');
}

/**
 * Byte-wise comparison of two strings' UTF-8 encodings.
 */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

/**
 * Whether a relative path is covered by an exclude list.
 * An entry ending in '/' excludes the whole subtree; any other entry matches exactly.
 */
export function isExcluded(relPath: string, exclude: readonly string[]): boolean {
  return exclude.some((entry) =>
    entry.endsWith('/') ? relPath.startsWith(entry) : relPath === entry
  );
}

/**
 * List regular files under a root, relative and in byte-wise order.
 * Symlinks (to files or directories) are never listed or followed. Dotfiles are included.
 */
export async function listRegularFiles(
  rootDir: string,
  exclude: readonly string[] = []
): Promise<string[]> {
  const entries = await fg('**/*', {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    absolute: false,
  });

  const files: string[] = [];
  for (const entry of entries) {
    const relPath = toPosix(entry);
    if (isExcluded(relPath, exclude)) continue;
    const stat = await fs.promises.lstat(path.join(rootDir, relPath));
    if (stat.isFile()) {
      files.push(relPath);
    }
  }

  return files.sort(compareBytes);
}
