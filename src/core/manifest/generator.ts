/**
 * Manifest generator: directory tree -> ordered checksum listing.
 *
 * Entries are sorted byte-wise by relative path, so the same file set always
 * yields the same manifest text. A file that cannot be read fails the whole
 * manifest; no partial manifest is ever written.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { sha256Hex } from '../../utils/checksum.js';
import { listRegularFiles, toPosix } from '../../utils/file-system.js';
import { ErrorCodes, ManifestReadError, errorMessage } from '../../utils/errors.js';
import type { FileWriter, WriteOutcome } from '../writer/types.js';
import type { ManifestEntry, ManifestOptions } from './types.js';

/**
 * Hash every regular file under rootDir.
 *
 * @throws ManifestReadError if the tree cannot be listed or any file cannot be read
 */
export async function generateManifest(rootDir: string, options: ManifestOptions = {}): Promise<ManifestEntry[]> {
  let files: string[];
  try {
    files = await listRegularFiles(rootDir, options.exclude ?? []);
  } catch (error) {
    throw new ManifestReadError(
      ErrorCodes.MANIFEST_READ,
      `Cannot list files under ${rootDir}: ${errorMessage(error)}`,
      { rootDir }
    );
  }

  const entries: ManifestEntry[] = [];
  for (const relativePath of files) {
    const filePath = path.join(rootDir, relativePath);
    let content: Buffer;
    try {
      content = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new ManifestReadError(
        ErrorCodes.MANIFEST_READ,
        `Cannot read ${filePath}: ${errorMessage(error)}`,
        { rootDir, relativePath }
      );
    }
    entries.push({ relativePath, digest: sha256Hex(content), size: content.length });
  }

  return entries;
}

/**
 * Render entries as "<digest>  <path>" lines. A path holding a backslash,
 * newline or carriage return is escaped and its line starts with a backslash, as
 * sha256sum does.
 */
export function formatManifest(entries: readonly ManifestEntry[]): string {
  return entries.map((e) => `${formatLine(e.digest, e.relativePath)}\n`).join('');
}

const ESCAPES: Record<string, string> = { '\\': '\\\\', '\n': '\\n', '\r': '\\r' };
const UNESCAPES: Record<string, string> = { '\\': '\\', n: '\n', r: '\r' };

function formatLine(digest: string, relativePath: string): string {
  if (!/[\\\n\r]/.test(relativePath)) {
    return `${digest}  ${relativePath}`;
  }
  const escaped = relativePath.replace(/[\\\n\r]/g, (c) => ESCAPES[c] ?? c);
  return `\\${digest}  ${escaped}`;
}

const MANIFEST_LINE = /^(\\?)([0-9a-fA-F]{64}) [ *](.+)$/;

/**
 * Parse manifest text back into digest/path pairs.
 *
 * @throws ManifestReadError on a malformed line
 */
export function parseManifest(text: string): Array<Pick<ManifestEntry, 'relativePath' | 'digest'>> {
  const entries: Array<Pick<ManifestEntry, 'relativePath' | 'digest'>> = [];
  const lines = text.split('\n');
  for (const [index, line] of lines.entries()) {
    if (line === '') continue;
    const match = MANIFEST_LINE.exec(line);
    if (!match) {
      throw new ManifestReadError(ErrorCodes.MANIFEST_PARSE, `Malformed manifest line ${index + 1}: ${line}`, {
        line: index + 1,
      });
    }
    const [, escaped, digest, rawPath] = match;
    const relativePath = escaped ? rawPath.replace(/\\([\\nr])/g, (_, c: string) => UNESCAPES[c] ?? c) : rawPath;
    entries.push({ digest: digest.toLowerCase(), relativePath: relativePath.replace(/^\.\//, '') });
  }
  return entries;
}

/**
 * Path of `target` relative to `rootDir` if it lies inside it.
 */
export function relativeInside(rootDir: string, target: string): string | undefined {
  const rel = path.relative(path.resolve(rootDir), path.resolve(target));
  if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return undefined;
  return toPosix(rel);
}

export interface WriteManifestResult {
  entries: ManifestEntry[];
  manifestPath: string;
  outcome: WriteOutcome;
}

async function readExisting(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fs.promises.readFile(filePath);
  } catch {
    // Absent or unreadable; the write below reports any real problem.
    return undefined;
  }
}

/**
 * Generate a manifest for rootDir and write it atomically to manifestPath.
 * When manifestPath lies inside rootDir it is left out of its own listing.
 * A manifest already holding the same text is left untouched and reported
 * as `skipped-existing`.
 *
 * @throws ManifestReadError when any file cannot be read
 * @throws the writer's error when the manifest file cannot be written
 */
export async function writeManifest(
  rootDir: string,
  manifestPath: string,
  writer: FileWriter,
  options: ManifestOptions = {}
): Promise<WriteManifestResult> {
  const self = relativeInside(rootDir, manifestPath);
  const exclude = [...(options.exclude ?? []), ...(self ? [self] : [])];

  const entries = await generateManifest(rootDir, { exclude });
  const text = formatManifest(entries);
  const existing = await readExisting(manifestPath);
  if (existing?.equals(Buffer.from(text, 'utf-8'))) {
    return { entries, manifestPath, outcome: { kind: 'skipped-existing', path: manifestPath } };
  }
  const outcome = await writer.write(manifestPath, text, { overwrite: true });
  if (outcome.kind === 'failed') {
    throw outcome.error;
  }
  return { entries, manifestPath, outcome };
}
