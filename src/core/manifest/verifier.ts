/**
 * Manifest verification against the files currently on disk.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { sha256Hex } from '../../utils/checksum.js';
import { listRegularFiles } from '../../utils/file-system.js';
import { ErrorCodes, ManifestReadError, errorMessage } from '../../utils/errors.js';
import { parseManifest, relativeInside } from './generator.js';
import type { ManifestOptions, ManifestVerification } from './types.js';

async function readManifestText(manifestPath: string): Promise<string> {
  try {
    return await fs.promises.readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw new ManifestReadError(
      ErrorCodes.MANIFEST_READ,
      `Cannot read manifest ${manifestPath}: ${errorMessage(error)}`,
      { manifestPath }
    );
  }
}

/**
 * Compare a manifest with rootDir.
 *
 * @throws ManifestReadError when the manifest cannot be read or parsed
 */
export async function verifyManifest(
  rootDir: string,
  manifestPath: string,
  options: ManifestOptions = {}
): Promise<ManifestVerification> {
  const entries = parseManifest(await readManifestText(manifestPath));

  const mismatched: string[] = [];
  const missing: string[] = [];
  let checked = 0;

  for (const entry of entries) {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(path.join(rootDir, ...entry.relativePath.split('/')));
    } catch {
      missing.push(entry.relativePath);
      continue;
    }
    checked++;
    if (sha256Hex(content) !== entry.digest) {
      mismatched.push(entry.relativePath);
    }
  }

  const self = relativeInside(rootDir, manifestPath);
  const exclude = [...(options.exclude ?? []), ...(self ? [self] : [])];
  const listed = new Set(entries.map((e) => e.relativePath));
  const unexpected = (await listRegularFiles(rootDir, exclude)).filter((f) => !listed.has(f));

  return {
    ok: mismatched.length === 0 && missing.length === 0 && unexpected.length === 0,
    checked,
    mismatched,
    missing,
    unexpected,
  };
}
