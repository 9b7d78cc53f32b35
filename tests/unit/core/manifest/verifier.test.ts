/**
 * Tests for manifest verification.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { writeManifest } from '../../../../src/core/manifest/generator.js';
import { verifyManifest } from '../../../../src/core/manifest/verifier.js';
import { AtomicFileWriter } from '../../../../src/core/writer/atomic-writer.js';
import { ManifestReadError } from '../../../../src/utils/errors.js';
import { memoryLogger } from '../../../helpers/fakes.js';

describe('verifyManifest', () => {
  let rootDir: string;
  let manifestPath: string;

  beforeEach(async () => {
    rootDir = fs.mkdtempSync(join(tmpdir(), 'modboot-verify-'));
    manifestPath = join(rootDir, 'SHASUMS256.txt');
    fs.mkdirSync(join(rootDir, 'docs'));
    fs.writeFileSync(join(rootDir, 'README.md'), '# alpha\n');
    fs.writeFileSync(join(rootDir, 'docs', 'notes.md'), 'notes');
    const { log } = memoryLogger();
    await writeManifest(rootDir, manifestPath, new AtomicFileWriter(log));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should pass for an untouched tree', async () => {
    expect(await verifyManifest(rootDir, manifestPath)).toEqual({
      ok: true,
      checked: 2,
      mismatched: [],
      missing: [],
      unexpected: [],
    });
  });

  it('should report modified, deleted and added files', async () => {
    fs.writeFileSync(join(rootDir, 'README.md'), 'tampered');
    fs.rmSync(join(rootDir, 'docs', 'notes.md'));
    fs.writeFileSync(join(rootDir, 'extra.txt'), 'new');

    expect(await verifyManifest(rootDir, manifestPath)).toEqual({
      ok: false,
      checked: 1,
      mismatched: ['README.md'],
      missing: ['docs/notes.md'],
      unexpected: ['extra.txt'],
    });
  });

  it('should raise ManifestReadError for a missing manifest', async () => {
    await expect(verifyManifest(rootDir, join(rootDir, 'absent.txt'))).rejects.toBeInstanceOf(ManifestReadError);
  });
});
