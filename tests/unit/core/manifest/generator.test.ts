/**
 * Tests for manifest generation, parsing and writing.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  formatManifest,
  generateManifest,
  parseManifest,
  relativeInside,
  writeManifest,
} from '../../../../src/core/manifest/generator.js';
import { AtomicFileWriter } from '../../../../src/core/writer/atomic-writer.js';
import { ManifestReadError } from '../../../../src/utils/errors.js';
import { memoryLogger } from '../../../helpers/fakes.js';

const EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('manifest generator', () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(join(tmpdir(), 'modboot-manifest-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should hash and sort regular files', async () => {
    fs.writeFileSync(join(rootDir, 'b.txt'), 'abc');
    fs.writeFileSync(join(rootDir, 'a.txt'), '');

    const entries = await generateManifest(rootDir);

    expect(entries).toEqual([
      { relativePath: 'a.txt', digest: EMPTY, size: 0 },
      { relativePath: 'b.txt', digest: ABC, size: 3 },
    ]);
    expect(formatManifest(entries)).toBe(`${EMPTY}  a.txt\n${ABC}  b.txt\n`);
  });

  it('should produce the same text regardless of creation order', async () => {
    const other = fs.mkdtempSync(join(tmpdir(), 'modboot-manifest-other-'));
    try {
      fs.mkdirSync(join(rootDir, 'docs'));
      fs.writeFileSync(join(rootDir, 'docs', 'x.md'), 'x');
      fs.writeFileSync(join(rootDir, 'README.md'), 'r');

      fs.writeFileSync(join(other, 'README.md'), 'r');
      fs.mkdirSync(join(other, 'docs'));
      fs.writeFileSync(join(other, 'docs', 'x.md'), 'x');

      expect(formatManifest(await generateManifest(other))).toBe(formatManifest(await generateManifest(rootDir)));
    } finally {
      fs.rmSync(other, { recursive: true, force: true });
    }
  });

  it('should leave out symlinks and excluded subtrees', async () => {
    fs.writeFileSync(join(rootDir, 'real.txt'), 'abc');
    fs.symlinkSync(join(rootDir, 'real.txt'), join(rootDir, 'alias.txt'));
    fs.mkdirSync(join(rootDir, 'packaging'));
    fs.writeFileSync(join(rootDir, 'packaging', 'out.tar.gz'), 'zz');

    const entries = await generateManifest(rootDir, { exclude: ['packaging/'] });

    expect(entries.map((e) => e.relativePath)).toEqual(['real.txt']);
  });

  it('should fail without writing when a file cannot be read', async () => {
    fs.writeFileSync(join(rootDir, 'a.txt'), 'abc');
    vi.spyOn(fs.promises, 'readFile').mockRejectedValueOnce(new Error('EACCES: permission denied'));
    const { log } = memoryLogger();
    const manifestPath = join(rootDir, 'SHASUMS256.txt');

    await expect(writeManifest(rootDir, manifestPath, new AtomicFileWriter(log))).rejects.toBeInstanceOf(
      ManifestReadError
    );
    expect(fs.existsSync(manifestPath)).toBe(false);
  });

  it('should not list its own manifest and leave an unchanged manifest untouched', async () => {
    fs.writeFileSync(join(rootDir, 'b.txt'), 'abc');
    const { log } = memoryLogger();
    const writer = new AtomicFileWriter(log);
    const manifestPath = join(rootDir, 'packaging', 'SHASUMS256.txt');

    const first = await writeManifest(rootDir, manifestPath, writer);
    const firstStat = fs.statSync(manifestPath);
    const second = await writeManifest(rootDir, manifestPath, writer);

    expect(first.outcome.kind).toBe('written');
    expect(first.entries.map((e) => e.relativePath)).toEqual(['b.txt']);
    expect(second.entries.map((e) => e.relativePath)).toEqual(['b.txt']);
    expect(second.outcome).toEqual({ kind: 'skipped-existing', path: manifestPath });
    expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(`${ABC}  b.txt\n`);
    expect(fs.statSync(manifestPath).ino).toBe(firstStat.ino);
    expect(fs.statSync(manifestPath).mtimeMs).toBe(firstStat.mtimeMs);
  });

  it('should rewrite the manifest when the tree changed', async () => {
    fs.writeFileSync(join(rootDir, 'b.txt'), 'abc');
    const { log } = memoryLogger();
    const writer = new AtomicFileWriter(log);
    const manifestPath = join(rootDir, 'SHASUMS256.txt');
    await writeManifest(rootDir, manifestPath, writer);

    fs.writeFileSync(join(rootDir, 'a.txt'), '');
    const result = await writeManifest(rootDir, manifestPath, writer);

    expect(result.outcome.kind).toBe('written');
    expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(`${EMPTY}  a.txt\n${ABC}  b.txt\n`);
  });

  it('should escape names holding a newline or backslash and read them back', () => {
    const text = formatManifest([
      { relativePath: 'back\\slash.txt', digest: EMPTY, size: 0 },
      { relativePath: 'line\nbreak.txt', digest: ABC, size: 3 },
      { relativePath: 'plain.txt', digest: ABC, size: 3 },
    ]);

    expect(text).toBe(`\\${EMPTY}  back\\\\slash.txt\n\\${ABC}  line\\nbreak.txt\n${ABC}  plain.txt\n`);
    expect(parseManifest(text)).toEqual([
      { digest: EMPTY, relativePath: 'back\\slash.txt' },
      { digest: ABC, relativePath: 'line\nbreak.txt' },
      { digest: ABC, relativePath: 'plain.txt' },
    ]);
  });
});

describe('parseManifest', () => {
  it('should read sha256sum text and binary markers', () => {
    expect(parseManifest(`${ABC}  ./b.txt\n${EMPTY} *a.txt\n`)).toEqual([
      { digest: ABC, relativePath: 'b.txt' },
      { digest: EMPTY, relativePath: 'a.txt' },
    ]);
  });

  it('should reject malformed lines', () => {
    expect(() => parseManifest(`${ABC}  ok.txt\nnot a manifest line\n`)).toThrow(
      expect.objectContaining({ code: 'M002', message: 'Malformed manifest line 2: not a manifest line' })
    );
  });
});

describe('relativeInside', () => {
  it('should return posix paths inside the root and undefined outside', () => {
    expect(relativeInside('/out', '/out/packaging/SHASUMS256.txt')).toBe('packaging/SHASUMS256.txt');
    expect(relativeInside('/out/alpha', '/out/packaging/alpha.tar.gz')).toBeUndefined();
    expect(relativeInside('/out', '/out')).toBeUndefined();
  });
});
