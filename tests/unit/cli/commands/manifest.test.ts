/**
 * Tests for the manifest and verify commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createManifestCommand, executeManifest } from '../../../../src/cli/commands/manifest.js';
import { createVerifyCommand, executeVerify } from '../../../../src/cli/commands/verify.js';
import { parseManifest } from '../../../../src/core/manifest/generator.js';

describe('manifest and verify commands', () => {
  let workDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    workDir = fs.mkdtempSync(join(tmpdir(), 'modboot-cli-manifest-'));
    fs.mkdirSync(join(workDir, 'tree', 'cache'), { recursive: true });
    fs.writeFileSync(join(workDir, 'tree', 'README.md'), '# tree\n');
    fs.writeFileSync(join(workDir, 'tree', 'cache', 'tmp.bin'), 'x');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should create commands with correct names', () => {
    expect(createManifestCommand().name()).toBe('manifest');
    expect(createVerifyCommand().name()).toBe('verify');
  });

  it('should write <dir>/SHASUMS256.txt honoring excludes', async () => {
    const code = await executeManifest('tree', { exclude: ['cache/'] }, workDir);

    expect(code).toBe(0);
    const entries = parseManifest(fs.readFileSync(join(workDir, 'tree', 'SHASUMS256.txt'), 'utf-8'));
    expect(entries.map((e) => e.relativePath)).toEqual(['README.md']);
  });

  it('should write to --output', async () => {
    const code = await executeManifest('tree', { output: 'sums.txt' }, workDir);

    expect(code).toBe(0);
    expect(fs.existsSync(join(workDir, 'sums.txt'))).toBe(true);
  });

  it('should verify a matching tree and fail a tampered one', async () => {
    await executeManifest('tree', { output: 'sums.txt' }, workDir);

    expect(await executeVerify('tree', { manifest: 'sums.txt', json: true }, workDir)).toBe(0);
    expect(JSON.parse(String(consoleLogSpy.mock.calls.at(-1)?.[0]))).toEqual({
      ok: true,
      checked: 2,
      mismatched: [],
      missing: [],
      unexpected: [],
    });

    fs.writeFileSync(join(workDir, 'tree', 'README.md'), 'tampered');
    expect(await executeVerify('tree', { manifest: 'sums.txt' }, workDir)).toBe(1);
  });

  it('should default to the manifest under packaging/ when there is one', async () => {
    await executeManifest('tree', { output: 'tree/packaging/SHASUMS256.txt' }, workDir);

    expect(await executeVerify('tree', { json: true }, workDir)).toBe(0);
    expect(JSON.parse(String(consoleLogSpy.mock.calls.at(-1)?.[0]))).toMatchObject({ ok: true, checked: 2 });
  });

  it('should not expect excluded paths to be listed', async () => {
    await executeManifest('tree', { output: 'tree/packaging/SHASUMS256.txt', exclude: ['cache/'] }, workDir);

    expect(await executeVerify('tree', {}, workDir)).toBe(1);
    expect(await executeVerify('tree', { exclude: ['cache/'] }, workDir)).toBe(0);
  });

  it('should exit 5 when the manifest is missing', async () => {
    expect(await executeVerify('tree', {}, workDir)).toBe(5);
  });
});
