/**
 * Tests for the run command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createRunCommand, executeRun, toOverrides } from '../../../../src/cli/commands/run.js';
import { MemorySink } from '../../../../src/utils/logger.js';

describe('run command', () => {
  let workDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    workDir = fs.mkdtempSync(join(tmpdir(), 'modboot-cli-run-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('createRunCommand', () => {
    it('should create a command with correct name', () => {
      expect(createRunCommand().name()).toBe('run');
    });

    it('should expose the documented flags', () => {
      const flags = createRunCommand().options.map((o) => o.long);

      expect(flags).toEqual([
        '--base-dir',
        '--force',
        '--sign',
        '--sign-key',
        '--modules',
        '--only',
        '--build-services',
        '--log-file',
        '--no-log-file',
        '--verbose',
        '--quiet',
        '--dry-run',
        '--json',
      ]);
    });
  });

  describe('toOverrides', () => {
    it('should only carry flags that were given', () => {
      expect(toOverrides({})).toEqual({});
      expect(toOverrides({ force: true, modules: 'm.yaml', logFile: false })).toEqual({
        force: true,
        modulesFile: 'm.yaml',
        logFile: false,
      });
    });

    it('should map verbosity to log levels', () => {
      expect(toOverrides({ verbose: true })).toEqual({ logLevel: 'debug' });
      expect(toOverrides({ quiet: true })).toEqual({ logLevel: 'warn' });
    });
  });

  describe('executeRun', () => {
    it('should exit 3 before writing anything when tar is missing', async () => {
      const sink = new MemorySink();
      const baseDir = join(workDir, 'out');

      const code = await executeRun({}, { env: { BASE_DIR: baseDir }, cwd: workDir, lookup: () => null, sinks: [sink] });

      expect(code).toBe(3);
      expect(fs.existsSync(baseDir)).toBe(false);
      expect(sink.messages('error')).toEqual(['Required command missing: tar']);
    });

    it('should exit 4 for an invalid environment', async () => {
      const code = await executeRun({}, { env: { LOG_LEVEL: 'loud' }, cwd: workDir, sinks: [new MemorySink()] });

      expect(code).toBe(4);
    });

    it('should exit 4 for an invalid modules file', async () => {
      fs.writeFileSync(join(workDir, 'modules.yaml'), 'modules: []\n');

      const code = await executeRun(
        { modules: 'modules.yaml', logFile: false },
        { env: {}, cwd: workDir, lookup: (c) => `/usr/bin/${c}`, sinks: [new MemorySink()] }
      );

      expect(code).toBe(4);
    });

    it('should exit 4 for an unknown --only module', async () => {
      const code = await executeRun(
        { only: ['no-such-module'], logFile: false },
        { env: {}, cwd: workDir, lookup: (c) => `/usr/bin/${c}`, sinks: [new MemorySink()] }
      );

      expect(code).toBe(4);
    });

    it('should exit 2 when the log directory cannot be created', async () => {
      fs.writeFileSync(join(workDir, 'blocked'), '');

      const code = await executeRun(
        { logFile: join(workDir, 'blocked', 'run.log') },
        { env: {}, cwd: workDir, lookup: (c) => `/usr/bin/${c}`, sinks: [new MemorySink()] }
      );

      expect(code).toBe(2);
    });

    it('should print a plan without writing on --dry-run', async () => {
      const baseDir = join(workDir, 'out');

      const code = await executeRun(
        { dryRun: true, json: true, only: ['sbom-gen'] },
        { env: { BASE_DIR: baseDir }, cwd: workDir, lookup: () => null, sinks: [new MemorySink()] }
      );

      expect(code).toBe(0);
      expect(fs.existsSync(baseDir)).toBe(false);
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toMatchObject({ baseDir, plans: [{ module: 'sbom-gen' }] });
      expect(output).toHaveProperty(['plans', 0, 'artifacts', 'length'], 14);
    });
  });
});
