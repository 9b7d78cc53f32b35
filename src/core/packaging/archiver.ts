/**
 * tar-backed Archiver.
 */
import { runTool } from '../../utils/tools.js';
import type { Archiver } from './types.js';

/**
 * Header fields pinned so that equal file contents always produce equal
 * archive bytes, whatever the files' timestamps or owners on disk.
 */
const REPRODUCIBLE_FLAGS = [
  '--sort=name',
  '--mtime=@0',
  '--owner=0',
  '--group=0',
  '--numeric-owner',
  '--use-compress-program=gzip -n',
] as const;

/**
 * Archives an explicit file list, reading NUL-terminated names from stdin.
 * Passing the list (rather than ".") keeps the archive to exactly the files
 * that were listed, with no directory entries or symlinks. Names are read
 * verbatim, so a file called `--exclude=x` is archived, not obeyed.
 * Requires GNU tar.
 */
export class TarArchiver implements Archiver {
  readonly name = 'tar';

  constructor(
    private readonly tarPath: string,
    private readonly timeoutMs?: number
  ) {}

  async create(sourceDir: string, files: readonly string[], destPath: string): Promise<void> {
    runTool(
      this.tarPath,
      ['-cf', destPath, ...REPRODUCIBLE_FLAGS, '-C', sourceDir, '--null', '--verbatim-files-from', '-T', '-'],
      {
        input: files.map((f) => `${f}\0`).join(''),
        timeoutMs: this.timeoutMs,
      }
    );
  }
}

/**
 * List member names of a gzip tarball.
 */
export function listTarball(tarPath: string, archivePath: string, timeoutMs?: number): string[] {
  return runTool(tarPath, ['-tzf', archivePath], { timeoutMs })
    .split('\n')
    .filter((line) => line.length > 0);
}
