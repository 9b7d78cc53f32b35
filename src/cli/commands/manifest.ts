/**
 * Manifest command - write a SHA-256 manifest for any directory.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { AtomicFileWriter } from '../../core/writer/index.js';
import { MANIFEST_FILE_NAME, writeManifest } from '../../core/manifest/index.js';
import { ExitCodes, exitCodeFor, errorMessage, type ExitCode } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export interface ManifestCommandOptions {
  output?: string;
  exclude?: string[];
}

export async function executeManifest(
  dir: string,
  options: ManifestCommandOptions,
  cwd: string = process.cwd()
): Promise<ExitCode> {
  const rootDir = path.resolve(cwd, dir);
  const manifestPath = options.output
    ? path.resolve(cwd, options.output)
    : path.join(rootDir, MANIFEST_FILE_NAME);
  try {
    const result = await writeManifest(rootDir, manifestPath, new AtomicFileWriter(log), {
      exclude: options.exclude ?? [],
    });
    log.success(`${result.entries.length} file(s) listed in ${manifestPath}`);
    return ExitCodes.SUCCESS;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

/**
 * Create the manifest command.
 */
export function createManifestCommand(): Command {
  return new Command('manifest')
    .description('Write a sha256sum-compatible manifest for a directory')
    .argument('<dir>', 'Directory to checksum')
    .option('-o, --output <file>', `Manifest path (default <dir>/${MANIFEST_FILE_NAME})`)
    .option('-e, --exclude <paths...>', "Relative paths to leave out; a trailing '/' leaves out a subtree")
    .action(async (dir: string, options: ManifestCommandOptions) => {
      const code = await executeManifest(dir, options);
      if (code !== ExitCodes.SUCCESS) {
        process.exit(code);
      }
    });
}
