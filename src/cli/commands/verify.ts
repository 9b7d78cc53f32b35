/**
 * Verify command - check a directory against its manifest.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { MANIFEST_FILE_NAME, verifyManifest } from '../../core/manifest/index.js';
import { ExitCodes, exitCodeFor, errorMessage, type ExitCode } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { pathExists } from '../../utils/file-system.js';
import { formatVerification } from '../formatters/human.js';
import { toJson } from '../formatters/json.js';

export interface VerifyCommandOptions {
  manifest?: string;
  exclude?: string[];
  json?: boolean;
}

/**
 * `<dir>/packaging/SHASUMS256.txt` when present (where runs write module and
 * tree manifests), else `<dir>/SHASUMS256.txt`.
 */
export async function defaultManifestPath(rootDir: string): Promise<string> {
  const packaged = path.join(rootDir, 'packaging', MANIFEST_FILE_NAME);
  return (await pathExists(packaged)) ? packaged : path.join(rootDir, MANIFEST_FILE_NAME);
}

/**
 * @returns 0 when every listed file matches and nothing is unlisted, 1 otherwise
 */
export async function executeVerify(
  dir: string,
  options: VerifyCommandOptions,
  cwd: string = process.cwd()
): Promise<ExitCode> {
  const rootDir = path.resolve(cwd, dir);
  const manifestPath = options.manifest
    ? path.resolve(cwd, options.manifest)
    : await defaultManifestPath(rootDir);
  try {
    const result = await verifyManifest(rootDir, manifestPath, { exclude: options.exclude ?? [] });
    console.log(options.json ? toJson(result) : formatVerification(manifestPath, result));
    return result.ok ? ExitCodes.SUCCESS : ExitCodes.MODULE_FAILED;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

/**
 * Create the verify command.
 */
export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Verify a directory against a SHA-256 manifest')
    .argument('<dir>', 'Directory to verify')
    .option('--manifest <file>', `Manifest path (default <dir>/packaging/${MANIFEST_FILE_NAME}, then <dir>/${MANIFEST_FILE_NAME})`)
    .option('-e, --exclude <paths...>', "Relative paths not expected in the manifest; a trailing '/' leaves out a subtree")
    .option('--json', 'Output the result as JSON')
    .action(async (dir: string, options: VerifyCommandOptions) => {
      const code = await executeVerify(dir, options);
      if (code !== ExitCodes.SUCCESS) {
        process.exit(code);
      }
    });
}
