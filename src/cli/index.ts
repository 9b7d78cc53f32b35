/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createRunCommand } from './commands/run.js';
import { createManifestCommand } from './commands/manifest.js';
import { createVerifyCommand } from './commands/verify.js';
import { createModulesCommand } from './commands/modules.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('modboot')
    .description('Scaffold, checksum and package service modules')
    .version(VERSION);
  program.addCommand(createRunCommand(), { isDefault: true });
  [createManifestCommand, createVerifyCommand, createModulesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
