/**
 * Modules command - list the module registry.
 */
import { Command } from 'commander';
import { loadRegistry } from '../../core/registry/index.js';
import { ExitCodes, exitCodeFor, errorMessage, type ExitCode } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { formatRegistry } from '../formatters/human.js';
import { toJson } from '../formatters/json.js';

export interface ModulesCommandOptions {
  modules?: string;
  json?: boolean;
}

export async function executeModules(
  options: ModulesCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<ExitCode> {
  const modulesFile = options.modules ?? (env.MODULES_FILE || undefined);
  try {
    const registry = await loadRegistry(cwd, modulesFile);
    console.log(options.json ? toJson(registry) : formatRegistry(registry));
    return ExitCodes.SUCCESS;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

/**
 * Create the modules command.
 */
export function createModulesCommand(): Command {
  return new Command('modules')
    .description('List the modules a run would process')
    .option('-m, --modules <file>', 'YAML modules file (env MODULES_FILE)')
    .option('--json', 'Output as JSON')
    .action(async (options: ModulesCommandOptions) => {
      const code = await executeModules(options);
      if (code !== ExitCodes.SUCCESS) {
        process.exit(code);
      }
    });
}
