/**
 * Run command - scaffold, manifest, package and optionally sign every module.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { resolveRunConfig, type ConfigOverrides } from '../../core/config/index.js';
import { loadRegistry, selectModules, type ModuleRegistry } from '../../core/registry/index.js';
import { createRunContext } from '../../core/context.js';
import { ScaffoldBuilder } from '../../core/scaffold/index.js';
import { relativeInside } from '../../core/manifest/index.js';
import { ensureDirectory } from '../../core/writer/index.js';
import { resolveCapabilities, runBootstrap, type ToolLookup } from '../../core/bootstrap/index.js';
import type { RunConfig } from '../../core/config/schema.js';
import { ExitCodes, exitCodeFor, errorMessage, type ExitCode } from '../../utils/errors.js';
import { ConsoleSink, FileSink, Logger, logger as log, type LogSink } from '../../utils/logger.js';
import { formatPlan, formatSummary } from '../formatters/human.js';
import { toJson } from '../formatters/json.js';
import type { ModulePlan } from '../formatters/types.js';

export interface RunOptions {
  baseDir?: string;
  force?: boolean;
  sign?: boolean;
  signKey?: string;
  modules?: string;
  only?: string[];
  buildServices?: boolean;
  /** Commander sets false for --no-log-file */
  logFile?: string | false;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

/** Process-level inputs, replaceable in tests. */
export interface RunEnvironment {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  now?: Date;
  lookup?: ToolLookup;
  /** Sinks for the run logger; defaults to the console (none under --json) */
  sinks?: LogSink[];
}

export function toOverrides(options: RunOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.baseDir !== undefined) overrides.baseDir = options.baseDir;
  if (options.force) overrides.force = true;
  if (options.sign) overrides.sign = true;
  if (options.signKey !== undefined) overrides.signKey = options.signKey;
  if (options.buildServices) overrides.buildServices = true;
  if (options.modules !== undefined) overrides.modulesFile = options.modules;
  if (options.only !== undefined) overrides.only = options.only;
  if (options.logFile !== undefined) overrides.logFile = options.logFile;
  if (options.verbose) overrides.logLevel = 'debug';
  else if (options.quiet) overrides.logLevel = 'warn';
  return overrides;
}

async function selectRegistry(config: RunConfig, cwd: string): Promise<ModuleRegistry> {
  const registry = await loadRegistry(cwd, config.modulesFile);
  return config.only ? selectModules(registry, config.only) : registry;
}

async function planRun(config: RunConfig, registry: ModuleRegistry, runLog: Logger, json: boolean): Promise<ExitCode> {
  const ctx = createRunContext({ baseDir: config.baseDir, overwrite: config.force, log: runLog });
  const builder = new ScaffoldBuilder(ctx);
  const plans: ModulePlan[] = [];
  for (const module of registry) {
    plans.push({ module: module.name, artifacts: await builder.plan(module) });
  }
  console.log(json ? toJson({ baseDir: config.baseDir, plans }) : formatPlan(config.baseDir, plans));
  return ExitCodes.SUCCESS;
}

/**
 * Execute a run and return its exit code. Fatal errors are logged and mapped
 * to their exit codes; nothing here calls process.exit.
 */
export async function executeRun(options: RunOptions, environment: RunEnvironment = {}): Promise<ExitCode> {
  const cwd = environment.cwd ?? process.cwd();
  const runLog = new Logger(environment.sinks ?? (options.json ? [] : [new ConsoleSink()]));
  let fileSink: FileSink | undefined;

  try {
    const config = resolveRunConfig({
      env: environment.env ?? process.env,
      cwd,
      now: environment.now,
      overrides: toOverrides(options),
    });
    runLog.setLevel(config.logLevel);

    if (options.dryRun) {
      return await planRun(config, await selectRegistry(config, cwd), runLog, options.json ?? false);
    }

    const capabilities = resolveCapabilities(config, runLog, environment.lookup);

    if (config.logFile) {
      await ensureDirectory(path.dirname(config.logFile));
      fileSink = new FileSink(config.logFile);
      runLog.addSink(fileSink);
      runLog.info(`Logging to ${config.logFile}`);
    }

    const registry = await selectRegistry(config, cwd);
    const logExclude = config.logFile ? relativeInside(config.baseDir, config.logFile) : undefined;
    const ctx = createRunContext({ baseDir: config.baseDir, overwrite: config.force, log: runLog });
    const summary = await runBootstrap(ctx, {
      registry,
      capabilities,
      treeExclude: logExclude ? [logExclude] : [],
    });

    console.log(options.json ? toJson(summary) : formatSummary(summary));
    return summary.exitCode;
  } catch (error) {
    runLog.error(errorMessage(error));
    return exitCodeFor(error);
  } finally {
    if (fileSink) runLog.removeSink(fileSink);
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((v) => v.trim()).filter(Boolean)];
}

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Scaffold, checksum and package every module')
    .option('-b, --base-dir <dir>', 'Output root (env BASE_DIR, default ./bootstrapped-modules)')
    .option('-f, --force', 'Overwrite existing files (env FORCE=1)')
    .option('--sign', 'Produce detached gpg signatures (env GPG_SIGN=1)')
    .option('--sign-key <key>', 'Signing key passed to gpg --local-user (env GPG_KEY)')
    .option('-m, --modules <file>', 'YAML modules file (env MODULES_FILE)')
    .option('--only <names>', 'Only process these modules (comma separated, repeatable)', collect)
    .option('--build-services', 'Build embedded Java services before packaging (env BUILD_SERVICES=1)')
    .option('--log-file <file>', 'Log file path (env LOG_FILE)')
    .option('--no-log-file', 'Do not write a log file')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Warnings and errors only')
    .option('--dry-run', 'Show what would be written without writing')
    .option('--json', 'Print the run summary as JSON')
    .action(async (options: RunOptions) => {
      try {
        const code = await executeRun(options);
        if (code !== ExitCodes.SUCCESS) {
          process.exit(code);
        }
      } catch (error) {
        log.error(errorMessage(error));
        process.exit(ExitCodes.MODULE_FAILED);
      }
    });
}
