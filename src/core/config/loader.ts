/**
 * Resolve the run configuration from environment and CLI overrides.
 */
import * as path from 'node:path';
import { EnvSchema, RunConfigSchema, type RunConfig } from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { DEFAULT_TOOL_TIMEOUT_MS } from '../../utils/tools.js';

export const DEFAULT_BASE_DIR = 'bootstrapped-modules';
export const LOG_DIR_NAME = 'logs';

/** CLI-level overrides. Undefined means "use the environment". */
export interface ConfigOverrides {
  baseDir?: string;
  force?: boolean;
  sign?: boolean;
  signKey?: string;
  buildServices?: boolean;
  modulesFile?: string;
  only?: string[];
  /** A path, or false to disable the log file */
  logFile?: string | false;
  logLevel?: RunConfig['logLevel'];
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: ConfigOverrides;
  now?: Date;
}

/**
 * Compact UTC timestamp used in log file names, e.g. 20261018T093000Z.
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Default log file location for a base directory.
 */
export function defaultLogFile(baseDir: string, now: Date): string {
  return path.join(baseDir, LOG_DIR_NAME, `bootstrap-${compactTimestamp(now)}.log`);
}

/**
 * Resolve the configuration for one run.
 *
 * @throws ConfigError when an environment value is malformed
 */
export function resolveRunConfig(options: ResolveConfigOptions = {}): RunConfig {
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};
  const now = options.now ?? new Date();

  const envResult = EnvSchema.safeParse(options.env ?? process.env);
  if (!envResult.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_ENV,
      `Invalid environment: ${formatZodError(envResult.error)}`,
      { errors: envResult.error.issues }
    );
  }
  const env = envResult.data;

  const baseDir = path.resolve(cwd, overrides.baseDir ?? env.BASE_DIR ?? DEFAULT_BASE_DIR);

  let logFile: string | null;
  if (overrides.logFile === false) {
    logFile = null;
  } else if (overrides.logFile !== undefined) {
    logFile = path.resolve(cwd, overrides.logFile);
  } else if (env.LOG_FILE !== undefined) {
    logFile = env.LOG_FILE === '' ? null : path.resolve(cwd, env.LOG_FILE);
  } else {
    logFile = defaultLogFile(baseDir, now);
  }

  const config = RunConfigSchema.safeParse({
    baseDir,
    force: overrides.force ?? env.FORCE,
    sign: overrides.sign ?? env.GPG_SIGN,
    signKey: overrides.signKey ?? env.GPG_KEY,
    buildServices: overrides.buildServices ?? env.BUILD_SERVICES,
    modulesFile: overrides.modulesFile ?? env.MODULES_FILE,
    only: overrides.only,
    logFile,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? 'info',
    toolTimeoutMs: env.TOOL_TIMEOUT_MS ?? DEFAULT_TOOL_TIMEOUT_MS,
  });

  if (!config.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_ENV,
      `Invalid configuration: ${formatZodError(config.error)}`,
      { errors: config.error.issues }
    );
  }

  return config.data;
}
