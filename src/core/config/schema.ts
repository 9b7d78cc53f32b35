/**
 * Run configuration schema.
 *
 * Values come from the environment (BASE_DIR, FORCE, GPG_SIGN, ...) and are
 * overridden by CLI flags.
 */
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** "1" enables; anything else (including unset) disables. */
const EnvFlagSchema = z
  .string()
  .optional()
  .transform((value) => value === '1');

/** Empty strings count as unset. */
const OptionalEnvString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

/** Environment variables read by a bootstrap run. */
export const EnvSchema = z.object({
  BASE_DIR: OptionalEnvString,
  FORCE: EnvFlagSchema,
  GPG_SIGN: EnvFlagSchema,
  GPG_KEY: OptionalEnvString,
  BUILD_SERVICES: EnvFlagSchema,
  MODULES_FILE: OptionalEnvString,
  /** Unset means the default log path; an empty string disables the log file. */
  LOG_FILE: z.string().optional(),
  LOG_LEVEL: z.preprocess((value) => (value === '' ? undefined : value), LogLevelSchema.optional()),
  TOOL_TIMEOUT_MS: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().optional()
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/** Fully resolved configuration for one run. */
export const RunConfigSchema = z.object({
  /** Absolute output root */
  baseDir: z.string().min(1),
  /** Overwrite existing files instead of skipping them */
  force: z.boolean(),
  /** Produce detached signatures */
  sign: z.boolean(),
  /** Signing key reference passed to the signer */
  signKey: z.string().min(1).optional(),
  /** Run the embedded service build before packaging */
  buildServices: z.boolean(),
  modulesFile: z.string().min(1).optional(),
  /** Restrict the run to these modules */
  only: z.array(z.string().min(1)).optional(),
  /** Absolute log file path, or null for console only */
  logFile: z.string().min(1).nullable(),
  logLevel: LogLevelSchema,
  toolTimeoutMs: z.number().int().positive(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
