/**
 * Error types and codes for modboot.
 * Every failure the engine reports is a BootstrapError subclass.
 */

/**
 * Base error class for all modboot errors.
 */
export class BootstrapError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BootstrapError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration and registry errors (env parsing, modules file validation).
 */
export class ConfigError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * An ancestor path component exists and is not a directory, or mkdir failed.
 */
export class DirectoryCreateError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DirectoryCreateError';
  }
}

/**
 * Temp-file write or rename failure.
 */
export class WriteError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'WriteError';
  }
}

/**
 * A required external command is not on PATH.
 */
export class MissingToolError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MissingToolError';
  }
}

export class ArchiveError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ArchiveError';
  }
}

/**
 * Detached signature failure. Never invalidates the signed artifact.
 */
export class SigningError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SigningError';
  }
}

/**
 * A file under a manifest root could not be read, or a manifest could not be parsed.
 */
export class ManifestReadError extends BootstrapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ManifestReadError';
  }
}

export const ErrorCodes = {
  // Configuration (C001-C005)
  INVALID_ENV: 'C001',
  INVALID_MODULES_FILE: 'C002',
  DUPLICATE_MODULE: 'C003',
  UNKNOWN_MODULE: 'C004',
  PARSE_ERROR: 'C005',

  // Filesystem (F001-F004)
  DIRECTORY_CREATE: 'F001',
  TEMP_WRITE: 'F002',
  RENAME: 'F003',
  DESTINATION_IS_DIRECTORY: 'F004',

  // Tools (T001-T002)
  MISSING_TOOL: 'T001',
  TOOL_FAILED: 'T002',

  // Packaging (P001-P003)
  ARCHIVE_FAILED: 'P001',
  SIGNING_FAILED: 'P002',
  SERVICE_BUILD_FAILED: 'P003',

  // Manifest (M001-M002)
  MANIFEST_READ: 'M001',
  MANIFEST_PARSE: 'M002',

  // State machine
  ILLEGAL_TRANSITION: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Process exit codes. Distinct causes map to distinct codes.
 */
export const ExitCodes = {
  SUCCESS: 0,
  MODULE_FAILED: 1,
  DIRECTORY_CREATE: 2,
  MISSING_TOOL: 3,
  CONFIG: 4,
  MANIFEST: 5,
  ARCHIVE: 6,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Map a fatal error to the exit code the CLI reports for it.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof DirectoryCreateError) return ExitCodes.DIRECTORY_CREATE;
  if (error instanceof MissingToolError) return ExitCodes.MISSING_TOOL;
  if (error instanceof ConfigError) return ExitCodes.CONFIG;
  if (error instanceof ManifestReadError) return ExitCodes.MANIFEST;
  if (error instanceof ArchiveError) return ExitCodes.ARCHIVE;
  return ExitCodes.MODULE_FAILED;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
