/**
 * External command helpers: PATH lookup and synchronous invocation.
 */
import { execFileSync } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import * as path from 'node:path';

/** Default timeout for external commands in milliseconds */
export const DEFAULT_TOOL_TIMEOUT_MS = 120_000;

/**
 * Locate an executable on a PATH string.
 *
 * @param command - Bare command name (e.g. "tar")
 * @param searchPath - PATH value to search; defaults to the process PATH
 * @returns Absolute path of the first executable match, or null
 */
export function findExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): string | null {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    try {
      accessSync(candidate, constants.X_OK);
      if (statSync(candidate).isFile()) {
        return candidate;
      }
    } catch { /* not present or not executable in this PATH entry */ }
  }
  return null;
}

export interface RunToolOptions {
  cwd?: string;
  /** Written to the command's stdin */
  input?: string;
  timeoutMs?: number;
}

/**
 * Failure of an external command, with whatever it wrote to stderr.
 */
export class ToolInvocationError extends Error {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly stderr: string,
    cause: unknown
  ) {
    super(`${command} ${args.join(' ')} failed: ${stderr.trim() || describe(cause)}`);
    this.name = 'ToolInvocationError';
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string') return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8');
  }
  return '';
}

/**
 * Run a command synchronously and return its stdout.
 *
 * @throws ToolInvocationError when the command exits non-zero, times out or cannot start
 */
export function runTool(command: string, args: readonly string[], options: RunToolOptions = {}): string {
  try {
    return execFileSync(command, args, {
      cwd: options.cwd,
      input: options.input,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    });
  } catch (error) {
    throw new ToolInvocationError(command, args, stderrOf(error), error);
  }
}
