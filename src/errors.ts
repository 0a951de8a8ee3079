/**
 * Error classes for harness failures.
 *
 * A failing assertion is never an error: it is recorded by the accounting and the
 * run continues. These classes cover the cases where the harness itself cannot go on
 * (bad `assert` usage, broken invariants, invalid configuration).
 */

/** Exit code of a script aborted by a usage or internal error. */
export const SCRIPT_ABORT_EXIT_CODE = 3;

/** Exit code of the CLI when it is invoked incorrectly. */
export const CLI_USAGE_EXIT_CODE = 2;

export abstract class HarnessError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed `assert` invocation or unreadable expectation file. */
export class UsageError extends HarnessError {
  readonly exitCode = SCRIPT_ABORT_EXIT_CODE;
}

/** A harness invariant was violated (e.g. subtest stack underflow). */
export class InternalError extends HarnessError {
  readonly exitCode = SCRIPT_ABORT_EXIT_CODE;
}

/** A pretest hook failed or printed something other than a JSON object. */
export class HookError extends HarnessError {
  readonly exitCode = SCRIPT_ABORT_EXIT_CODE;
}

/** Invalid configuration file, environment or CLI input. */
export class ConfigError extends HarnessError {
  readonly exitCode = CLI_USAGE_EXIT_CODE;
}

export function isHarnessError(err: unknown): err is HarnessError {
  return err instanceof HarnessError;
}

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * js-yaml YAMLException shape, detected by `name`.
 */
interface YAMLExceptionLike extends Error {
  name: 'YAMLException';
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number };
}

function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === 'YAMLException';
}

/**
 * Format an error into a one-line CLI message (no stack trace).
 */
export function formatCliError(err: unknown): string {
  if (isYAMLException(err)) {
    const reason = err.reason ?? 'invalid YAML syntax';
    const mark = err.mark;
    if (mark && mark.line != null) {
      const file = mark.name ? `${mark.name} ` : '';
      // js-yaml lines are 0-based
      return `Failed to parse YAML: ${reason} (${file}line ${mark.line + 1}, column ${(mark.column ?? 0) + 1})`;
    }
    return `Failed to parse YAML: ${reason}`;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` '${err.path}'` : '';
    switch (err.code) {
      case 'ENOENT':
        return `File not found:${filePath}`;
      case 'EACCES':
      case 'EPERM':
        return `Permission denied:${filePath}`;
      case 'EISDIR':
        return `Expected a file but found a directory:${filePath}`;
      default:
        return `System error (${err.code}):${filePath} ${err.message}`;
    }
  }

  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
