import { parseAssertArgs, runAssertion } from '../assertions/index.js';
import type { IgnoreDefaults, ScriptEnv } from '../types/index.js';
import type { Accounting } from './accounting.js';
import { runLevel } from './level.js';
import type { TestFunction } from './registry.js';

export interface AssertWithOptions {
  /** Fed to the command's stdin instead of inheriting it */
  input?: string | Uint8Array;
}

/**
 * API handed to every test function
 */
export interface TestContext {
  /**
   * Run a command and check its outputs:
   * `assert [-d] {description} [options] -- {command...}`.
   * Resolves to 0, or with `-f` to the number of failed channels.
   */
  assert(...args: string[]): Promise<number>;
  assertWith(options: AssertWithOptions, ...args: string[]): Promise<number>;
  /** Group checks in a nested level; resolves to its verdict */
  subtest(name: string, body: TestFunction): Promise<boolean>;
  /** Write a comment line in the report */
  note(message: string, level?: number): void;
  describe(description: string): void;
  readonly env: ScriptEnv;
}

export interface ScriptContextOptions {
  accounting: Accounting;
  env: ScriptEnv;
  /** Directory receiving the capture artifacts */
  outDir: string;
  onDiagnostic?: (line: string) => void;
  onDebug?: (message: string) => void;
}

export function ignoreDefaultsFromEnv(env: ScriptEnv): IgnoreDefaults {
  return {
    stdout: env.TEST_IGNORE_STDOUT,
    stderr: env.TEST_IGNORE_STDERR,
    exit_status: env.TEST_IGNORE_STATUS,
  };
}

export class ScriptContext implements TestContext {
  private lastStderrFile: string | undefined;

  constructor(private readonly options: ScriptContextOptions) {}

  get env(): ScriptEnv {
    return this.options.env;
  }

  /** Stderr artifact of the most recent assertion */
  get lastStderrPath(): string | undefined {
    return this.lastStderrFile;
  }

  assert(...args: string[]): Promise<number> {
    return this.assertWith({}, ...args);
  }

  async assertWith(options: AssertWithOptions, ...args: string[]): Promise<number> {
    const { accounting, env, outDir, onDebug, onDiagnostic } = this.options;
    onDebug?.(`Assert: ${args.join(' ')}`);

    const parsed = parseAssertArgs(args, ignoreDefaultsFromEnv(env));
    const verdict = await runAssertion(parsed, {
      accounting,
      outDir,
      captureName: env.TEST_NAME,
      timeoutMs: env.TEST_TIMEOUT_MS,
      input: options.input,
      onDiagnostic,
      onDebug,
    });
    this.lastStderrFile = verdict.files.stderrPath;

    return parsed.failOnError ? verdict.failedChannels.length : 0;
  }

  subtest(name: string, body: TestFunction): Promise<boolean> {
    return runLevel(this.options.accounting, name, () => body(this), this.reportError);
  }

  note(message: string, level = 0): void {
    this.options.accounting.note(message, level);
  }

  describe(description: string): void {
    this.note(description);
  }

  /** Send an unexpected test error to the diagnostic stream */
  readonly reportError = (err: unknown): void => {
    const text = err instanceof Error ? (err.stack ?? err.message) : String(err);
    for (const line of text.split('\n')) {
      this.options.onDiagnostic?.(line);
    }
  };
}
