import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { tmpdir } from 'node:os';
import { delimiter, dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { execa } from 'execa';
import pc from 'picocolors';
import { exitStatusOf } from '../assertions/command.js';
import { DETAILS_MARKER } from '../assertions/engine.js';
import { formatCliError, isHarnessError, SCRIPT_ABORT_EXIT_CODE } from '../errors.js';
import { executeHooks } from '../hooks/index.js';
import {
  DEFAULT_CAPTURE_NAME,
  DEFAULT_FUNCTION_PATTERN,
  type Hook,
  type IgnoreDefaults,
} from '../types/index.js';
import { tee, TailBuffer } from './tee.js';

/** Function name -> script it belongs to */
export type InclusionFilter = Map<string, string>;

export interface DriverOptions {
  /** Artifact directory; `runAll` creates a temporary one when absent */
  outDir?: string;
  name?: string;
  functionPattern?: string;
  timeoutMs?: number;
  /** Modules imported by the child before the script */
  preload?: string[];
  ignore?: IgnoreDefaults;
  hooks?: Hook[];
  include?: InclusionFilter;
  /** Print the test functions of each script instead of running them */
  list?: boolean;
  debug?: boolean;
  color?: boolean;
  cwd?: string;
  /** Environment the children inherit; process.env by default */
  env?: NodeJS.ProcessEnv;
  /** Report output (status lines and the child's stdout) */
  write?: (chunk: string | Uint8Array) => void;
  /** Live copy of the child's stderr, and driver errors */
  writeError?: (chunk: string | Uint8Array) => void;
}

export interface ScriptResult {
  path: string;
  exitCode: number;
}

export interface RunAllResult {
  exitCode: number;
  results: ScriptResult[];
}

const RUNTIME_EXTENSION = extname(fileURLToPath(import.meta.url));

function childEntry(): string {
  return join(dirname(fileURLToPath(import.meta.url)), `child${RUNTIME_EXTENSION}`);
}

// Scripts are TypeScript, so every child loads tsx
function loaderArgs(): string[] {
  const loader = createRequire(import.meta.url).resolve('tsx');
  return ['--import', pathToFileURL(loader).href];
}

function flag(value: boolean | undefined): string {
  return value ? '1' : '';
}

/** Names of the inclusion filter mapped to `scriptPath` */
export function includedFunctions(include: InclusionFilter | undefined, scriptPath: string, cwd: string): string[] {
  const target = resolve(cwd, scriptPath);
  return [...(include ?? [])]
    .filter(([, path]) => resolve(cwd, path) === target)
    .map(([name]) => name);
}

/**
 * Environment of the child running `scriptPath`: the inherited environment,
 * hook variables, then the script configuration
 */
export function buildChildEnv(
  scriptPath: string,
  options: DriverOptions,
  variables: Record<string, string> = {}
): NodeJS.ProcessEnv {
  const cwd = options.cwd ?? process.cwd();
  return {
    ...(options.env ?? process.env),
    ...variables,
    TEST_DEBUG: flag(options.debug),
    TEST_OUT_DIR: options.outDir ? resolve(cwd, options.outDir) : '',
    TEST_NAME: options.name ?? DEFAULT_CAPTURE_NAME,
    TEST_IGNORE_STDOUT: flag(options.ignore?.stdout),
    TEST_IGNORE_STDERR: flag(options.ignore?.stderr),
    TEST_IGNORE_STATUS: flag(options.ignore?.exit_status),
    TEST_TIMEOUT_MS: options.timeoutMs === undefined ? '' : String(options.timeoutMs),
    TEST_FUNC_PATTERN: options.functionPattern ?? DEFAULT_FUNCTION_PATTERN,
    TEST_INCLUDE_SUBTESTS: includedFunctions(options.include, scriptPath, cwd).join(' '),
    TEST_PRELOAD: (options.preload ?? []).map((path) => resolve(cwd, path)).join(delimiter),
    TEST_SOURCE_PATH: scriptPath,
    TEST_SOURCE_DIR: dirname(scriptPath),
    TEST_LIST_ONLY: flag(options.list),
  };
}

/** Artifact paths named by detail markers, in first-seen order */
export function detailFiles(stderr: string): string[] {
  const files = stderr
    .split('\n')
    .filter((line) => line.startsWith(DETAILS_MARKER))
    .map((line) => line.slice(DETAILS_MARKER.length).trim())
    .filter((path) => path !== '');
  return [...new Set(files)];
}

function statusLine(exitCode: number, scriptPath: string, colors: ReturnType<typeof pc.createColors>): string {
  switch (exitCode) {
    case 0:
      return colors.green(`All tests passed in: '${scriptPath}'`);
    case 1:
      return colors.red(`Some tests failed in: '${scriptPath}'`);
    case SCRIPT_ABORT_EXIT_CODE:
      return colors.red('Test script did not finish gracefully.');
    default:
      return colors.red(`Unknown error when executing test script (exit code: ${exitCode}).`);
  }
}

/**
 * Run one test script in its own Node process and report its outcome
 */
export async function runScript(path: string, options: DriverOptions = {}): Promise<ScriptResult> {
  const cwd = options.cwd ?? process.cwd();
  const scriptPath = resolve(cwd, path);
  const write = options.write ?? ((chunk: string | Uint8Array) => process.stdout.write(chunk));
  const writeError = options.writeError ?? ((chunk: string | Uint8Array) => process.stderr.write(chunk));
  const colors = pc.createColors(options.color ?? false);
  const debug = options.debug ? (message: string) => writeError(`# DBG: ${message}\n`) : () => {};

  if (!existsSync(scriptPath)) {
    writeError(`TEST ERROR: Test script not found: '${scriptPath}'\n`);
    return { path: scriptPath, exitCode: SCRIPT_ABORT_EXIT_CODE };
  }

  write(`${colors.bold(`# [RUNNING: ${scriptPath}]`)}\n`);

  let variables: Record<string, string> = {};
  if (options.hooks && options.hooks.length > 0) {
    try {
      variables = await executeHooks(options.hooks, { env: options.env ?? process.env, onDebug: debug });
    } catch (err) {
      if (!isHarnessError(err)) {
        throw err;
      }
      for (const line of err.message.split('\n')) {
        writeError(`TEST ERROR: ${line}\n`);
      }
      write(`${statusLine(SCRIPT_ABORT_EXIT_CODE, scriptPath, colors)}\n`);
      return { path: scriptPath, exitCode: SCRIPT_ABORT_EXIT_CODE };
    }
  }

  const args = [...loaderArgs(), childEntry(), scriptPath];
  debug(`Launching: ${process.execPath} ${args.join(' ')}`);

  const child = execa(process.execPath, args, {
    cwd,
    env: buildChildEnv(scriptPath, options, variables),
    extendEnv: false,
    stdin: 'ignore',
    reject: false,
    buffer: false,
  });

  const captured = new TailBuffer();
  const streams = Promise.all([
    tee(child.stdout, [(chunk) => write(chunk)]),
    tee(child.stderr, [(chunk) => writeError(chunk), captured.push]),
  ]);
  const result = await child;
  await streams;

  const exitCode = exitStatusOf(result);
  debug(`Test script exit code: ${exitCode}`);

  if (options.list && exitCode === 0) {
    return { path: scriptPath, exitCode };
  }

  write(`${statusLine(exitCode, scriptPath, colors)}\n`);

  if (exitCode !== 0) {
    for (const file of detailFiles(captured.toString())) {
      write(`${colors.dim(`-----[${file}]`)}\n`);
      try {
        const contents = await readFile(file, 'utf-8');
        write(contents.endsWith('\n') || contents === '' ? contents : `${contents}\n`);
      } catch (err) {
        write(`${formatCliError(err)}\n`);
      }
      write(`${colors.dim('-----')}\n`);
    }
  }

  return { path: scriptPath, exitCode };
}

/**
 * Run scripts one after another. The exit code is 0 when every script passed.
 */
export async function runAll(scripts: string[], options: DriverOptions = {}): Promise<RunAllResult> {
  const cwd = options.cwd ?? process.cwd();
  let outDir: string;
  if (options.outDir) {
    outDir = resolve(cwd, options.outDir);
    await mkdir(outDir, { recursive: true });
  } else {
    outDir = await mkdtemp(join(tmpdir(), 'cmdprobe.'));
  }

  const results: ScriptResult[] = [];
  for (const script of scripts) {
    results.push(await runScript(script, { ...options, outDir }));
  }

  return {
    exitCode: results.every((result) => result.exitCode === 0) ? 0 : 1,
    results,
  };
}
