import { execa } from 'execa';
import { HookError } from '../errors.js';
import type { Hook } from '../types/index.js';
import { interpolate, type Variables } from '../config/interpolate.js';

const DEFAULT_TIMEOUT_MS = 30000;
const PREVIEW_LENGTH = 200;

export interface HookResult {
  variables: Variables;
  stdout: string;
}

export interface ExecuteHookOptions {
  currentVars?: Variables;
  /** Environment the hook inherits and `${ENV.NAME}` reads */
  env?: NodeJS.ProcessEnv;
  onDebug?: (message: string) => void;
}

function preview(text: string): string {
  return `${text.slice(0, PREVIEW_LENGTH)}${text.length > PREVIEW_LENGTH ? '...' : ''}`;
}

function withStderr(message: string, stderr: string): string {
  return stderr ? `${message}\nStderr: ${stderr}` : message;
}

/**
 * Execute a single hook and parse its JSON output
 * @param hook The hook configuration
 * @param options Execution options (variables, environment, debug callback)
 */
export async function executeHook(hook: Hook, options: ExecuteHookOptions = {}): Promise<HookResult> {
  const { currentVars = {}, env = process.env, onDebug } = options;
  const debug = onDebug ?? (() => {});
  const [cmd, ...args] = hook.cmd.map((part) => interpolate(part, currentVars, env));
  const command = [cmd, ...args].join(' ');
  const timeout = hook.timeout_ms ?? DEFAULT_TIMEOUT_MS;

  debug(`[Hook] Running: ${command}`);

  const hookEnv: NodeJS.ProcessEnv = { ...env };
  for (const [key, value] of Object.entries(hook.env ?? {})) {
    const interpolated = interpolate(value, currentVars, env);
    hookEnv[key] = interpolated;
    debug(`[Hook] Env: ${key}=${interpolated}`);
  }

  const result = await execa(cmd, args, {
    timeout,
    reject: false,
    env: hookEnv,
    extendEnv: false,
    stdin: 'ignore',
  });

  const stderr = result.stderr.trim();
  if (stderr) {
    debug(`[Hook] Stderr: ${preview(stderr)}`);
  }

  if (result.failed) {
    const reason = result.timedOut
      ? `timed out after ${timeout}ms`
      : result.exitCode !== undefined
        ? `exit code ${result.exitCode}`
        : result.signal !== undefined
          ? `signal ${result.signal}`
          : 'could not be started';
    throw new HookError(withStderr(`Hook failed (${reason}): ${command}`, stderr));
  }
  debug(`[Hook] Exit code: ${result.exitCode}`);

  const stdout = result.stdout.trim();
  if (!stdout) {
    debug(`[Hook] No output`);
    return { variables: {}, stdout: '' };
  }

  debug(`[Hook] Stdout: ${preview(stdout)}`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    throw new HookError(withStderr(`Hook output is not valid JSON: ${command}\nStdout: ${stdout}`, stderr));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new HookError(withStderr(`Hook output must be a JSON object: ${command}\nStdout: ${stdout}`, stderr));
  }

  // Values become environment variables of the script
  const variables: Variables = {};
  for (const [key, value] of Object.entries(parsed)) {
    variables[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }

  debug(`[Hook] Variables: ${Object.keys(variables).join(', ') || '(none)'}`);
  return { variables, stdout };
}

export interface ExecuteHooksOptions {
  env?: NodeJS.ProcessEnv;
  onDebug?: (message: string) => void;
}

/**
 * Execute all hooks in order and merge their outputs; later hooks see the
 * variables of earlier ones
 */
export async function executeHooks(hooks: Hook[], options: ExecuteHooksOptions = {}): Promise<Variables> {
  const variables: Variables = {};

  for (const hook of hooks) {
    const result = await executeHook(hook, { currentVars: variables, env: options.env, onDebug: options.onDebug });
    Object.assign(variables, result.variables);
  }

  return variables;
}
