/**
 * Process entry of one test script: `node [--import tsx] child.js <script>`.
 *
 * Reads its configuration from TEST_* variables, imports the preload modules and
 * the script, then runs (or lists) the script's test functions. Exit codes:
 * 0 all passed, 1 some failed, 3 harness error or abnormal termination.
 */
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadScriptEnv } from '../config/env.js';
import { DETAILS_MARKER } from '../assertions/engine.js';
import { isHarnessError, SCRIPT_ABORT_EXIT_CODE, UsageError } from '../errors.js';
import type { ScriptEnv } from '../types/index.js';
import { Accounting } from './accounting.js';
import { ScriptContext } from './context.js';
import { registry } from './registry.js';
import { runScriptTests, selectTests } from './script.js';

let finished = false;
let context: ScriptContext | undefined;

function writeLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

function writeError(line: string): void {
  process.stderr.write(`${line}\n`);
}

process.on('exit', () => {
  if (finished) {
    return;
  }
  writeError('ERROR: Test script execution failed.');
  const stderrPath = context?.lastStderrPath;
  if (stderrPath) {
    writeError(`${DETAILS_MARKER}${stderrPath}`);
  }
  process.exitCode = SCRIPT_ABORT_EXIT_CODE;
});

function importPath(path: string): Promise<unknown> {
  return import(pathToFileURL(resolve(path)).href);
}

async function main(argv: string[]): Promise<number> {
  const env: ScriptEnv = loadScriptEnv(process.env);
  const debug = env.TEST_DEBUG ? (message: string) => writeError(`# DBG: ${message}`) : undefined;

  const script = argv[0] ?? env.TEST_SOURCE_PATH;
  if (!script) {
    throw new UsageError('No test script given');
  }
  const scriptPath = resolve(script);
  env.TEST_SOURCE_PATH = scriptPath;
  env.TEST_SOURCE_DIR ??= dirname(scriptPath);

  for (const preload of env.TEST_PRELOAD) {
    debug?.(`Preloading: '${preload}'`);
    await importPath(preload);
  }
  debug?.(`Loading test script: '${scriptPath}'`);
  await importPath(scriptPath);

  if (env.TEST_LIST_ONLY) {
    for (const entry of selectTests(registry, scriptPath, env.TEST_FUNC_PATTERN, env.TEST_INCLUDE_SUBTESTS)) {
      writeLine(entry.name);
    }
    return 0;
  }

  const outDir = env.TEST_OUT_DIR ?? (await mkdtemp(join(tmpdir(), 'cmdprobe.')));
  debug?.(`Output directory: '${outDir}'`);

  const accounting = new Accounting(writeLine);
  const scriptContext = new ScriptContext({
    accounting,
    env,
    outDir,
    onDiagnostic: writeError,
    onDebug: debug,
  });
  context = scriptContext;

  const failed = await runScriptTests({
    scriptPath,
    registry,
    accounting,
    functionPattern: env.TEST_FUNC_PATTERN,
    include: env.TEST_INCLUDE_SUBTESTS,
    context: scriptContext,
    onError: scriptContext.reportError,
    onDebug: debug,
  });
  return failed === 0 ? 0 : 1;
}

try {
  process.exitCode = await main(process.argv.slice(2));
  finished = true;
} catch (err) {
  if (!isHarnessError(err)) {
    throw err;
  }
  for (const line of err.message.split('\n')) {
    writeError(`TEST ERROR: ${line}`);
  }
  process.exitCode = SCRIPT_ABORT_EXIT_CODE;
  finished = true;
}
