import { InternalError } from '../errors.js';
import type { Accounting } from './accounting.js';
import type { TestContext } from './context.js';
import { runLevel } from './level.js';
import type { TestEntry, TestRegistry } from './registry.js';

export interface RunScriptTestsOptions {
  scriptPath: string;
  registry: TestRegistry;
  accounting: Accounting;
  functionPattern: string;
  /** Restrict the run to these function names; all discovered functions run when empty */
  include?: readonly string[];
  context: TestContext;
  /** Receives errors thrown by test functions */
  onError?: (err: unknown) => void;
  onDebug?: (message: string) => void;
}

/**
 * Test functions of a script that a run would execute, in declaration order
 */
export function selectTests(
  registry: TestRegistry,
  scriptPath: string,
  functionPattern: string,
  include: readonly string[] = []
): TestEntry[] {
  const discovered = registry.discover(scriptPath, functionPattern);
  if (include.length === 0) {
    return discovered;
  }
  const wanted = new Set(include);
  return discovered.filter((entry) => wanted.has(entry.name));
}

/**
 * Run the test functions of one script, each in its own level.
 * Returns the number of failed functions.
 */
export async function runScriptTests(options: RunScriptTestsOptions): Promise<number> {
  const { scriptPath, registry, accounting, functionPattern, context } = options;
  const include = options.include ?? [];
  const debug = options.onDebug ?? (() => {});

  const entries = selectTests(registry, scriptPath, functionPattern, include);
  debug(`Running ${entries.length} test function(s) from '${scriptPath}'`);

  const ran = new Set<string>();
  let failed = 0;
  for (const entry of entries) {
    debug(`Running test function: '${entry.name}'`);
    const passed = await runLevel(accounting, entry.name, () => entry.fn(context), options.onError);
    ran.add(entry.name);
    if (!passed) {
      failed++;
    }
  }

  const missing = include.filter((name) => !ran.has(name));
  if (missing.length > 0) {
    throw new InternalError(
      missing.map((name) => `'${name}': Subtest in inclusion list not found in script: '${scriptPath}'`).join('\n')
    );
  }

  return failed;
}
