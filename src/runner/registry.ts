import { existsSync, realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { matchGlob } from '../assertions/glob.js';
import { UsageError } from '../errors.js';
import type { TestContext } from './context.js';

/**
 * What a test function may return. `false` and non-zero numbers mark the
 * function as failed, the same as throwing.
 */
export type TestOutcome = void | boolean | number;

export type TestFunction = (t: TestContext) => TestOutcome | Promise<TestOutcome>;

export interface TestEntry {
  name: string;
  fn: TestFunction;
  /** Absolute path of the file that registered the entry */
  source: string;
  /** Registration order across the whole registry */
  position: number;
}

/**
 * Normalize a module URL (`import.meta.url`) or path to an absolute path.
 * Symbolic links of existing files are resolved, as Node does for module URLs.
 */
export function toSourcePath(moduleUrlOrPath: string): string {
  const path = moduleUrlOrPath.startsWith('file:') ? fileURLToPath(moduleUrlOrPath) : resolve(moduleUrlOrPath);
  return existsSync(path) ? realpathSync(path) : path;
}

export class TestRegistry {
  constructor(private readonly entries: TestEntry[] = []) {}

  register(source: string, name: string, fn: TestFunction): void {
    const path = toSourcePath(source);
    if (this.entries.some((entry) => entry.source === path && entry.name === name)) {
      throw new UsageError(`Test function '${name}' is already defined in '${path}'`);
    }
    this.entries.push({ name, fn, source: path, position: this.entries.length });
  }

  /**
   * Entries registered from `scriptPath` itself whose names match `pattern`,
   * in declaration order
   */
  discover(scriptPath: string, pattern: string): TestEntry[] {
    const path = toSourcePath(scriptPath);
    return this.entries
      .filter((entry) => entry.source === path && matchGlob(pattern, entry.name))
      .sort((a, b) => a.position - b.position);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

const ENTRIES_KEY = Symbol.for('cmdprobe.registry');

function isEntryList(value: unknown): value is TestEntry[] {
  return Array.isArray(value);
}

// Every copy of the package loaded in a process shares one entry list
function sharedEntries(): TestEntry[] {
  const existing: unknown = Reflect.get(globalThis, ENTRIES_KEY);
  if (isEntryList(existing)) {
    return existing;
  }
  const entries: TestEntry[] = [];
  Reflect.set(globalThis, ENTRIES_KEY, entries);
  return entries;
}

/** Registry the test scripts of the current process register into */
export const registry = new TestRegistry(sharedEntries());

export interface ScriptRegistrar {
  /** Declare a test function of this script */
  test(name: string, fn: TestFunction): void;
}

/**
 * Bind test registration to one script file:
 *
 * ```ts
 * const { test } = testScript(import.meta.url);
 *
 * test('test_echo', async (t) => {
 *   await t.assert('prints hello', '-o', 'hello', '--', 'echo', '-n', 'hello');
 * });
 * ```
 *
 * Only functions registered from the script being run are picked up, so helper
 * modules may declare their own without them leaking into every script.
 */
export function testScript(moduleUrl: string, target: TestRegistry = registry): ScriptRegistrar {
  return {
    test(name, fn) {
      target.register(moduleUrl, name, fn);
    },
  };
}
