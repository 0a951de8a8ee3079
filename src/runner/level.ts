import { isHarnessError } from '../errors.js';
import type { Accounting } from './accounting.js';
import type { TestOutcome } from './registry.js';

function firstLine(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.split('\n')[0];
}

/**
 * Run a test function (or subtest body) in its own level and return its verdict.
 *
 * A thrown error or an abnormal result (`false`, a non-zero number) adds a
 * failing entry; harness errors abort the script and are rethrown once the
 * level is closed.
 */
export async function runLevel(
  accounting: Accounting,
  name: string,
  body: () => TestOutcome | Promise<TestOutcome>,
  onError?: (err: unknown) => void
): Promise<boolean> {
  const { passed } = await accounting.scope(name, async () => {
    try {
      const outcome = await body();
      if (outcome === false || (typeof outcome === 'number' && outcome !== 0)) {
        accounting.record(`Non-zero result from test function: '${name}'`, false);
      }
    } catch (err) {
      if (isHarnessError(err)) {
        throw err;
      }
      accounting.record(`Error in '${name}': ${firstLine(err)}`, false);
      onError?.(err);
    }
  });
  return passed;
}
