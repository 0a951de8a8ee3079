import { createTwoFilesPatch } from 'diff';
import type { CompareMode } from '../types/index.js';
import { matchGlob } from './glob.js';
import { toBuffer, trimTrailingNewlines, type Bytes } from './utils.js';

export interface CompareOptions {
  /** Drop trailing newlines from both sides first (default: true) */
  trimTrailingNewlines?: boolean;
}

/**
 * Compare an actual output against its expectation.
 * Returns null on match, otherwise a human-readable description of the mismatch.
 */
export function compare(
  mode: CompareMode,
  expected: Bytes,
  actual: Bytes,
  options: CompareOptions = {}
): string | null {
  if (mode === 'ignore') {
    return null;
  }

  const trim = options.trimTrailingNewlines ?? true;
  let exp = toBuffer(expected);
  let act = toBuffer(actual);
  if (trim) {
    exp = trimTrailingNewlines(exp);
    act = trimTrailingNewlines(act);
  }

  switch (mode) {
    case 'exact':
      return exp.equals(act) ? null : unifiedDiff(exp.toString('utf-8'), act.toString('utf-8'), trim);
    case 'pattern': {
      const pattern = exp.toString('utf-8');
      const output = act.toString('utf-8');
      if (matchGlob(pattern, output)) {
        return null;
      }
      return `Pattern not matched: '${pattern}'.\nOutput was: '${output}'.`;
    }
  }
}

/**
 * Unified diff of expected vs actual, without the leading `====` separator
 */
export function unifiedDiff(expected: string, actual: string, trimmed = true): string {
  // Trimmed values get one newline back, else every hunk ends in "No newline at end of file"
  const terminate = (s: string) => (trimmed && s !== '' ? `${s}\n` : s);
  const patch = createTwoFilesPatch('expected', 'actual', terminate(expected), terminate(actual));
  return patch
    .split('\n')
    .filter((line) => !line.startsWith('==='))
    .join('\n')
    .trimEnd();
}
