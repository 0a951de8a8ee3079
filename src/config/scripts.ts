import { resolve } from 'node:path';
import fg from 'fast-glob';

/**
 * Default test script patterns
 */
export const DEFAULT_SCRIPT_PATTERNS = ['**/*.cmdtest.ts', '**/*.cmdtest.js'];

/**
 * Find test scripts matching glob patterns, as sorted absolute paths
 */
export async function findTestScripts(patterns: string[], cwd: string): Promise<string[]> {
  const matches = await fg(patterns, {
    cwd,
    onlyFiles: true,
    ignore: ['**/node_modules/**', '**/dist/**'],
  });
  return [...new Set(matches.map((match) => resolve(cwd, match)))].sort();
}
