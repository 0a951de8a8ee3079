import { ConfigError } from '../errors.js';
import { ScriptEnvSchema, type ScriptEnv } from '../types/index.js';
import { formatIssues } from './loader.js';

/**
 * Read the configuration of a test script process from its environment
 */
export function loadScriptEnv(env: NodeJS.ProcessEnv = process.env): ScriptEnv {
  const result = ScriptEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid test environment:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
