import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigError, formatCliError } from '../errors.js';
import { ProjectConfigSchema, type ProjectConfig } from '../types/index.js';

export const CONFIG_FILENAME = 'cmdprobe.config.yaml';

/**
 * Find config file by walking up from cwd
 */
export function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export function formatIssues(error: ZodError): string {
  return error.errors
    .map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
    .join('\n');
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  /** Null when no config file was found and defaults apply */
  configPath: string | null;
}

/**
 * Load and validate the project config. Without an explicit path a missing
 * file is not an error: the defaults apply.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ? resolve(cwd, options.configPath) : findConfigFile(cwd);

  if (!configPath) {
    return { config: ProjectConfigSchema.parse({}), configPath: null };
  }

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf-8'), { filename: configPath });
  } catch (err) {
    throw new ConfigError(formatCliError(err));
  }

  // An empty file holds no settings
  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${configPath}:\n${formatIssues(result.error)}`);
  }

  return {
    config: result.data,
    configPath,
  };
}
