import { dirname, resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import {
  loadConfig,
  findTestScripts,
  DEFAULT_SCRIPT_PATTERNS,
  type LoadConfigResult,
} from '../../config/index.js';
import { CLI_USAGE_EXIT_CODE, formatCliError } from '../../errors.js';
import { runAll, type InclusionFilter } from '../../runner/index.js';

export interface RunOptions {
  config?: string;
  only?: string[];
  pattern?: string;
  outDir?: string;
  name?: string;
  timeout?: number;
  preload?: string[];
  list?: boolean;
  debug?: boolean;
  color?: boolean;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
}

/**
 * Parse `--only` entries (`<script>:<function>`) into the inclusion filter
 */
export function parseInclusions(entries: string[], cwd: string): InclusionFilter {
  const include: InclusionFilter = new Map();
  for (const entry of entries) {
    const separator = entry.lastIndexOf(':');
    const script = entry.slice(0, separator);
    const name = entry.slice(separator + 1);
    if (separator <= 0 || name === '') {
      throw new InvalidArgumentError(`Invalid inclusion entry '${entry}', expected <script>:<function>.`);
    }
    include.set(name, resolve(cwd, script));
  }
  return include;
}

function fail(message: string): never {
  console.error(pc.red('Error:'), message);
  process.exit(CLI_USAGE_EXIT_CODE);
}

export const runCommand = new Command('run')
  .description('Run test scripts')
  .argument('[scripts...]', 'Test script files')
  .option('-c, --config <path>', 'Path to config file')
  .option('--only <script:function...>', 'Run only these test functions')
  .option('--pattern <glob>', 'Naming pattern of test functions')
  .option('-o, --out-dir <dir>', 'Directory for captured outputs')
  .option('-n, --name <token>', 'Base name of capture files')
  .option('-t, --timeout <ms>', 'Timeout of each tested command', parseTimeout)
  .option('--preload <module...>', 'Modules to import before each script')
  .option('-l, --list', 'List test functions without running them')
  .option('--debug', 'Debug output')
  .option('--color', 'Force colored status lines')
  .option('--no-color', 'Disable colored status lines')
  .action(async (scripts: string[], options: RunOptions) => {
    const cwd = process.cwd();

    let configResult: LoadConfigResult;
    try {
      configResult = loadConfig({ configPath: options.config, cwd });
    } catch (err) {
      fail(formatCliError(err));
    }
    const { config, configPath } = configResult;
    // Paths in the config file are relative to the file
    const configDir = configPath ? dirname(configPath) : cwd;

    if (options.debug) {
      console.error(pc.dim(`# DBG: Config: ${configPath ?? '(defaults)'}`));
    }

    let include: InclusionFilter;
    try {
      include = parseInclusions(options.only ?? [], cwd);
    } catch (err) {
      fail(formatCliError(err));
    }

    const explicit = [...scripts.map((script) => resolve(cwd, script)), ...include.values()];
    let scriptPaths = [...new Set(explicit)];
    if (scriptPaths.length === 0) {
      const patterns = config.scripts === undefined
        ? DEFAULT_SCRIPT_PATTERNS
        : [config.scripts].flat();
      scriptPaths = await findTestScripts(patterns, configDir);
      if (scriptPaths.length === 0) {
        fail(`No test scripts found (patterns: ${patterns.join(', ')}).`);
      }
    }

    const outDir = options.outDir
      ? resolve(cwd, options.outDir)
      : config.out_dir
        ? resolve(configDir, config.out_dir)
        : undefined;
    const preload = options.preload
      ? options.preload.map((module) => resolve(cwd, module))
      : (config.preload ?? []).map((module) => resolve(configDir, module));

    const { exitCode } = await runAll(scriptPaths, {
      cwd,
      outDir,
      name: options.name ?? config.name,
      functionPattern: options.pattern ?? config.function_pattern,
      timeoutMs: options.timeout ?? config.timeout_ms,
      preload,
      ignore: config.ignore,
      hooks: config.hooks,
      include,
      list: options.list,
      debug: options.debug,
      color: options.color ?? pc.isColorSupported,
    });

    process.exitCode = exitCode;
  });
