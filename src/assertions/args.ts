import { UsageError } from '../errors.js';
import {
  CHANNEL_ORDER,
  type AssertOptions,
  type Channel,
  type CompareMode,
  type ExpectedValue,
  type IgnoreDefaults,
} from '../types/index.js';

interface ValueOption {
  channel: Channel;
  mode: Exclude<CompareMode, 'ignore'>;
  from: 'literal' | 'file';
}

const VALUE_OPTIONS: Partial<Record<string, ValueOption>> = {
  '-o': { channel: 'out', mode: 'exact', from: 'literal' },
  '-op': { channel: 'out', mode: 'pattern', from: 'literal' },
  '-O': { channel: 'out', mode: 'exact', from: 'file' },
  '-e': { channel: 'err', mode: 'exact', from: 'literal' },
  '-ep': { channel: 'err', mode: 'pattern', from: 'literal' },
  '-E': { channel: 'err', mode: 'exact', from: 'file' },
  '-r': { channel: 'ret', mode: 'exact', from: 'literal' },
  '-rp': { channel: 'ret', mode: 'pattern', from: 'literal' },
  '-R': { channel: 'ret', mode: 'exact', from: 'file' },
};

const IGNORE_OPTIONS: Partial<Record<string, Channel>> = {
  '-oi': 'out',
  '-ei': 'err',
  '-ri': 'ret',
};

const COMMAND_SEPARATOR = '--';

function defaultExpectation(ignored: boolean | undefined): ExpectedValue {
  return {
    mode: ignored ? 'ignore' : 'exact',
    source: { kind: 'default' },
    preserveNewlines: false,
  };
}

/**
 * Parse the argument list of an `assert` call:
 *
 *   [-d] {description} [options] -- {command...}
 *
 * Channels flagged in `ignoreDefaults` start out ignored; any option naming the
 * channel afterwards replaces that.
 */
export function parseAssertArgs(args: string[], ignoreDefaults: IgnoreDefaults = {}): AssertOptions {
  if (args.length < 2) {
    throw new UsageError('At least two arguments must be provided (description, command).');
  }

  const expected: Record<Channel, ExpectedValue> = {
    out: defaultExpectation(ignoreDefaults.stdout),
    err: defaultExpectation(ignoreDefaults.stderr),
    ret: defaultExpectation(ignoreDefaults.exit_status),
  };

  let description: string | undefined;
  let command: string[] | undefined;
  let preserveNewlines = false;
  let failOnError = false;

  let i = 0;
  if (!args[0].startsWith('-')) {
    description = args[0];
    i = 1;
  }

  while (i < args.length) {
    const arg = args[i];

    if (arg === COMMAND_SEPARATOR) {
      command = args.slice(i + 1);
      break;
    }

    if (arg === '-p') {
      preserveNewlines = true;
      i++;
      continue;
    }
    if (arg === '-f') {
      failOnError = true;
      i++;
      continue;
    }

    const ignored = IGNORE_OPTIONS[arg];
    if (ignored) {
      expected[ignored] = defaultExpectation(true);
      i++;
      continue;
    }

    const valueOption = VALUE_OPTIONS[arg];
    if (valueOption || arg === '-d') {
      if (i + 1 >= args.length) {
        throw new UsageError(`Missing value for option: '${arg}'`);
      }
      const value = args[i + 1];
      if (valueOption) {
        expected[valueOption.channel] = {
          mode: valueOption.mode,
          source: valueOption.from === 'file' ? { kind: 'file', path: value } : { kind: 'literal', value },
          preserveNewlines: false,
        };
      } else {
        description = value;
      }
      i += 2;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new UsageError(`Invalid option for 'assert': '${arg}'`);
    }
    throw new UsageError(
      `Invalid argument given to 'assert': '${arg}' (arg index: ${i + 1}). Arguments were: ${args.join(' ')}`
    );
  }

  if (!command || command.length === 0) {
    throw new UsageError('Please specify a command to test.');
  }
  if (!description) {
    throw new UsageError('Please specify a description for the test case.');
  }

  for (const channel of CHANNEL_ORDER) {
    expected[channel].preserveNewlines = preserveNewlines;
  }

  return { description, expected, preserveNewlines, failOnError, command };
}
