import { readFile, stat } from 'node:fs/promises';
import { allocateCapture } from '../capture/index.js';
import { formatCliError, UsageError } from '../errors.js';
import type { Accounting } from '../runner/accounting.js';
import {
  CHANNEL_LABELS,
  CHANNEL_ORDER,
  DEFAULT_CAPTURE_NAME,
  type AssertionVerdict,
  type AssertOptions,
  type CaptureFiles,
  type Channel,
  type ExpectedValue,
} from '../types/index.js';
import { runCommand } from './command.js';
import { compare } from './compare.js';
import type { ChannelResult } from './types.js';
import { trimTrailingNewlines } from './utils.js';

/** Prefix of the lines pointing at an artifact worth reading after a failure */
export const DETAILS_MARKER = 'For details, see: ';

const RULE = '----------';

export interface AssertionRuntime {
  accounting: Accounting;
  outDir: string;
  captureName?: string;
  timeoutMs?: number;
  /** Data for the command's stdin; inherited when absent */
  input?: string | Uint8Array;
  /** Receives diagnostic lines meant for stderr (artifact markers) */
  onDiagnostic?: (line: string) => void;
  onDebug?: (message: string) => void;
}

function capturePath(files: CaptureFiles, channel: Channel): string {
  switch (channel) {
    case 'out':
      return files.stdoutPath;
    case 'err':
      return files.stderrPath;
    case 'ret':
      return files.statusPath;
  }
}

/**
 * Load the expected bytes of a channel from its source
 */
async function resolveExpected(channel: Channel, expected: ExpectedValue): Promise<Buffer> {
  const source = expected.source;
  switch (source.kind) {
    case 'default':
      return Buffer.from(channel === 'ret' ? '0' : '');
    case 'literal':
      return Buffer.from(source.value);
    case 'file':
      try {
        return await readFile(source.path);
      } catch (err) {
        throw new UsageError(
          `Failed to read expected ${CHANNEL_LABELS[channel]} file '${source.path}': ${formatCliError(err)}`
        );
      }
  }
}

function parseExpectedStatus(value: Buffer): number {
  const text = trimTrailingNewlines(value).toString('utf-8').trim();
  if (!/^-?\d+$/.test(text)) {
    throw new UsageError(`Invalid expected exit status: '${text}'`);
  }
  return Number(text);
}

/**
 * Evaluate one (non-ignored) channel against its expectation
 */
async function checkChannel(
  channel: Channel,
  expected: ExpectedValue,
  expectedBytes: Buffer,
  exitStatus: number,
  files: CaptureFiles
): Promise<ChannelResult> {
  if (channel === 'ret') {
    const actual = String(exitStatus);
    if (expected.mode === 'pattern') {
      const mismatch = compare('pattern', expectedBytes, actual);
      return { channel, passed: mismatch === null, actual, mismatch: mismatch ?? undefined };
    }
    // Plain number comparison instead of a diff
    const want = parseExpectedStatus(expectedBytes);
    return exitStatus === want
      ? { channel, passed: true, actual }
      : { channel, passed: false, actual, mismatch: `Got exit status '${exitStatus}', expected '${want}'.` };
  }

  const actualBytes = await readFile(capturePath(files, channel));
  const mismatch = compare(expected.mode, expectedBytes, actualBytes, {
    trimTrailingNewlines: !expected.preserveNewlines,
  });
  return {
    channel,
    passed: mismatch === null,
    actual: actualBytes.toString('utf-8'),
    mismatch: mismatch ?? undefined,
  };
}

async function isEmptyFile(path: string): Promise<boolean> {
  return (await stat(path)).size === 0;
}

/**
 * Run the command of an `assert` call and check its outputs.
 *
 * The call becomes a level named after its description with one entry per checked
 * channel; closing it records the call's verdict in the enclosing level.
 */
export async function runAssertion(
  options: AssertOptions,
  runtime: AssertionRuntime
): Promise<AssertionVerdict> {
  const { accounting } = runtime;
  const debug = runtime.onDebug ?? (() => {});
  const diagnostic = runtime.onDiagnostic ?? (() => {});

  // Expectations are read (and validated) before anything runs
  const expectedBytes: Record<Channel, Buffer> = {
    out: await resolveExpected('out', options.expected.out),
    err: await resolveExpected('err', options.expected.err),
    ret: await resolveExpected('ret', options.expected.ret),
  };
  if (options.expected.ret.mode === 'exact') {
    parseExpectedStatus(expectedBytes.ret);
  }

  const files = await allocateCapture(runtime.outDir, runtime.captureName ?? DEFAULT_CAPTURE_NAME);
  debug(`STDOUT will be saved to: '${files.stdoutPath}'.`);
  debug(`STDERR will be saved to: '${files.stderrPath}'.`);
  debug(`Exit status will be saved to: '${files.statusPath}'.`);

  const exitStatus = await runCommand(options.command, files, {
    preserveNewlines: options.preserveNewlines,
    input: runtime.input,
    timeoutMs: runtime.timeoutMs,
    onDebug: debug,
  });

  accounting.enter(options.description);
  const failedChannels: Channel[] = [];
  const markers = new Set<string>();

  for (const channel of CHANNEL_ORDER) {
    const expected = options.expected[channel];
    const label = CHANNEL_LABELS[channel];
    const path = capturePath(files, channel);

    if (expected.mode === 'ignore') {
      if (channel === 'ret' ? exitStatus !== 0 : !(await isEmptyFile(path))) {
        accounting.note(channel === 'ret' ? `Ignored ${label}: ${exitStatus}.` : `Ignored ${label} output (see '${path}').`);
      }
      continue;
    }

    const result = await checkChannel(channel, expected, expectedBytes[channel], exitStatus, files);
    accounting.record(label, result.passed);
    if (result.passed) {
      continue;
    }
    failedChannels.push(channel);

    if (channel === 'ret') {
      accounting.note(result.mismatch ?? '');
      // The reason for an unexpected status is usually on stderr
      if (!(await isEmptyFile(files.stderrPath))) {
        markers.add(files.stderrPath);
      }
      continue;
    }

    accounting.note('');
    accounting.note(`Unexpected ${label}:`);
    accounting.note(RULE, 1);
    accounting.note(result.mismatch ?? '', 1);
    accounting.note(RULE, 1);
    accounting.note(`[See: '${path}']`, 1);
    accounting.note('');
    markers.add(path);
  }

  for (const path of markers) {
    diagnostic(`${DETAILS_MARKER}${path}`);
  }

  const passed = accounting.exit();
  return {
    description: options.description,
    passed,
    failedChannels,
    exitStatus,
    files,
  };
}
