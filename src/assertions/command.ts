import { createWriteStream } from 'node:fs';
import { appendFile, writeFile } from 'node:fs/promises';
import { constants } from 'node:os';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { execa } from 'execa';
import { createChompStream } from '../capture/index.js';
import type { CaptureFiles } from '../types/index.js';

/** Exit status recorded when the timeout kills a command */
export const TIMEOUT_EXIT_STATUS = 124;
/** Exit status recorded when a command cannot be started */
export const NOT_STARTED_EXIT_STATUS = 127;
const SIGNAL_EXIT_BASE = 128;

export interface RunCommandOptions {
  /** Keep trailing newlines in the captured output */
  preserveNewlines?: boolean;
  /** Data for the command's stdin; by default stdin is inherited */
  input?: string | Uint8Array;
  timeoutMs?: number;
  onDebug?: (message: string) => void;
}

interface ExitInfo {
  exitCode?: number;
  signal?: string;
  timedOut: boolean;
}

function signalNumber(signal: string): number {
  const table: Array<[string, number]> = Object.entries(constants.signals);
  return table.find(([name]) => name === signal)?.[1] ?? 0;
}

/**
 * Shell-style exit status: the exit code, or 128+N for signal N
 */
export function exitStatusOf(info: ExitInfo): number {
  if (info.timedOut) {
    return TIMEOUT_EXIT_STATUS;
  }
  if (info.exitCode !== undefined) {
    return info.exitCode;
  }
  if (info.signal !== undefined) {
    return SIGNAL_EXIT_BASE + signalNumber(info.signal);
  }
  return NOT_STARTED_EXIT_STATUS;
}

function captureStream(stream: Readable, path: string, chomp: boolean): Promise<void> {
  const file = createWriteStream(path);
  return chomp ? pipeline(stream, createChompStream(), file) : pipeline(stream, file);
}

/**
 * Run a command with stdout and stderr captured into the given artifact files,
 * then write its exit status into the status file. Returns the exit status.
 */
export async function runCommand(
  command: string[],
  files: CaptureFiles,
  options: RunCommandOptions = {}
): Promise<number> {
  const debug = options.onDebug ?? (() => {});
  const chomp = !options.preserveNewlines;
  const [file, ...args] = command;

  debug(`Running test command: ${command.join(' ')}`);

  const subprocess = options.input === undefined
    ? execa(file, args, { stdin: 'inherit', reject: false, buffer: false, timeout: options.timeoutMs })
    : execa(file, args, { input: options.input, reject: false, buffer: false, timeout: options.timeoutMs });

  const captures = Promise.allSettled([
    captureStream(subprocess.stdout, files.stdoutPath, chomp),
    captureStream(subprocess.stderr, files.stderrPath, chomp),
  ]);

  const result = await subprocess;
  const settled = await captures;
  const status = exitStatusOf(result);

  if (status === NOT_STARTED_EXIT_STATUS && result.exitCode === undefined) {
    // Nothing ran, so torn-down capture streams carry no output to lose
    await appendFile(files.stderrPath, `${file}: command could not be started${chomp ? '' : '\n'}`);
  } else {
    for (const capture of settled) {
      if (capture.status === 'rejected') {
        throw capture.reason;
      }
    }
  }

  await writeFile(files.statusPath, `${status}\n`);
  debug(`Exit status: ${status}`);
  return status;
}
