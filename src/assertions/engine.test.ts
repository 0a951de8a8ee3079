import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UsageError } from '../errors.js';
import { Accounting } from '../runner/accounting.js';
import { parseAssertArgs } from './args.js';
import { runAssertion, type AssertionRuntime } from './engine.js';

describe('runAssertion', () => {
  let outDir: string;
  let lines: string[];
  let diagnostics: string[];
  let runtime: AssertionRuntime;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'cmdprobe-engine-'));
    lines = [];
    diagnostics = [];
    runtime = {
      accounting: new Accounting((line) => lines.push(line)),
      outDir,
      onDiagnostic: (line) => diagnostics.push(line),
    };
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) => runAssertion(parseAssertArgs(args), runtime);

  it('passes when every channel matches', async () => {
    const verdict = await run('prints hello', '-o', 'hello', '--', 'echo', 'hello');

    expect(verdict.passed).toBe(true);
    expect(verdict.failedChannels).toEqual([]);
    expect(lines).toEqual([
      '# Subtest 1 - prints hello',
      '  ok 1 - exit status',
      '  ok 2 - stdout',
      '  ok 3 - stderr',
      '  # 3 PASSED, 0 FAILED',
      'ok 1 - prints hello',
      '',
    ]);
    expect(diagnostics).toEqual([]);
    expect(await readFile(join(outDir, 'test00.out'), 'utf-8')).toBe('hello');
    expect(await readFile(join(outDir, 'test00.ret'), 'utf-8')).toBe('0\n');
  });

  it('reports an unexpected stdout with a diff', async () => {
    const verdict = await run('expects world', '-o', 'world', '--', 'echo', 'hello');
    const stdoutPath = join(outDir, 'test00.out');

    expect(verdict.passed).toBe(false);
    expect(verdict.failedChannels).toEqual(['out']);
    expect(lines).toEqual([
      '# Subtest 1 - expects world',
      '  ok 1 - exit status',
      '  not ok 2 - stdout',
      '  #',
      '  # Unexpected stdout:',
      '  #   ----------',
      '  #   --- expected',
      '  #   +++ actual',
      '  #   @@ -1,1 +1,1 @@',
      '  #   -world',
      '  #   +hello',
      '  #   ----------',
      `  #   [See: '${stdoutPath}']`,
      '  #',
      '  ok 3 - stderr',
      '  # 2 PASSED, 1 FAILED',
      'not ok 1 - expects world',
      '',
    ]);
    expect(diagnostics).toEqual([`For details, see: ${stdoutPath}`]);
  });

  it('compares exit statuses numerically and points at stderr', async () => {
    const verdict = await run('fails', '--', 'sh', '-c', 'echo broken >&2; exit 2');

    expect(verdict.exitStatus).toBe(2);
    expect(verdict.failedChannels).toEqual(['ret', 'err']);
    expect(lines).toContain('  not ok 1 - exit status');
    expect(lines).toContain("  # Got exit status '2', expected '0'.");
    expect(diagnostics).toEqual([`For details, see: ${join(outDir, 'test00.err')}`]);
  });

  it('matches the exit status against a pattern', async () => {
    const verdict = await run('any failure', '-rp', '[1-9]', '--', 'sh', '-c', 'exit 3');
    expect(verdict.passed).toBe(true);
  });

  it('notes ignored output without recording it', async () => {
    const verdict = await run('noisy', '-ei', '-ri', '--', 'sh', '-c', 'echo warn >&2; exit 5');
    const stderrPath = join(outDir, 'test00.err');

    expect(verdict.passed).toBe(true);
    expect(lines).toEqual([
      '# Subtest 1 - noisy',
      '  # Ignored exit status: 5.',
      '  ok 1 - stdout',
      `  # Ignored stderr output (see '${stderrPath}').`,
      '  # 1 PASSED, 0 FAILED',
      'ok 1 - noisy',
      '',
    ]);
  });

  it('keeps trailing newlines with -p', async () => {
    const chomped = await run('chomped', '-o', 'a', '--', 'printf', 'a\n\n');
    const preserved = await run('preserved', '-p', '-o', 'a\n\n', '--', 'printf', 'a\n\n');
    const strict = await run('strict', '-p', '-o', 'a', '--', 'printf', 'a\n');

    expect(chomped.passed).toBe(true);
    expect(preserved.passed).toBe(true);
    expect(strict.passed).toBe(false);
    expect(await readFile(preserved.files.stdoutPath, 'utf-8')).toBe('a\n\n');
  });

  it('reads expectations from files', async () => {
    const expectedPath = join(outDir, 'expected.txt');
    await writeFile(expectedPath, 'from file\n');
    const verdict = await run('file', '-O', expectedPath, '--', 'echo', 'from file');
    expect(verdict.passed).toBe(true);
  });

  it('feeds input to the command', async () => {
    const verdict = await runAssertion(parseAssertArgs(['cat', '-o', 'piped', '--', 'cat']), {
      ...runtime,
      input: 'piped',
    });
    expect(verdict.passed).toBe(true);
  });

  it('records a missing command as status 127', async () => {
    const verdict = await run('missing', '-ri', '-ei', '--', 'cmdprobe-no-such-command');
    expect(verdict.exitStatus).toBe(127);
    expect(await readFile(verdict.files.stderrPath, 'utf-8')).toBe(
      'cmdprobe-no-such-command: command could not be started'
    );
  });

  it('gives timed out commands status 124', async () => {
    const verdict = await runAssertion(parseAssertArgs(['slow', '-r', '124', '--', 'sleep', '5']), {
      ...runtime,
      timeoutMs: 100,
    });
    expect(verdict.passed).toBe(true);
  });

  it('rejects an invalid expected status before running anything', async () => {
    await expect(run('bad', '-r', 'zero', '--', 'true')).rejects.toThrow(
      new UsageError("Invalid expected exit status: 'zero'")
    );
    expect(lines).toEqual([]);
  });

  it('rejects an unreadable expectation file', async () => {
    const missing = join(outDir, 'nope.txt');
    await expect(run('bad', '-O', missing, '--', 'true')).rejects.toThrow(
      new UsageError(`Failed to read expected stdout file '${missing}': File not found: '${missing}'`)
    );
  });
});
