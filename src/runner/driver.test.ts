import { mkdtemp, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildChildEnv, detailFiles, includedFunctions, runAll, runScript, type DriverOptions } from './driver.js';

const fixture = (name: string) => fileURLToPath(new URL(`./__fixtures__/${name}.cmdtest.ts`, import.meta.url));

function collector() {
  const chunks: string[] = [];
  return {
    write: (chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
    },
    text: () => chunks.join(''),
  };
}

describe('detailFiles', () => {
  it('collects marker paths once, in order', () => {
    const stderr = [
      'noise',
      'For details, see: /tmp/a.err',
      'For details, see: /tmp/b.out',
      'For details, see: /tmp/a.err',
      'TEST ERROR: something',
    ].join('\n');
    expect(detailFiles(stderr)).toEqual(['/tmp/a.err', '/tmp/b.out']);
  });
});

describe('includedFunctions', () => {
  it('keeps the names mapped to the script', () => {
    const include = new Map([
      ['test_a', '/work/a.cmdtest.ts'],
      ['test_b', './b.cmdtest.ts'],
      ['test_c', '/work/a.cmdtest.ts'],
    ]);
    expect(includedFunctions(include, '/work/a.cmdtest.ts', '/work')).toEqual(['test_a', 'test_c']);
    expect(includedFunctions(include, 'b.cmdtest.ts', '/work')).toEqual(['test_b']);
    expect(includedFunctions(undefined, '/work/a.cmdtest.ts', '/work')).toEqual([]);
  });
});

describe('buildChildEnv', () => {
  it('sets every script variable explicitly', () => {
    const env = buildChildEnv(
      '/work/a.cmdtest.ts',
      {
        cwd: '/work',
        env: { PATH: '/bin', TEST_INCLUDE_SUBTESTS: 'stale' },
        outDir: 'out',
        timeoutMs: 500,
        ignore: { stderr: true },
        preload: ['setup.ts'],
      },
      { TOKEN: 'test-token' }
    );
    expect(env).toMatchObject({
      PATH: '/bin',
      TOKEN: 'test-token',
      TEST_DEBUG: '',
      TEST_OUT_DIR: '/work/out',
      TEST_NAME: 'test',
      TEST_IGNORE_STDOUT: '',
      TEST_IGNORE_STDERR: '1',
      TEST_IGNORE_STATUS: '',
      TEST_TIMEOUT_MS: '500',
      TEST_FUNC_PATTERN: 'test_*',
      TEST_INCLUDE_SUBTESTS: '',
      TEST_PRELOAD: '/work/setup.ts',
      TEST_SOURCE_PATH: '/work/a.cmdtest.ts',
      TEST_SOURCE_DIR: '/work',
      TEST_LIST_ONLY: '',
    });
  });
});

describe('runScript', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'cmdprobe-driver-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  function options(out: ReturnType<typeof collector>, err: ReturnType<typeof collector>): DriverOptions {
    return { outDir, write: out.write, writeError: err.write, color: false };
  }

  it('reports a passing script', async () => {
    const out = collector();
    const err = collector();
    const path = fixture('pass');

    const result = await runScript(path, options(out, err));

    expect(result).toEqual({ path, exitCode: 0 });
    const lines = out.text().split('\n');
    expect(lines[0]).toBe(`# [RUNNING: ${path}]`);
    expect(lines).toContain('# Subtest 1 - test_echo');
    expect(lines).toContain('  # Subtest 1 - prints hello');
    expect(lines).toContain('    ok 1 - exit status');
    expect(lines).toContain('ok 1 - test_echo');
    expect(lines).toContain('ok 2 - test_status');
    expect(lines).not.toContain('# Subtest 3 - helper_not_collected');
    expect(lines.at(-2)).toBe(`All tests passed in: '${path}'`);
  });

  it('shows the diff and replays artifacts of a failing script', async () => {
    const out = collector();
    const err = collector();
    const path = fixture('fail');

    const result = await runScript(path, options(out, err));

    expect(result.exitCode).toBe(1);
    const text = out.text();
    expect(text).toContain('    not ok 2 - stdout\n');
    expect(text).toContain('    #   -world\n');
    expect(text).toContain('    #   +hello\n');
    expect(text).toContain('  not ok 1 - expects world\n');
    expect(text).toContain('not ok 1 - test_mismatch\n');
    expect(text).toContain('ok 2 - test_match\n');
    expect(text).toContain(`Some tests failed in: '${path}'\n`);
    expect(text).toContain(`-----[${join(outDir, 'test00.out')}]\nhello\n-----\n`);
    expect(err.text()).toContain(`For details, see: ${join(outDir, 'test00.out')}\n`);
  });

  it('runs a script reached through a symbolic link', async () => {
    const out = collector();
    const err = collector();
    const link = join(outDir, 'linked.cmdtest.ts');
    await symlink(fixture('fail'), link);

    const result = await runScript(link, options(out, err));

    expect(result).toEqual({ path: link, exitCode: 1 });
    const text = out.text();
    expect(text).toContain('not ok 1 - test_mismatch\n');
    expect(text).toContain('ok 2 - test_match\n');
    expect(text).toContain(`Some tests failed in: '${link}'\n`);
  });

  it('lists test functions without running them', async () => {
    const out = collector();
    const err = collector();
    const path = fixture('pass');

    const result = await runScript(path, { ...options(out, err), list: true });

    expect(result.exitCode).toBe(0);
    expect(out.text()).toBe(`# [RUNNING: ${path}]\ntest_echo\ntest_status\n`);
  });

  it('runs only the included functions', async () => {
    const out = collector();
    const err = collector();
    const path = fixture('pass');

    const result = await runScript(path, { ...options(out, err), include: new Map([['test_status', path]]) });

    expect(result.exitCode).toBe(0);
    const lines = out.text().split('\n');
    expect(lines).toContain('# Subtest 1 - test_status');
    expect(lines).not.toContain('# Subtest 1 - test_echo');
  });

  it('fails a script whose included function does not exist', async () => {
    const out = collector();
    const err = collector();
    const path = fixture('pass');

    const result = await runScript(path, { ...options(out, err), include: new Map([['test_nope', path]]) });

    expect(result.exitCode).toBe(3);
    expect(err.text()).toContain(
      `TEST ERROR: 'test_nope': Subtest in inclusion list not found in script: '${path}'\n`
    );
    expect(out.text()).toContain('Test script did not finish gracefully.\n');
  });

  it('aborts on a malformed assert call', async () => {
    const out = collector();
    const err = collector();

    const result = await runScript(fixture('usage'), options(out, err));

    expect(result.exitCode).toBe(3);
    expect(err.text()).toContain('TEST ERROR: Please specify a command to test.\n');
  });

  it('detects a script that exits before finishing', async () => {
    const out = collector();
    const err = collector();

    const result = await runScript(fixture('abort'), options(out, err));

    expect(result.exitCode).toBe(3);
    expect(err.text()).toContain('ERROR: Test script execution failed.\n');
    expect(out.text()).toContain(`-----[${join(outDir, 'test00.err')}]\noops\n-----\n`);
  });

  it('passes hook output to the script environment', async () => {
    const out = collector();
    const err = collector();

    const result = await runScript(fixture('env'), {
      ...options(out, err),
      hooks: [{ cmd: ['sh', '-c', 'echo \'{"GREETING":"from-hook"}\''] }],
    });

    expect(result.exitCode).toBe(0);
  });

  it('fails the script when a hook fails', async () => {
    const out = collector();
    const err = collector();

    const result = await runScript(fixture('env'), {
      ...options(out, err),
      hooks: [{ cmd: ['sh', '-c', 'exit 4'] }],
    });

    expect(result.exitCode).toBe(3);
    expect(err.text()).toContain('TEST ERROR: Hook failed (exit code 4): sh -c exit 4\n');
  });

  it('reports a missing script', async () => {
    const out = collector();
    const err = collector();
    const path = join(outDir, 'missing.cmdtest.ts');

    const result = await runScript(path, options(out, err));

    expect(result.exitCode).toBe(3);
    expect(err.text()).toBe(`TEST ERROR: Test script not found: '${path}'\n`);
    expect(out.text()).toBe('');
  });
});

describe('runAll', () => {
  it('exits 1 when any script fails', async () => {
    const out = collector();
    const outDir = await mkdtemp(join(tmpdir(), 'cmdprobe-runall-'));
    try {
      const result = await runAll([fixture('pass'), fixture('fail')], {
        outDir,
        write: out.write,
        writeError: () => {},
      });
      expect(result.exitCode).toBe(1);
      expect(result.results.map((r) => r.exitCode)).toEqual([0, 1]);
    } finally {
      await rm(outDir, { recursive: true, force: true });
    }
  });
});
