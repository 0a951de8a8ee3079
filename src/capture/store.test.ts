import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InternalError } from '../errors.js';
import { allocateCapture, getCaptureFiles } from './store.js';

describe('getCaptureFiles', () => {
  it('derives the three artifact paths', () => {
    expect(getCaptureFiles('/out/test00')).toEqual({
      stdoutPath: '/out/test00.out',
      stderrPath: '/out/test00.err',
      statusPath: '/out/test00.ret',
    });
  });
});

describe('allocateCapture', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cmdprobe-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reserves consecutive candidates', async () => {
    const first = await allocateCapture(dir);
    const second = await allocateCapture(dir);
    expect(first.stdoutPath).toBe(join(dir, 'test00.out'));
    expect(second.stdoutPath).toBe(join(dir, 'test01.out'));
    expect(await readFile(first.statusPath, 'utf-8')).toBe('');
  });

  it('skips a candidate when any of its files exists', async () => {
    await writeFile(join(dir, 'run00.ret'), '0\n');
    const files = await allocateCapture(dir, 'run');
    expect(files.stderrPath).toBe(join(dir, 'run01.err'));
  });

  it('creates the directory', async () => {
    const nested = join(dir, 'a', 'b');
    const files = await allocateCapture(nested);
    expect(files.stdoutPath).toBe(join(nested, 'test00.out'));
  });

  it('fails after the last candidate', async () => {
    for (let i = 0; i < 100; i++) {
      await writeFile(join(dir, `x${String(i).padStart(2, '0')}.out`), '');
    }
    await expect(allocateCapture(dir, 'x')).rejects.toThrow(
      new InternalError(`Could not determine a unique file name after 100 attempts: '${join(dir, 'x')}'`)
    );
  });
});
