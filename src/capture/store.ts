import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InternalError } from '../errors.js';
import { DEFAULT_CAPTURE_NAME, type CaptureFiles } from '../types/index.js';

export const MAX_CAPTURE_CANDIDATES = 100;

/**
 * Get the artifact paths for a candidate base path
 */
export function getCaptureFiles(basePath: string): CaptureFiles {
  return {
    stdoutPath: `${basePath}.out`,
    stderrPath: `${basePath}.err`,
    statusPath: `${basePath}.ret`,
  };
}

/**
 * Reserve a fresh set of artifact files under `dir`.
 *
 * Candidates are `<name>00` to `<name>99`; the first one whose three files are all
 * absent is claimed by creating them empty, so the next call moves on.
 */
export async function allocateCapture(
  dir: string,
  baseName: string = DEFAULT_CAPTURE_NAME
): Promise<CaptureFiles> {
  await mkdir(dir, { recursive: true });

  for (let i = 0; i < MAX_CAPTURE_CANDIDATES; i++) {
    const files = getCaptureFiles(join(dir, `${baseName}${String(i).padStart(2, '0')}`));
    const paths = [files.stdoutPath, files.stderrPath, files.statusPath];
    if (paths.some((path) => existsSync(path))) {
      continue;
    }
    for (const path of paths) {
      await writeFile(path, '', { flag: 'wx' });
    }
    return files;
  }

  throw new InternalError(
    `Could not determine a unique file name after ${MAX_CAPTURE_CANDIDATES} attempts: '${join(dir, baseName)}'`
  );
}
