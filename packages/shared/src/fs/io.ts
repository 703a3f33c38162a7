import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra/esm';

/**
 * Creates the parent directory of `path` if it does not exist.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Returns an unused file name in the same directory as `path`, so a later rename onto
 * `path` stays on one filesystem.
 */
export async function siblingTempPath(path: string): Promise<string> {
  await ensureDir(path);
  return tmpName({ tmpdir: dirname(path), prefix: '.filewarden', postfix: 'tmp' });
}

/**
 * Moves a fully written `tempPath` over `path` in one rename.
 */
export async function replaceFile(tempPath: string, path: string): Promise<void> {
  await fs.rename(tempPath, path);
}

/**
 * Removes a file, ignoring a file that is already gone.
 */
export async function removeIfExists(path: string): Promise<void> {
  await fs.rm(path, { force: true });
}
