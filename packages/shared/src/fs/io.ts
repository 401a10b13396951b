import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureParentDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a temp file in the target's directory and renames it into
 * place, so readers see either the old or the new content. The temp file is
 * removed if the write or rename fails.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureParentDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Reads a UTF-8 file, returning `undefined` when it does not exist.
 * Other read errors propagate.
 */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
