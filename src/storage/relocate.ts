/**
 * File relocation without overwrites
 *
 * Used by both the retention resolver and the image classifier. A destination
 * that already exists is reported as a collision and nothing is touched.
 */

import { constants } from 'node:fs';
import { access, copyFile, mkdir, rename, unlink } from 'node:fs/promises';

import { isNodeError } from '../lib/errors.js';

export type RelocationOutcome = 'moved' | 'collision';

/**
 * Check if a path exists (file, directory or dangling link)
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a directory (and parents) if it is missing
 */
export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Move `source` to `destination` unless something already lives there.
 *
 * Renames when source and destination share a filesystem; across devices the
 * file is copied with exclusive create, then the source is unlinked.
 *
 * @returns 'collision' when the destination exists, otherwise 'moved'
 * @throws Any other I/O error (vanished source, permissions, file in use)
 */
export async function relocateFile(source: string, destination: string): Promise<RelocationOutcome> {
  if (await pathExists(destination)) {
    return 'collision';
  }

  try {
    await rename(source, destination);
  } catch (error) {
    if (!isNodeError(error, 'EXDEV')) {
      throw error;
    }

    try {
      await copyFile(source, destination, constants.COPYFILE_EXCL);
    } catch (copyError) {
      if (isNodeError(copyError, 'EEXIST')) {
        return 'collision';
      }
      throw copyError;
    }
    await unlink(source);
  }

  return 'moved';
}
