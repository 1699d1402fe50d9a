import type { Dirent, Stats } from 'node:fs';
import { lstat, readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { InvalidDirectoryError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { IMAGE_EXTENSIONS, type FileKind, type ListedEntry } from '../types/index.js';

const imageExtensions: ReadonlySet<string> = new Set(IMAGE_EXTENSIONS);

/**
 * Decide the kind of a file from its name alone (case-insensitive extension match)
 */
export function classifyKind(name: string): FileKind {
  return imageExtensions.has(extname(name).toLowerCase()) ? 'image' : 'generic';
}

/**
 * Resolve the root argument to an absolute directory path.
 *
 * @throws InvalidDirectoryError when the path is empty, missing or not a directory
 */
export async function assertDirectory(directory: string): Promise<string> {
  if (directory.trim().length === 0) {
    throw new InvalidDirectoryError(directory, 'no directory given');
  }

  const absolute = resolve(directory);
  let stats: Stats;
  try {
    stats = await stat(absolute);
  } catch (error) {
    throw new InvalidDirectoryError(directory, describeError(error));
  }

  if (!stats.isDirectory()) {
    throw new InvalidDirectoryError(directory, 'not a directory');
  }

  return absolute;
}

function createdTimeOf(stats: Stats): number {
  // birthtime is 0 on filesystems that do not record it
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

/**
 * List every regular file below `root`.
 *
 * Symbolic links are never followed. Directories that cannot be read and
 * entries whose lstat fails are skipped; the walk itself never fails.
 * Order of the result is unspecified.
 */
export async function listEntries(root: string): Promise<ListedEntry[]> {
  const entries: ListedEntry[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined) break;

    let dirents: Dirent[];
    try {
      dirents = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      logger.debug({ directory, error: describeError(error) }, 'Skipping unreadable directory');
      continue;
    }

    for (const dirent of dirents) {
      const path = join(directory, dirent.name);

      if (dirent.isSymbolicLink()) continue;

      if (dirent.isDirectory()) {
        pending.push(path);
        continue;
      }

      if (!dirent.isFile()) continue;

      try {
        const stats = await lstat(path);
        if (!stats.isFile()) continue;

        entries.push({
          path,
          name: dirent.name,
          size: stats.size,
          createdTime: createdTimeOf(stats),
          modifiedTime: stats.mtimeMs
        });
      } catch (error) {
        logger.debug({ path, error: describeError(error) }, 'Skipping entry that could not be stat-ed');
      }
    }
  }

  return entries;
}
