import { basename, join, resolve } from 'node:path';

import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { formatCompactTimestamp } from '../lib/timestamp.js';
import { parseRetentionStrategy } from '../lib/validation.js';
import { ensureDirectory, relocateFile } from '../storage/index.js';
import type {
  DuplicateMap,
  FileRecord,
  ProgressListener,
  ResolutionResult
} from '../types/index.js';

import { selectSurvivor } from './strategies.js';

export interface ResolveOptions {
  /** Directory that receives the duplicates_<timestamp> folder; defaults to QUARANTINE_DIR or cwd */
  quarantineRoot?: string;
  /** Clock used for the folder name */
  now?: Date;
  onProgress?: ProgressListener;
}

export function quarantineFolderName(now: Date): string {
  return `duplicates_${formatCompactTimestamp(now)}`;
}

/**
 * Keep one file per duplicate class and move the others into a quarantine folder.
 *
 * The folder is created on the first move of the run. A candidate whose
 * basename is already taken in the folder stays where it is, and so does one
 * whose move fails; neither is counted.
 *
 * @param classes - Duplicate classes; arrays are not reordered
 * @param strategy - Retention strategy token, unknown values mean `oldest`
 */
export async function resolveDuplicates(
  classes: DuplicateMap,
  strategy: string = 'oldest',
  options: ResolveOptions = {}
): Promise<ResolutionResult> {
  const retention = parseRetentionStrategy(strategy);
  const quarantineRoot = resolve(options.quarantineRoot ?? env.QUARANTINE_DIR ?? process.cwd());
  const quarantineFolder = join(quarantineRoot, quarantineFolderName(options.now ?? new Date()));

  let folderReady = false;
  let movedCount = 0;
  let movedBytes = 0;
  const movedRecords: FileRecord[] = [];

  const total = classes.size;
  let completed = 0;

  for (const members of classes.values()) {
    const { survivor, redundant } = selectSurvivor(members, retention);
    logger.debug({ survivor: survivor?.path, redundant: redundant.length }, 'Resolving duplicate class');

    for (const record of redundant) {
      const destination = join(quarantineFolder, basename(record.path));

      try {
        if (!folderReady) {
          await ensureDirectory(quarantineFolder);
          folderReady = true;
        }

        const outcome = await relocateFile(record.path, destination);
        if (outcome === 'collision') {
          logger.debug({ path: record.path, destination }, 'Name taken in quarantine, leaving in place');
          continue;
        }

        movedCount++;
        movedBytes += record.size;
        movedRecords.push(record);
      } catch (error) {
        logger.debug({ path: record.path, error: describeError(error) }, 'Move failed, leaving in place');
      }
    }

    completed++;
    options.onProgress?.({ phase: 'resolving', completed, total });
  }

  logger.info({ strategy: retention, movedCount, movedBytes, quarantineFolder }, 'Duplicates resolved');

  return { movedCount, movedBytes, movedRecords, quarantineFolder };
}
