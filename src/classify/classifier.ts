import { join } from 'node:path';

import pLimit from 'p-limit';

import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { formatLocalDate } from '../lib/timestamp.js';
import { parseClassificationMode } from '../lib/validation.js';
import { readCaptureDate, type CaptureDateReader } from '../metadata/exif.js';
import { assertDirectory, classifyKind, listEntries } from '../scan/entry-lister.js';
import { ensureDirectory, pathExists, relocateFile } from '../storage/index.js';
import type { ClassificationTally, ListedEntry, ProgressListener } from '../types/index.js';

import { deriveClassificationKey } from './keys.js';

export interface ClassifyOptions {
  /** Capture date lookup, exiftool by default */
  readCaptureDate?: CaptureDateReader;
  /** Parallel capture date reads, defaults to HASH_WORKERS */
  concurrency?: number;
  onProgress?: ProgressListener;
}

interface DatedImage {
  entry: ListedEntry;
  date: string;
}

/**
 * Memoises key -> folder so each folder is checked and created once per run.
 * A folder that failed to create is remembered as null.
 */
class FolderCache {
  private readonly folders = new Map<string, string | null>();

  constructor(private readonly root: string) {}

  async resolve(key: string): Promise<string | null> {
    const cached = this.folders.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const folder = join(this.root, key);
    let resolved: string | null = folder;
    try {
      if (!(await pathExists(folder))) {
        await ensureDirectory(folder);
      }
    } catch (error) {
      logger.debug({ folder, error: describeError(error) }, 'Could not create classification folder');
      resolved = null;
    }

    this.folders.set(key, resolved);
    return resolved;
  }
}

/**
 * Move every image below `directory` into a folder named after its date or quarter.
 *
 * The capture date comes from EXIF when present, else from the modification
 * time. Same-named files already at the destination are never overwritten; the
 * source is skipped instead. Each image ends up counted as organized or skipped.
 *
 * @param mode - `date` or `quarter`, unknown values mean `date`
 * @throws InvalidDirectoryError before any work when the root is unusable
 */
export async function classify(
  directory: string,
  mode: string = 'date',
  options: ClassifyOptions = {}
): Promise<ClassificationTally> {
  const root = await assertDirectory(directory);
  const classification = parseClassificationMode(mode);
  const reader = options.readCaptureDate ?? readCaptureDate;
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? env.hashWorkers)));

  const images = (await listEntries(root)).filter(entry => classifyKind(entry.name) === 'image');

  // Capture dates are read in parallel; all moves below happen one at a time
  const dated: DatedImage[] = await Promise.all(
    images.map(entry =>
      limit(async () => {
        let captureDate: string | null = null;
        try {
          captureDate = await reader(entry.path);
        } catch (error) {
          logger.debug({ path: entry.path, error: describeError(error) }, 'Capture date lookup failed');
        }
        return { entry, date: captureDate ?? formatLocalDate(entry.modifiedTime) };
      })
    )
  );

  const folders = new FolderCache(root);
  const total = dated.length;
  let organized = 0;
  let skipped = 0;

  for (const { entry, date } of dated) {
    const key = deriveClassificationKey(date, classification);
    const folder = key === null ? null : await folders.resolve(key);

    if (folder === null) {
      skipped++;
    } else {
      try {
        const outcome = await relocateFile(entry.path, join(folder, entry.name));
        if (outcome === 'moved') {
          organized++;
        } else {
          skipped++;
        }
      } catch (error) {
        logger.debug({ path: entry.path, error: describeError(error) }, 'Image move failed');
        skipped++;
      }
    }

    options.onProgress?.({ phase: 'classifying', completed: organized + skipped, total });
  }

  const tally: ClassificationTally = {
    totalImages: total,
    organizedImages: organized,
    skippedImages: skipped
  };
  logger.info({ root, mode: classification, ...tally }, 'Image classification finished');

  return tally;
}
