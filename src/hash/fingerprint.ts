import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { classifyKind } from '../scan/entry-lister.js';
import type { FileRecord, ListedEntry } from '../types/index.js';

import { computeFileDigest } from './digest.js';
import { computeImageFingerprint } from './perceptual.js';

/**
 * Build the FileRecord for one listed entry.
 *
 * Images get a perceptual fingerprint, everything else an exact digest.
 * Empty files and files that cannot be hashed yield null and drop out.
 */
export async function fingerprintEntry(entry: ListedEntry): Promise<FileRecord | null> {
  if (entry.size === 0) {
    return null;
  }

  const kind = classifyKind(entry.name);

  let fingerprint: string | null;
  try {
    fingerprint =
      kind === 'image' ? await computeImageFingerprint(entry.path) : await computeFileDigest(entry.path);
  } catch (error) {
    logger.debug({ path: entry.path, error: describeError(error) }, 'Fingerprinting failed');
    return null;
  }

  if (!fingerprint) {
    return null;
  }

  return {
    path: entry.path,
    size: entry.size,
    createdTime: entry.createdTime,
    modifiedTime: entry.modifiedTime,
    fingerprint,
    kind
  };
}
