import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/**
 * Read size for streamed digests
 */
export const DIGEST_BLOCK_SIZE = 8 * 1024;

/**
 * Compute the MD5 digest of a file's bytes.
 *
 * MD5 is enough for telling byte-identical files apart here; it is not used
 * for anything security related.
 *
 * @returns Lowercase hex digest, or null when the file cannot be read
 */
export async function computeFileDigest(path: string): Promise<string | null> {
  const hash = createHash('md5');

  try {
    const stream = createReadStream(path, { highWaterMark: DIGEST_BLOCK_SIZE });
    for await (const block of stream) {
      hash.update(block);
    }
    return hash.digest('hex');
  } catch (error) {
    logger.debug({ path, error: describeError(error) }, 'Digest failed');
    return null;
  }
}
