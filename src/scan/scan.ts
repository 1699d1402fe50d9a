import { logger } from '../lib/logger.js';
import type { ScanResult } from '../types/index.js';

import { hashEntries, type DispatchOptions } from './dispatcher.js';
import { assertDirectory, listEntries } from './entry-lister.js';
import { filterDuplicates } from './grouper.js';

export type ScanOptions = DispatchOptions;

/**
 * Find duplicate classes below a directory.
 *
 * Lists the whole tree first, fingerprints every entry on the worker pool,
 * then keeps only fingerprints shared by two or more files.
 *
 * @throws InvalidDirectoryError before any scanning when the root is unusable
 */
export async function scan(directory: string, options: ScanOptions = {}): Promise<ScanResult> {
  const root = await assertDirectory(directory);

  const entries = await listEntries(root);
  logger.info({ root, entries: entries.length }, 'Directory listed');

  const maps = await hashEntries(entries, options);

  const result: ScanResult = {
    imageDuplicates: filterDuplicates(maps.image),
    genericDuplicates: filterDuplicates(maps.generic)
  };

  logger.info(
    {
      root,
      imageClasses: result.imageDuplicates.size,
      genericClasses: result.genericDuplicates.size
    },
    'Duplicate scan finished'
  );

  return result;
}
