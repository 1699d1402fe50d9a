import pLimit from 'p-limit';

import { env } from '../config/index.js';
import { fingerprintEntry } from '../hash/fingerprint.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type {
  DuplicateMap,
  FileRecord,
  FingerprintMaps,
  ListedEntry,
  ProgressListener
} from '../types/index.js';

export type Fingerprinter = (entry: ListedEntry) => Promise<FileRecord | null>;

export interface DispatchOptions {
  /** Worker pool size, defaults to the configured HASH_WORKERS */
  concurrency?: number;
  onProgress?: ProgressListener;
  /** Replaces the hash engine, mainly for tests */
  fingerprint?: Fingerprinter;
}

function addRecord(map: DuplicateMap, record: FileRecord): void {
  const members = map.get(record.fingerprint);
  if (members) {
    members.push(record);
  } else {
    map.set(record.fingerprint, [record]);
  }
}

/**
 * Fingerprint every entry on a bounded pool and merge the results by kind.
 *
 * Tasks share nothing; each result is merged only after its task settles.
 * A task that throws or yields null is dropped without affecting the others.
 */
export async function hashEntries(
  entries: readonly ListedEntry[],
  options: DispatchOptions = {}
): Promise<FingerprintMaps> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? env.hashWorkers));
  const fingerprint = options.fingerprint ?? fingerprintEntry;
  const limit = pLimit(concurrency);

  const maps: FingerprintMaps = { image: new Map(), generic: new Map() };
  const total = entries.length;
  let completed = 0;
  let excluded = 0;

  await Promise.all(
    entries.map(entry =>
      limit(async () => {
        let record: FileRecord | null = null;
        try {
          record = await fingerprint(entry);
        } catch (error) {
          logger.debug({ path: entry.path, error: describeError(error) }, 'Hashing task failed');
        }

        if (record) {
          addRecord(maps[record.kind], record);
        } else {
          excluded++;
        }

        completed++;
        options.onProgress?.({ phase: 'hashing', completed, total });
      })
    )
  );

  logger.info({ total, excluded, concurrency }, 'Hashing finished');

  return maps;
}
