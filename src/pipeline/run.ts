import { writeAuditLog } from '../audit/run-log.js';
import { classify } from '../classify/classifier.js';
import { RunCancelledError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { Task } from '../lib/validation.js';
import type { CaptureDateReader } from '../metadata/exif.js';
import { resolveDuplicates } from '../retention/resolver.js';
import { assertDirectory } from '../scan/entry-lister.js';
import { countDuplicateFiles, mergeDuplicateClasses } from '../scan/grouper.js';
import { scan } from '../scan/scan.js';
import type { ClassificationTally, ProgressListener } from '../types/index.js';

export interface PipelineOptions {
  directory: string;
  /** Defaults to `organize` */
  task?: Task;
  /** Retention strategy token, unknown values mean `oldest` */
  strategy?: string;
  /** Classification mode token, unknown values mean `date` */
  mode?: string;
  /** Checked between phases only; running hashes always complete */
  signal?: AbortSignal;
  /** Write a plain-text audit log when files were moved */
  auditLog?: boolean;
  auditLogDirectory?: string;
  quarantineRoot?: string;
  concurrency?: number;
  readCaptureDate?: CaptureDateReader;
  onProgress?: ProgressListener;
}

export interface DeduplicationSummary {
  totalDuplicateFiles: number;
  duplicateClasses: number;
  movedCount: number;
  movedBytes: number;
  /** null when no duplicates were found */
  quarantineFolder: string | null;
  auditLogPath: string | null;
}

export type RunOutcome =
  | {
      status: 'completed';
      directory: string;
      deduplication?: DeduplicationSummary;
      classification?: ClassificationTally;
    }
  | { status: 'cancelled'; directory: string };

function checkpoint(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new RunCancelledError(phase);
  }
}

async function deduplicate(root: string, options: PipelineOptions): Promise<DeduplicationSummary> {
  const { imageDuplicates, genericDuplicates } = await scan(root, {
    concurrency: options.concurrency,
    onProgress: options.onProgress
  });

  checkpoint(options.signal, 'duplicate resolution');

  const classes = mergeDuplicateClasses(imageDuplicates, genericDuplicates);
  const totalDuplicateFiles = countDuplicateFiles(classes);

  if (totalDuplicateFiles === 0) {
    logger.info({ root }, 'No duplicate files found');
    return {
      totalDuplicateFiles: 0,
      duplicateClasses: 0,
      movedCount: 0,
      movedBytes: 0,
      quarantineFolder: null,
      auditLogPath: null
    };
  }

  const resolution = await resolveDuplicates(classes, options.strategy, {
    quarantineRoot: options.quarantineRoot,
    onProgress: options.onProgress
  });

  const auditLogPath = options.auditLog
    ? await writeAuditLog(
        { ...resolution, scannedDirectory: root },
        { directory: options.auditLogDirectory }
      ).catch((error: unknown) => {
        logger.warn({ root, error: describeError(error) }, 'Audit log could not be written');
        return null;
      })
    : null;

  return {
    totalDuplicateFiles,
    duplicateClasses: classes.size,
    movedCount: resolution.movedCount,
    movedBytes: resolution.movedBytes,
    quarantineFolder: resolution.quarantineFolder,
    auditLogPath
  };
}

/**
 * Run deduplication, classification, or deduplication followed by classification.
 *
 * Cancellation is cooperative: the signal is checked before deduplication,
 * between scanning and moving, and before classification.
 *
 * @throws InvalidDirectoryError before anything runs when the root is unusable
 */
export async function runPipeline(options: PipelineOptions): Promise<RunOutcome> {
  const root = await assertDirectory(options.directory);
  const task = options.task ?? 'organize';

  try {
    let deduplication: DeduplicationSummary | undefined;
    let classification: ClassificationTally | undefined;

    if (task === 'deduplicate' || task === 'both') {
      checkpoint(options.signal, 'deduplication');
      deduplication = await deduplicate(root, options);
    }

    if (task === 'organize' || task === 'both') {
      checkpoint(options.signal, 'classification');
      classification = await classify(root, options.mode, {
        readCaptureDate: options.readCaptureDate,
        concurrency: options.concurrency,
        onProgress: options.onProgress
      });
    }

    return { status: 'completed', directory: root, deduplication, classification };
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.info({ root, reason: error.message }, 'Run cancelled');
      return { status: 'cancelled', directory: root };
    }
    throw error;
  }
}
