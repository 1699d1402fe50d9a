import { formatMegabytes } from '../audit/run-log.js';

import type { RunOutcome } from './run.js';

const RULE = '='.repeat(50);

/**
 * Human-readable end-of-run summary
 */
export function formatRunSummary(outcome: RunOutcome): string {
  if (outcome.status === 'cancelled') {
    return 'Processing cancelled\n';
  }

  const lines = [RULE, 'Processing complete. Summary:', RULE];

  const { deduplication, classification } = outcome;

  if (deduplication) {
    lines.push(
      '',
      'Deduplication:',
      `- Scanned directory: ${outcome.directory}`,
      `- Duplicate files found: ${deduplication.totalDuplicateFiles}`,
      `- Duplicate groups: ${deduplication.duplicateClasses}`,
      `- Files moved: ${deduplication.movedCount}`,
      `- Moved size: ${formatMegabytes(deduplication.movedBytes)}`
    );
    if (deduplication.quarantineFolder) {
      lines.push(`- Quarantine folder: ${deduplication.quarantineFolder}`);
    }
    if (deduplication.auditLogPath) {
      lines.push(`- Audit log: ${deduplication.auditLogPath}`);
    }
  }

  if (classification) {
    lines.push(
      '',
      'Classification:',
      `- Scanned directory: ${outcome.directory}`,
      `- Images found: ${classification.totalImages}`,
      `- Images organized: ${classification.organizedImages}`,
      `- Images skipped: ${classification.skippedImages}`
    );
  }

  lines.push(RULE);
  return `${lines.join('\n')}\n`;
}
