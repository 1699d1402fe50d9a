import { writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { formatCompactTimestamp, formatLocalDateTime } from '../lib/timestamp.js';
import type { ResolutionResult } from '../types/index.js';

export interface AuditReport extends ResolutionResult {
  /** Directory that was scanned */
  scannedDirectory: string;
}

export interface WriteAuditLogOptions {
  /** Where the log file goes, defaults to cwd */
  directory?: string;
  now?: Date;
}

/**
 * Bytes as megabytes with two decimals
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function auditLogFileName(now: Date): string {
  return `duplicate_files_log_${formatCompactTimestamp(now)}.txt`;
}

/**
 * Render the plain-text audit log of a deduplication run
 */
export function formatAuditLog(report: AuditReport, now: Date = new Date()): string {
  const lines = [
    `Duplicate removal log - ${formatLocalDateTime(now)}`,
    `Scanned directory: ${report.scannedDirectory}`,
    `Moved files: ${report.movedCount}`,
    `Moved size: ${formatMegabytes(report.movedBytes)}`,
    `Quarantine folder: ${report.quarantineFolder}`,
    '',
    'Moved file list:',
    ...report.movedRecords.map(record => record.path)
  ];

  return `${lines.join('\n')}\n`;
}

/**
 * Write the audit log next to the quarantine folder (or wherever asked).
 *
 * @returns Path of the written file, or null when nothing was moved
 */
export async function writeAuditLog(
  report: AuditReport,
  options: WriteAuditLogOptions = {}
): Promise<string | null> {
  if (report.movedRecords.length === 0) {
    return null;
  }

  const now = options.now ?? new Date();
  const path = join(resolve(options.directory ?? process.cwd()), auditLogFileName(now));
  await writeFile(path, formatAuditLog(report, now), 'utf-8');

  return path;
}
