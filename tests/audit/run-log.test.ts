import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { auditLogFileName, formatAuditLog, formatMegabytes, writeAuditLog, type AuditReport } from '../../src/audit/run-log.js';
import type { FileRecord } from '../../src/types/index.js';
import { createTempDir, removeTempDir } from '../helpers/fs-fixtures.js';

const NOW = new Date(2024, 4, 6, 7, 8, 9);

function moved(path: string, size: number): FileRecord {
  return { path, size, createdTime: 0, modifiedTime: 0, fingerprint: 'fp', kind: 'generic' };
}

const report: AuditReport = {
  scannedDirectory: '/photos',
  movedCount: 2,
  movedBytes: 3 * 1024 * 1024,
  movedRecords: [moved('/photos/a/copy.jpg', 1024 * 1024), moved('/photos/b/copy.txt', 2 * 1024 * 1024)],
  quarantineFolder: '/work/duplicates_20240506_070809'
};

describe('formatMegabytes', () => {
  it('renders two decimals', () => {
    expect(formatMegabytes(0)).toBe('0.00 MB');
    expect(formatMegabytes(1572864)).toBe('1.50 MB');
  });
});

describe('formatAuditLog', () => {
  it('lists the run facts followed by every moved path', () => {
    expect(formatAuditLog(report, NOW)).toBe(
      [
        'Duplicate removal log - 2024-05-06 07:08:09',
        'Scanned directory: /photos',
        'Moved files: 2',
        'Moved size: 3.00 MB',
        'Quarantine folder: /work/duplicates_20240506_070809',
        '',
        'Moved file list:',
        '/photos/a/copy.jpg',
        '/photos/b/copy.txt',
        ''
      ].join('\n')
    );
  });
});

describe('writeAuditLog', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir('audit');
  });

  afterEach(async () => {
    await removeTempDir(directory);
  });

  it('writes a timestamped file and returns its path', async () => {
    const path = await writeAuditLog(report, { directory, now: NOW });

    expect(path).toBe(join(directory, 'duplicate_files_log_20240506_070809.txt'));
    expect(auditLogFileName(NOW)).toBe('duplicate_files_log_20240506_070809.txt');
    expect(await readFile(join(directory, auditLogFileName(NOW)), 'utf-8')).toBe(formatAuditLog(report, NOW));
  });

  it('writes nothing when no file was moved', async () => {
    const empty: AuditReport = { ...report, movedCount: 0, movedBytes: 0, movedRecords: [] };

    await expect(writeAuditLog(empty, { directory, now: NOW })).resolves.toBeNull();
  });
});
