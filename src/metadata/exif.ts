/**
 * EXIF capture date lookup
 *
 * Only DateTimeOriginal (EXIF tag 0x9003) is consumed. The date portion is
 * returned as `YYYY-MM-DD`; time and zone are ignored.
 */

import { ExifDateTime, ExifTool } from 'exiftool-vendored';

import { env } from '../config/index.js';
import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export type CaptureDateReader = (path: string) => Promise<string | null>;

/**
 * Singleton exiftool instance
 */
let exiftool: ExifTool | null = null;

/**
 * Get or create exiftool instance
 */
function getExifTool(): ExifTool {
  if (!exiftool) {
    exiftool = new ExifTool({ taskTimeoutMillis: env.EXIF_TASK_TIMEOUT_MS });
  }
  return exiftool;
}

/**
 * Close exiftool instance (call on shutdown)
 */
export async function closeExifTool(): Promise<void> {
  if (exiftool) {
    await exiftool.end();
    exiftool = null;
  }
}

function isoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || year < 1 || month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Normalise a DateTimeOriginal value to `YYYY-MM-DD`.
 *
 * exiftool-vendored hands back an ExifDateTime when it can parse the tag and
 * the raw `YYYY:MM:DD HH:MM:SS` text when it cannot.
 */
export function captureDateFromTag(value: unknown): string | null {
  if (value instanceof ExifDateTime) {
    return isoDate(value.year, value.month, value.day);
  }

  if (typeof value === 'string') {
    const match = /^(\d{4})[:-](\d{2})[:-](\d{2})/.exec(value.trim());
    if (match) {
      return isoDate(Number(match[1]), Number(match[2]), Number(match[3]));
    }
  }

  return null;
}

/**
 * Read the capture date of an image file
 *
 * @returns `YYYY-MM-DD`, or null when the tag is missing or the file unreadable
 */
export const readCaptureDate: CaptureDateReader = async path => {
  try {
    const tags = await getExifTool().read(path);
    return captureDateFromTag(tags.DateTimeOriginal);
  } catch (error) {
    logger.debug({ path, error: describeError(error) }, 'EXIF read failed');
    return null;
  }
};
