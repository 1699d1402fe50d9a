import type { ClassificationMode } from '../lib/validation.js';

export type KeyDeriver = (date: string) => string | null;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function parseDate(date: string): { year: number; month: number; day: number } | null {
  const match = DATE_PATTERN.exec(date);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;

  return { year, month, day };
}

/**
 * Quarter of a month, 1-based: Jan-Mar -> 1 ... Oct-Dec -> 4
 */
export function quarterOf(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}

export const KEY_DERIVERS: Readonly<Record<ClassificationMode, KeyDeriver>> = {
  date: date => (parseDate(date) ? date : null),
  quarter: date => {
    const parsed = parseDate(date);
    return parsed ? `${parsed.year}-Q${quarterOf(parsed.month)}` : null;
  }
};

/**
 * Folder key for a `YYYY-MM-DD` date: the date itself, or `YYYY-QN`.
 * Returns null for anything that is not a valid date string.
 */
export function deriveClassificationKey(date: string, mode: ClassificationMode): string | null {
  return KEY_DERIVERS[mode](date);
}
