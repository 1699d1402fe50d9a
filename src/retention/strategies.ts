import type { RetentionStrategy } from '../lib/validation.js';
import type { FileRecord } from '../types/index.js';

export type SortDirection = 'ascending' | 'descending';

export interface RetentionRule {
  key: (record: FileRecord) => number;
  /** ascending keeps the minimum, descending keeps the maximum */
  direction: SortDirection;
}

/** Length in code points, so a character outside the BMP counts once */
function pathLength(record: FileRecord): number {
  return [...record.path].length;
}

export const RETENTION_RULES: Readonly<Record<RetentionStrategy, RetentionRule>> = {
  oldest: { key: record => record.createdTime, direction: 'ascending' },
  newest: { key: record => record.createdTime, direction: 'descending' },
  largest: { key: record => record.size, direction: 'descending' },
  smallest: { key: record => record.size, direction: 'ascending' },
  shortest_path: { key: pathLength, direction: 'ascending' },
  longest_path: { key: pathLength, direction: 'descending' }
};

/**
 * Order class members so the survivor comes first.
 * Returns a new array; ties keep their incoming order.
 */
export function orderForRetention(
  members: readonly FileRecord[],
  strategy: RetentionStrategy
): FileRecord[] {
  const { key, direction } = RETENTION_RULES[strategy];
  const sign = direction === 'ascending' ? 1 : -1;

  return [...members].sort((a, b) => sign * (key(a) - key(b)));
}

/**
 * Split a class into the file that stays and the files to relocate
 */
export function selectSurvivor(
  members: readonly FileRecord[],
  strategy: RetentionStrategy
): { survivor: FileRecord | undefined; redundant: FileRecord[] } {
  const [survivor, ...redundant] = orderForRetention(members, strategy);
  return { survivor, redundant };
}
