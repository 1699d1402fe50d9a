import { describe, expect, it } from 'vitest';

import { parseRetentionStrategy, type RetentionStrategy } from '../../src/lib/validation.js';
import { orderForRetention, selectSurvivor } from '../../src/retention/strategies.js';
import type { FileRecord } from '../../src/types/index.js';

function record(path: string, size: number, createdTime: number): FileRecord {
  return { path, size, createdTime, modifiedTime: createdTime, fingerprint: 'same', kind: 'generic' };
}

const middle = record('/a/bb/file.txt', 300, 30);
const early = record('/a/file.txt', 100, 10);
const deep = record('/a/bbbb/cc/file.txt', 200, 20);
const members = [middle, early, deep];

describe('selectSurvivor', () => {
  const expectations: Array<[RetentionStrategy, FileRecord]> = [
    ['oldest', early],
    ['newest', middle],
    ['largest', middle],
    ['smallest', early],
    ['shortest_path', early],
    ['longest_path', deep]
  ];

  it.each(expectations)('keeps the extremal member for %s', (strategy, expected) => {
    const { survivor, redundant } = selectSurvivor(members, strategy);

    expect(survivor).toBe(expected);
    expect(redundant).toHaveLength(2);
    expect(redundant).not.toContain(expected);
  });

  it('keeps incoming order among ties', () => {
    const first = record('/x/one', 50, 5);
    const second = record('/x/two', 50, 5);

    expect(selectSurvivor([first, second], 'largest').survivor).toBe(first);
    expect(selectSurvivor([second, first], 'oldest').survivor).toBe(second);
  });

  it('measures path length in characters rather than UTF-16 units', () => {
    // 11 characters for the plain name, 10 characters (13 units) for the emoji one
    const plain = record('/p/abcd.txt', 1, 1);
    const emoji = record('/p/\u{1F600}\u{1F600}\u{1F600}.txt', 1, 1);

    expect(selectSurvivor([plain, emoji], 'shortest_path').survivor).toBe(emoji);
    expect(selectSurvivor([emoji, plain], 'longest_path').survivor).toBe(plain);
  });

  it('returns no survivor for an empty class', () => {
    expect(selectSurvivor([], 'oldest')).toEqual({ survivor: undefined, redundant: [] });
  });
});

describe('orderForRetention', () => {
  it('sorts a copy and leaves the class untouched', () => {
    const ordered = orderForRetention(members, 'smallest');

    expect(ordered.map(item => item.size)).toEqual([100, 200, 300]);
    expect(members).toEqual([middle, early, deep]);
  });
});

describe('parseRetentionStrategy', () => {
  it('accepts every known token', () => {
    for (const token of ['oldest', 'newest', 'largest', 'smallest', 'shortest_path', 'longest_path']) {
      expect(parseRetentionStrategy(token)).toBe(token);
    }
  });

  it('falls back to oldest for unknown or missing tokens', () => {
    expect(parseRetentionStrategy('biggest')).toBe('oldest');
    expect(parseRetentionStrategy('')).toBe('oldest');
    expect(parseRetentionStrategy(undefined)).toBe('oldest');
    expect(parseRetentionStrategy(42)).toBe('oldest');
  });
});
