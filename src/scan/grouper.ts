import type { DuplicateMap } from '../types/index.js';

/**
 * Keep only fingerprints shared by two or more files. Pure; the input is not modified.
 */
export function filterDuplicates(map: DuplicateMap): DuplicateMap {
  const duplicates: DuplicateMap = new Map();

  for (const [fingerprint, members] of map) {
    if (members.length > 1) {
      duplicates.set(fingerprint, members);
    }
  }

  return duplicates;
}

/**
 * Combine image and generic classes into one map for retention.
 * Keys become `<kind>:<fingerprint>` so the two kinds can never merge.
 */
export function mergeDuplicateClasses(
  imageDuplicates: DuplicateMap,
  genericDuplicates: DuplicateMap
): DuplicateMap {
  const merged: DuplicateMap = new Map();

  for (const [fingerprint, members] of imageDuplicates) {
    merged.set(`image:${fingerprint}`, members);
  }
  for (const [fingerprint, members] of genericDuplicates) {
    merged.set(`generic:${fingerprint}`, members);
  }

  return merged;
}

/**
 * Total number of files across all classes
 */
export function countDuplicateFiles(map: DuplicateMap): number {
  let count = 0;
  for (const members of map.values()) {
    count += members.length;
  }
  return count;
}
