// Core type definitions for duplicate detection and image organization

export type FileKind = 'image' | 'generic';

/**
 * Extensions (lower case, with leading dot) hashed perceptually instead of byte-exactly
 */
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff'] as const;

/**
 * A regular file found during a walk, with the lstat snapshot taken at listing time
 */
export interface ListedEntry {
  path: string;
  name: string;
  size: number;
  // Birth time where the filesystem reports one, otherwise inode change time (ms)
  createdTime: number;
  modifiedTime: number;
}

/**
 * A non-empty file with a computed fingerprint.
 * `path` is where the file was at scan time; the pipeline may move it afterwards.
 */
export interface FileRecord {
  path: string;
  size: number;
  createdTime: number;
  modifiedTime: number;
  fingerprint: string;
  kind: FileKind;
}

/**
 * fingerprint -> files sharing it. Entries with two or more members are duplicate classes.
 */
export type DuplicateMap = Map<string, FileRecord[]>;

export interface FingerprintMaps {
  image: DuplicateMap;
  generic: DuplicateMap;
}

export interface ScanResult {
  imageDuplicates: DuplicateMap;
  genericDuplicates: DuplicateMap;
}

export interface ResolutionResult {
  movedCount: number;
  movedBytes: number;
  movedRecords: FileRecord[];
  quarantineFolder: string;
}

export interface ClassificationTally {
  totalImages: number;
  organizedImages: number;
  skippedImages: number;
}

export type ProgressPhase = 'hashing' | 'resolving' | 'classifying';

export interface ProgressEvent {
  phase: ProgressPhase;
  completed: number;
  total: number;
}

export type ProgressListener = (event: ProgressEvent) => void;
