/**
 * Scan module - listing, concurrent hashing and duplicate grouping
 */

export { listEntries, assertDirectory, classifyKind } from './entry-lister.js';
export { hashEntries, type DispatchOptions, type Fingerprinter } from './dispatcher.js';
export { filterDuplicates, mergeDuplicateClasses, countDuplicateFiles } from './grouper.js';
export { scan, type ScanOptions } from './scan.js';
