export { scan, listEntries, hashEntries, filterDuplicates, mergeDuplicateClasses } from './scan/index.js';
export type { ScanOptions, DispatchOptions, Fingerprinter } from './scan/index.js';
export { computeFileDigest, computePerceptualHash, fingerprintEntry } from './hash/index.js';
export { resolveDuplicates, RETENTION_RULES, selectSurvivor } from './retention/index.js';
export type { ResolveOptions } from './retention/index.js';
export { classify, deriveClassificationKey } from './classify/index.js';
export type { ClassifyOptions } from './classify/index.js';
export { readCaptureDate, closeExifTool } from './metadata/index.js';
export type { CaptureDateReader } from './metadata/index.js';
export { writeAuditLog, formatAuditLog } from './audit/index.js';
export type { AuditReport } from './audit/index.js';
export { runPipeline, formatRunSummary } from './pipeline/index.js';
export type { PipelineOptions, RunOutcome, DeduplicationSummary } from './pipeline/index.js';
export { InvalidDirectoryError, RunCancelledError } from './lib/errors.js';
export {
  parseRetentionStrategy,
  parseClassificationMode,
  type RetentionStrategy,
  type ClassificationMode,
  type Task
} from './lib/validation.js';
export type * from './types/index.js';
export { IMAGE_EXTENSIONS } from './types/index.js';
