import { z } from 'zod';

/**
 * Validation schemas for the tokens accepted by the pipeline and CLI
 */

export const RetentionStrategySchema = z.enum([
  'oldest',
  'newest',
  'largest',
  'smallest',
  'shortest_path',
  'longest_path'
]);

export type RetentionStrategy = z.infer<typeof RetentionStrategySchema>;

export const DEFAULT_RETENTION_STRATEGY: RetentionStrategy = 'oldest';

export const ClassificationModeSchema = z.enum(['date', 'quarter']);

export type ClassificationMode = z.infer<typeof ClassificationModeSchema>;

export const DEFAULT_CLASSIFICATION_MODE: ClassificationMode = 'date';

export const TaskSchema = z.enum(['deduplicate', 'organize', 'both']);

export type Task = z.infer<typeof TaskSchema>;

export const WorkerCountSchema = z.coerce.number().int().min(1).max(64);

/**
 * Parse a retention strategy token. Unknown or missing tokens fall back to `oldest`.
 */
export function parseRetentionStrategy(value: unknown): RetentionStrategy {
  return RetentionStrategySchema.catch(DEFAULT_RETENTION_STRATEGY).parse(value);
}

/**
 * Parse a classification mode token. Unknown or missing tokens fall back to `date`.
 */
export function parseClassificationMode(value: unknown): ClassificationMode {
  return ClassificationModeSchema.catch(DEFAULT_CLASSIFICATION_MODE).parse(value);
}
