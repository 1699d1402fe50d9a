import { availableParallelism } from 'node:os';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

/**
 * Upper bound on hashing workers when HASH_WORKERS is not set.
 */
export const MAX_DEFAULT_HASH_WORKERS = 8;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  HASH_WORKERS: z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? undefined : Number(value)))
    .pipe(
      z
        .number()
        .int()
        .min(1)
        .max(64)
        .optional()
        .describe('HASH_WORKERS must be within 1-64')
    ),
  QUARANTINE_DIR: z
    .string()
    .min(1, 'QUARANTINE_DIR must not be empty')
    .optional()
    .describe('Directory in which duplicates_<timestamp> folders are created'),
  EXIF_TASK_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(z.number().int().min(1000).describe('EXIF_TASK_TIMEOUT_MS must be >= 1000ms'))
});

export type RawEnvironment = z.infer<typeof envSchema>;

/**
 * Pool size used when nothing is configured: min(8, available parallelism), never below 1.
 */
export function defaultHashWorkers(parallelism: number = availableParallelism()): number {
  return Math.max(1, Math.min(MAX_DEFAULT_HASH_WORKERS, parallelism));
}

export function parseEnvironment(source: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  const data = parseResult.data;

  return {
    ...data,
    hashWorkers: data.HASH_WORKERS ?? defaultHashWorkers(),
    isDevelopment: data.NODE_ENV === 'development',
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test'
  };
}

export const env = parseEnvironment(process.env);

export type AppEnvironment = typeof env;
