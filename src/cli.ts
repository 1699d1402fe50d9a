import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';

import { InvalidDirectoryError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import {
  ClassificationModeSchema,
  RetentionStrategySchema,
  TaskSchema,
  WorkerCountSchema,
  parseClassificationMode,
  parseRetentionStrategy,
  type ClassificationMode,
  type RetentionStrategy,
  type Task
} from './lib/validation.js';
import { closeExifTool } from './metadata/exif.js';
import { runPipeline } from './pipeline/run.js';
import { formatRunSummary } from './pipeline/summary.js';

export interface CliOptions {
  directory: string;
  task: Task;
  strategy: RetentionStrategy;
  mode: ClassificationMode;
  workers?: number;
  auditLog: boolean;
}

const parsedOptionsSchema = z.object({
  directory: z.string(),
  function: TaskSchema,
  strategy: z.string(),
  mode: z.string(),
  workers: WorkerCountSchema.optional(),
  auditLog: z.boolean()
});

export function buildProgram(): Command {
  return new Command()
    .name('dedup-organizer')
    .description('Quarantine duplicate files and sort images into date folders')
    .option('-d, --directory <path>', 'directory to process', process.cwd())
    .addOption(
      new Option('-f, --function <task>', 'what to run')
        .choices(TaskSchema.options)
        .default('organize')
    )
    .option(
      '-s, --strategy <name>',
      `which copy to keep (${RetentionStrategySchema.options.join(', ')})`,
      'oldest'
    )
    .option('-m, --mode <mode>', `folder naming (${ClassificationModeSchema.options.join(', ')})`, 'date')
    .option('-w, --workers <count>', 'hashing pool size')
    .option('--no-audit-log', 'do not write the moved-file log')
    .exitOverride();
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Unknown strategy and mode tokens fall back to their defaults.
 *
 * @throws CommanderError for unknown options, bad choices and --help
 */
export function parseCliOptions(argv: string[]): CliOptions {
  const program = buildProgram();
  program.parse(argv, { from: 'user' });

  const raw = parsedOptionsSchema.safeParse(program.opts());
  if (!raw.success) {
    const details = raw.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new CommanderError(1, 'dedup-organizer.invalidOption', `Invalid options: ${details}`);
  }

  return {
    directory: raw.data.directory,
    task: raw.data.function,
    strategy: parseRetentionStrategy(raw.data.strategy),
    mode: parseClassificationMode(raw.data.mode),
    workers: raw.data.workers,
    auditLog: raw.data.auditLog
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'dedup-organizer.invalidOption') {
        process.stderr.write(`${error.message}\n`);
      }
      return error.exitCode;
    }
    throw error;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Cancellation requested, stopping at the next checkpoint');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const outcome = await runPipeline({
      directory: options.directory,
      task: options.task,
      strategy: options.strategy,
      mode: options.mode,
      concurrency: options.workers,
      auditLog: options.auditLog,
      signal: controller.signal,
      onProgress: event => logger.debug(event, 'Progress')
    });

    process.stdout.write(formatRunSummary(outcome));
    return outcome.status === 'cancelled' ? 130 : 0;
  } catch (error) {
    if (error instanceof InvalidDirectoryError) {
      logger.error({ directory: error.directory }, 'Invalid directory');
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', onInterrupt);
    await closeExifTool();
  }
}
