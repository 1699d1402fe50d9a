/**
 * Raised before any scanning when the root argument is missing or not a directory.
 * This is the only failure the pipeline reports as a hard error.
 */
export class InvalidDirectoryError extends Error {
  public readonly directory: string;

  constructor(directory: string, reason: string) {
    super(`Invalid directory "${directory}": ${reason}`);
    this.name = 'InvalidDirectoryError';
    this.directory = directory;
  }
}

/**
 * Raised at a phase checkpoint once cancellation has been requested.
 */
export class RunCancelledError extends Error {
  constructor(checkpoint: string) {
    super(`Run cancelled before ${checkpoint}`);
    this.name = 'RunCancelledError';
  }
}

/**
 * Narrow an unknown error to a Node.js system error, optionally with a given code.
 */
export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
