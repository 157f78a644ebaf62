/**
 * Raised when configuration (environment, rules file or rule patterns)
 * cannot be turned into a usable monitor. Always fatal at startup.
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the tail source fails. Fatal to the ingestion pipeline;
 * restarting is left to whatever supervises the process.
 */
export class TailSourceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TailSourceError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
