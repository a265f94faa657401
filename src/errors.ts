/**
 * Error classification codes. Every one of them ends the run with exit code 1.
 */
export type ErrorCode = 'UsageError' | 'ResolutionError' | 'IOError' | 'DatabaseError';

export interface CollwatchErrorOptions {
  cause?: unknown;
}

/**
 * Base error for everything collwatch raises on purpose.
 */
export class CollwatchError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: CollwatchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

/**
 * Bad or missing command-line input. Raised before the database is contacted.
 */
export class UsageError extends CollwatchError {
  constructor(message: string, options: CollwatchErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * No LC_COLLATE file exists for a locale under either naming convention.
 */
export class LocaleNotFoundError extends CollwatchError {
  public readonly locale: string;
  public readonly candidates: string[];

  constructor(locale: string, candidates: string[]) {
    super('ResolutionError', `No LC_COLLATE file found for locale "${locale}" (tried ${candidates.join(', ')})`);
    this.locale = locale;
    this.candidates = candidates;
  }
}

/**
 * A locale file could not be stat'ed, opened or fully read.
 */
export class ProbeError extends CollwatchError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('IOError', `Failed to read ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

/**
 * A catalog query or plan statement failed on the server.
 */
export class DatabaseError extends CollwatchError {
  constructor(message: string, options: CollwatchErrorOptions = {}) {
    super('DatabaseError', message, options);
  }
}

export function isCollwatchError(error: unknown): error is CollwatchError {
  return error instanceof CollwatchError;
}
