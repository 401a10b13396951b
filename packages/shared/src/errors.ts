/**
 * Error codes used throughout unilist.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'IoError'
  | 'ProcessError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all unilist errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IoError', 'Cannot write whitelist', {
 *   cause: originalError,
 *   details: { path: '.unicode_whitelist.json' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a file cannot be read or written.
 */
export class IoError extends AppError {
  /** Path of the file involved */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('IoError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when the whitelist file holds invalid JSON or a non-object value.
 * The file is left untouched so the existing whitelist is not lost.
 */
export class WhitelistCorruptError extends ConfigError {
  /** Path of the corrupt whitelist file */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super(`Whitelist file ${path} is corrupt: ${message}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when a whitelist update cannot be persisted.
 * The finding that triggered the write has already been reported.
 */
export class WhitelistWriteError extends IoError {
  constructor(path: string, options: AppErrorOptions = {}) {
    super(path, `Failed to write whitelist file ${path}`, options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Maps an error to the process exit status the CLI uses for it.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
