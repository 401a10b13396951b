import type { ScanEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout unilist.
 * Supports both structured scan events and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ScanStarted', ... });
 * logger.warn('Whitelist entry for a.txt is not an array');
 * const fileLogger = logger.child({ file: 'a.txt' });
 * ```
 */
export interface Logger {
  /** Persist a structured scan event. */
  log(event: ScanEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * Combines structured event data with a human-readable summary.
   */
  trace(event: ScanEvent, message: string): MaybePromise<void>;

  /** Log a debug message (suppressed unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /** Log an error with optional message. */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
