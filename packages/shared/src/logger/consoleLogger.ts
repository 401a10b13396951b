import type { ScanEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and structured events */
  verbose?: boolean;
}

/**
 * Console-backed logger. Info, warnings and errors go to stderr; debug output
 * and structured events appear only in verbose mode.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: ScanEvent): void {
    if (this.verbose) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: ScanEvent, message: string): void {
    if (this.verbose) {
      console.debug(message, JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

/**
 * Prefixes messages with `[k=v ...]` bindings and forwards to a base logger.
 */
export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: ScanEvent) {
    return this.base.log(event);
  }

  trace(event: ScanEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
