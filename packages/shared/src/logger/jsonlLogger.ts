import * as fs from 'fs/promises';
import type { ScanEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends scan events to a JSONL trace file and delegates plain messages to
 * another logger. A failed append is reported but never fails the scan.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly delegate: Logger;

  constructor(filePath: string, delegate: Logger) {
    this.filePath = filePath;
    this.delegate = delegate;
  }

  async log(event: ScanEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to trace file at ${this.filePath}`, error);
    }
    await this.delegate.log(event);
  }

  async trace(event: ScanEvent, message: string): Promise<void> {
    await this.log(event);
    await this.delegate.debug(message);
  }

  debug(message: string) {
    return this.delegate.debug(message);
  }

  info(message: string) {
    return this.delegate.info(message);
  }

  warn(message: string) {
    return this.delegate.warn(message);
  }

  error(error: Error, message?: string) {
    return this.delegate.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.delegate.child(bindings));
  }
}
