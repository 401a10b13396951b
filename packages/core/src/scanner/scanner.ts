import { randomUUID } from 'crypto';
import {
  ConsoleLogger,
  SCAN_EVENT_SCHEMA_VERSION,
  matchesPrefix,
  type ContentSource,
  type Logger,
  type PersistMode,
} from '@unilist/shared';
import type { WhitelistStore } from '../whitelist/store';
import { formatCodePoint, nonAsciiChars } from './codepoints';

/**
 * A code point seen in a file that its whitelist entry does not cover yet.
 */
export interface Finding {
  file: string;
  lineNumber: number;
  /** Lowercase hex, as stored */
  codePoint: string;
  char: string;
}

export interface ScanOptions {
  /** Lines from files under these prefixes are skipped */
  excludePrefixes?: string[];
  /** Add new code points to the whitelist and write it (default true) */
  update?: boolean;
  persist?: PersistMode;
  /** Check each distinct character once per line */
  dedupePerLine?: boolean;
  /**
   * Receives each finding before the whitelist is written, so a failed write
   * never hides a finding.
   */
  onFinding?: (finding: Finding) => void | Promise<void>;
}

export interface ScanResult {
  store: WhitelistStore;
  findings: Finding[];
  /** Non-excluded lines read from the content source */
  linesScanned: number;
  /** Files with at least one finding, in first-seen order */
  filesWithFindings: string[];
  whitelistPath: string;
  /** Whether the whitelist file was written during the scan */
  persisted: boolean;
}

export interface WhitelistScannerOptions {
  logger?: Logger;
  runId?: string;
  now?: () => Date;
}

/**
 * Scans content for non-ASCII code points and reconciles them with a
 * per-file whitelist.
 */
export class WhitelistScanner {
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly now: () => Date;

  constructor(options: WhitelistScannerOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.runId = options.runId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
  }

  async scan(
    source: ContentSource,
    store: WhitelistStore,
    options: ScanOptions = {},
  ): Promise<ScanResult> {
    const excludePrefixes = options.excludePrefixes ?? [];
    const update = options.update ?? true;
    const persistMode = options.persist ?? 'per-finding';

    const findings: Finding[] = [];
    const filesWithFindings = new Set<string>();
    let linesScanned = 0;
    let persisted = false;

    const persist = async (details?: Record<string, unknown>) => {
      await store.persist(details);
      persisted = true;
      await this.logger.log({
        ...this.eventBase(),
        type: 'WhitelistPersisted',
        payload: { path: store.path, fileCount: store.fileCount },
      });
    };

    await this.logger.log({
      ...this.eventBase(),
      type: 'ScanStarted',
      payload: { whitelistPath: store.path, source: source.name, excludePrefixes, update },
    });

    if (update && persistMode === 'per-finding' && !store.exists) {
      await persist();
    }

    for await (const line of source.lines()) {
      if (matchesPrefix(line.file, excludePrefixes)) {
        continue;
      }
      linesScanned++;

      for (const ch of nonAsciiChars(line.text, { dedupe: options.dedupePerLine })) {
        await store.warnMalformed(line.file);
        if (store.has(line.file, ch.hex)) {
          continue;
        }

        const finding: Finding = {
          file: line.file,
          lineNumber: line.lineNumber,
          codePoint: ch.hex,
          char: ch.char,
        };
        findings.push(finding);
        filesWithFindings.add(finding.file);

        await options.onFinding?.(finding);
        await this.logger.trace(
          {
            ...this.eventBase(),
            type: 'FindingRecorded',
            payload: {
              file: finding.file,
              lineNumber: finding.lineNumber,
              codePoint: finding.codePoint,
            },
          },
          `New code point ${formatCodePoint(finding.codePoint)} in ${finding.file}:${finding.lineNumber}`,
        );

        // Recorded in memory even in check mode so a repeat is reported once.
        await store.add(finding.file, finding.codePoint);
        if (update && persistMode === 'per-finding') {
          await persist({
            file: finding.file,
            lineNumber: finding.lineNumber,
            codePoint: finding.codePoint,
          });
        }
      }
    }

    if (update && persistMode === 'end' && (findings.length > 0 || !store.exists)) {
      await persist({ findingCount: findings.length });
    }

    await this.logger.log({
      ...this.eventBase(),
      type: 'ScanCompleted',
      payload: { findingCount: findings.length, linesScanned, persisted },
    });

    return {
      store,
      findings,
      linesScanned,
      filesWithFindings: [...filesWithFindings],
      whitelistPath: store.path,
      persisted,
    };
  }

  private eventBase() {
    return {
      schemaVersion: SCAN_EVENT_SCHEMA_VERSION,
      timestamp: this.now().toISOString(),
      runId: this.runId,
    };
  }
}
