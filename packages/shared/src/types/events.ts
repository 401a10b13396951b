/**
 * Base interface for all scan events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the scan run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a scan starts.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    whitelistPath: string;
    /** Content source name, e.g. `git` or `fs` */
    source: string;
    excludePrefixes: string[];
    /** Whether the whitelist is updated (`scan`) or only checked (`check`) */
    update: boolean;
  };
}

/** Emitted for every code point not yet whitelisted for its file */
export interface FindingRecorded extends BaseEvent {
  type: 'FindingRecorded';
  payload: {
    file: string;
    lineNumber: number;
    codePoint: string;
  };
}

/** Emitted after the whitelist has been written to disk */
export interface WhitelistPersisted extends BaseEvent {
  type: 'WhitelistPersisted';
  payload: {
    path: string;
    fileCount: number;
  };
}

/** Emitted when a scan finishes */
export interface ScanCompleted extends BaseEvent {
  type: 'ScanCompleted';
  payload: {
    findingCount: number;
    linesScanned: number;
    persisted: boolean;
  };
}

export type ScanEvent = ScanStarted | FindingRecorded | WhitelistPersisted | ScanCompleted;

export const SCAN_EVENT_SCHEMA_VERSION = 1;
