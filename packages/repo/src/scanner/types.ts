export interface FileSystemSourceOptions {
  /** Directory to walk; reported paths are relative to it */
  root: string;
  /** Path prefixes (relative to root) never read */
  excludePrefixes?: string[];
  /** Only read files with one of these extensions, e.g. `.py`; empty means all */
  extensions?: string[];
  /** Skip files larger than this many bytes */
  maxFileSize?: number;
}

export interface RepoFileMeta {
  path: string;
  absPath: string;
  sizeBytes: number;
}

export interface RepoSnapshot {
  root: string;
  files: RepoFileMeta[];
  warnings: string[];
}
