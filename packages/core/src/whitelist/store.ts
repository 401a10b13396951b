import {
  WhitelistCorruptError,
  WhitelistWriteError,
  atomicWrite,
  readTextIfExists,
  type Logger,
} from '@unilist/shared';

export interface WhitelistStoreOptions {
  logger?: Logger;
}

/**
 * The persisted whitelist: file path → code points (lowercase hex) already
 * reviewed for that file.
 *
 * Entries are kept as loaded, so a malformed value survives untouched until
 * the first new code point for its file replaces it.
 */
export class WhitelistStore {
  private readonly entries: Map<string, unknown>;
  private readonly logger?: Logger;
  private readonly warnedMalformed = new Set<string>();
  private existsOnDisk: boolean;

  private constructor(
    readonly path: string,
    entries: Map<string, unknown>,
    existsOnDisk: boolean,
    options: WhitelistStoreOptions,
  ) {
    this.entries = entries;
    this.existsOnDisk = existsOnDisk;
    this.logger = options.logger;
  }

  /**
   * Loads the whitelist at `path`. A missing or unreadable file yields an
   * empty store; invalid JSON or a non-object document is rejected.
   */
  static async load(path: string, options: WhitelistStoreOptions = {}): Promise<WhitelistStore> {
    let text: string | undefined;
    try {
      text = await readTextIfExists(path);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      await options.logger?.warn(`Cannot read whitelist file ${path} (${reason}); starting empty`);
      return new WhitelistStore(path, new Map(), false, options);
    }

    if (text === undefined) {
      return new WhitelistStore(path, new Map(), false, options);
    }
    return new WhitelistStore(path, parseWhitelist(path, text), true, options);
  }

  /** Builds an in-memory store, e.g. for tests or dry runs. */
  static fromObject(
    path: string,
    data: Record<string, unknown>,
    options: WhitelistStoreOptions = {},
  ): WhitelistStore {
    return new WhitelistStore(path, new Map(Object.entries(data)), false, options);
  }

  /** Whether the file existed at load time or has been written since. */
  get exists(): boolean {
    return this.existsOnDisk;
  }

  get fileCount(): number {
    return this.entries.size;
  }

  files(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Code points whitelisted for `file`. A missing key or a value that is not
   * an array counts as empty.
   */
  codePointsFor(file: string): string[] {
    const value = this.entries.get(file);
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((v): v is string => typeof v === 'string');
  }

  has(file: string, codePoint: string): boolean {
    return this.codePointsFor(file).includes(codePoint);
  }

  /**
   * Whitelists `codePoint` for `file`. Returns false when it was already present.
   */
  async add(file: string, codePoint: string): Promise<boolean> {
    if (this.has(file, codePoint)) {
      return false;
    }

    const value = this.entries.get(file);
    if (Array.isArray(value)) {
      value.push(codePoint);
    } else {
      if (value !== undefined) {
        await this.warnMalformed(file, value);
      }
      this.entries.set(file, [codePoint]);
    }
    return true;
  }

  /**
   * Logs once per file when its entry is not an array. Lookups treat such an
   * entry as empty and the next `add` replaces it.
   */
  async warnMalformed(file: string, value: unknown = this.entries.get(file)): Promise<void> {
    if (value === undefined || Array.isArray(value) || this.warnedMalformed.has(file)) {
      return;
    }
    this.warnedMalformed.add(file);
    const kind = value === null ? 'null' : typeof value;
    await this.logger?.warn(
      `Whitelist entry for ${file} is ${kind}, not an array; treating it as empty`,
    );
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }

  serialize(): string {
    return JSON.stringify(this.toJSON(), null, 2) + '\n';
  }

  /**
   * Writes the whole store atomically.
   *
   * @param details - attached to the WhitelistWriteError if the write fails
   */
  async persist(details?: Record<string, unknown>): Promise<void> {
    try {
      await atomicWrite(this.path, this.serialize());
    } catch (error) {
      throw new WhitelistWriteError(this.path, { cause: error, details });
    }
    this.existsOnDisk = true;
  }
}

function parseWhitelist(path: string, text: string): Map<string, unknown> {
  // An empty file holds no entries.
  if (text.trim() === '') {
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new WhitelistCorruptError(path, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new WhitelistCorruptError(path, 'expected a JSON object at the top level');
  }
  return new Map(Object.entries(parsed));
}
