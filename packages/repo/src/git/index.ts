import { spawn, type SpawnOptions } from 'child_process';
import {
  ProcessError,
  matchesPrefix,
  normalizePath,
  type ContentLine,
  type ContentSource,
  type Logger,
} from '@unilist/shared';

/**
 * The parts of a child process GitService relies on.
 */
export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: 'close', listener: (code: number | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  kill(): boolean;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export interface GitServiceOptions {
  repoRoot: string;
  spawn?: SpawnFn;
}

/** Matches any character outside 7-bit ASCII (PCRE syntax). */
export const NON_ASCII_PATTERN = '[^\\x00-\\x7F]';

export class GitService {
  private repoRoot: string;
  private spawnFn: SpawnFn;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.spawnFn = options.spawn ?? defaultSpawn;
  }

  private async exec(args: string[]): Promise<string> {
    let output = '';
    for await (const line of this.stream(args)) {
      output += line + '\n';
    }
    return output.trim();
  }

  /**
   * Runs git and yields stdout split on `\n`. Exit codes listed in
   * `okCodes` besides 0 count as success. Breaking out of the iteration
   * kills the process.
   */
  private async *stream(args: string[], okCodes: number[] = []): AsyncGenerator<string> {
    const child = this.spawnFn('git', args, { cwd: this.repoRoot });
    if (!child.stdout || !child.stderr) {
      throw new ProcessError(`Failed to open output streams for: git ${args.join(' ')}`);
    }

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk) => {
      stderr += String(chunk);
    });

    let exited = false;
    const exit = new Promise<number | null>((resolve, reject) => {
      child.on('close', (code) => {
        exited = true;
        resolve(code);
      });
      child.on('error', (err) => {
        exited = true;
        reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
      });
    });
    // Awaited once stdout is drained; attach a handler so an early spawn
    // failure is not reported as unhandled in the meantime.
    exit.catch(() => undefined);

    // git ends records with \n only; a lone \r belongs to the line text.
    child.stdout.setEncoding('utf8');
    try {
      let pending = '';
      for await (const chunk of child.stdout) {
        pending += String(chunk);
        let start = 0;
        let newline = pending.indexOf('\n', start);
        while (newline !== -1) {
          yield stripCarriageReturn(pending.slice(start, newline));
          start = newline + 1;
          newline = pending.indexOf('\n', start);
        }
        pending = pending.slice(start);
      }
      if (pending !== '') {
        yield stripCarriageReturn(pending);
      }
    } finally {
      if (!exited) {
        child.kill();
      }
    }

    const code = await exit;
    if (code !== 0 && (code === null || !okCodes.includes(code))) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
        exitCode: code ?? undefined,
        details: stderr.trim() || undefined,
      });
    }
  }

  async isInsideWorkTree(): Promise<boolean> {
    try {
      return (await this.exec(['rev-parse', '--is-inside-work-tree'])) === 'true';
    } catch (error) {
      if (error instanceof ProcessError && error.exitCode !== undefined) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Fails with a ProcessError unless the repo root is inside a git work tree.
   */
  async ensureWorkTree(): Promise<void> {
    if (!(await this.isInsideWorkTree())) {
      throw new ProcessError(`Not a git repository: ${this.repoRoot}`, {
        details: 'The git content source only scans files tracked by git. Use --source fs otherwise.',
      });
    }
  }

  /**
   * Yields every line of a tracked text file that contains a non-ASCII
   * character. Binary files are skipped by git (`-I`).
   */
  async *grepNonAscii(): AsyncGenerator<ContentLine> {
    const args = ['grep', '--line-number', '--null', '--no-color', '-I', '-P', NON_ASCII_PATTERN];
    // git grep exits 1 when nothing matched.
    for await (const record of this.stream(args, [1])) {
      yield parseGrepRecord(record);
    }
  }
}

/** Drops the `\r` a CRLF line ending leaves behind. */
function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Parses one `git grep --null --line-number` record: `path\0line\0text`.
 */
export function parseGrepRecord(record: string): ContentLine {
  const first = record.indexOf('\0');
  const second = first === -1 ? -1 : record.indexOf('\0', first + 1);
  const lineNumber = second === -1 ? NaN : Number(record.slice(first + 1, second));

  if (first <= 0 || !Number.isInteger(lineNumber) || lineNumber < 1) {
    throw new ProcessError('Unexpected git grep output', {
      details: record.replace(/\0/g, '\\0').slice(0, 200),
    });
  }

  return {
    file: normalizePath(record.slice(0, first)),
    lineNumber,
    text: record.slice(second + 1),
  };
}

export interface GitGrepSourceOptions {
  repoRoot: string;
  excludePrefixes?: string[];
  logger?: Logger;
  spawn?: SpawnFn;
}

/**
 * Content source backed by `git grep` over the tracked files of a work tree.
 */
export class GitGrepSource implements ContentSource {
  readonly name = 'git';
  private readonly git: GitService;
  private readonly excludePrefixes: string[];
  private readonly logger?: Logger;

  constructor(options: GitGrepSourceOptions) {
    this.git = new GitService({ repoRoot: options.repoRoot, spawn: options.spawn });
    this.excludePrefixes = options.excludePrefixes ?? [];
    this.logger = options.logger;
  }

  async *lines(): AsyncGenerator<ContentLine> {
    await this.git.ensureWorkTree();
    for await (const line of this.git.grepNonAscii()) {
      if (matchesPrefix(line.file, this.excludePrefixes)) {
        continue;
      }
      await this.logger?.debug(`git grep: ${line.file}:${line.lineNumber}`);
      yield line;
    }
  }
}
