import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import {
  IoError,
  isErrnoException,
  matchesPrefix,
  normalizePath,
  type ContentLine,
  type ContentSource,
  type Logger,
} from '@unilist/shared';
import type { FileSystemSourceOptions, RepoFileMeta, RepoSnapshot } from './types';
import { isBinaryFile, hasNonAscii, DEFAULT_IGNORES } from './utils';

export * from './types';
export { isBinaryFile, hasNonAscii, DEFAULT_IGNORES };

type Fs = typeof nodeFs;

/**
 * Content source that walks a directory tree instead of asking git. Honors
 * `.gitignore` in the root, skips binary files and excluded prefixes.
 */
export class FileSystemSource implements ContentSource {
  readonly name = 'fs';
  private readonly options: FileSystemSourceOptions;
  private readonly fs: Fs;
  private readonly logger?: Logger;

  constructor(options: FileSystemSourceOptions, deps: { fs?: Fs; logger?: Logger } = {}) {
    this.options = options;
    this.fs = deps.fs ?? nodeFs;
    this.logger = deps.logger;
  }

  async listFiles(): Promise<RepoSnapshot> {
    const { root } = this.options;
    const excludePrefixes = this.options.excludePrefixes ?? [];
    const extensions = (this.options.extensions ?? []).map((e) => e.toLowerCase());
    const ig = ignore();
    const warnings: string[] = [];

    // 1. Add default ignores
    ig.add(DEFAULT_IGNORES);

    // 2. Add .gitignore
    try {
      const gitignoreContent = await this.fs.readFile(path.join(root, '.gitignore'), 'utf-8');
      ig.add(gitignoreContent);
    } catch (error) {
      // A missing .gitignore is fine; a missing root fails in the walk below.
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw new IoError(root, `Cannot read ${path.join(root, '.gitignore')}`, { cause: error });
      }
    }

    const files: RepoFileMeta[] = [];

    const walk = async (dir: string, relativeDir: string) => {
      const entries = await this.fs.readdir(dir, { withFileTypes: true });

      for (const entry of entries) {
        const entryRelativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
        const absPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          // For directories, append slash to match directory patterns in ignore
          const dirPath = entryRelativePath + '/';
          if (ig.ignores(dirPath) || matchesPrefix(dirPath, excludePrefixes)) continue;
          await walk(absPath, entryRelativePath);
        } else if (entry.isFile()) {
          if (ig.ignores(entryRelativePath) || matchesPrefix(entryRelativePath, excludePrefixes)) {
            continue;
          }
          if (extensions.length > 0 && !extensions.includes(path.extname(entry.name).toLowerCase())) {
            continue;
          }

          const stats = await this.fs.stat(absPath);
          if (this.options.maxFileSize && stats.size > this.options.maxFileSize) {
            warnings.push(`Skipping large file: ${entryRelativePath} (${stats.size} bytes)`);
            continue;
          }
          if (await isBinaryFile(absPath, this.fs)) {
            continue;
          }

          files.push({ path: normalizePath(entryRelativePath), absPath, sizeBytes: stats.size });
        }
      }
    };

    try {
      await walk(root, '');
    } catch (error) {
      const failedPath = isErrnoException(error) && error.path ? error.path : root;
      throw new IoError(failedPath, `Cannot read ${failedPath}`, { cause: error });
    }

    // Sort files for stability (deterministic order)
    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    return { root, files, warnings };
  }

  async *lines(): AsyncGenerator<ContentLine> {
    const snapshot = await this.listFiles();
    for (const warning of snapshot.warnings) {
      await this.logger?.warn(warning);
    }

    for (const file of snapshot.files) {
      const content = await this.fs.readFile(file.absPath, 'utf-8');
      if (!hasNonAscii(content)) continue;

      const lines = content.split(/\r?\n/);
      for (let i = 0; i < lines.length; i++) {
        if (hasNonAscii(lines[i])) {
          yield { file: file.path, lineNumber: i + 1, text: lines[i] };
        }
      }
    }
  }
}
