import path from 'path';
import { randomUUID } from 'crypto';
import type { Command } from 'commander';
import { ConfigLoader, WhitelistScanner, WhitelistStore } from '@unilist/core';
import { FileSystemSource, GitGrepSource, type SpawnFn } from '@unilist/repo';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  type Config,
  type ContentSource,
  type Logger,
} from '@unilist/shared';
import { OutputRenderer } from '../output/renderer';

/**
 * Process-level inputs shared by every command. Tests supply their own.
 */
export interface CliEnvironment {
  cwd: string;
  spawn?: SpawnFn;
  /** Set by commands that complete but must still fail the process */
  exitCode: number;
}

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  trace?: string;
  whitelist?: string;
};

export type ScanCommandOptions = {
  exclude?: string[];
  defaultExcludes?: boolean;
  source?: string;
  root?: string;
  ext?: string[];
  persist?: string;
  dedupePerLine?: boolean;
};

export interface CommandContext {
  config: Config;
  logger: Logger;
  renderer: OutputRenderer;
  /** Whitelist path as configured, for messages */
  whitelistLabel: string;
  /** Whitelist path resolved against the working directory */
  whitelistPath: string;
}

export interface ScanContext extends CommandContext {
  source: ContentSource;
  store: WhitelistStore;
  scanner: WhitelistScanner;
}

export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function addScanOptions(command: Command): Command {
  return command
    .option('--exclude <prefix>', 'Skip files under this path prefix (repeatable)', collect)
    .option('--no-default-excludes', 'Start from an empty exclude list')
    .option('--source <kind>', 'Content source: git or fs')
    .option('--root <dir>', 'Directory walked by the fs source')
    .option('--ext <extension>', 'Only scan files with this extension, fs source (repeatable)', collect)
    .option('--persist <mode>', 'When to write the whitelist: per-finding or end')
    .option('--dedupe-per-line', 'Check each distinct character once per line');
}

function excludeFlag(options: ScanCommandOptions): string[] | undefined {
  if (options.exclude) {
    return options.exclude;
  }
  return options.defaultExcludes === false ? [] : undefined;
}

export async function createCommandContext(
  globalOpts: GlobalOptions,
  env: CliEnvironment,
  scanOpts: ScanCommandOptions = {},
): Promise<CommandContext> {
  let logger: Logger = new ConsoleLogger({ verbose: globalOpts.verbose });
  if (globalOpts.trace) {
    logger = new JsonlLogger(path.resolve(env.cwd, globalOpts.trace), logger);
  }

  const config = await ConfigLoader.load({
    cwd: env.cwd,
    configPath: globalOpts.config ? path.resolve(env.cwd, globalOpts.config) : undefined,
    logger,
    flags: {
      whitelistPath: globalOpts.whitelist,
      excludePrefixes: excludeFlag(scanOpts),
      source: scanOpts.source,
      root: scanOpts.root,
      extensions: scanOpts.ext,
      persist: scanOpts.persist,
      dedupePerLine: scanOpts.dedupePerLine,
    },
  });

  return {
    config,
    logger,
    renderer: new OutputRenderer({ json: globalOpts.json, verbose: globalOpts.verbose }),
    whitelistLabel: config.whitelistPath,
    whitelistPath: path.resolve(env.cwd, config.whitelistPath),
  };
}

export function createContentSource(
  config: Config,
  env: CliEnvironment,
  logger: Logger,
): ContentSource {
  if (config.source === 'fs') {
    return new FileSystemSource(
      {
        root: path.resolve(env.cwd, config.root),
        excludePrefixes: config.excludePrefixes,
        extensions: config.extensions,
        maxFileSize: config.maxFileSize,
      },
      { logger },
    );
  }
  return new GitGrepSource({
    repoRoot: env.cwd,
    excludePrefixes: config.excludePrefixes,
    logger,
    spawn: env.spawn,
  });
}

export async function createScanContext(
  globalOpts: GlobalOptions,
  scanOpts: ScanCommandOptions,
  env: CliEnvironment,
): Promise<ScanContext> {
  const context = await createCommandContext(globalOpts, env, scanOpts);
  if (context.config.source === 'git' && (scanOpts.ext || scanOpts.root)) {
    throw new UsageError('--ext and --root only apply to the fs source; add --source fs');
  }
  const store = await WhitelistStore.load(context.whitelistPath, { logger: context.logger });
  const runId = randomUUID();

  return {
    ...context,
    source: createContentSource(context.config, env, context.logger),
    store,
    scanner: new WhitelistScanner({ logger: context.logger, runId }),
  };
}
