import { z } from 'zod';

export const DEFAULT_WHITELIST_PATH = '.unicode_whitelist.json';

/**
 * Path prefixes known to hold large volumes of legitimate non-ASCII text
 * (translations, mnemonic wordlists, store listings).
 */
export const DEFAULT_EXCLUDE_PREFIXES = ['electrum/locale/', 'electrum/wordlist/', 'fastlane/'];

export const ContentSourceKindSchema = z.enum(['git', 'fs']);

/**
 * `per-finding` writes the whitelist after every new code point;
 * `end` writes once after the scan.
 */
export const PersistModeSchema = z.enum(['per-finding', 'end']);
export type PersistMode = z.infer<typeof PersistModeSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  whitelistPath: z.string().min(1).default(DEFAULT_WHITELIST_PATH),
  excludePrefixes: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE_PREFIXES),
  source: ContentSourceKindSchema.default('git'),
  /** Root directory walked by the `fs` source */
  root: z.string().min(1).default('.'),
  /** File extensions the `fs` source is limited to, e.g. `.py`; empty means all */
  extensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'must look like ".ext"'))
    .default([]),
  /** Files larger than this many bytes are skipped by the `fs` source, with a warning */
  maxFileSize: z.number().int().positive().optional(),
  persist: PersistModeSchema.default('per-finding'),
  /** Collapse repeated characters within one line into a single check */
  dedupePerLine: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
