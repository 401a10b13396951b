import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import {
  WhitelistWriteError,
  type ContentLine,
  type ContentSource,
  type Logger,
} from '@unilist/shared';
import { WhitelistStore } from '../whitelist/store';
import { WhitelistScanner, type Finding } from './scanner';

class MemorySource implements ContentSource {
  readonly name = 'memory';
  calls = 0;

  constructor(private readonly content: ContentLine[]) {}

  async *lines(): AsyncGenerator<ContentLine> {
    this.calls++;
    for (const line of this.content) {
      yield line;
    }
  }
}

function mockLogger() {
  const logger: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  return logger;
}

describe('WhitelistScanner', () => {
  let tmpDir: string;
  let whitelistPath: string;
  let logger: Logger;
  let scanner: WhitelistScanner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'unilist-scanner-test-'));
    whitelistPath = join(tmpDir, '.unicode_whitelist.json');
    logger = mockLogger();
    scanner = new WhitelistScanner({
      logger,
      runId: 'run-1',
      now: () => new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function readWhitelist(): Promise<unknown> {
    return JSON.parse(await fs.readFile(whitelistPath, 'utf8'));
  }

  const cafeSource = () =>
    new MemorySource([{ file: 'a.txt', lineNumber: 3, text: 'café' }]);

  it('reports and whitelists a new code point', async () => {
    const store = await WhitelistStore.load(whitelistPath);
    const reported: Finding[] = [];

    const result = await scanner.scan(cafeSource(), store, {
      onFinding: (f) => {
        reported.push(f);
      },
    });

    const expected: Finding = { file: 'a.txt', lineNumber: 3, codePoint: 'e9', char: 'é' };
    expect(result.findings).toEqual([expected]);
    expect(reported).toEqual([expected]);
    expect(result.filesWithFindings).toEqual(['a.txt']);
    expect(result.linesScanned).toBe(1);
    expect(result.persisted).toBe(true);
    expect(await readWhitelist()).toEqual({ 'a.txt': ['e9'] });
  });

  it('reports nothing for an already whitelisted pair and leaves the file alone', async () => {
    const original = '{"a.txt": ["e9"]}';
    await fs.writeFile(whitelistPath, original);
    const store = await WhitelistStore.load(whitelistPath);

    const result = await scanner.scan(cafeSource(), store);

    expect(result.findings).toEqual([]);
    expect(result.persisted).toBe(false);
    expect(await fs.readFile(whitelistPath, 'utf8')).toBe(original);
  });

  it('suppresses only the exact file and code point pair', async () => {
    await fs.writeFile(whitelistPath, '{"a.txt": ["e9"]}');
    const store = await WhitelistStore.load(whitelistPath);
    const source = new MemorySource([
      { file: 'a.txt', lineNumber: 1, text: 'éü' },
      { file: 'b.txt', lineNumber: 2, text: 'é' },
    ]);

    const result = await scanner.scan(source, store);

    expect(result.findings.map((f) => `${f.file}:${f.lineNumber}:${f.codePoint}`)).toEqual([
      'a.txt:1:fc',
      'b.txt:2:e9',
    ]);
    expect(await readWhitelist()).toEqual({ 'a.txt': ['e9', 'fc'], 'b.txt': ['e9'] });
  });

  it('replaces a malformed entry instead of merging into it', async () => {
    await fs.writeFile(whitelistPath, '{"b.txt": "not-an-array"}');
    const store = await WhitelistStore.load(whitelistPath, { logger });
    const source = new MemorySource([{ file: 'b.txt', lineNumber: 1, text: '☺' }]);

    const result = await scanner.scan(source, store);

    expect(result.findings).toHaveLength(1);
    expect(await readWhitelist()).toEqual({ 'b.txt': ['263a'] });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('never reports files under an excluded prefix', async () => {
    const store = await WhitelistStore.load(whitelistPath);
    const source = new MemorySource([
      { file: 'electrum/locale/de/messages.po', lineNumber: 1, text: 'üöäß' },
      { file: 'electrum/wordlist/chinese.txt', lineNumber: 9, text: '的' },
    ]);

    const result = await scanner.scan(source, store, {
      excludePrefixes: ['electrum/locale/', 'electrum/wordlist/'],
    });

    expect(result.findings).toEqual([]);
    expect(result.linesScanned).toBe(0);
    expect(await readWhitelist()).toEqual({});
  });

  it('is idempotent across runs', async () => {
    const source = new MemorySource([
      { file: 'a.txt', lineNumber: 1, text: '— é' },
      { file: 'c/d.md', lineNumber: 4, text: '😀' },
    ]);

    const first = await scanner.scan(source, await WhitelistStore.load(whitelistPath));
    const second = await scanner.scan(source, await WhitelistStore.load(whitelistPath));

    expect(first.findings.map((f) => f.codePoint)).toEqual(['2014', 'e9', '1f600']);
    expect(second.findings).toEqual([]);
    expect(source.calls).toBe(2);
    expect(await readWhitelist()).toEqual({ 'a.txt': ['2014', 'e9'], 'c/d.md': ['1f600'] });
  });

  it('reports a repeated character on one line once, with or without per-line dedupe', async () => {
    const line = { file: 'a.txt', lineNumber: 1, text: 'é and é' };

    const plain = await scanner.scan(
      new MemorySource([line]),
      WhitelistStore.fromObject(join(tmpDir, 'plain.json'), {}),
    );
    const deduped = await scanner.scan(
      new MemorySource([line]),
      WhitelistStore.fromObject(join(tmpDir, 'deduped.json'), {}),
      { dedupePerLine: true },
    );

    expect(plain.findings).toHaveLength(1);
    expect(deduped.findings).toHaveLength(1);
  });

  it('writes after every new code point in per-finding mode', async () => {
    const store = await WhitelistStore.load(whitelistPath);
    const persistSpy = vi.spyOn(store, 'persist');
    const source = new MemorySource([{ file: 'a.txt', lineNumber: 1, text: 'éè' }]);

    await scanner.scan(source, store);

    // One write to create the file, then one per finding.
    expect(persistSpy).toHaveBeenCalledTimes(3);
    expect(persistSpy).toHaveBeenLastCalledWith({ file: 'a.txt', lineNumber: 1, codePoint: 'e8' });
  });

  it('writes once at the end in end mode', async () => {
    const store = await WhitelistStore.load(whitelistPath);
    const persistSpy = vi.spyOn(store, 'persist');
    const source = new MemorySource([{ file: 'a.txt', lineNumber: 1, text: 'éè' }]);

    const result = await scanner.scan(source, store, { persist: 'end' });

    expect(persistSpy).toHaveBeenCalledTimes(1);
    expect(result.persisted).toBe(true);
    expect(await readWhitelist()).toEqual({ 'a.txt': ['e9', 'e8'] });
  });

  it('reports the finding before a failed write surfaces', async () => {
    await fs.writeFile(whitelistPath, '{}');
    const store = await WhitelistStore.load(whitelistPath);
    vi.spyOn(store, 'persist').mockRejectedValueOnce(
      new WhitelistWriteError(whitelistPath, { cause: new Error('ENOSPC') }),
    );
    const reported: Finding[] = [];

    await expect(
      scanner.scan(cafeSource(), store, {
        onFinding: (f) => {
          reported.push(f);
        },
      }),
    ).rejects.toBeInstanceOf(WhitelistWriteError);

    expect(reported).toEqual([{ file: 'a.txt', lineNumber: 3, codePoint: 'e9', char: 'é' }]);
  });

  it('stops at the first content source failure', async () => {
    const store = await WhitelistStore.load(whitelistPath);
    const failing: ContentSource = {
      name: 'broken',
      async *lines() {
        throw new Error('not a git repository');
      },
    };

    await expect(scanner.scan(failing, store)).rejects.toThrow('not a git repository');
  });

  describe('check mode', () => {
    it('reports without creating or writing the whitelist', async () => {
      const store = await WhitelistStore.load(whitelistPath);
      const source = new MemorySource([
        { file: 'a.txt', lineNumber: 1, text: 'é' },
        { file: 'a.txt', lineNumber: 2, text: 'é' },
      ]);

      const result = await scanner.scan(source, store, { update: false });

      expect(result.findings).toHaveLength(1);
      expect(result.persisted).toBe(false);
      await expect(fs.access(whitelistPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  it('logs scan events', async () => {
    const store = await WhitelistStore.load(whitelistPath);

    await scanner.scan(cafeSource(), store, { excludePrefixes: ['fastlane/'] });

    expect(logger.log).toHaveBeenCalledWith({
      schemaVersion: 1,
      timestamp: '2026-01-01T00:00:00.000Z',
      runId: 'run-1',
      type: 'ScanStarted',
      payload: {
        whitelistPath,
        source: 'memory',
        excludePrefixes: ['fastlane/'],
        update: true,
      },
    });
    expect(logger.trace).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'FindingRecorded',
        payload: { file: 'a.txt', lineNumber: 3, codePoint: 'e9' },
      }),
      'New code point U+E9 in a.txt:3',
    );
    expect(logger.log).toHaveBeenLastCalledWith(
      expect.objectContaining({
        type: 'ScanCompleted',
        payload: { findingCount: 1, linesScanned: 1, persisted: true },
      }),
    );
  });
});
