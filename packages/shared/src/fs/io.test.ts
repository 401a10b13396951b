import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { atomicWrite, isErrnoException, readTextIfExists } from './io';

describe('io', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'unilist-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('atomicWrite', () => {
    it('creates missing parent directories', async () => {
      const target = join(tmpDir, 'nested', 'deep', 'file.json');
      await atomicWrite(target, '{}\n');
      expect(await fs.readFile(target, 'utf8')).toBe('{}\n');
    });

    it('replaces existing content and leaves no temp files behind', async () => {
      const target = join(tmpDir, 'file.json');
      await fs.writeFile(target, 'old');
      await atomicWrite(target, 'new');

      expect(await fs.readFile(target, 'utf8')).toBe('new');
      expect(await fs.readdir(tmpDir)).toEqual(['file.json']);
    });

    it('cleans up the temp file when the rename fails', async () => {
      // Renaming a file onto a non-empty directory fails.
      const target = join(tmpDir, 'occupied');
      await fs.mkdir(target);
      await fs.writeFile(join(target, 'keep.txt'), 'x');

      await expect(atomicWrite(target, 'data')).rejects.toThrow();
      expect(await fs.readdir(tmpDir)).toEqual(['occupied']);
    });
  });

  describe('readTextIfExists', () => {
    it('returns undefined for a missing file', async () => {
      expect(await readTextIfExists(join(tmpDir, 'missing.json'))).toBeUndefined();
    });

    it('returns the file content', async () => {
      const target = join(tmpDir, 'present.txt');
      await fs.writeFile(target, 'héllo');
      expect(await readTextIfExists(target)).toBe('héllo');
    });

    it('propagates errors other than ENOENT', async () => {
      await expect(readTextIfExists(tmpDir)).rejects.toMatchObject({ code: 'EISDIR' });
    });
  });

  describe('isErrnoException', () => {
    it('recognizes errors carrying a code', () => {
      const error = Object.assign(new Error('nope'), { code: 'EACCES' });
      expect(isErrnoException(error)).toBe(true);
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException('EACCES')).toBe(false);
    });
  });
});
