/**
 * LocalStore Unit Tests
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createLocalStore, ownerDirName } from '@/services/local.storage.js';

import {
  createTempDir,
  removeTempDir,
  writeTestFile,
} from '../../helpers/test-utils.js';

describe('LocalStore', () => {
  let dir: string;
  let rootDir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    rootDir = path.join(dir, 'file_storage');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should partition copies by owner', async () => {
    const store = createLocalStore({ rootDir });
    const source = await writeTestFile(dir, 'notes.txt.gz', 'payload');

    const storedPath = await store.save(source, 'owner-1', 'f1_notes.txt.gz');

    expect(storedPath).toBe(path.join(rootDir, 'user_owner-1', 'f1_notes.txt.gz'));
    expect(await readFile(storedPath, 'utf8')).toBe('payload');
    expect(await readFile(source, 'utf8')).toBe('payload');
  });

  it('should escape owner directory names', () => {
    const store = createLocalStore({ rootDir });

    expect(ownerDirName('a/b')).toBe('user_a=2Fb');
    expect(store.ownerDir('a/b')).toBe(path.join(rootDir, 'user_a=2Fb'));
  });

  it('should give distinct owners distinct directories', () => {
    expect(ownerDirName('a/b')).not.toBe(ownerDirName('a_b'));
    expect(ownerDirName('..')).toBe('user_..');
    expect(ownerDirName('...')).toBe('user_...');
  });

  it('should report existence and remove copies', async () => {
    const store = createLocalStore({ rootDir });
    const source = await writeTestFile(dir, 'a.gz', 'x');
    const storedPath = await store.save(source, 'owner-1', 'f1_a.gz');

    expect(await store.exists(storedPath)).toBe(true);

    await store.remove(storedPath);

    expect(await store.exists(storedPath)).toBe(false);
    await expect(store.remove(storedPath)).resolves.toBeUndefined();
  });

  it('should not treat directories as stored files', async () => {
    const store = createLocalStore({ rootDir });
    const source = await writeTestFile(dir, 'a.gz', 'x');
    await store.save(source, 'owner-1', 'f1_a.gz');

    expect(await store.exists(store.ownerDir('owner-1'))).toBe(false);
  });

  describe('usage()', () => {
    it('should be zero before anything is stored', async () => {
      const store = createLocalStore({ rootDir });

      expect(await store.usage()).toEqual({ fileCount: 0, totalBytes: 0 });
    });

    it('should count files and bytes across owners', async () => {
      const store = createLocalStore({ rootDir });
      const small = await writeTestFile(dir, 'small.gz', 'abc');
      const large = await writeTestFile(dir, 'large.gz', 'abcdefghij');

      await store.save(small, 'owner-1', 'f1_small.gz');
      await store.save(large, 'owner-1', 'f2_large.gz');
      await store.save(small, 'owner-2', 'f3_small.gz');

      expect(await store.usage()).toEqual({ fileCount: 3, totalBytes: 16 });
    });
  });
});
