/**
 * MetadataIndex Unit Tests
 */

import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadMetadataIndex } from '@/services/metadata-index.js';
import type { FileRecord } from '@/types/index.js';

import {
  createTempDir,
  removeTempDir,
  silentLogger,
} from '../../helpers/test-utils.js';

function makeRecord(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    fileId: '1700000000_abc123',
    ownerId: 'owner-1',
    originalName: 'notes.txt',
    originalSize: 1000,
    compressedSize: 250,
    compressionAlgorithm: 'gzip',
    compressionRatio: 75,
    mediaKind: 'document',
    mimeType: 'text/plain',
    storageLocations: [
      {
        kind: 'channel',
        ref: { channelId: '-1001234567890', messageId: 7, fileId: 'doc-7' },
        publicLocator: 'https://t.me/c/1234567890/7',
      },
      { kind: 'local', path: '/data/file_storage/user_owner-1/x.gz' },
    ],
    primaryStorageKind: 'channel',
    publicReference: 'https://t.me/c/1234567890/7',
    createdAt: new Date('2024-01-02T03:04:05.000Z'),
    ...overrides,
  };
}

describe('MetadataIndex', () => {
  let dir: string;
  let filePath: string;
  const logger = silentLogger();

  beforeEach(async () => {
    dir = await createTempDir();
    filePath = path.join(dir, 'file_metadata.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('loading', () => {
    it('should start empty when the file does not exist', async () => {
      const index = await loadMetadataIndex({ filePath, logger });

      expect(index.size()).toBe(0);
      expect(index.all()).toEqual([]);
    });

    it('should start empty when the file is not valid JSON', async () => {
      await writeFile(filePath, '{ not json');

      const index = await loadMetadataIndex({ filePath, logger });

      expect(index.size()).toBe(0);
    });

    it('should skip invalid entries and keep valid ones', async () => {
      const good = makeRecord();
      await writeFile(
        filePath,
        JSON.stringify({
          [good.fileId]: { ...good, createdAt: good.createdAt.toISOString() },
          broken: { fileId: 'broken', ownerId: 'owner-1' },
        })
      );

      const index = await loadMetadataIndex({ filePath, logger });

      expect(index.size()).toBe(1);
      expect(index.get(good.fileId)).toEqual(good);
      expect(index.get('broken')).toBeNull();
    });

    it('should skip entries whose primary location is missing', async () => {
      const record = makeRecord({
        primaryStorageKind: 'cloud',
        publicReference: 'https://cloud.test/x',
      });
      await writeFile(
        filePath,
        JSON.stringify({
          [record.fileId]: {
            ...record,
            createdAt: record.createdAt.toISOString(),
          },
        })
      );

      const index = await loadMetadataIndex({ filePath, logger });

      expect(index.size()).toBe(0);
    });

    it('should skip entries stored under a key other than their id', async () => {
      const record = makeRecord();
      await writeFile(
        filePath,
        JSON.stringify({
          other_id: { ...record, createdAt: record.createdAt.toISOString() },
        })
      );

      const index = await loadMetadataIndex({ filePath, logger });

      expect(index.size()).toBe(0);
      expect(index.get('other_id')).toBeNull();
      expect(index.get(record.fileId)).toBeNull();
    });
  });

  describe('put()', () => {
    it('should persist records with ISO dates and reload them', async () => {
      const record = makeRecord();
      const index = await loadMetadataIndex({ filePath, logger });

      await index.put(record.fileId, record);

      const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
      expect(raw).toMatchObject({
        [record.fileId]: { createdAt: '2024-01-02T03:04:05.000Z' },
      });

      const reloaded = await loadMetadataIndex({ filePath, logger });
      expect(reloaded.get(record.fileId)).toEqual(record);
    });

    it('should overwrite an existing id', async () => {
      const index = await loadMetadataIndex({ filePath, logger });

      await index.put('a', makeRecord({ fileId: 'a', originalName: 'one.txt' }));
      await index.put('a', makeRecord({ fileId: 'a', originalName: 'two.txt' }));

      expect(index.size()).toBe(1);
      expect(index.get('a')?.originalName).toBe('two.txt');
    });

    it('should keep every record when puts run concurrently', async () => {
      const index = await loadMetadataIndex({ filePath, logger });
      const ids = Array.from({ length: 20 }, (_, i) => `file-${i}`);

      await Promise.all(
        ids.map((fileId) => index.put(fileId, makeRecord({ fileId })))
      );

      const reloaded = await loadMetadataIndex({ filePath, logger });
      expect(reloaded.size()).toBe(20);
      expect(
        reloaded
          .all()
          .map((record) => record.fileId)
          .sort()
      ).toEqual([...ids].sort());
    });

    it('should leave memory unchanged when the flush fails', async () => {
      // A directory where the file should be makes the final rename fail
      await mkdir(filePath);
      const index = await loadMetadataIndex({ filePath, logger });

      await expect(
        index.put('a', makeRecord({ fileId: 'a' }))
      ).rejects.toMatchObject({
        code: 'DURABILITY_FAILURE',
        message: 'Failed to persist file metadata',
      });

      expect(index.get('a')).toBeNull();
      expect(index.size()).toBe(0);
      expect(await readdir(dir)).toEqual(['file_metadata.json']);
    });
  });

  describe('getForOwner()', () => {
    it('should hide records owned by someone else', async () => {
      const index = await loadMetadataIndex({ filePath, logger });
      await index.put('a', makeRecord({ fileId: 'a', ownerId: 'owner-1' }));

      expect(index.getForOwner('a', 'owner-1')?.fileId).toBe('a');
      expect(index.getForOwner('a', 'owner-2')).toBeNull();
      expect(index.getForOwner('missing', 'owner-1')).toBeNull();
    });
  });

  describe('delete()', () => {
    it('should remove the record durably', async () => {
      const index = await loadMetadataIndex({ filePath, logger });
      await index.put('a', makeRecord({ fileId: 'a' }));
      await index.put('b', makeRecord({ fileId: 'b' }));

      expect(await index.delete('a')).toBe(true);

      const reloaded = await loadMetadataIndex({ filePath, logger });
      expect(reloaded.get('a')).toBeNull();
      expect(reloaded.get('b')?.fileId).toBe('b');
    });

    it('should return false for unknown ids', async () => {
      const index = await loadMetadataIndex({ filePath, logger });

      expect(await index.delete('missing')).toBe(false);
    });
  });
});
