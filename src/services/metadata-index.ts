/**
 * MetadataIndex
 *
 * Durable fileId -> FileRecord map kept in one JSON file.
 *
 * - Loaded once at startup; a missing or unreadable file is an empty index
 * - Every mutation rewrites the whole file (temp file, fsync, rename), then
 *   swaps the in-memory map, so a failed flush leaves memory untouched
 * - Mutations run one at a time; reads never wait and never see a
 *   half-applied change
 */

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import { nanoid } from 'nanoid';
import pLimit from 'p-limit';
import type pino from 'pino';
import { z } from 'zod';

import type { FileRecord } from '../types/index.js';
import { StorageError } from '../types/index.js';

/**
 * MetadataIndex interface
 */
export interface MetadataIndex {
  get(fileId: string): FileRecord | null;
  /** null unless the record exists and belongs to ownerId */
  getForOwner(fileId: string, ownerId: string): FileRecord | null;
  put(fileId: string, record: FileRecord): Promise<void>;
  /** false when there was nothing to delete */
  delete(fileId: string): Promise<boolean>;
  all(): FileRecord[];
  size(): number;
}

// ─────────────────────────────────────────────────────────────
// PERSISTED FORMAT
// ─────────────────────────────────────────────────────────────

const storageLocationSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('channel'),
    ref: z.object({
      channelId: z.string(),
      messageId: z.number().int(),
      fileId: z.string(),
    }),
    publicLocator: z.string(),
  }),
  z.object({
    kind: z.literal('cloud'),
    objectPath: z.string(),
    publicLocator: z.string(),
  }),
  z.object({
    kind: z.literal('local'),
    path: z.string(),
  }),
]);

const fileRecordSchema = z.object({
  fileId: z.string().min(1),
  ownerId: z.string().min(1),
  originalName: z.string(),
  originalSize: z.number().nonnegative(),
  compressedSize: z.number().nonnegative(),
  compressionAlgorithm: z.enum(['gzip', 'deflate', 'brotli']),
  compressionRatio: z.number(),
  mediaKind: z.enum(['document', 'image', 'video', 'audio']),
  mimeType: z.string().nullable(),
  storageLocations: z.array(storageLocationSchema).min(1),
  primaryStorageKind: z.enum(['channel', 'cloud', 'local']),
  publicReference: z.string(),
  createdAt: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
});

type PersistedRecord = z.input<typeof fileRecordSchema>;

function toPersisted(record: FileRecord): PersistedRecord {
  return { ...record, createdAt: record.createdAt.toISOString() };
}

/**
 * Parse the durable file, skipping entries that fail validation
 */
function parseSnapshot(
  raw: string,
  logger: pino.Logger
): Map<string, FileRecord> {
  const records = new Map<string, FileRecord>();
  const parsed: unknown = JSON.parse(raw);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    logger.warn('Metadata file is not an object, starting with an empty index');
    return records;
  }

  for (const [fileId, value] of Object.entries(parsed)) {
    const result = fileRecordSchema.safeParse(value);
    if (!result.success) {
      logger.warn(
        { fileId, issues: result.error.issues.length },
        'Skipping invalid metadata entry'
      );
      continue;
    }
    const record = result.data;
    if (record.fileId !== fileId) {
      logger.warn(
        { fileId, recordFileId: record.fileId },
        'Skipping entry stored under another id'
      );
      continue;
    }
    if (
      !record.storageLocations.some(
        (location) => location.kind === record.primaryStorageKind
      )
    ) {
      logger.warn(
        { fileId },
        'Skipping entry whose primary location is missing'
      );
      continue;
    }
    records.set(fileId, record);
  }

  return records;
}

/**
 * Replace the durable file without ever exposing a partial write
 */
async function writeSnapshotAtomic(
  filePath: string,
  records: ReadonlyMap<string, FileRecord>
): Promise<void> {
  const payload: Record<string, PersistedRecord> = {};
  for (const [fileId, record] of records) {
    payload[fileId] = toPersisted(record);
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${nanoid(8)}.tmp`;

  try {
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(JSON.stringify(payload, null, 2));
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

// ─────────────────────────────────────────────────────────────
// INDEX
// ─────────────────────────────────────────────────────────────

/**
 * Load the index from disk and return a live handle
 */
export async function loadMetadataIndex(deps: {
  filePath: string;
  logger: pino.Logger;
}): Promise<MetadataIndex> {
  const { filePath, logger } = deps;

  let records = new Map<string, FileRecord>();
  try {
    records = parseSnapshot(await readFile(filePath, 'utf8'), logger);
    logger.info({ filePath, files: records.size }, 'Metadata index loaded');
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'ENOENT'
    ) {
      logger.info({ filePath }, 'No metadata file yet, starting empty');
    } else {
      logger.error(
        { filePath, err: error },
        'Failed to load metadata, starting with an empty index'
      );
    }
  }

  const mutations = pLimit(1);

  /**
   * Flush the next state, then publish it
   */
  async function commit(next: Map<string, FileRecord>): Promise<void> {
    try {
      await writeSnapshotAtomic(filePath, next);
    } catch (error) {
      logger.error({ filePath, err: error }, 'Failed to flush metadata index');
      throw new StorageError(
        'DURABILITY_FAILURE',
        'Failed to persist file metadata',
        { cause: error }
      );
    }
    records = next;
  }

  return {
    get(fileId: string): FileRecord | null {
      return records.get(fileId) ?? null;
    },

    getForOwner(fileId: string, ownerId: string): FileRecord | null {
      const record = records.get(fileId);
      if (record === undefined || record.ownerId !== ownerId) {
        return null;
      }
      return record;
    },

    put(fileId: string, record: FileRecord): Promise<void> {
      return mutations(async () => {
        if (records.has(fileId)) {
          logger.warn({ fileId }, 'Overwriting existing metadata record');
        }
        const next = new Map(records);
        next.set(fileId, record);
        await commit(next);
      });
    },

    delete(fileId: string): Promise<boolean> {
      return mutations(async () => {
        if (!records.has(fileId)) {
          return false;
        }
        const next = new Map(records);
        next.delete(fileId);
        await commit(next);
        return true;
      });
    },

    all(): FileRecord[] {
      return [...records.values()];
    },

    size(): number {
      return records.size;
    },
  };
}
