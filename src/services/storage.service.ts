/**
 * StorageService Implementation
 *
 * Orchestrates compression, multi-backend upload, metadata recording,
 * download with fallback, and deletion across backends.
 *
 * SCOPE: storage orchestration and the file index
 * NOT IN SCOPE: chat commands, message formatting, messaging protocol
 *
 * GUARDRAILS:
 * - Every query is scoped to the owner; another owner's file is NOT_FOUND
 * - Remote backends (channel, cloud) are best-effort: failures are logged
 *   and absorbed, never surfaced
 * - The local backup is the durability floor: if it or the index flush
 *   fails, the upload fails and no record is committed
 * - Remote calls are bounded by backendTimeoutMs; a timeout is an ordinary
 *   backend failure
 * - No automatic retries; the service only decides fallback order
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import { nanoid } from 'nanoid';
import type pino from 'pino';

import { withDeadline } from '../lib/deadline.js';
import {
  escapeKeySegment,
  formatDuration,
  formatFileSize,
  generateFileId,
  sanitizeFilename,
} from '../lib/format.js';
import type {
  ChannelLocation,
  ChannelMessageRef,
  CompressionAlgorithm,
  DownloadProgress,
  DownloadedFile,
  Failure,
  FileRecord,
  FileSummary,
  IncomingMedia,
  IngestReceipt,
  LocalLocation,
  ProgressSink,
  Result,
  StorageInfo,
  StorageKind,
  StorageLocation,
  UploadDescriptor,
  UploadReceipt,
} from '../types/index.js';
import {
  STORAGE_PRIORITY,
  StorageError,
  failure,
  success,
} from '../types/index.js';

import type { CompressionService } from './compression.service.js';
import { ALGORITHM_SUFFIX } from './compression.service.js';
import type { LocalStore } from './local.storage.js';
import { ownerDirName } from './local.storage.js';
import type { MetadataIndex } from './metadata-index.js';

/**
 * Result of posting a payload to the storage channel
 */
export interface ChannelUpload {
  ref: ChannelMessageRef;
  publicLocator: string;
}

/**
 * Channel backend abstraction (message-addressed object storage)
 */
export interface StorageServiceChannel {
  readonly channelId: string;
  upload: (
    filePath: string,
    caption: string,
    signal: AbortSignal
  ) => Promise<ChannelUpload>;
  fetch: (
    ref: ChannelMessageRef,
    destPath: string,
    signal: AbortSignal
  ) => Promise<void>;
  delete: (ref: ChannelMessageRef, signal: AbortSignal) => Promise<void>;
}

/**
 * Cloud backend abstraction (redundant copy addressed by public link)
 */
export interface StorageServiceCloud {
  /** Returns the public locator, or null when the backend produced none */
  upload: (filePath: string, objectPath: string) => Promise<string | null>;
  delete: (objectPath: string) => Promise<void>;
}

/**
 * Parameters for storing a new, uncompressed file
 */
export interface IngestParams {
  sourcePath: string;
  ownerId: string;
  media: IncomingMedia;
  /** 'auto' picks a codec from the name and size */
  algorithm?: CompressionAlgorithm | 'auto';
  level?: number;
  /** Generated when omitted */
  fileId?: string;
}

export interface StorageSettings {
  tempDir: string;
  backendTimeoutMs: number;
  defaultAlgorithm: CompressionAlgorithm;
  defaultLevel: number;
}

/**
 * StorageService interface
 */
export interface StorageService {
  ingest(params: IngestParams): Promise<Result<IngestReceipt>>;
  upload(
    localPath: string,
    fileId: string,
    ownerId: string,
    descriptor: UploadDescriptor
  ): Promise<Result<UploadReceipt>>;
  download(
    fileId: string,
    ownerId: string,
    progress?: ProgressSink
  ): Promise<Result<DownloadedFile>>;
  getFile(fileId: string, ownerId: string): Promise<Result<FileSummary>>;
  delete(fileId: string, ownerId: string): Promise<Result<boolean>>;
  list(ownerId: string): Promise<Result<FileSummary[]>>;
  getStorageInfo(): Promise<Result<StorageInfo>>;
  describeBackends(): StorageKind[];
}

/**
 * A remote upload attempt in priority order
 */
interface RemoteBackend {
  kind: Exclude<StorageKind, 'local'>;
  attempt: (signal: AbortSignal) => Promise<StorageLocation | null>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function isChannelLocation(
  location: StorageLocation
): location is ChannelLocation {
  return location.kind === 'channel';
}

function isLocalLocation(location: StorageLocation): location is LocalLocation {
  return location.kind === 'local';
}

/**
 * First location by read priority; the local copy when nothing else exists
 */
function selectPrimary(
  locations: StorageLocation[],
  floor: LocalLocation
): StorageLocation {
  for (const kind of STORAGE_PRIORITY) {
    const match = locations.find((location) => location.kind === kind);
    if (match !== undefined) {
      return match;
    }
  }
  return floor;
}

function referenceOf(location: StorageLocation): string {
  return location.kind === 'local' ? location.path : location.publicLocator;
}

function toSummary(record: FileRecord): FileSummary {
  return {
    fileId: record.fileId,
    originalName: record.originalName,
    originalSize: record.originalSize,
    compressedSize: record.compressedSize,
    compressionAlgorithm: record.compressionAlgorithm,
    compressionRatio: record.compressionRatio,
    mediaKind: record.mediaKind,
    primaryStorageKind: record.primaryStorageKind,
    publicReference: record.publicReference,
    createdAt: record.createdAt,
  };
}

function storageFailure(error: StorageError): Failure {
  return failure(
    error.code === 'INPUT_NOT_FOUND' ? 'VALIDATION_ERROR' : error.code,
    error.message
  );
}

/**
 * <escaped fileId>_<basename>. The escaped id never contains '_', so
 * distinct ids never share a name. The codec suffix is always present
 * so decompression can detect the algorithm.
 */
function storedFileName(
  fileId: string,
  localPath: string,
  algorithm: CompressionAlgorithm
): string {
  const suffix = ALGORITHM_SUFFIX[algorithm];
  const base = path.basename(localPath);
  return `${escapeKeySegment(fileId)}_${base.endsWith(suffix) ? base : `${base}${suffix}`}`;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create StorageService instance
 */
export function createStorageService(deps: {
  index: MetadataIndex;
  codec: CompressionService;
  local: LocalStore;
  channel?: StorageServiceChannel | null;
  cloud?: StorageServiceCloud | null;
  logger: pino.Logger;
  settings: StorageSettings;
  now?: () => Date;
}): StorageService {
  const { index, codec, local, logger, settings } = deps;
  const channel = deps.channel ?? null;
  const cloud = deps.cloud ?? null;
  const now = deps.now ?? (() => new Date());

  /**
   * Remove a staging file; failure only leaves litter behind
   */
  async function discard(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      logger.warn({ filePath, err: error }, 'Failed to remove staging file');
    }
  }

  async function report(
    sink: ProgressSink | undefined,
    progress: DownloadProgress,
    fileId: string
  ): Promise<void> {
    if (sink === undefined) {
      return;
    }
    try {
      await sink(progress);
    } catch (error) {
      logger.debug({ fileId, err: error }, 'Progress sink failed, ignoring');
    }
  }

  function remoteBackendsFor(
    localPath: string,
    fileId: string,
    ownerId: string,
    descriptor: UploadDescriptor
  ): RemoteBackend[] {
    const backends: RemoteBackend[] = [];

    if (channel !== null) {
      const caption = `File ID: ${fileId}\nUser: ${ownerId}\nOriginal: ${descriptor.originalName}`;
      backends.push({
        kind: 'channel',
        attempt: async (signal) => {
          const sent = await channel.upload(localPath, caption, signal);
          return {
            kind: 'channel',
            ref: sent.ref,
            publicLocator: sent.publicLocator,
          };
        },
      });
    }

    if (cloud !== null) {
      const objectPath = `${ownerDirName(ownerId)}/${storedFileName(fileId, localPath, descriptor.compressionAlgorithm)}`;
      backends.push({
        kind: 'cloud',
        attempt: async () => {
          const publicLocator = await cloud.upload(localPath, objectPath);
          return publicLocator === null
            ? null
            : { kind: 'cloud', objectPath, publicLocator };
        },
      });
    }

    return backends;
  }

  /**
   * Best-effort removal of one stored copy
   */
  async function removeLocation(
    location: StorageLocation,
    fileId: string
  ): Promise<void> {
    try {
      switch (location.kind) {
        case 'local':
          await local.remove(location.path);
          return;
        case 'channel': {
          if (channel === null) {
            logger.warn({ fileId }, 'Channel not configured, message kept');
            return;
          }
          const { ref } = location;
          await withDeadline('channel', settings.backendTimeoutMs, (signal) =>
            channel.delete(ref, signal)
          );
          return;
        }
        case 'cloud': {
          if (cloud === null) {
            logger.warn({ fileId }, 'Cloud not configured, object kept');
            return;
          }
          const { objectPath } = location;
          await withDeadline('cloud', settings.backendTimeoutMs, () =>
            cloud.delete(objectPath)
          );
          return;
        }
      }
    } catch (error) {
      logger.warn(
        { fileId, backend: location.kind, err: error },
        'Failed to remove stored copy'
      );
    }
  }

  async function upload(
    localPath: string,
    fileId: string,
    ownerId: string,
    descriptor: UploadDescriptor
  ): Promise<Result<UploadReceipt>> {
    if (!fileId || fileId.trim() === '') {
      return failure('VALIDATION_ERROR', 'fileId is required');
    }
    if (!ownerId || ownerId.trim() === '') {
      return failure('VALIDATION_ERROR', 'ownerId is required');
    }

    let compressedSize: number;
    try {
      const info = await stat(localPath);
      if (!info.isFile()) {
        return failure('VALIDATION_ERROR', `Not a file: ${localPath}`);
      }
      compressedSize = info.size;
    } catch (error) {
      logger.warn({ fileId, localPath, err: error }, 'Upload source missing');
      return failure('VALIDATION_ERROR', `File not found: ${localPath}`);
    }

    // 1-2. Remote backends, best-effort, in priority order
    const locations: StorageLocation[] = [];
    for (const backend of remoteBackendsFor(
      localPath,
      fileId,
      ownerId,
      descriptor
    )) {
      try {
        const location = await withDeadline(
          backend.kind,
          settings.backendTimeoutMs,
          backend.attempt
        );
        if (location === null) {
          logger.warn(
            { fileId, backend: backend.kind },
            'Backend returned no locator'
          );
          continue;
        }
        locations.push(location);
        logger.info({ fileId, backend: backend.kind }, 'Stored remote copy');
      } catch (error) {
        logger.warn(
          { fileId, backend: backend.kind, err: error },
          'Remote upload failed, continuing'
        );
      }
    }

    // 3. Local backup, the durability floor
    let storedPath: string;
    try {
      storedPath = await local.save(
        localPath,
        ownerId,
        storedFileName(fileId, localPath, descriptor.compressionAlgorithm)
      );
    } catch (error) {
      logger.error({ fileId, err: error }, 'Local backup failed');
      for (const location of locations) {
        await removeLocation(location, fileId);
      }
      return failure('DURABILITY_FAILURE', 'Failed to write local backup');
    }

    // 4. Primary by fixed priority
    const localLocation: LocalLocation = { kind: 'local', path: storedPath };
    locations.push(localLocation);
    const primary = selectPrimary(locations, localLocation);

    // 5. Persist
    const compression = codec.getCompressionInfo(
      descriptor.originalSize,
      compressedSize
    );
    const record: FileRecord = {
      fileId,
      ownerId,
      originalName: descriptor.originalName,
      originalSize: descriptor.originalSize,
      compressedSize,
      compressionAlgorithm: descriptor.compressionAlgorithm,
      compressionRatio: compression.compressionRatio,
      mediaKind: descriptor.mediaKind,
      mimeType: descriptor.mimeType,
      storageLocations: locations,
      primaryStorageKind: primary.kind,
      publicReference: referenceOf(primary),
      createdAt: now(),
    };

    try {
      await index.put(fileId, record);
    } catch (error) {
      if (error instanceof StorageError) {
        for (const location of locations) {
          await removeLocation(location, fileId);
        }
        return storageFailure(error);
      }
      throw error;
    }

    // 6. Reference of the primary copy
    return success({
      fileId,
      publicReference: record.publicReference,
      primaryStorageKind: record.primaryStorageKind,
      storageLocations: structuredClone(locations),
    });
  }

  async function ingest(params: IngestParams): Promise<Result<IngestReceipt>> {
    const { sourcePath, ownerId, media } = params;
    const algorithm =
      params.algorithm === 'auto'
        ? codec.recommendAlgorithm(
            media.suggestedName,
            media.size,
            settings.defaultAlgorithm
          )
        : (params.algorithm ?? settings.defaultAlgorithm);
    const level = params.level ?? settings.defaultLevel;
    const startedAt = now().getTime();

    if (!ownerId || ownerId.trim() === '') {
      return failure('VALIDATION_ERROR', 'ownerId is required');
    }

    let compressedPath: string;
    try {
      compressedPath = await codec.compress(sourcePath, algorithm, level);
    } catch (error) {
      if (error instanceof StorageError) {
        return storageFailure(error);
      }
      throw error;
    }

    try {
      const originalSize = (await stat(sourcePath)).size;
      const compressedSize = (await stat(compressedPath)).size;
      const fileId = params.fileId ?? generateFileId(now());

      const stored = await upload(compressedPath, fileId, ownerId, {
        originalName: media.suggestedName,
        originalSize,
        mediaKind: media.kind,
        mimeType: media.mimeType,
        compressionAlgorithm: algorithm,
      });
      if (!stored.success) {
        return stored;
      }

      const compression = codec.getCompressionInfo(originalSize, compressedSize);
      logger.info(
        {
          fileId,
          ownerId,
          algorithm,
          original: formatFileSize(originalSize),
          compressed: formatFileSize(compressedSize),
          ratio: Number(compression.compressionRatio.toFixed(1)),
          primary: stored.data.primaryStorageKind,
          took: formatDuration(now().getTime() - startedAt),
        },
        'File stored'
      );

      return success({
        ...stored.data,
        originalName: media.suggestedName,
        compressionAlgorithm: algorithm,
        compression,
      });
    } finally {
      await discard(compressedPath);
    }
  }

  async function download(
    fileId: string,
    ownerId: string,
    progress?: ProgressSink
  ): Promise<Result<DownloadedFile>> {
    const record = index.getForOwner(fileId, ownerId);
    if (record === null) {
      return failure('NOT_FOUND', 'File not found');
    }

    await report(progress, { stage: 'fetch-start', percent: 10 }, fileId);
    try {
      await mkdir(settings.tempDir, { recursive: true });
    } catch (error) {
      logger.error(
        { fileId, tempDir: settings.tempDir, err: error },
        'Staging directory unavailable'
      );
      return failure('INTERNAL_ERROR', 'Staging directory is not writable');
    }

    const suffix = ALGORITHM_SUFFIX[record.compressionAlgorithm];
    const token = nanoid(6);
    let stagedPath: string | null = null;

    try {
      let sourcePath: string | null = null;
      let source: DownloadedFile['source'] = 'local';

      // 1. Channel copy first
      const channelLocation = record.storageLocations.find(isChannelLocation);
      if (channelLocation !== undefined && channel !== null) {
        const candidate = path.join(
          settings.tempDir,
          `channel_download_${escapeKeySegment(fileId)}_${token}${suffix}`
        );
        stagedPath = candidate;
        try {
          await withDeadline('channel', settings.backendTimeoutMs, (signal) =>
            channel.fetch(channelLocation.ref, candidate, signal)
          );
          sourcePath = candidate;
          source = 'channel';
        } catch (error) {
          logger.warn(
            { fileId, err: error },
            'Channel download failed, using local backup'
          );
        }
      }

      // 2. Local backup; its absence means data loss
      if (sourcePath === null) {
        const localLocation = record.storageLocations.find(isLocalLocation);
        if (
          localLocation === undefined ||
          !(await local.exists(localLocation.path))
        ) {
          logger.error({ fileId }, 'Local backup is missing');
          return failure(
            'FILE_UNAVAILABLE',
            'File is not available in any storage location'
          );
        }
        sourcePath = localLocation.path;
      }

      await report(progress, { stage: 'fetch-complete', percent: 60 }, fileId);

      // 3. Decompress into the staging directory
      const outputPath = path.join(
        settings.tempDir,
        `restored_${escapeKeySegment(fileId)}_${token}_${sanitizeFilename(record.originalName)}`
      );
      try {
        await codec.decompress(sourcePath, outputPath);
      } catch (error) {
        if (
          error instanceof StorageError &&
          error.code === 'UNSUPPORTED_OPERATION'
        ) {
          return storageFailure(error);
        }
        logger.error({ fileId, source, err: error }, 'Decompression failed');
        return failure(
          'FILE_UNAVAILABLE',
          'Stored payload could not be decompressed'
        );
      }

      await report(
        progress,
        { stage: 'decompress-complete', percent: 100 },
        fileId
      );

      return success({
        path: outputPath,
        originalName: record.originalName,
        originalSize: record.originalSize,
        source,
      });
    } finally {
      // 4. Remote staging never outlives the request
      if (stagedPath !== null) {
        await discard(stagedPath);
      }
    }
  }

  async function getFile(
    fileId: string,
    ownerId: string
  ): Promise<Result<FileSummary>> {
    const record = index.getForOwner(fileId, ownerId);
    if (record === null) {
      return failure('NOT_FOUND', 'File not found');
    }
    return success(toSummary(record));
  }

  async function deleteFile(
    fileId: string,
    ownerId: string
  ): Promise<Result<boolean>> {
    const record = index.getForOwner(fileId, ownerId);
    if (record === null) {
      return success(false);
    }

    // The record decides existence; commit its removal first
    try {
      await index.delete(fileId);
    } catch (error) {
      if (error instanceof StorageError) {
        return storageFailure(error);
      }
      throw error;
    }

    for (const location of record.storageLocations) {
      await removeLocation(location, fileId);
    }

    logger.info({ fileId, ownerId }, 'File deleted');
    return success(true);
  }

  async function list(ownerId: string): Promise<Result<FileSummary[]>> {
    const records = index
      .all()
      .filter((record) => record.ownerId === ownerId)
      // Later insertions win ties on createdAt
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return success(records.map(toSummary));
  }

  function describeBackends(): StorageKind[] {
    const kinds: StorageKind[] = [];
    if (channel !== null) {
      kinds.push('channel');
    }
    if (cloud !== null) {
      kinds.push('cloud');
    }
    kinds.push('local');
    return kinds;
  }

  async function getStorageInfo(): Promise<Result<StorageInfo>> {
    try {
      const usage = await local.usage();
      return success({
        backends: describeBackends(),
        storageDir: local.rootDir,
        totalFiles: usage.fileCount,
        totalBytes: usage.totalBytes,
        indexedFiles: index.size(),
      });
    } catch (error) {
      logger.error({ err: error }, 'Failed to read storage usage');
      return failure('INTERNAL_ERROR', 'Failed to read storage usage');
    }
  }

  return {
    ingest,
    upload,
    download,
    getFile,
    delete: deleteFile,
    list,
    getStorageInfo,
    describeBackends,
  };
}
