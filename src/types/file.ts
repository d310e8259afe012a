/**
 * File Domain Types
 *
 * A FileRecord is created once, after every configured backend has been
 * tried, and removed as a whole on deletion. It is never updated in place.
 */

/**
 * Storage backend kinds
 */
export type StorageKind = 'channel' | 'cloud' | 'local';

/**
 * Read preference, highest first
 */
export const STORAGE_PRIORITY: readonly StorageKind[] = [
  'channel',
  'cloud',
  'local',
];

/**
 * Supported compression codecs
 */
export type CompressionAlgorithm = 'gzip' | 'deflate' | 'brotli';

export const COMPRESSION_ALGORITHMS: readonly CompressionAlgorithm[] = [
  'gzip',
  'deflate',
  'brotli',
];

/**
 * Media kinds a chat message can carry
 */
export type MediaKind = 'document' | 'image' | 'video' | 'audio';

/**
 * Address of a stored message in the storage channel
 */
export interface ChannelMessageRef {
  channelId: string;
  messageId: number;
  /** Platform file handle used to fetch the payload back */
  fileId: string;
}

export interface ChannelLocation {
  kind: 'channel';
  ref: ChannelMessageRef;
  publicLocator: string;
}

export interface CloudLocation {
  kind: 'cloud';
  objectPath: string;
  publicLocator: string;
}

export interface LocalLocation {
  kind: 'local';
  path: string;
}

export type StorageLocation = ChannelLocation | CloudLocation | LocalLocation;

/**
 * An incoming upload, resolved once at the boundary
 */
export interface IncomingMedia {
  kind: MediaKind;
  suggestedName: string;
  size: number;
  mimeType: string | null;
}

/**
 * Caller-supplied description of an upload
 */
export interface UploadDescriptor {
  originalName: string;
  originalSize: number;
  mediaKind: MediaKind;
  mimeType: string | null;
  compressionAlgorithm: CompressionAlgorithm;
}

/**
 * Persisted metadata for one uploaded file
 */
export interface FileRecord {
  fileId: string;
  ownerId: string;
  originalName: string;
  originalSize: number;
  compressedSize: number;
  compressionAlgorithm: CompressionAlgorithm;
  /** Percent of the original size saved: (1 - compressed / original) * 100 */
  compressionRatio: number;
  mediaKind: MediaKind;
  mimeType: string | null;
  storageLocations: StorageLocation[];
  primaryStorageKind: StorageKind;
  publicReference: string;
  createdAt: Date;
}

/**
 * Listing entry returned to callers
 */
export type FileSummary = Pick<
  FileRecord,
  | 'fileId'
  | 'originalName'
  | 'originalSize'
  | 'compressedSize'
  | 'compressionAlgorithm'
  | 'compressionRatio'
  | 'mediaKind'
  | 'primaryStorageKind'
  | 'publicReference'
  | 'createdAt'
>;

export interface UploadReceipt {
  fileId: string;
  publicReference: string;
  primaryStorageKind: StorageKind;
  storageLocations: StorageLocation[];
}

export interface CompressionInfo {
  originalSize: number;
  compressedSize: number;
  compressionRatio: number;
  spaceSaved: number;
}

export interface IngestReceipt extends UploadReceipt {
  originalName: string;
  compressionAlgorithm: CompressionAlgorithm;
  compression: CompressionInfo;
}

export interface DownloadedFile {
  /** Decompressed copy in the staging directory; the caller removes it */
  path: string;
  originalName: string;
  originalSize: number;
  source: Exclude<StorageKind, 'cloud'>;
}

export type DownloadStage = 'fetch-start' | 'fetch-complete' | 'decompress-complete';

export interface DownloadProgress {
  stage: DownloadStage;
  percent: number;
}

/**
 * Advisory progress callback; its failures never abort a download
 */
export type ProgressSink = (progress: DownloadProgress) => void | Promise<void>;

export interface StorageInfo {
  backends: StorageKind[];
  storageDir: string;
  totalFiles: number;
  totalBytes: number;
  indexedFiles: number;
}
