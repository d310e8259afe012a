/**
 * Shared type definitions
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { StorageErrorCode } from './errors.js';
export { StorageError, BackendError } from './errors.js';
export type { ActorContext } from './actor.js';
export type {
  StorageKind,
  CompressionAlgorithm,
  MediaKind,
  ChannelMessageRef,
  ChannelLocation,
  CloudLocation,
  LocalLocation,
  StorageLocation,
  IncomingMedia,
  UploadDescriptor,
  FileRecord,
  FileSummary,
  UploadReceipt,
  CompressionInfo,
  IngestReceipt,
  DownloadedFile,
  DownloadStage,
  DownloadProgress,
  ProgressSink,
  StorageInfo,
} from './file.js';
export {
  STORAGE_PRIORITY,
  COMPRESSION_ALGORITHMS,
} from './file.js';
