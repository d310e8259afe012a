/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to stored files and the metadata index.
 */

// CompressionService
export type { CompressionService } from './compression.service.js';
export {
  ALGORITHM_SUFFIX,
  algorithmFromPath,
  createCompressionService,
  isCompressionAlgorithm,
} from './compression.service.js';

// MetadataIndex
export type { MetadataIndex } from './metadata-index.js';
export { loadMetadataIndex } from './metadata-index.js';

// Backends
export type { LocalStore, LocalStorageUsage } from './local.storage.js';
export { createLocalStore, ownerDirName } from './local.storage.js';
export {
  channelMessageLink,
  createTelegramChannelAdapter,
} from './channel.storage.js';
export { createSupabaseCloudAdapter } from './cloud.storage.js';

// StorageService
export type {
  ChannelUpload,
  IngestParams,
  StorageService,
  StorageServiceChannel,
  StorageServiceCloud,
  StorageSettings,
} from './storage.service.js';
export { createStorageService } from './storage.service.js';
