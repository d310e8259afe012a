/**
 * Shared Library Exports
 */

export type {
  AppConfig,
  ChannelConfig,
  CloudConfig,
  LogLevel,
} from './config.js';
export { loadConfig, describeConfig, ConfigError } from './config.js';
export { createLogger } from './logger.js';
export { createSupabaseAdmin } from './supabase.js';
export { withDeadline } from './deadline.js';
export {
  formatFileSize,
  formatDuration,
  sanitizeFilename,
  escapeKeySegment,
  generateFileId,
} from './format.js';
