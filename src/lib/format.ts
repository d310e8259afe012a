/**
 * Formatting and naming helpers
 */

import { customAlphabet } from 'nanoid';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

const fileIdSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 6);

/**
 * Human-readable size, e.g. "1.5 MB"
 */
export function formatFileSize(sizeBytes: number): string {
  let size = sizeBytes;
  let unit = 0;

  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit += 1;
  }

  if (unit === 0) {
    return `${Math.trunc(size)} B`;
  }
  return `${size.toFixed(1)} ${SIZE_UNITS[unit] ?? 'B'}`;
}

/**
 * Human-readable duration, e.g. "2m 5s"
 */
export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const rest = seconds % 60;
    return rest > 0 ? `${minutes}m ${rest}s` : `${minutes}m`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
}

/**
 * Replace characters most filesystems reject.
 * Falls back to file_<unix seconds> when nothing usable is left.
 */
export function sanitizeFilename(name: string, now: Date = new Date()): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '_')
    .replace(/^[\s.]+|[\s.]+$/g, '');

  if (cleaned === '') {
    return `file_${Math.floor(now.getTime() / 1000)}`;
  }
  return cleaned;
}

/**
 * Reversible path segment for an id. Bytes outside [A-Za-z0-9.-] are
 * written as =XX, so distinct ids give distinct segments and the result
 * never contains '_' or '/'.
 */
export function escapeKeySegment(value: string): string {
  let escaped = '';
  for (const byte of Buffer.from(value, 'utf8')) {
    escaped += isKeySafe(byte)
      ? String.fromCharCode(byte)
      : `=${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return escaped;
}

function isKeySafe(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x2d ||
    byte === 0x2e
  );
}

/**
 * Unique file id: <unix seconds>_<6 lowercase alphanumerics>
 */
export function generateFileId(now: Date = new Date()): string {
  return `${Math.floor(now.getTime() / 1000)}_${fileIdSuffix()}`;
}
