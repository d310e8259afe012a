/**
 * Incoming media resolution
 *
 * Every upload is described once, here, as { kind, suggestedName, size,
 * mimeType } before it reaches the storage service.
 */

import { sanitizeFilename } from '../../lib/format.js';
import type { IncomingMedia, MediaKind } from '../../types/index.js';

const DEFAULT_NAME: Record<MediaKind, (timestamp: number) => string> = {
  document: (timestamp) => `file_${timestamp}`,
  image: (timestamp) => `photo_${timestamp}.jpg`,
  video: (timestamp) => `video_${timestamp}.mp4`,
  audio: (timestamp) => `audio_${timestamp}.mp3`,
};

/**
 * Media kind implied by a MIME type
 */
export function mediaKindFromMime(mimeType: string | null): MediaKind {
  if (mimeType === null) {
    return 'document';
  }
  if (mimeType.startsWith('image/')) {
    return 'image';
  }
  if (mimeType.startsWith('video/')) {
    return 'video';
  }
  if (mimeType.startsWith('audio/')) {
    return 'audio';
  }
  return 'document';
}

export function resolveIncomingMedia(
  input: {
    kind?: MediaKind;
    fileName: string | null;
    size: number;
    mimeType: string | null;
  },
  now: Date = new Date()
): IncomingMedia {
  const mimeType =
    input.mimeType === null || input.mimeType.trim() === ''
      ? null
      : input.mimeType;
  const kind = input.kind ?? mediaKindFromMime(mimeType);
  const timestamp = Math.floor(now.getTime() / 1000);

  const suggestedName =
    input.fileName === null || input.fileName.trim() === ''
      ? DEFAULT_NAME[kind](timestamp)
      : sanitizeFilename(input.fileName, now);

  return { kind, suggestedName, size: input.size, mimeType };
}
